import { loadConfigFromEnv } from '../infra/config.js';
import { createPersistence } from '../infra/db/persistence.js';

async function migrate(): Promise<void> {
  const config = loadConfigFromEnv();
  const persistence = createPersistence(config);

  try {
    console.log(`Starting ${persistence.engine} migrations...`);
    const applied = await persistence.migrate();
    console.log(
      applied === 0 ? 'Database is up to date.' : 'All migrations applied successfully.'
    );
  } finally {
    await persistence.close();
  }
}

migrate().catch((error: unknown) => {
  console.error('Migration failed:', error);
  process.exitCode = 1;
});
