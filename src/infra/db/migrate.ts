import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import type { Logger } from '../../application/auth/ports.js';
import type { DatabaseType } from '../config.js';
import { withTransaction, type PgPool } from './postgres/pool.js';
import type { SqliteDatabase } from './sqlite/database.js';

const MIGRATIONS_ROOT = join(process.cwd(), 'src/infra/db/migrations');

export function migrationsDir(engine: DatabaseType): string {
  return join(MIGRATIONS_ROOT, engine);
}

export interface Migration {
  filename: string;
  version: number;
}

export async function getMigrations(dir: string): Promise<Migration[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

/**
 * Apply pending Postgres migrations, one transaction per file.
 * Returns the number applied.
 */
export async function migratePostgres(
  pool: PgPool,
  logger: Logger = console,
  dir: string = migrationsDir('postgres')
): Promise<number> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const migrations = await getMigrations(dir);
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  const applied = new Set(result.rows.map((row) => row.version));
  const pending = migrations.filter((m) => !applied.has(m.version));

  if (pending.length === 0) {
    logger.info('No pending migrations.');
    return 0;
  }

  logger.info(`Found ${pending.length} pending migration(s)`);

  for (const migration of pending) {
    const sql = await readFile(join(dir, migration.filename), 'utf-8');
    await withTransaction(pool, async (client) => {
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
        migration.version,
      ]);
    });
    logger.info(`✓ Applied migration ${migration.version}: ${migration.filename}`);
  }

  return pending.length;
}

/**
 * SQLite counterpart of migratePostgres. Files are read up front so each
 * transaction stays synchronous.
 */
export async function migrateSqlite(
  db: SqliteDatabase,
  logger: Logger = console,
  dir: string = migrationsDir('sqlite')
): Promise<number> {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    )
  `);

  const migrations = await getMigrations(dir);
  const rows = db
    .prepare<[], { version: number }>('SELECT version FROM schema_migrations ORDER BY version')
    .all();
  const applied = new Set(rows.map((row) => row.version));
  const pending = migrations.filter((m) => !applied.has(m.version));

  if (pending.length === 0) {
    logger.info('No pending migrations.');
    return 0;
  }

  logger.info(`Found ${pending.length} pending migration(s)`);

  const record = db.prepare<[number]>('INSERT INTO schema_migrations (version) VALUES (?)');
  for (const migration of pending) {
    const sql = await readFile(join(dir, migration.filename), 'utf-8');
    db.transaction(() => {
      db.exec(sql);
      record.run(migration.version);
    })();
    logger.info(`✓ Applied migration ${migration.version}: ${migration.filename}`);
  }

  return pending.length;
}
