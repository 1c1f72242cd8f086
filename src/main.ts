import { PasswordHasher } from './domain/auth/password.js';
import { TokenIssuer } from './application/auth/tokenIssuer.js';
import { UserService } from './application/auth/userService.js';
import { loadConfigFromEnv } from './infra/config.js';
import { createPersistence } from './infra/db/persistence.js';
import { createApp } from './infra/http/server.js';

async function main(): Promise<void> {
  const config = loadConfigFromEnv();

  const persistence = createPersistence(config);
  console.log(`Using ${persistence.engine} storage`);
  await persistence.migrate();

  const hasher = new PasswordHasher(config.hashing);
  const tokens = new TokenIssuer(
    {
      secret: config.jwtSecret,
      accessTokenTtlSeconds: config.accessTokenTtlSeconds,
      refreshTokenTtlDays: config.refreshTokenTtlDays,
    },
    persistence.refreshTokens
  );
  const service = new UserService(persistence.users, hasher, tokens);

  const warmed = await service.warmUp();
  if (!warmed.ok) {
    throw warmed.error;
  }

  const app = createApp({
    service,
    users: persistence.users,
    corsOrigin: config.corsOrigin,
    port: config.port,
  });

  const server = app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/healthz`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      persistence.close().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('Failed to close database:', error);
          process.exit(1);
        }
      );
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Startup failed:', error);
  process.exit(1);
});
