import type { Logger, RefreshTokenStore, UserRepository } from '../../application/auth/ports.js';
import type { AppConfig, DatabaseType } from '../config.js';
import { migratePostgres, migrateSqlite } from './migrate.js';
import { createPgPool } from './postgres/pool.js';
import { PostgresRefreshTokenStore } from './postgres/refreshTokenStore.js';
import { PostgresUserRepo } from './postgres/userRepo.js';
import { openSqlite, type SqliteDatabase } from './sqlite/database.js';
import { SqliteRefreshTokenStore } from './sqlite/refreshTokenStore.js';
import { SqliteUserRepo } from './sqlite/userRepo.js';

/**
 * The storage engine chosen at startup, behind the two persistence contracts.
 */
export interface Persistence {
  readonly engine: DatabaseType;
  readonly users: UserRepository;
  readonly refreshTokens: RefreshTokenStore;
  /** Apply pending migrations; returns how many ran. */
  migrate(): Promise<number>;
  close(): Promise<void>;
}

export function createPersistence(
  config: Pick<AppConfig, 'databaseType' | 'databaseUrl' | 'dbPoolMax'>,
  logger: Logger = console
): Persistence {
  switch (config.databaseType) {
    case 'postgres': {
      const pool = createPgPool(
        { connectionString: config.databaseUrl, max: config.dbPoolMax },
        logger
      );
      return {
        engine: 'postgres',
        users: new PostgresUserRepo(pool),
        refreshTokens: new PostgresRefreshTokenStore(pool),
        migrate: () => migratePostgres(pool, logger),
        close: () => pool.end(),
      };
    }
    case 'sqlite':
      return sqlitePersistence(openSqlite(config.databaseUrl), logger);
  }
}

/**
 * Wrap an already open SQLite database.
 */
export function sqlitePersistence(db: SqliteDatabase, logger: Logger = console): Persistence {
  return {
    engine: 'sqlite',
    users: new SqliteUserRepo(db),
    refreshTokens: new SqliteRefreshTokenStore(db),
    migrate: () => migrateSqlite(db, logger),
    close: async () => {
      db.close();
    },
  };
}
