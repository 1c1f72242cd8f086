import pg from 'pg';
import type { Logger } from '../../../application/auth/ports.js';

const { Pool } = pg;

export interface PgPoolOptions {
  connectionString: string;
  max: number;
}

/**
 * The subset of pg.Pool the adapters use.
 */
export type PgPool = Pick<pg.Pool, 'query' | 'connect'>;

export function createPgPool(options: PgPoolOptions, logger: Logger = console): pg.Pool {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.info('Database connection established');
  });

  pool.on('error', (error) => {
    logger.error('Unexpected database error:', error);
  });

  return pool;
}

/**
 * Run `work` inside BEGIN/COMMIT on one pooled client. Rolls back and rethrows
 * on failure; a client whose rollback also failed is discarded.
 */
export async function withTransaction<T>(
  pool: PgPool,
  work: (client: pg.PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      broken = rollbackError instanceof Error ? rollbackError : new Error('ROLLBACK failed');
    }
    throw error;
  } finally {
    client.release(broken);
  }
}
