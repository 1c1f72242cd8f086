import { vi, type Mock } from 'vitest';
import type { Logger } from '../application/auth/ports.js';
import type { PasswordHashingParams } from '../domain/auth/password.js';
import { migrateSqlite } from '../infra/db/migrate.js';
import { openSqlite, type SqliteDatabase } from '../infra/db/sqlite/database.js';

/** Argon2 at its minimum cost, for tests that hash often. */
export const FAST_HASHING: PasswordHashingParams = {
  memoryCost: 1024,
  timeCost: 2,
  parallelism: 1,
};

export const TEST_SECRET = 'test-secret-0123456789';

export type RecordingLogger = Logger & { info: Mock; warn: Mock; error: Mock };

export function silentLogger(): RecordingLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export async function openMigratedSqlite(): Promise<SqliteDatabase> {
  const db = openSqlite(':memory:');
  await migrateSqlite(db, silentLogger());
  return db;
}

/**
 * Mutable clock for token tests.
 */
export class TestClock {
  constructor(private current: Date = new Date('2026-01-15T12:00:00.000Z')) {}

  now = (): Date => new Date(this.current.getTime());

  advanceSeconds(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }

  advanceDays(days: number): void {
    this.advanceSeconds(days * 24 * 60 * 60);
  }
}
