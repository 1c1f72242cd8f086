import type { Statement } from 'better-sqlite3';
import type {
  RefreshTokenRecord,
  RefreshTokenStore,
  RefreshTokenSuccessor,
  RotationOutcome,
} from '../../../application/auth/ports.js';
import { StorageError } from '../../../application/errors.js';
import { err, ok, type Result } from '../../../domain/result.js';
import { parseSqliteTimestamp, toSqliteTimestamp, type SqliteDatabase } from './database.js';

interface ConsumedRow {
  user_id: string;
  expires_at: string;
}

type InsertParams = [string, string, string, string];

export class SqliteRefreshTokenStore implements RefreshTokenStore {
  private readonly db: SqliteDatabase;
  private readonly insertStmt: Statement<InsertParams>;
  private readonly consumeStmt: Statement<[string, string], ConsumedRow>;
  private readonly existsStmt: Statement<[string], { found: number }>;
  private readonly revokeStmt: Statement<[string, string]>;

  constructor(db: SqliteDatabase) {
    this.db = db;
    this.insertStmt = db.prepare<InsertParams>(
      `INSERT INTO refresh_tokens (token_hash, user_id, expires_at, created_at)
       VALUES (?, ?, ?, ?)`
    );
    this.consumeStmt = db.prepare<[string, string], ConsumedRow>(
      `UPDATE refresh_tokens
       SET revoked_at = ?
       WHERE token_hash = ? AND revoked_at IS NULL
       RETURNING user_id, expires_at`
    );
    this.existsStmt = db.prepare<[string], { found: number }>(
      'SELECT 1 AS found FROM refresh_tokens WHERE token_hash = ?'
    );
    this.revokeStmt = db.prepare<[string, string]>(
      `UPDATE refresh_tokens SET revoked_at = ?
       WHERE token_hash = ? AND revoked_at IS NULL`
    );
  }

  async insert(record: RefreshTokenRecord): Promise<Result<void, StorageError>> {
    try {
      this.insertStmt.run(
        record.tokenHash,
        record.userId,
        toSqliteTimestamp(record.expiresAt),
        toSqliteTimestamp(record.createdAt)
      );
      return ok(undefined);
    } catch (error) {
      return err(new StorageError('Failed to store refresh token', { cause: error }));
    }
  }

  async rotate(
    tokenHash: string,
    successor: RefreshTokenSuccessor,
    now: Date
  ): Promise<Result<RotationOutcome, StorageError>> {
    const rotation = this.db.transaction((): RotationOutcome => {
      const consumed = this.consumeStmt.get(toSqliteTimestamp(now), tokenHash);
      if (!consumed) {
        return this.existsStmt.get(tokenHash) ? { status: 'consumed' } : { status: 'unknown' };
      }

      if (parseSqliteTimestamp(consumed.expires_at).getTime() <= now.getTime()) {
        return { status: 'expired' };
      }

      this.insertStmt.run(
        successor.tokenHash,
        consumed.user_id,
        toSqliteTimestamp(successor.expiresAt),
        toSqliteTimestamp(successor.createdAt)
      );
      return { status: 'rotated', userId: consumed.user_id };
    });

    try {
      // BEGIN IMMEDIATE takes the write lock before the read
      return ok(rotation.immediate());
    } catch (error) {
      return err(new StorageError('Failed to rotate refresh token', { cause: error }));
    }
  }

  async revoke(tokenHash: string, now: Date): Promise<Result<boolean, StorageError>> {
    try {
      const result = this.revokeStmt.run(toSqliteTimestamp(now), tokenHash);
      return ok(result.changes > 0);
    } catch (error) {
      return err(new StorageError('Failed to revoke refresh token', { cause: error }));
    }
  }
}
