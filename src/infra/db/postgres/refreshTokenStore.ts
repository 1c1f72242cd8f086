import type {
  RefreshTokenRecord,
  RefreshTokenStore,
  RefreshTokenSuccessor,
  RotationOutcome,
} from '../../../application/auth/ports.js';
import { StorageError } from '../../../application/errors.js';
import { err, ok, type Result } from '../../../domain/result.js';
import { withTransaction, type PgPool } from './pool.js';

export class PostgresRefreshTokenStore implements RefreshTokenStore {
  constructor(private readonly pool: PgPool) {}

  async insert(record: RefreshTokenRecord): Promise<Result<void, StorageError>> {
    try {
      await this.pool.query(
        `INSERT INTO refresh_tokens (token_hash, user_id, expires_at, created_at)
         VALUES ($1, $2, $3, $4)`,
        [record.tokenHash, record.userId, record.expiresAt, record.createdAt]
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
    try {
      const outcome = await withTransaction(this.pool, async (client): Promise<RotationOutcome> => {
        // Conditional update: only one concurrent caller can flip revoked_at
        const consumed = await client.query<{ user_id: string; expires_at: Date }>(
          `UPDATE refresh_tokens
           SET revoked_at = $2
           WHERE token_hash = $1 AND revoked_at IS NULL
           RETURNING user_id, expires_at`,
          [tokenHash, now]
        );

        if (consumed.rows.length === 0) {
          const existing = await client.query(
            'SELECT 1 FROM refresh_tokens WHERE token_hash = $1',
            [tokenHash]
          );
          return existing.rows.length > 0 ? { status: 'consumed' } : { status: 'unknown' };
        }

        const row = consumed.rows[0];
        if (row.expires_at.getTime() <= now.getTime()) {
          return { status: 'expired' };
        }

        await client.query(
          `INSERT INTO refresh_tokens (token_hash, user_id, expires_at, created_at)
           VALUES ($1, $2, $3, $4)`,
          [successor.tokenHash, row.user_id, successor.expiresAt, successor.createdAt]
        );
        return { status: 'rotated', userId: row.user_id };
      });

      return ok(outcome);
    } catch (error) {
      return err(new StorageError('Failed to rotate refresh token', { cause: error }));
    }
  }

  async revoke(tokenHash: string, now: Date): Promise<Result<boolean, StorageError>> {
    try {
      const result = await this.pool.query(
        `UPDATE refresh_tokens SET revoked_at = $2
         WHERE token_hash = $1 AND revoked_at IS NULL`,
        [tokenHash, now]
      );
      return ok((result.rowCount ?? 0) > 0);
    } catch (error) {
      return err(new StorageError('Failed to revoke refresh token', { cause: error }));
    }
  }
}
