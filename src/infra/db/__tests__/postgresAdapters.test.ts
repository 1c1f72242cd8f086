import { describe, it, expect, vi } from 'vitest';
import pg from 'pg';
import { PostgresUserRepo } from '../postgres/userRepo.js';
import { PostgresRefreshTokenStore } from '../postgres/refreshTokenStore.js';
import { violatedUserField } from '../postgres/errors.js';
import {
  DuplicateEmailError,
  DuplicateUsernameError,
  NotFoundError,
  StorageError,
} from '../../../application/errors.js';

function uniqueViolation(options: { constraint?: string; detail?: string }): pg.DatabaseError {
  const error = new pg.DatabaseError('duplicate key value violates unique constraint', 0, 'error');
  error.code = '23505';
  error.constraint = options.constraint;
  error.detail = options.detail;
  return error;
}

/** A pool whose every query and connect fails with `error`. */
function failingPool(error: unknown) {
  return {
    query: vi.fn(async () => {
      throw error;
    }),
    connect: vi.fn(async () => {
      throw error;
    }),
  };
}

const NEW_USER = { username: 'alice', email: 'alice@x.com', passwordHash: 'hash' };

describe('violatedUserField (Postgres)', () => {
  it('should map the users constraints by name', () => {
    expect(violatedUserField(uniqueViolation({ constraint: 'users_username_key' }))).toBe(
      'username'
    );
    expect(violatedUserField(uniqueViolation({ constraint: 'users_email_key' }))).toBe('email');
  });

  it('should fall back to the Key (column) detail', () => {
    expect(
      violatedUserField(uniqueViolation({ detail: 'Key (email)=(alice@x.com) already exists.' }))
    ).toBe('email');
    expect(
      violatedUserField(uniqueViolation({ detail: 'Key (username)=(alice) already exists.' }))
    ).toBe('username');
  });

  it('should ignore other codes, other columns and foreign errors', () => {
    const notNull = uniqueViolation({ constraint: 'users_username_key' });
    notNull.code = '23502';

    expect(violatedUserField(notNull)).toBeNull();
    expect(violatedUserField(uniqueViolation({ constraint: 'refresh_tokens_pkey' }))).toBeNull();
    expect(violatedUserField(new Error('duplicate key'))).toBeNull();
  });
});

describe('PostgresUserRepo error mapping', () => {
  it('should turn a username violation into DuplicateUsernameError', async () => {
    const repo = new PostgresUserRepo(failingPool(uniqueViolation({ constraint: 'users_username_key' })));

    const result = await repo.create(NEW_USER);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DuplicateUsernameError);
  });

  it('should turn an email violation into DuplicateEmailError', async () => {
    const repo = new PostgresUserRepo(failingPool(uniqueViolation({ constraint: 'users_email_key' })));

    const result = await repo.create(NEW_USER);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DuplicateEmailError);
  });

  it('should wrap any other failure in StorageError with its cause', async () => {
    const cause = new Error('connect ECONNREFUSED');
    const repo = new PostgresUserRepo(failingPool(cause));

    const results = [
      await repo.create(NEW_USER),
      await repo.findByUsername('alice'),
      await repo.findById('00000000-0000-4000-8000-000000000000'),
      await repo.deleteById('00000000-0000-4000-8000-000000000000'),
      await repo.ping(),
    ];

    for (const result of results) {
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(StorageError);
      expect(result.error.cause).toBe(cause);
    }
  });

  it('should not query for an id that is not a UUID', async () => {
    const pool = failingPool(new Error('should not be called'));
    const repo = new PostgresUserRepo(pool);

    const found = await repo.findById('42');
    const deleted = await repo.deleteById('42');

    expect(found.ok).toBe(false);
    if (!found.ok) expect(found.error).toBeInstanceOf(NotFoundError);
    expect(deleted).toEqual({ ok: true, value: false });
    expect(pool.query).not.toHaveBeenCalled();
  });
});

describe('PostgresRefreshTokenStore error mapping', () => {
  it('should wrap pool failures in StorageError', async () => {
    const store = new PostgresRefreshTokenStore(failingPool(new Error('pool exhausted')));
    const now = new Date('2026-01-15T12:00:00.000Z');

    const results = [
      await store.insert({ tokenHash: 'h', userId: 'u', expiresAt: now, createdAt: now }),
      await store.rotate('h', { tokenHash: 'h2', expiresAt: now, createdAt: now }, now),
      await store.revoke('h', now),
    ];

    for (const result of results) {
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(StorageError);
    }
  });
});

/**
 * A pool that hands out one client whose queries answer in order with the
 * given rows, or reject where an Error is given.
 */
function scriptedPool(...steps: Array<Array<Record<string, unknown>> | Error>) {
  const query = vi.fn();
  for (const step of steps) {
    if (step instanceof Error) {
      query.mockRejectedValueOnce(step);
    } else {
      query.mockResolvedValueOnce({ rows: step, rowCount: step.length });
    }
  }
  const client = { query, release: vi.fn() };
  return { pool: { query: vi.fn(), connect: vi.fn().mockResolvedValue(client) }, client };
}

const sqlOf = (client: { query: { mock: { calls: unknown[][] } } }) =>
  client.query.mock.calls.map(([sql]) => String(sql).trim().split(/\s+/)[0]);

describe('PostgresRefreshTokenStore.rotate', () => {
  const now = new Date('2026-01-15T12:00:00.000Z');
  const later = new Date('2026-01-22T12:00:00.000Z');
  const successor = { tokenHash: 'next-hash', expiresAt: later, createdAt: now };
  const userId = '11111111-1111-4111-8111-111111111111';

  it('should consume the token and insert its successor in one transaction', async () => {
    const { pool, client } = scriptedPool(
      [],
      [{ user_id: userId, expires_at: later }],
      [],
      []
    );
    const store = new PostgresRefreshTokenStore(pool);

    const result = await store.rotate('old-hash', successor, now);

    expect(result).toEqual({ ok: true, value: { status: 'rotated', userId } });
    expect(sqlOf(client)).toEqual(['BEGIN', 'UPDATE', 'INSERT', 'COMMIT']);
    expect(client.query.mock.calls[1][1]).toEqual(['old-hash', now]);
    expect(client.query.mock.calls[2][1]).toEqual(['next-hash', userId, later, now]);
    expect(client.release).toHaveBeenCalledWith(undefined);
  });

  it('should report a consumed token when the row exists but is already revoked', async () => {
    const { pool, client } = scriptedPool([], [], [{ '?column?': 1 }], []);
    const store = new PostgresRefreshTokenStore(pool);

    const result = await store.rotate('old-hash', successor, now);

    expect(result).toEqual({ ok: true, value: { status: 'consumed' } });
    expect(sqlOf(client)).toEqual(['BEGIN', 'UPDATE', 'SELECT', 'COMMIT']);
  });

  it('should report an unknown token when no row matches', async () => {
    const { pool, client } = scriptedPool([], [], [], []);
    const store = new PostgresRefreshTokenStore(pool);

    const result = await store.rotate('old-hash', successor, now);

    expect(result).toEqual({ ok: true, value: { status: 'unknown' } });
    expect(sqlOf(client)).toEqual(['BEGIN', 'UPDATE', 'SELECT', 'COMMIT']);
  });

  it('should report an expired token without inserting a successor', async () => {
    const { pool, client } = scriptedPool([], [{ user_id: userId, expires_at: now }], []);
    const store = new PostgresRefreshTokenStore(pool);

    const result = await store.rotate('old-hash', successor, now);

    expect(result).toEqual({ ok: true, value: { status: 'expired' } });
    expect(sqlOf(client)).toEqual(['BEGIN', 'UPDATE', 'COMMIT']);
  });

  it('should roll back and return StorageError when the insert fails', async () => {
    const cause = new Error('disk full');
    const { pool, client } = scriptedPool(
      [],
      [{ user_id: userId, expires_at: later }],
      cause,
      []
    );
    const store = new PostgresRefreshTokenStore(pool);

    const result = await store.rotate('old-hash', successor, now);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(StorageError);
    expect(result.error.cause).toBe(cause);
    expect(sqlOf(client)).toEqual(['BEGIN', 'UPDATE', 'INSERT', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledWith(undefined);
  });

  it('should discard the client when the rollback fails too', async () => {
    const rollbackError = new Error('connection terminated');
    const { pool, client } = scriptedPool(
      [],
      [{ user_id: userId, expires_at: later }],
      new Error('disk full'),
      rollbackError
    );
    const store = new PostgresRefreshTokenStore(pool);

    const result = await store.rotate('old-hash', successor, now);

    expect(result.ok).toBe(false);
    expect(client.release).toHaveBeenCalledWith(rollbackError);
  });
});
