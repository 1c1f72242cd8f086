import type { UserRepository } from '../../../application/auth/ports.js';
import {
  DuplicateEmailError,
  DuplicateUsernameError,
  NotFoundError,
  StorageError,
} from '../../../application/errors.js';
import type { NewUser, User } from '../../../domain/auth/user.js';
import { err, ok, type Result } from '../../../domain/result.js';
import { isUserId, newUserId } from '../ids.js';
import { violatedUserField } from './errors.js';
import type { PgPool } from './pool.js';

// A type alias, not an interface: pg's row constraint needs an index signature
type UserRow = {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: Date;
};

const USER_COLUMNS = 'id, username, email, password_hash, created_at';

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

export class PostgresUserRepo implements UserRepository {
  constructor(private readonly pool: PgPool) {}

  async create(
    data: NewUser
  ): Promise<Result<User, DuplicateUsernameError | DuplicateEmailError | StorageError>> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (id, username, email, password_hash)
         VALUES ($1, $2, $3, $4)
         RETURNING ${USER_COLUMNS}`,
        [newUserId(), data.username, data.email, data.passwordHash]
      );

      const row = result.rows[0];
      return ok(rowToUser(row));
    } catch (error) {
      const field = violatedUserField(error);
      if (field === 'username') {
        return err(new DuplicateUsernameError());
      }
      if (field === 'email') {
        return err(new DuplicateEmailError());
      }
      return err(new StorageError('Failed to create user', { cause: error }));
    }
  }

  async findByUsername(username: string): Promise<Result<User, NotFoundError | StorageError>> {
    try {
      const result = await this.pool.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
        [username]
      );

      if (result.rows.length === 0) {
        return err(new NotFoundError('User not found'));
      }
      return ok(rowToUser(result.rows[0]));
    } catch (error) {
      return err(new StorageError('Failed to find user by username', { cause: error }));
    }
  }

  async findById(id: string): Promise<Result<User, NotFoundError | StorageError>> {
    // The column is UUID; anything else would be a cast error rather than a miss
    if (!isUserId(id)) {
      return err(new NotFoundError('User not found'));
    }

    try {
      const result = await this.pool.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
        [id]
      );

      if (result.rows.length === 0) {
        return err(new NotFoundError('User not found'));
      }
      return ok(rowToUser(result.rows[0]));
    } catch (error) {
      return err(new StorageError('Failed to find user by id', { cause: error }));
    }
  }

  async deleteById(id: string): Promise<Result<boolean, StorageError>> {
    if (!isUserId(id)) {
      return ok(false);
    }

    try {
      const result = await this.pool.query('DELETE FROM users WHERE id = $1', [id]);
      return ok((result.rowCount ?? 0) > 0);
    } catch (error) {
      return err(new StorageError('Failed to delete user', { cause: error }));
    }
  }

  async ping(): Promise<Result<void, StorageError>> {
    try {
      await this.pool.query('SELECT 1');
      return ok(undefined);
    } catch (error) {
      return err(new StorageError('Database unavailable', { cause: error }));
    }
  }
}
