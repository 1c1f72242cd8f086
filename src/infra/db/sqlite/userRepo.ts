import type { Statement } from 'better-sqlite3';
import type { UserRepository } from '../../../application/auth/ports.js';
import {
  DuplicateEmailError,
  DuplicateUsernameError,
  NotFoundError,
  StorageError,
} from '../../../application/errors.js';
import type { NewUser, User } from '../../../domain/auth/user.js';
import { err, ok, type Result } from '../../../domain/result.js';
import { newUserId } from '../ids.js';
import { parseSqliteTimestamp, type SqliteDatabase } from './database.js';
import { violatedUserField } from './errors.js';

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: string;
}

const USER_COLUMNS = 'id, username, email, password_hash, created_at';

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: parseSqliteTimestamp(row.created_at),
  };
}

/**
 * better-sqlite3 is synchronous; the methods stay async to satisfy the
 * shared contract. The single connection serializes writers, and UNIQUE
 * constraints still decide duplicates.
 */
export class SqliteUserRepo implements UserRepository {
  private readonly insertStmt: Statement<[string, string, string, string], UserRow>;
  private readonly findByUsernameStmt: Statement<[string], UserRow>;
  private readonly findByIdStmt: Statement<[string], UserRow>;
  private readonly deleteStmt: Statement<[string]>;
  private readonly pingStmt: Statement<[]>;

  constructor(db: SqliteDatabase) {
    this.insertStmt = db.prepare<[string, string, string, string], UserRow>(
      `INSERT INTO users (id, username, email, password_hash)
       VALUES (?, ?, ?, ?)
       RETURNING ${USER_COLUMNS}`
    );
    this.findByUsernameStmt = db.prepare<[string], UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = ?`
    );
    this.findByIdStmt = db.prepare<[string], UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = ?`
    );
    this.deleteStmt = db.prepare<[string]>('DELETE FROM users WHERE id = ?');
    this.pingStmt = db.prepare<[]>('SELECT 1');
  }

  async create(
    data: NewUser
  ): Promise<Result<User, DuplicateUsernameError | DuplicateEmailError | StorageError>> {
    try {
      const row = this.insertStmt.get(newUserId(), data.username, data.email, data.passwordHash);
      if (!row) {
        return err(new StorageError('Insert returned no row'));
      }
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
      const row = this.findByUsernameStmt.get(username);
      if (!row) {
        return err(new NotFoundError('User not found'));
      }
      return ok(rowToUser(row));
    } catch (error) {
      return err(new StorageError('Failed to find user by username', { cause: error }));
    }
  }

  async findById(id: string): Promise<Result<User, NotFoundError | StorageError>> {
    try {
      const row = this.findByIdStmt.get(id);
      if (!row) {
        return err(new NotFoundError('User not found'));
      }
      return ok(rowToUser(row));
    } catch (error) {
      return err(new StorageError('Failed to find user by id', { cause: error }));
    }
  }

  async deleteById(id: string): Promise<Result<boolean, StorageError>> {
    try {
      const result = this.deleteStmt.run(id);
      return ok(result.changes > 0);
    } catch (error) {
      return err(new StorageError('Failed to delete user', { cause: error }));
    }
  }

  async ping(): Promise<Result<void, StorageError>> {
    try {
      this.pingStmt.get();
      return ok(undefined);
    } catch (error) {
      return err(new StorageError('Database unavailable', { cause: error }));
    }
  }
}
