import type { NewUser, User } from '../../domain/auth/user.js';
import type { Result } from '../../domain/result.js';
import type {
  DuplicateEmailError,
  DuplicateUsernameError,
  NotFoundError,
  StorageError,
} from '../errors.js';

/**
 * Persistence contract for users. Implemented once per storage engine; both
 * implementations must behave identically, including which error they return.
 */
export interface UserRepository {
  /**
   * Insert a user. Uniqueness of username and email is enforced by the engine,
   * and the duplicate errors are derived from its constraint violation.
   */
  create(
    data: NewUser
  ): Promise<Result<User, DuplicateUsernameError | DuplicateEmailError | StorageError>>;
  findByUsername(username: string): Promise<Result<User, NotFoundError | StorageError>>;
  findById(id: string): Promise<Result<User, NotFoundError | StorageError>>;
  /** Returns whether a row was removed. */
  deleteById(id: string): Promise<Result<boolean, StorageError>>;
  ping(): Promise<Result<void, StorageError>>;
}

export interface RefreshTokenRecord {
  tokenHash: string;
  userId: string;
  expiresAt: Date;
  createdAt: Date;
}

/** Successor for a rotated token; the owner is taken from the consumed row. */
export type RefreshTokenSuccessor = Omit<RefreshTokenRecord, 'userId'>;

export type RotationOutcome =
  | { status: 'rotated'; userId: string }
  | { status: 'expired' }
  | { status: 'consumed' }
  | { status: 'unknown' };

/**
 * Server-side state for refresh tokens. Only token hashes are stored.
 */
export interface RefreshTokenStore {
  insert(record: RefreshTokenRecord): Promise<Result<void, StorageError>>;
  /**
   * Consume `tokenHash` and, if it was live and unexpired, store `successor`
   * for the same user, all in one transaction. At most one caller can consume
   * a given hash.
   */
  rotate(
    tokenHash: string,
    successor: RefreshTokenSuccessor,
    now: Date
  ): Promise<Result<RotationOutcome, StorageError>>;
  /** Returns whether a live token was revoked. */
  revoke(tokenHash: string, now: Date): Promise<Result<boolean, StorageError>>;
}

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;
