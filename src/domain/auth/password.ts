import { argon2id, hash, verify } from 'argon2';
import { err, ok, type Result } from '../result.js';
import { HashingError } from './errors.js';

export interface PasswordHashingParams {
  /** Memory cost in KiB */
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

/**
 * OWASP baseline for Argon2id: 19 MiB, 2 iterations, 1 lane.
 */
export const DEFAULT_HASHING_PARAMS: PasswordHashingParams = {
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

/**
 * Password hashing using Argon2id.
 * Hashes are PHC strings ($argon2id$v=19$m=...,t=...,p=...$salt$hash), so the
 * salt and parameters travel with the hash.
 */
export class PasswordHasher {
  constructor(private readonly params: PasswordHashingParams = DEFAULT_HASHING_PARAMS) {}

  /**
   * Hash a plain text password with a fresh random salt.
   */
  async hash(plainPassword: string): Promise<Result<string, HashingError>> {
    try {
      const digest = await hash(plainPassword, {
        type: argon2id,
        memoryCost: this.params.memoryCost,
        timeCost: this.params.timeCost,
        parallelism: this.params.parallelism,
      });
      return ok(digest);
    } catch (error) {
      return err(new HashingError('Password hashing failed', { cause: error }));
    }
  }

  /**
   * Verify a plain password against a stored hash.
   * A wrong password is ok(false); an unparseable hash is a HashingError.
   */
  async verify(plainPassword: string, storedHash: string): Promise<Result<boolean, HashingError>> {
    try {
      return ok(await verify(storedHash, plainPassword));
    } catch (error) {
      return err(new HashingError('Stored password hash is malformed', { cause: error }));
    }
  }
}
