import { z } from 'zod';
import type { HashingError } from '../../domain/auth/errors.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import { toPublicUser, type PublicUser } from '../../domain/auth/user.js';
import { err, ok, type Result } from '../../domain/result.js';
import {
  DuplicateEmailError,
  DuplicateUsernameError,
  InternalError,
  InvalidCredentialsError,
  NotFoundError,
  StorageError,
  ValidationError,
  issuesFromZod,
} from '../errors.js';
import type { Logger, UserRepository } from './ports.js';
import type { TokenIssuer, TokenPair } from './tokenIssuer.js';

export const USERNAME_MAX_LENGTH = 50;
export const EMAIL_MAX_LENGTH = 254;
export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 1024;

export const registerSchema = z.object({
  username: z
    .string()
    .trim()
    .min(1, 'Username is required')
    .max(USERNAME_MAX_LENGTH, `Username must be at most ${USERNAME_MAX_LENGTH} characters`),
  email: z
    .string()
    .trim()
    .toLowerCase()
    .min(1, 'Email is required')
    .max(EMAIL_MAX_LENGTH, `Email must be at most ${EMAIL_MAX_LENGTH} characters`)
    .email('Email must be a valid address'),
  password: z
    .string()
    .min(PASSWORD_MIN_LENGTH, `Password must be at least ${PASSWORD_MIN_LENGTH} characters`)
    .max(PASSWORD_MAX_LENGTH, `Password must be at most ${PASSWORD_MAX_LENGTH} characters`),
});

export type RegisterCommand = z.input<typeof registerSchema>;

export interface LoginCommand {
  username: string;
  password: string;
}

export type RegisterFailure =
  | ValidationError
  | DuplicateUsernameError
  | DuplicateEmailError
  | InternalError;

// Verified against when the username does not exist, so that path costs the
// same Argon2 work as a wrong password.
const PLACEHOLDER_PASSWORD = 'placeholder-password-for-unknown-users';

export interface UserServiceOptions {
  logger?: Logger;
}

/**
 * Registration, login and session refresh.
 *
 * Every operation returns a Result. Storage and hashing faults are logged here
 * and replaced by a bare InternalError; token failures all become
 * InvalidCredentialsError.
 */
export class UserService {
  private readonly logger: Logger;
  private placeholderHash?: Promise<Result<string, HashingError>>;

  constructor(
    private readonly users: UserRepository,
    private readonly hasher: PasswordHasher,
    private readonly tokens: TokenIssuer,
    options: UserServiceOptions = {}
  ) {
    this.logger = options.logger ?? console;
  }

  async register(command: RegisterCommand): Promise<Result<PublicUser, RegisterFailure>> {
    const parsed = registerSchema.safeParse(command);
    if (!parsed.success) {
      return err(new ValidationError(issuesFromZod(parsed.error)));
    }
    const { username, email, password } = parsed.data;

    this.logger.info(`Registering user: ${username}`);

    const hashed = await this.hasher.hash(password);
    if (!hashed.ok) {
      return err(this.internal('register', hashed.error));
    }

    const created = await this.users.create({ username, email, passwordHash: hashed.value });
    if (!created.ok) {
      if (created.error instanceof StorageError) {
        return err(this.internal('register', created.error));
      }
      return err(created.error);
    }

    this.logger.info(`User registered: ${created.value.id}`);
    return ok(toPublicUser(created.value));
  }

  async login(
    command: LoginCommand
  ): Promise<Result<TokenPair, InvalidCredentialsError | InternalError>> {
    // Same normalization as registration
    const found = await this.users.findByUsername(command.username.trim());
    if (!found.ok && found.error instanceof StorageError) {
      return err(this.internal('login', found.error));
    }

    if (!found.ok) {
      const placeholder = await this.getPlaceholderHash();
      if (!placeholder.ok) {
        return err(this.internal('login', placeholder.error));
      }
      // Only the cost of this call matters; its outcome is discarded.
      await this.hasher.verify(command.password, placeholder.value);
      return err(new InvalidCredentialsError());
    }

    const user = found.value;
    const verified = await this.hasher.verify(command.password, user.passwordHash);
    if (!verified.ok) {
      return err(this.internal('login', verified.error));
    }
    if (!verified.value) {
      return err(new InvalidCredentialsError());
    }

    const pair = await this.tokens.issuePair(user.id);
    if (!pair.ok) {
      return err(this.internal('login', pair.error));
    }

    this.logger.info(`User logged in: ${user.id}`);
    return ok(pair.value);
  }

  async refresh(
    refreshToken: string
  ): Promise<Result<TokenPair, InvalidCredentialsError | InternalError>> {
    const rotated = await this.tokens.rotate(refreshToken);
    if (!rotated.ok) {
      if (rotated.error instanceof StorageError) {
        return err(this.internal('refresh', rotated.error));
      }
      return err(new InvalidCredentialsError());
    }
    return ok(rotated.value);
  }

  /**
   * Revoke a refresh token. Succeeds whether or not the token was live.
   */
  async logout(refreshToken: string): Promise<Result<void, InternalError>> {
    const revoked = await this.tokens.revoke(refreshToken);
    if (!revoked.ok) {
      return err(this.internal('logout', revoked.error));
    }
    return ok(undefined);
  }

  /**
   * Resolve the user behind an access token.
   */
  async authenticate(
    accessToken: string
  ): Promise<Result<PublicUser, InvalidCredentialsError | InternalError>> {
    const verified = this.tokens.verifyAccessToken(accessToken);
    if (!verified.ok) {
      return err(new InvalidCredentialsError());
    }

    const found = await this.users.findById(verified.value);
    if (!found.ok) {
      if (found.error instanceof StorageError) {
        return err(this.internal('authenticate', found.error));
      }
      // Token outlived its user
      return err(new InvalidCredentialsError());
    }
    return ok(toPublicUser(found.value));
  }

  async getUser(id: string): Promise<Result<PublicUser, NotFoundError | InternalError>> {
    const found = await this.users.findById(id);
    if (!found.ok) {
      if (found.error instanceof StorageError) {
        return err(this.internal('getUser', found.error));
      }
      return err(found.error);
    }
    return ok(toPublicUser(found.value));
  }

  /**
   * Compute the placeholder hash ahead of the first unknown-username login.
   */
  async warmUp(): Promise<Result<void, InternalError>> {
    const placeholder = await this.getPlaceholderHash();
    if (!placeholder.ok) {
      return err(this.internal('warmUp', placeholder.error));
    }
    return ok(undefined);
  }

  private getPlaceholderHash(): Promise<Result<string, HashingError>> {
    if (!this.placeholderHash) {
      const pending = this.hasher.hash(PLACEHOLDER_PASSWORD).then((result) => {
        if (!result.ok) {
          this.placeholderHash = undefined;
        }
        return result;
      });
      this.placeholderHash = pending;
    }
    return this.placeholderHash;
  }

  private internal(operation: string, cause: StorageError | HashingError): InternalError {
    this.logger.error(`${operation} failed:`, cause);
    return new InternalError();
  }
}
