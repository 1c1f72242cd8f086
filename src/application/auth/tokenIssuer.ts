import jwt, { type JwtPayload } from 'jsonwebtoken';
import { createHash, randomBytes, randomUUID } from 'crypto';
import { ExpiredTokenError, InvalidTokenError } from '../../domain/auth/errors.js';
import { err, ok, type Result } from '../../domain/result.js';
import type { StorageError } from '../errors.js';
import type { Logger, RefreshTokenStore } from './ports.js';

export interface TokenIssuerConfig {
  /** HMAC secret for access tokens. Read once at startup. */
  secret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlDays: number;
}

export interface TokenIssuerOptions {
  now?: () => Date;
  logger?: Logger;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export interface TokenPair {
  accessToken: string;
  accessTokenExpiresAt: Date;
  refreshToken: string;
  refreshTokenExpiresAt: Date;
}

const ALGORITHM = 'HS256';
const ACCESS_TOKEN_TYPE = 'access';
const REFRESH_TOKEN_BYTES = 32;
// base64url of 32 bytes, no padding
const REFRESH_TOKEN_PATTERN = /^[A-Za-z0-9_-]{43}$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Refresh tokens are stored by digest only.
 */
export function hashRefreshToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

/**
 * Issues and checks session tokens.
 *
 * Access tokens are HS256 JWTs (`sub`, `typ`, `jti`, `iat`, `exp`) and are
 * verified without touching storage. Refresh tokens are opaque random strings
 * whose state lives in the RefreshTokenStore; each one can be rotated once.
 */
export class TokenIssuer {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly config: TokenIssuerConfig,
    private readonly refreshTokens: RefreshTokenStore,
    options: TokenIssuerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
  }

  issueAccessToken(userId: string): IssuedToken {
    const issuedAt = Math.floor(this.now().getTime() / 1000);
    const exp = issuedAt + this.config.accessTokenTtlSeconds;

    const token = jwt.sign(
      {
        sub: userId,
        typ: ACCESS_TOKEN_TYPE,
        jti: randomUUID(),
        iat: issuedAt,
        exp,
      },
      this.config.secret,
      { algorithm: ALGORITHM }
    );

    return { token, expiresAt: new Date(exp * 1000) };
  }

  /**
   * Returns the user id carried by a valid, unexpired access token.
   */
  verifyAccessToken(token: string): Result<string, InvalidTokenError> {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.config.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: Math.floor(this.now().getTime() / 1000),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return err(new InvalidTokenError('expired'));
      }
      if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
        return err(new InvalidTokenError('signature'));
      }
      return err(new InvalidTokenError('malformed'));
    }

    if (typeof payload === 'string') {
      return err(new InvalidTokenError('malformed'));
    }
    if (payload.typ !== ACCESS_TOKEN_TYPE) {
      return err(new InvalidTokenError('wrong-type'));
    }
    if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
      return err(new InvalidTokenError('malformed'));
    }

    return ok(payload.sub);
  }

  async issueRefreshToken(userId: string): Promise<Result<IssuedToken, StorageError>> {
    const now = this.now();
    const token = generateRefreshToken();
    const expiresAt = this.refreshExpiry(now);

    const stored = await this.refreshTokens.insert({
      tokenHash: hashRefreshToken(token),
      userId,
      expiresAt,
      createdAt: now,
    });
    if (!stored.ok) {
      return stored;
    }

    return ok({ token, expiresAt });
  }

  async issuePair(userId: string): Promise<Result<TokenPair, StorageError>> {
    const refresh = await this.issueRefreshToken(userId);
    if (!refresh.ok) {
      return refresh;
    }
    const access = this.issueAccessToken(userId);

    return ok({
      accessToken: access.token,
      accessTokenExpiresAt: access.expiresAt,
      refreshToken: refresh.value.token,
      refreshTokenExpiresAt: refresh.value.expiresAt,
    });
  }

  /**
   * Exchange a refresh token for a new pair. The presented token is consumed
   * in the same transaction that stores its successor, so a token value can be
   * rotated at most once even under concurrent calls.
   */
  async rotate(
    refreshToken: string
  ): Promise<Result<TokenPair, InvalidTokenError | ExpiredTokenError | StorageError>> {
    if (!REFRESH_TOKEN_PATTERN.test(refreshToken)) {
      return err(new InvalidTokenError('malformed'));
    }

    const now = this.now();
    const successorToken = generateRefreshToken();
    const successorExpiresAt = this.refreshExpiry(now);

    const rotated = await this.refreshTokens.rotate(
      hashRefreshToken(refreshToken),
      {
        tokenHash: hashRefreshToken(successorToken),
        expiresAt: successorExpiresAt,
        createdAt: now,
      },
      now
    );
    if (!rotated.ok) {
      return rotated;
    }

    const outcome = rotated.value;
    switch (outcome.status) {
      case 'rotated': {
        const access = this.issueAccessToken(outcome.userId);
        return ok({
          accessToken: access.token,
          accessTokenExpiresAt: access.expiresAt,
          refreshToken: successorToken,
          refreshTokenExpiresAt: successorExpiresAt,
        });
      }
      case 'expired':
        return err(new ExpiredTokenError('Refresh token expired'));
      case 'consumed':
        this.logger.warn('Refresh token presented after it was already rotated or revoked');
        return err(new InvalidTokenError('consumed'));
      case 'unknown':
        return err(new InvalidTokenError('unknown'));
    }
  }

  /**
   * Revoke a live refresh token. Unknown or already-dead tokens are a no-op.
   */
  async revoke(refreshToken: string): Promise<Result<boolean, StorageError>> {
    if (!REFRESH_TOKEN_PATTERN.test(refreshToken)) {
      return ok(false);
    }
    return this.refreshTokens.revoke(hashRefreshToken(refreshToken), this.now());
  }

  private refreshExpiry(from: Date): Date {
    return new Date(from.getTime() + this.config.refreshTokenTtlDays * MS_PER_DAY);
  }
}

function generateRefreshToken(): string {
  return randomBytes(REFRESH_TOKEN_BYTES).toString('base64url');
}
