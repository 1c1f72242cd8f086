export class DomainError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Hashing failed, or a stored hash could not be parsed.
 * Never means "wrong password".
 */
export class HashingError extends DomainError {
  readonly kind = 'HashingError' as const;

  constructor(message = 'Password hashing failed', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type InvalidTokenReason =
  | 'malformed'
  | 'signature'
  | 'expired'
  | 'wrong-type'
  | 'consumed'
  | 'unknown';

export class InvalidTokenError extends DomainError {
  readonly kind = 'InvalidToken' as const;

  constructor(public readonly reason: InvalidTokenReason) {
    super(`Invalid token (${reason})`);
  }
}

/** A refresh token presented after its expiry. */
export class ExpiredTokenError extends DomainError {
  readonly kind = 'Expired' as const;

  constructor(message = 'Token expired') {
    super(message);
  }
}
