import type { ZodError } from 'zod';
import { DomainError } from '../domain/auth/errors.js';

/**
 * Application-level errors.
 * Each carries a literal `kind`; the HTTP error handler maps them to status codes.
 */

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends DomainError {
  readonly kind = 'ValidationError' as const;

  constructor(
    public readonly issues: ValidationIssue[],
    message = 'Validation failed'
  ) {
    super(message);
  }
}

export function issuesFromZod(error: ZodError): ValidationIssue[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

export class DuplicateUsernameError extends DomainError {
  readonly kind = 'DuplicateUsername' as const;

  constructor(message = 'Username is already taken') {
    super(message);
  }
}

export class DuplicateEmailError extends DomainError {
  readonly kind = 'DuplicateEmail' as const;

  constructor(message = 'Email is already registered') {
    super(message);
  }
}

export class NotFoundError extends DomainError {
  readonly kind = 'NotFound' as const;

  constructor(message = 'Resource not found') {
    super(message);
  }
}

/**
 * Wrong password, unknown username and unusable tokens all map here.
 */
export class InvalidCredentialsError extends DomainError {
  readonly kind = 'InvalidCredentials' as const;

  constructor(message = 'Invalid credentials') {
    super(message);
  }
}

/**
 * Missing or unusable bearer credentials on a protected route.
 */
export class UnauthorizedError extends DomainError {
  readonly kind = 'Unauthorized' as const;

  constructor(message = 'Authentication required') {
    super(message);
  }
}

/**
 * Storage failure: connectivity, query or an unexpected constraint.
 * The engine's own error is kept as `cause` for logs only.
 */
export class StorageError extends DomainError {
  readonly kind = 'StorageError' as const;

  constructor(message = 'Storage operation failed', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Generic failure handed to callers in place of storage or hashing faults.
 */
export class InternalError extends DomainError {
  readonly kind = 'Internal' as const;

  constructor(message = 'Internal server error') {
    super(message);
  }
}
