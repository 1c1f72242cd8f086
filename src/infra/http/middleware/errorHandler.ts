import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import {
  DuplicateEmailError,
  DuplicateUsernameError,
  InternalError,
  InvalidCredentialsError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '../../../application/errors.js';
import type { Logger } from '../../../application/auth/ports.js';
import { getRequestId } from './requestId.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface MappedError {
  status: number;
  body: ErrorResponse;
}

// express.json() rejects unparseable bodies with a SyntaxError carrying status 400
function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

function mapError(err: unknown): MappedError | null {
  if (err instanceof ValidationError) {
    return {
      status: 400,
      body: { code: 'VALIDATION_ERROR', message: err.message, details: { issues: err.issues } },
    };
  }

  if (isBodyParseError(err)) {
    return {
      status: 400,
      body: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
    };
  }

  if (err instanceof DuplicateUsernameError) {
    return { status: 409, body: { code: 'USERNAME_TAKEN', message: err.message } };
  }

  if (err instanceof DuplicateEmailError) {
    return { status: 409, body: { code: 'EMAIL_TAKEN', message: err.message } };
  }

  if (err instanceof InvalidCredentialsError) {
    return { status: 401, body: { code: 'INVALID_CREDENTIALS', message: err.message } };
  }

  if (err instanceof UnauthorizedError) {
    return { status: 401, body: { code: 'UNAUTHORIZED', message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  return null;
}

export function errorHandler(logger: Logger = console): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const mapped = mapError(err);
    if (mapped) {
      res.status(mapped.status).json(mapped.body);
      return;
    }

    const requestId = getRequestId(res) ?? '-';
    // InternalError was already logged with its cause by the service
    if (err instanceof InternalError) {
      logger.error(`[${requestId}] ${req.method} ${req.originalUrl} failed: ${err.message}`);
    } else {
      logger.error(`[${requestId}] ${req.method} ${req.originalUrl} unhandled error:`, err);
    }

    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
