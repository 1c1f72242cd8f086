import type { Request, Response, NextFunction } from 'express';
import { InvalidCredentialsError, UnauthorizedError } from '../../../application/errors.js';
import type { UserService } from '../../../application/auth/userService.js';
import type { PublicUser } from '../../../domain/auth/user.js';

export interface AuthRequest extends Request {
  user?: PublicUser;
}

const BEARER_PREFIX = 'Bearer ';

/**
 * Resolve `Authorization: Bearer <access token>` to a user, or fail with 401.
 */
export function authMiddleware(service: Pick<UserService, 'authenticate'>) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    const token = authHeader.slice(BEARER_PREFIX.length).trim();

    void service.authenticate(token).then(
      (result) => {
        if (result.ok) {
          req.user = result.value;
          next();
          return;
        }
        next(
          result.error instanceof InvalidCredentialsError
            ? new UnauthorizedError('Invalid or expired token')
            : result.error
        );
      },
      next
    );
  };
}
