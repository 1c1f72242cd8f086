import type { Request, Response, NextFunction } from 'express';

const ALLOWED_METHODS = 'GET, POST, OPTIONS';
const ALLOWED_HEADERS = 'Content-Type, Authorization, X-Request-Id';
const MAX_AGE_SECONDS = '86400';

/**
 * CORS for a single browser origin, with preflight support.
 * Requests from other origins get no CORS headers, and their preflight a 403.
 */
export function cors(allowedOrigin: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const origin = req.get('Origin');
    res.vary('Origin');

    const allowed = origin !== undefined && (allowedOrigin === '*' || origin === allowedOrigin);
    if (allowed) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Credentials', 'true');
      res.setHeader('Access-Control-Expose-Headers', 'X-Request-Id');
    }

    if (req.method !== 'OPTIONS') {
      next();
      return;
    }

    if (origin !== undefined && !allowed) {
      res.sendStatus(403);
      return;
    }

    res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS);
    res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS);
    res.setHeader('Access-Control-Max-Age', MAX_AGE_SECONDS);
    res.sendStatus(204);
  };
}
