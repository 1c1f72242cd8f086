import express, { type Express } from 'express';
import type { Logger, UserRepository } from '../../application/auth/ports.js';
import { createAuthRoutes, type AuthRoutesService } from './routes/auth.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createSwaggerSpec } from './swagger.js';
import { cors } from './middleware/cors.js';
import { errorHandler } from './middleware/errorHandler.js';
import { requestId } from './middleware/requestId.js';

export interface AppDeps {
  service: AuthRoutesService;
  users: Pick<UserRepository, 'ping'>;
  corsOrigin: string;
  port: number;
  logger?: Logger;
}

const HEALTH_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new Error('timeout')), ms);
    }),
  ]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDeps): Express {
  const logger = deps.logger ?? console;
  const app = express();

  app.disable('x-powered-by');
  app.use(requestId());
  app.use(cors(deps.corsOrigin));
  app.use(express.json());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(deps.users.ping(), HEALTH_TIMEOUT_MS)
      .then((result) => {
        if (result.ok) {
          res.status(200).json({ status: 'ok' });
          return;
        }
        logger.error('Health check failed:', result.error);
        res.status(500).json({ code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
      })
      .catch(() => {
        res.status(500).json({ code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
      })
      .catch(next);
  });

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes(createSwaggerSpec(deps.port)));

  app.use('/api/auth', createAuthRoutes(deps.service));

  // Error handler (must be last)
  app.use(errorHandler(logger));

  return app;
}
