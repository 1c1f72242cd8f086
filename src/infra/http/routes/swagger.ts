import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';

export function createSwaggerRoutes(spec: object) {
  const router = Router();

  router.use('/docs', swaggerUi.serve);
  router.get('/docs', swaggerUi.setup(spec, {
    customCss: '.swagger-ui .topbar { display: none }',
  }));

  return router;
}
