import { Router } from 'express';
import { z } from 'zod';
import type { UserService } from '../../../application/auth/userService.js';
import { UnauthorizedError } from '../../../application/errors.js';
import { authMiddleware, type AuthRequest } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, email, password]
 *             properties:
 *               username: { type: string, minLength: 1, maxLength: 50 }
 *               email: { type: string, format: email, maxLength: 254 }
 *               password: { type: string, minLength: 8, maxLength: 1024 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Username or email already registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange username and password for a token pair
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/TokenPair'
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/refresh:
 *   post:
 *     tags: [Auth]
 *     summary: Rotate a refresh token into a new token pair
 *     description: The presented refresh token is consumed and cannot be used again.
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/RefreshTokenBody'
 *     responses:
 *       200:
 *         description: New token pair
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/TokenPair'
 *       401:
 *         description: Refresh token unknown, expired or already used
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/logout:
 *   post:
 *     tags: [Auth]
 *     summary: Revoke a refresh token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/RefreshTokenBody'
 *     responses:
 *       204:
 *         description: Revoked, or was not live
 *
 * /api/auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: The user behind the access token
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Current user
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       401:
 *         description: Missing, invalid or expired access token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

// Field rules live in the service; these only check the body's shape.
const registerBodySchema = z.object({
  username: z.string(),
  email: z.string(),
  password: z.string(),
});

const loginBodySchema = z.object({
  username: z.string(),
  password: z.string(),
});

const refreshTokenBodySchema = z.object({
  refreshToken: z.string().min(1),
});

export type AuthRoutesService = Pick<
  UserService,
  'register' | 'login' | 'refresh' | 'logout' | 'authenticate'
>;

export function createAuthRoutes(service: AuthRoutesService) {
  const router = Router();

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await service.register(body);
      if (!result.ok) {
        throw result.error;
      }
      res.status(201).json(result.value);
    })
  );

  router.post(
    '/login',
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await service.login(body);
      if (!result.ok) {
        throw result.error;
      }
      res.status(200).json(result.value);
    })
  );

  router.post(
    '/refresh',
    validate({ body: refreshTokenBodySchema }),
    asyncHandler(async (req, res) => {
      const { refreshToken } = refreshTokenBodySchema.parse(req.body);
      const result = await service.refresh(refreshToken);
      if (!result.ok) {
        throw result.error;
      }
      res.status(200).json(result.value);
    })
  );

  router.post(
    '/logout',
    validate({ body: refreshTokenBodySchema }),
    asyncHandler(async (req, res) => {
      const { refreshToken } = refreshTokenBodySchema.parse(req.body);
      const result = await service.logout(refreshToken);
      if (!result.ok) {
        throw result.error;
      }
      res.status(204).end();
    })
  );

  router.get('/me', authMiddleware(service), (req: AuthRequest, res) => {
    if (!req.user) {
      throw new UnauthorizedError();
    }
    res.status(200).json(req.user);
  });

  return router;
}
