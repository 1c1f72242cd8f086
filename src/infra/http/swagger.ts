import swaggerJsdoc from 'swagger-jsdoc';

export function createSwaggerSpec(port: number): object {
  const options: swaggerJsdoc.Options = {
    definition: {
      openapi: '3.0.0',
      info: {
        title: 'POS User Service API',
        version: '1.0.0',
        description: 'User registration, login and session tokens for the point-of-sale platform',
      },
      servers: [
        {
          url: `http://localhost:${port}`,
          description: 'Development server',
        },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: 'http',
            scheme: 'bearer',
            bearerFormat: 'JWT',
          },
        },
        schemas: {
          ErrorResponse: {
            type: 'object',
            required: ['code', 'message'],
            properties: {
              code: {
                type: 'string',
                description: 'Error code identifier',
                example: 'USERNAME_TAKEN',
              },
              message: {
                type: 'string',
                description: 'Human-readable error message',
                example: 'Username is already taken',
              },
              details: {
                type: 'object',
                description: 'Additional error details (optional)',
                additionalProperties: true,
              },
            },
          },
          User: {
            type: 'object',
            required: ['id', 'username', 'email', 'createdAt'],
            properties: {
              id: { type: 'string', format: 'uuid' },
              username: { type: 'string', example: 'alice' },
              email: { type: 'string', format: 'email', example: 'alice@example.com' },
              createdAt: { type: 'string', format: 'date-time' },
            },
          },
          TokenPair: {
            type: 'object',
            required: [
              'accessToken',
              'accessTokenExpiresAt',
              'refreshToken',
              'refreshTokenExpiresAt',
            ],
            properties: {
              accessToken: { type: 'string', description: 'HS256 JWT' },
              accessTokenExpiresAt: { type: 'string', format: 'date-time' },
              refreshToken: { type: 'string', description: 'Opaque, single use' },
              refreshTokenExpiresAt: { type: 'string', format: 'date-time' },
            },
          },
          RefreshTokenBody: {
            type: 'object',
            required: ['refreshToken'],
            properties: {
              refreshToken: { type: 'string' },
            },
          },
        },
      },
      tags: [{ name: 'Auth', description: 'Registration, login and token lifecycle' }],
    },
    apis: ['./src/infra/http/routes/*.ts'],
  };

  return swaggerJsdoc(options);
}
