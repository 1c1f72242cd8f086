import dotenv from 'dotenv';
import { z } from 'zod';
import type { PasswordHashingParams } from '../domain/auth/password.js';

export type DatabaseType = 'postgres' | 'sqlite';

export interface AppConfig {
  readonly databaseType: DatabaseType;
  readonly databaseUrl: string;
  readonly dbPoolMax: number;
  readonly jwtSecret: string;
  readonly accessTokenTtlSeconds: number;
  readonly refreshTokenTtlDays: number;
  readonly hashing: Readonly<PasswordHashingParams>;
  readonly port: number;
  readonly corsOrigin: string;
}

const SECONDS_PER_DAY = 24 * 60 * 60;

// Lower bounds enforced by argon2 itself
const ARGON2_MIN_MEMORY_KIB = 1024;
const ARGON2_MIN_TIME_COST = 2;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const intAtLeast = (min: number, fallback: number, message: string) =>
  z.coerce.number().int().min(min, message).default(fallback);

const envSchema = z
  .object({
    DATABASE_TYPE: z
      .string()
      .default('sqlite')
      .transform((value) => value.trim().toLowerCase())
      .pipe(z.enum(['postgres', 'postgresql', 'sqlite']))
      .transform((value): DatabaseType => (value === 'sqlite' ? 'sqlite' : 'postgres')),
    DATABASE_URL: z.string().min(1, 'DATABASE_URL must be set'),
    DB_POOL_MAX: positiveInt(5),
    JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
    ACCESS_TOKEN_TTL_SECS: positiveInt(900),
    REFRESH_TOKEN_TTL_DAYS: positiveInt(30),
    ARGON2_MEMORY_COST: intAtLeast(
      ARGON2_MIN_MEMORY_KIB,
      19456,
      `ARGON2_MEMORY_COST must be at least ${ARGON2_MIN_MEMORY_KIB}`
    ),
    ARGON2_TIME_COST: intAtLeast(
      ARGON2_MIN_TIME_COST,
      2,
      `ARGON2_TIME_COST must be at least ${ARGON2_MIN_TIME_COST}`
    ),
    ARGON2_PARALLELISM: positiveInt(1),
    PORT: positiveInt(3001),
    CORS_ORIGIN: z.string().default('http://localhost:5173'),
  })
  .refine((env) => env.ARGON2_MEMORY_COST >= 8 * env.ARGON2_PARALLELISM, {
    message: 'ARGON2_MEMORY_COST must be at least 8 KiB per ARGON2_PARALLELISM lane',
    path: ['ARGON2_MEMORY_COST'],
  })
  .refine((env) => env.ACCESS_TOKEN_TTL_SECS < env.REFRESH_TOKEN_TTL_DAYS * SECONDS_PER_DAY, {
    message: 'ACCESS_TOKEN_TTL_SECS must be shorter than REFRESH_TOKEN_TTL_DAYS',
    path: ['ACCESS_TOKEN_TTL_SECS'],
  });

/**
 * Thrown once at startup when the environment cannot be turned into a config.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the process configuration from environment variables.
 * The result is frozen; nothing reads process.env after this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }
  const vars = parsed.data;

  return Object.freeze({
    databaseType: vars.DATABASE_TYPE,
    databaseUrl: vars.DATABASE_URL,
    dbPoolMax: vars.DB_POOL_MAX,
    jwtSecret: vars.JWT_SECRET,
    accessTokenTtlSeconds: vars.ACCESS_TOKEN_TTL_SECS,
    refreshTokenTtlDays: vars.REFRESH_TOKEN_TTL_DAYS,
    hashing: Object.freeze({
      memoryCost: vars.ARGON2_MEMORY_COST,
      timeCost: vars.ARGON2_TIME_COST,
      parallelism: vars.ARGON2_PARALLELISM,
    }),
    port: vars.PORT,
    corsOrigin: vars.CORS_ORIGIN,
  });
}

/**
 * Load `.env` into process.env, then build the config.
 */
export function loadConfigFromEnv(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
