/**
 * Service configuration for library-service.
 * Environment is read through dotenv + zod once; invalid settings stop startup.
 */

import 'dotenv/config';
import { z } from 'zod';
import {
  getLogger as getPlatformLogger,
  parseEnvironment,
  resolveTimeouts,
  splitList,
  validateJwtSecretStrength,
  type TimeoutTier,
} from '@shelfwise/platform-core';
import type * as winston from 'winston';

export type Logger = winston.Logger;

export const SERVICE_NAME = 'library-service';

export function getLogger(module: string): Logger {
  return getPlatformLogger(`${SERVICE_NAME}:${module}`);
}

export type StoreDriver = 'postgres' | 'memory';

const DEV_JWT_SECRET = 'development-only-secret-change-me';

const EnvironmentSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3020),
    DATABASE_URL: z.string().url().optional(),
    DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
    STORE_DRIVER: z.enum(['postgres', 'memory']).optional(),
    JWT_SECRET: z.string().min(1).optional(),
    JWT_ISSUER: z.string().min(1).default('shelfwise'),
    JWT_AUDIENCE: z.string().min(1).default('shelfwise-api'),
    JWT_EXPIRES_IN: z.coerce.number().int().positive().default(3600),
    BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
    ALLOWED_ORIGINS: z.string().optional(),
    AUTH_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(20),
    AUTH_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
    BOOTSTRAP_ADMIN_USERNAME: z.string().min(3).optional(),
    BOOTSTRAP_ADMIN_PASSWORD: z.string().min(8).optional(),
  })
  .superRefine((env, ctx) => {
    const driver = env.STORE_DRIVER ?? (env.NODE_ENV === 'production' ? 'postgres' : 'memory');
    if (driver === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'is required when STORE_DRIVER is postgres',
      });
    }
    if (env.NODE_ENV === 'production' && !env.JWT_SECRET) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['JWT_SECRET'], message: 'is required in production' });
    }
    if (Boolean(env.BOOTSTRAP_ADMIN_USERNAME) !== Boolean(env.BOOTSTRAP_ADMIN_PASSWORD)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['BOOTSTRAP_ADMIN_PASSWORD'],
        message: 'BOOTSTRAP_ADMIN_USERNAME and BOOTSTRAP_ADMIN_PASSWORD must be set together',
      });
    }
  });

export interface ServiceConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  databaseUrl?: string;
  databasePoolMax: number;
  storeDriver: StoreDriver;
  timeouts: TimeoutTier;
  jwt: {
    secret: string;
    issuer: string;
    audience: string;
    expiresInSeconds: number;
  };
  bcryptRounds: number;
  allowedOrigins: string[];
  /** Per-client limit on register and login attempts. */
  authRateLimit: { windowMs: number; max: number };
  bootstrapAdmin?: { username: string; password: string };
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = parseEnvironment(SERVICE_NAME, EnvironmentSchema, env);
  const jwtSecret = parsed.JWT_SECRET ?? DEV_JWT_SECRET;
  validateJwtSecretStrength(jwtSecret, env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    databasePoolMax: parsed.DATABASE_POOL_MAX,
    storeDriver: parsed.STORE_DRIVER ?? (parsed.NODE_ENV === 'production' ? 'postgres' : 'memory'),
    timeouts: resolveTimeouts(env),
    jwt: {
      secret: jwtSecret,
      issuer: parsed.JWT_ISSUER,
      audience: parsed.JWT_AUDIENCE,
      expiresInSeconds: parsed.JWT_EXPIRES_IN,
    },
    bcryptRounds: parsed.BCRYPT_ROUNDS,
    allowedOrigins: splitList(parsed.ALLOWED_ORIGINS),
    authRateLimit: { windowMs: parsed.AUTH_RATE_LIMIT_WINDOW_MS, max: parsed.AUTH_RATE_LIMIT_MAX },
    bootstrapAdmin:
      parsed.BOOTSTRAP_ADMIN_USERNAME && parsed.BOOTSTRAP_ADMIN_PASSWORD
        ? { username: parsed.BOOTSTRAP_ADMIN_USERNAME, password: parsed.BOOTSTRAP_ADMIN_PASSWORD }
        : undefined,
  };
}
