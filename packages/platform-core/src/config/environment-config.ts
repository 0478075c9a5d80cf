/**
 * Environment Configuration Utilities
 *
 * Parse process.env through a zod schema once at startup and fail fast,
 * listing every problem, when the configuration is unusable.
 */

import { z } from 'zod';
import { getLogger } from '../logging/logger.js';
import { DomainError } from '../error-handling/errors.js';

const logger = getLogger('environment-config');

export class ConfigurationError extends DomainError {
  constructor(
    serviceName: string,
    public readonly problems: string[]
  ) {
    super(`Invalid configuration for ${serviceName}: ${problems.join('; ')}`, 500, undefined, 'INTERNAL_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function isProduction(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV === 'production';
}

/**
 * Comma-separated list → trimmed, non-empty entries
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function parseEnvironment<T extends z.ZodTypeAny>(
  serviceName: string,
  schema: T,
  env: NodeJS.ProcessEnv = process.env
): z.infer<T> {
  const parsed = schema.safeParse(env);
  if (parsed.success) {
    return parsed.data;
  }

  const problems = parsed.error.errors.map(issue => {
    const name = issue.path.join('.') || 'environment';
    return `${name}: ${issue.message}`;
  });
  logger.error('Environment validation failed', { serviceName, problems });
  throw new ConfigurationError(serviceName, problems);
}

/**
 * In production a short JWT secret is an error; elsewhere only a warning.
 */
export function validateJwtSecretStrength(secret: string, env: NodeJS.ProcessEnv = process.env, minLength = 32): void {
  if (secret.length >= minLength) return;

  const message = `JWT_SECRET is too short (${secret.length} chars, minimum ${minLength}). Use a cryptographically random string.`;
  if (isProduction(env)) {
    throw new ConfigurationError('jwt', [message]);
  }
  logger.warn(message);
}
