import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ConfigurationError,
  parseEnvironment,
  splitList,
  validateJwtSecretStrength,
} from '../config/environment-config';
import { DEFAULT_TIMEOUTS, resolveTimeouts, validateTier } from '../config/timeout-hierarchy';

describe('environment config', () => {
  const schema = z.object({
    PORT: z.coerce.number().int().positive().default(3020),
    JWT_SECRET: z.string().min(1, 'is required'),
  });

  it('should parse and apply defaults', () => {
    expect(parseEnvironment('library-service', schema, { JWT_SECRET: 'test-secret' })).toEqual({
      PORT: 3020,
      JWT_SECRET: 'test-secret',
    });
  });

  it('should list every problem in one error', () => {
    let caught: unknown;
    try {
      parseEnvironment('library-service', schema, { PORT: '-1' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError ? caught.problems : []).toHaveLength(2);
  });

  it('should split comma separated lists', () => {
    expect(splitList(' http://a.test, ,http://b.test ')).toEqual(['http://a.test', 'http://b.test']);
    expect(splitList(undefined)).toEqual([]);
  });

  it('should only fail short secrets in production', () => {
    expect(() => validateJwtSecretStrength('short', { NODE_ENV: 'test' })).not.toThrow();
    expect(() => validateJwtSecretStrength('short', { NODE_ENV: 'production' })).toThrow(ConfigurationError);
  });
});

describe('timeout hierarchy', () => {
  it('should use the defaults when nothing is configured', () => {
    expect(resolveTimeouts({})).toEqual(DEFAULT_TIMEOUTS);
  });

  it('should read configured values that keep the ordering', () => {
    expect(resolveTimeouts({ STORE_TIMEOUT_MS: '2000', STATEMENT_TIMEOUT_MS: '1500' })).toEqual({
      request: 30000,
      store: 2000,
      statement: 1500,
    });
  });

  it('should fall back when the store would outwait the request', () => {
    expect(validateTier({ request: 1000, store: 2000, statement: 500 })).toHaveLength(1);
    expect(resolveTimeouts({ TIMEOUT_REQUEST_MS: '1000', STORE_TIMEOUT_MS: '2000' })).toEqual(DEFAULT_TIMEOUTS);
  });
});
