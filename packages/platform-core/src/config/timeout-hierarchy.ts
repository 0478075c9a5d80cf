import { getLogger } from '../logging/logger.js';

const logger = getLogger('timeout-hierarchy');

/**
 * An HTTP request must outlive every store call it makes, and a store call
 * must give up before the database's own statement timeout would.
 */
export interface TimeoutTier {
  request: number;
  store: number;
  statement: number;
}

function readMs(value: string | undefined, fallback: number): number {
  const parsed = value ? parseInt(value, 10) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const DEFAULT_TIMEOUTS: TimeoutTier = {
  request: 30000,
  store: 5000,
  statement: 4500,
};

export function validateTier(tier: TimeoutTier): string[] {
  const violations: string[] = [];
  if (tier.request <= tier.store) {
    violations.push(`request timeout (${tier.request}ms) must be > store timeout (${tier.store}ms)`);
  }
  if (tier.store < tier.statement) {
    violations.push(`store timeout (${tier.store}ms) must be >= statement timeout (${tier.statement}ms)`);
  }
  return violations;
}

/**
 * Resolve timeouts from TIMEOUT_REQUEST_MS / STORE_TIMEOUT_MS / STATEMENT_TIMEOUT_MS,
 * falling back to the defaults when the configured values break the ordering.
 */
export function resolveTimeouts(env: NodeJS.ProcessEnv = process.env): TimeoutTier {
  const tier: TimeoutTier = {
    request: readMs(env.TIMEOUT_REQUEST_MS, DEFAULT_TIMEOUTS.request),
    store: readMs(env.STORE_TIMEOUT_MS, DEFAULT_TIMEOUTS.store),
    statement: readMs(env.STATEMENT_TIMEOUT_MS, DEFAULT_TIMEOUTS.statement),
  };

  const violations = validateTier(tier);
  if (violations.length > 0) {
    logger.warn('Timeout hierarchy violations detected, using defaults', { violations });
    return { ...DEFAULT_TIMEOUTS };
  }
  return tier;
}
