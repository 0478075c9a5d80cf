/**
 * Correlation Context
 *
 * Carries the request's correlation ID (and, once known, the caller's user id)
 * through async calls so log lines and error envelopes can be tied together.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import type { LogContext } from './types.js';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore()?.correlationId;
}

/**
 * Attach fields to the current context (no-op outside a request)
 */
export function enrichCorrelationContext(fields: Partial<LogContext>): void {
  const store = correlationStorage.getStore();
  if (store) {
    Object.assign(store, fields);
  }
}

export function generateCorrelationId(): string {
  return randomUUID();
}
