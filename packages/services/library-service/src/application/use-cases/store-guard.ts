import { withTimeout } from '@shelfwise/platform-core';

/**
 * Runs a store call under the service's store timeout.
 */
export type StoreGuard = <T>(operation: string, call: () => Promise<T>) => Promise<T>;

export function createStoreGuard(timeoutMs: number): StoreGuard {
  return (operation, call) => withTimeout(operation, timeoutMs, call);
}
