import { DomainError, DomainErrorCode } from '../error-handling/errors.js';

export class StoreTimeoutError extends DomainError {
  constructor(operation: string, timeoutMs: number) {
    super(
      `The data store did not answer ${operation} within ${timeoutMs}ms. Please retry.`,
      503,
      undefined,
      DomainErrorCode.SERVICE_UNAVAILABLE,
      { retryable: true, operation, timeoutMs }
    );
    this.name = 'StoreTimeoutError';
  }
}

/**
 * Bound a store call. The underlying query keeps running until the
 * database's statement_timeout ends it; the caller stops waiting here.
 */
export async function withTimeout<T>(operation: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new StoreTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), expiry]);
  } finally {
    clearTimeout(timer);
  }
}
