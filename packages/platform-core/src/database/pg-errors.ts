/**
 * PostgreSQL error codes the repositories translate into domain errors.
 * Drizzle wraps driver errors, so the code may sit on `cause`.
 */

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

export function readPgCode(error: unknown, depth = 0): string | undefined {
  if (typeof error !== 'object' || error === null || depth > 3) return undefined;
  if ('code' in error && typeof error.code === 'string' && /^[0-9A-Z]{5}$/.test(error.code)) {
    return error.code;
  }
  return 'cause' in error ? readPgCode(error.cause, depth + 1) : undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return readPgCode(error) === UNIQUE_VIOLATION;
}

export function isForeignKeyViolation(error: unknown): boolean {
  return readPgCode(error) === FOREIGN_KEY_VIOLATION;
}
