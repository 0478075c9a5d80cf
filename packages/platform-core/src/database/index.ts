/**
 * Database Module
 */

export { withTimeout, StoreTimeoutError } from './withTimeout.js';

export { isUniqueViolation, isForeignKeyViolation, readPgCode } from './pg-errors.js';
