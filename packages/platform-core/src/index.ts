/**
 * Platform Core - shared building blocks for the Shelfwise services
 *
 * - Structured logging with correlation tracking
 * - Domain errors and the Express error pipeline
 * - JWT authentication and permission-gate guards
 * - Request validation and response envelopes
 * - Timeouts, configuration and the generic resource handler
 */

export * from './auth/index.js';
export * from './config/index.js';
export * from './database/index.js';
export * from './error-handling/index.js';
export * from './http/index.js';
export * from './lifecycle/index.js';
export * from './logging/index.js';
export * from './middleware/index.js';
export * from './resource/index.js';
