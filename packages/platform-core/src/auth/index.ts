/**
 * Authentication Module - Index
 */

export * from './types.js';

export * from './jwt-service.js';

export * from './auth-middleware.js';

export * from './policy-guards.js';
