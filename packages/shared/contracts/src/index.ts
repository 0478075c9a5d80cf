/**
 * Shared contracts for the Shelfwise services
 *
 * Roles, capabilities, the permission gate and the response envelopes.
 * Services import these instead of defining local duplicates.
 */

export * from './common/index.js';

export * from './api/index.js';
