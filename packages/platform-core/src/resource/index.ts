export * from './types.js';
export * from './query-params.js';
export * from './policies.js';
export * from './resource-handler.js';
export * from './express-adapter.js';
