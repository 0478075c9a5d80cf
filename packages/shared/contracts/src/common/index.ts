export * from './roles.js';
export * from './auth-context.js';
export * from './error-factory.js';
