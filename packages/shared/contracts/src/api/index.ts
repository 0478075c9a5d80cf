export * from './envelope.js';
export * from './auth-schemas.js';
export * from './profile-schemas.js';
