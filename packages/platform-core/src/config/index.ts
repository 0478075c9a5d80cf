/**
 * Configuration Module - Index
 */

export * from './environment-config.js';

export * from './timeout-hierarchy.js';
