/**
 * Logging Types
 */

export type { Logger } from 'winston';

export interface LogContext {
  correlationId?: string;
  service?: string;
  method?: string;
  url?: string;
  userId?: number;
  [key: string]: unknown;
}

export interface LoggerMeta {
  service: string;
  env: string;
  version?: string;
  instanceId?: string;
}
