/**
 * Logging Middleware
 *
 * Express middleware for request logging with correlation
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { LogContext } from './types.js';
import { getLogger } from './logger.js';
import { correlationStorage, generateCorrelationId } from './correlation.js';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Assigns a correlation ID, echoes it back and logs the request once it finishes
 */
export function requestLogger(serviceName: string): RequestHandler {
  const logger = getLogger(serviceName);

  return (req: Request, res: Response, next: NextFunction) => {
    const correlationId =
      headerValue(req.headers['x-correlation-id']) || headerValue(req.headers['x-request-id']) || generateCorrelationId();
    const startedAt = Date.now();

    const context: LogContext = {
      correlationId,
      service: serviceName,
      method: req.method,
      url: req.originalUrl,
    };

    res.setHeader('x-correlation-id', correlationId);
    res.on('finish', () => {
      logger.http('Request completed', {
        correlationId,
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
        userId: context.userId,
      });
    });

    correlationStorage.run(context, () => {
      next();
    });
  };
}
