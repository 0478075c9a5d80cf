/**
 * Rate limiting for credential endpoints
 */

import rateLimit from 'express-rate-limit';
import type { Request, RequestHandler, Response } from 'express';
import { StructuredErrors } from '@shelfwise/shared-contracts';
import { getCorrelationId } from '@shelfwise/platform-core';
import { getLogger } from '@config/service-config';

const logger = getLogger('rate-limit');

export interface RateLimitConfig {
  windowMs: number;
  max: number;
}

export function credentialRateLimit(config: RateLimitConfig): RequestHandler {
  return rateLimit({
    windowMs: config.windowMs,
    max: config.max,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request): string => req.ip ?? 'unknown',
    handler: (req: Request, res: Response) => {
      logger.warn('Rate limit exceeded', { clientIP: req.ip, path: req.path });
      StructuredErrors.rateLimited(res, 'Too many attempts. Please try again later.', getCorrelationId());
    },
  });
}
