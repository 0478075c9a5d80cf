/**
 * Authentication Middleware
 *
 * Reads an optional `Authorization: Bearer <token>` header and attaches the
 * caller's AuthContext. A missing header means anonymous; a bad token is a 401.
 * With a caller lookup, the role comes from the account store rather than
 * the token claims.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import {
  createAnonymousContext,
  createAuthContext,
  createAuthContextFromClaims,
  type AuthContext,
} from '@shelfwise/shared-contracts';
import { DomainError, DomainErrorCode, asyncHandler, sendErrorResponse } from '../error-handling/errors.js';
import { enrichCorrelationContext } from '../logging/correlation.js';
import { getLogger } from '../logging/logger.js';
import { StandardJWTService } from './jwt-service.js';
import type { AuthOptions, CallerLookup } from './types.js';

export class StandardAuthMiddleware {
  private readonly logger;

  constructor(
    serviceName: string,
    private readonly jwtService: StandardJWTService,
    private readonly lookupCaller?: CallerLookup
  ) {
    this.logger = getLogger(`${serviceName}:auth`);
  }

  authenticate(options: AuthOptions = {}): RequestHandler {
    return asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
      const authHeader = req.headers.authorization;

      if (!authHeader) {
        if (options.required) {
          sendErrorResponse(res, 401, 'Authentication credentials were not provided.', {
            code: DomainErrorCode.UNAUTHORIZED,
          });
          return;
        }
        req.authContext = createAnonymousContext();
        next();
        return;
      }

      const [scheme, token] = authHeader.split(' ');
      if (scheme !== 'Bearer' || !token) {
        sendErrorResponse(res, 401, 'Authorization header must be "Bearer <token>".', {
          code: DomainErrorCode.UNAUTHORIZED,
        });
        return;
      }

      let ctx: AuthContext;
      try {
        ctx = createAuthContextFromClaims(this.jwtService.verify(token));
      } catch (error) {
        if (error instanceof DomainError) {
          this.logger.debug('Rejected bearer token', { reason: error.message });
          sendErrorResponse(res, error.statusCode, error.message, { code: error.code });
          return;
        }
        throw error;
      }

      if (ctx.isAuthenticated && this.lookupCaller) {
        const caller = await this.lookupCaller(ctx.userId);
        if (!caller) {
          this.logger.debug('Rejected token for a removed account', { userId: ctx.userId });
          sendErrorResponse(res, 401, 'User account no longer exists.', { code: DomainErrorCode.UNAUTHORIZED });
          return;
        }
        if (caller.role !== ctx.role) {
          this.logger.debug('Token role is stale', { userId: ctx.userId, tokenRole: ctx.role, role: caller.role });
        }
        ctx = createAuthContext(ctx.userId, caller.role, caller.username ?? ctx.username);
      }

      req.authContext = ctx;
      if (ctx.isAuthenticated) {
        enrichCorrelationContext({ userId: ctx.userId });
      }
      next();
    });
  }

  getJwtService(): StandardJWTService {
    return this.jwtService;
  }
}
