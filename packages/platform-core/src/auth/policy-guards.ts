/**
 * PolicyGuards - Centralized Authorization Middleware
 *
 * Express wrappers around the permission gate from shared-contracts.
 *
 * Usage:
 * ```typescript
 * router.post('/books', requireCapability(CAPABILITY.CREATE), createBook);
 * router.patch('/users/:id/role', requireRole(USER_ROLES.ADMIN), updateRole);
 * ```
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import {
  type AuthContext,
  type AuthenticatedContext,
  type Capability,
  type GateDecision,
  type UserRole,
  createAnonymousContext,
  decide,
  denialStatusCode,
  hasRole,
} from '@shelfwise/shared-contracts';
import { DomainErrorCode, sendErrorResponse } from '../error-handling/errors.js';
import { getLogger } from '../logging/logger.js';
import './types.js';

const logger = getLogger('policy-guards');

export interface PolicyGuardOptions {
  onUnauthorized?: (req: Request, res: Response, reason: string) => void;
  onForbidden?: (req: Request, res: Response, reason: string) => void;
}

const defaultOptions: Required<PolicyGuardOptions> = {
  onUnauthorized: (_req, res, reason) => {
    sendErrorResponse(res, 401, reason, { code: DomainErrorCode.UNAUTHORIZED });
  },
  onForbidden: (_req, res, reason) => {
    sendErrorResponse(res, 403, reason, { code: DomainErrorCode.FORBIDDEN });
  },
};

export function extractAuthContext(req: Request): AuthContext {
  if (!req.authContext) {
    req.authContext = createAnonymousContext();
  }
  return req.authContext;
}

/**
 * The authenticated caller, or null for anonymous requests
 */
export function getAuthenticatedUser(req: Request): AuthenticatedContext | null {
  const ctx = extractAuthContext(req);
  return ctx.isAuthenticated ? ctx : null;
}

/**
 * Apply a gate decision: continue on allow, otherwise answer 401 or 403.
 * Both denials are logged; only the level differs.
 */
export function enforceDecision(
  decision: GateDecision,
  req: Request,
  res: Response,
  next: NextFunction,
  options: PolicyGuardOptions = {}
): void {
  if (decision.allowed) {
    next();
    return;
  }

  const opts = { ...defaultOptions, ...options };
  const ctx = extractAuthContext(req);
  const statusCode = denialStatusCode(decision.reason);
  logger.log(statusCode === 401 ? 'info' : 'warn', 'Request denied by permission gate', {
    reason: decision.reason,
    method: req.method,
    url: req.originalUrl,
    userId: ctx.userId,
    role: ctx.role,
  });

  if (statusCode === 401) {
    opts.onUnauthorized(req, res, decision.message);
  } else {
    opts.onForbidden(req, res, decision.message);
  }
}

export function requireAuthenticated(options: PolicyGuardOptions = {}): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const ctx = extractAuthContext(req);
    const decision: GateDecision = ctx.isAuthenticated
      ? { allowed: true }
      : { allowed: false, reason: 'unauthenticated', message: 'Authentication credentials were not provided.' };
    enforceDecision(decision, req, res, next, options);
  };
}

export function requireCapability(capability: Capability, options: PolicyGuardOptions = {}): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    enforceDecision(decide(extractAuthContext(req), capability), req, res, next, options);
  };
}

export function requireRole(role: UserRole, options: PolicyGuardOptions = {}): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const ctx = extractAuthContext(req);
    let decision: GateDecision = { allowed: true };

    if (!ctx.isAuthenticated) {
      decision = { allowed: false, reason: 'unauthenticated', message: 'Authentication credentials were not provided.' };
    } else if (!hasRole(ctx, role)) {
      decision = { allowed: false, reason: 'forbidden', message: `${role} access required` };
    }

    enforceDecision(decision, req, res, next, options);
  };
}

export const PolicyGuards = {
  extractAuthContext,
  getAuthenticatedUser,
  requireAuthenticated,
  requireCapability,
  requireRole,
};
