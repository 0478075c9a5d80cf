/**
 * AuthContext - Centralized Authorization Context
 *
 * Single source of truth for caller identity across the service.
 * The auth middleware builds it from a verified JWT; every authorization
 * decision goes through `decide` (role capabilities) and, for owned
 * resources, `decideOwnership`.
 */

import { USER_ROLES, normalizeRole, type UserRole } from './roles.js';

export interface AnonymousContext {
  isAuthenticated: false;
  userId: null;
  role: null;
}

export interface AuthenticatedContext {
  isAuthenticated: true;
  userId: number;
  role: UserRole;
  username?: string;
}

export type AuthContext = AnonymousContext | AuthenticatedContext;

export interface JWTClaims {
  sub?: string;
  id?: string | number;
  username?: string;
  role?: string;
  iat?: number;
  exp?: number;
}

export const CAPABILITY = {
  VIEW: 'view',
  CREATE: 'create',
  EDIT: 'edit',
  DELETE: 'delete',
} as const;

export type Capability = (typeof CAPABILITY)[keyof typeof CAPABILITY];

export const ROLE_CAPABILITIES: Record<UserRole, readonly Capability[]> = {
  [USER_ROLES.ADMIN]: [CAPABILITY.VIEW, CAPABILITY.CREATE, CAPABILITY.EDIT, CAPABILITY.DELETE],
  [USER_ROLES.LIBRARIAN]: [CAPABILITY.VIEW, CAPABILITY.CREATE, CAPABILITY.EDIT],
  [USER_ROLES.MEMBER]: [CAPABILITY.VIEW],
} as const;

export type DenyReason = 'unauthenticated' | 'forbidden';

export type GateDecision = { allowed: true } | { allowed: false; reason: DenyReason; message: string };

export const ALLOW: GateDecision = { allowed: true };

export function createAnonymousContext(): AnonymousContext {
  return { isAuthenticated: false, userId: null, role: null };
}

export function createAuthContext(userId: number, rawRole: string | undefined | null, username?: string): AuthContext {
  if (!Number.isInteger(userId) || userId <= 0) {
    return createAnonymousContext();
  }
  return {
    isAuthenticated: true,
    userId,
    role: normalizeRole(rawRole),
    ...(username ? { username } : {}),
  };
}

function parseUserId(raw: string | number | undefined): number {
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'string' && /^\d+$/.test(raw)) return Number(raw);
  return 0;
}

export function createAuthContextFromClaims(claims: JWTClaims | null | undefined): AuthContext {
  if (!claims) {
    return createAnonymousContext();
  }
  return createAuthContext(parseUserId(claims.sub ?? claims.id), claims.role, claims.username);
}

export function hasRole(ctx: AuthContext, role: UserRole): boolean {
  return ctx.isAuthenticated && ctx.role === role;
}

export function hasCapability(ctx: AuthContext, capability: Capability): boolean {
  if (!ctx.isAuthenticated) {
    return capability === CAPABILITY.VIEW;
  }
  return ROLE_CAPABILITIES[ctx.role].includes(capability);
}

/**
 * The permission gate. Anonymous callers may only view; authenticated
 * callers may do whatever their role's capability set contains.
 */
export function decide(ctx: AuthContext, capability: Capability): GateDecision {
  if (hasCapability(ctx, capability)) {
    return ALLOW;
  }
  if (!ctx.isAuthenticated) {
    return { allowed: false, reason: 'unauthenticated', message: 'Authentication credentials were not provided.' };
  }
  return {
    allowed: false,
    reason: 'forbidden',
    message: `Your role '${ctx.role}' does not have the '${capability}' permission.`,
  };
}

/**
 * Gate for owned resources: the owner passes, anyone else needs the capability.
 */
export function decideOwnership(ctx: AuthContext, capability: Capability, ownerId: number): GateDecision {
  if (!ctx.isAuthenticated) {
    return decide(ctx, capability);
  }
  if (ctx.userId === ownerId) {
    return ALLOW;
  }
  if (hasCapability(ctx, capability)) {
    return ALLOW;
  }
  return { allowed: false, reason: 'forbidden', message: 'You do not have permission to modify this resource.' };
}

export function denialStatusCode(reason: DenyReason): 401 | 403 {
  return reason === 'unauthenticated' ? 401 : 403;
}
