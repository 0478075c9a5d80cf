/**
 * Unit Tests for AuthContext and the permission gate
 */

import { describe, it, expect } from 'vitest';
import {
  createAuthContext,
  createAuthContextFromClaims,
  createAnonymousContext,
  decide,
  decideOwnership,
  denialStatusCode,
  hasCapability,
  hasRole,
  CAPABILITY,
  type Capability,
} from '../common/auth-context';
import { USER_ROLES } from '../common/roles';

const ALL_CAPABILITIES: Capability[] = [CAPABILITY.VIEW, CAPABILITY.CREATE, CAPABILITY.EDIT, CAPABILITY.DELETE];

describe('AuthContext', () => {
  describe('createAuthContext', () => {
    it('should create an authenticated context for a positive user id', () => {
      const ctx = createAuthContext(7, USER_ROLES.LIBRARIAN, 'ada');

      expect(ctx).toEqual({ isAuthenticated: true, userId: 7, role: 'librarian', username: 'ada' });
    });

    it('should fall back to anonymous for an invalid user id', () => {
      expect(createAuthContext(0, USER_ROLES.ADMIN)).toEqual(createAnonymousContext());
      expect(createAuthContext(-3, USER_ROLES.ADMIN).isAuthenticated).toBe(false);
    });

    it('should map legacy group names onto roles', () => {
      expect(createAuthContext(1, 'Editors').role).toBe(USER_ROLES.LIBRARIAN);
      expect(createAuthContext(1, 'viewer').role).toBe(USER_ROLES.MEMBER);
      expect(createAuthContext(1, 'unknown').role).toBe(USER_ROLES.MEMBER);
    });
  });

  describe('createAuthContextFromClaims', () => {
    it('should read the numeric subject claim', () => {
      const ctx = createAuthContextFromClaims({ sub: '42', role: 'admin' });

      expect(ctx.isAuthenticated).toBe(true);
      expect(ctx.userId).toBe(42);
      expect(hasRole(ctx, USER_ROLES.ADMIN)).toBe(true);
    });

    it('should treat missing or malformed claims as anonymous', () => {
      expect(createAuthContextFromClaims(null).isAuthenticated).toBe(false);
      expect(createAuthContextFromClaims({ sub: 'abc' }).isAuthenticated).toBe(false);
    });
  });
});

describe('decide', () => {
  it('should let anonymous callers view only', () => {
    const anonymous = createAnonymousContext();

    expect(decide(anonymous, CAPABILITY.VIEW)).toEqual({ allowed: true });
    for (const capability of [CAPABILITY.CREATE, CAPABILITY.EDIT, CAPABILITY.DELETE]) {
      const decision = decide(anonymous, capability);
      expect(decision.allowed).toBe(false);
      if (!decision.allowed) {
        expect(decision.reason).toBe('unauthenticated');
        expect(denialStatusCode(decision.reason)).toBe(401);
      }
    }
  });

  it('should grant admins every capability', () => {
    const admin = createAuthContext(1, USER_ROLES.ADMIN);

    expect(ALL_CAPABILITIES.every(capability => decide(admin, capability).allowed)).toBe(true);
  });

  it('should let librarians view, create and edit but not delete', () => {
    const librarian = createAuthContext(2, USER_ROLES.LIBRARIAN);

    expect(ALL_CAPABILITIES.map(capability => decide(librarian, capability).allowed)).toEqual([
      true,
      true,
      true,
      false,
    ]);
  });

  it('should forbid members from writing', () => {
    const member = createAuthContext(3, USER_ROLES.MEMBER);
    const decision = decide(member, CAPABILITY.CREATE);

    expect(decision).toEqual({
      allowed: false,
      reason: 'forbidden',
      message: "Your role 'member' does not have the 'create' permission.",
    });
    expect(hasCapability(member, CAPABILITY.VIEW)).toBe(true);
  });
});

describe('decideOwnership', () => {
  it('should allow the owner regardless of role', () => {
    const member = createAuthContext(3, USER_ROLES.MEMBER);

    expect(decideOwnership(member, CAPABILITY.DELETE, 3).allowed).toBe(true);
  });

  it('should allow a non-owner holding the capability', () => {
    const admin = createAuthContext(1, USER_ROLES.ADMIN);

    expect(decideOwnership(admin, CAPABILITY.DELETE, 3).allowed).toBe(true);
  });

  it('should forbid a non-owner without the capability', () => {
    const librarian = createAuthContext(2, USER_ROLES.LIBRARIAN);
    const decision = decideOwnership(librarian, CAPABILITY.DELETE, 3);

    expect(decision.allowed).toBe(false);
    if (!decision.allowed) {
      expect(denialStatusCode(decision.reason)).toBe(403);
    }
  });

  it('should report anonymous callers as unauthenticated', () => {
    const decision = decideOwnership(createAnonymousContext(), CAPABILITY.EDIT, 3);

    expect(decision.allowed).toBe(false);
    if (!decision.allowed) {
      expect(decision.reason).toBe('unauthenticated');
    }
  });
});
