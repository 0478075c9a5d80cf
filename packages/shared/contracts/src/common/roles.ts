/**
 * User Roles - Single Source of Truth
 *
 * Role definitions:
 * - ADMIN: every capability, including deletes and role management
 * - LIBRARIAN: curates the catalog (view, create, edit)
 * - MEMBER: read-only access (default for all new registrations)
 */

export const USER_ROLES = {
  ADMIN: 'admin',
  LIBRARIAN: 'librarian',
  MEMBER: 'member',
} as const;

export type UserRole = (typeof USER_ROLES)[keyof typeof USER_ROLES];

export const VALID_ROLES: readonly UserRole[] = [USER_ROLES.ADMIN, USER_ROLES.LIBRARIAN, USER_ROLES.MEMBER] as const;

// Older group names still arrive from clients and seed data.
const ROLE_ALIASES: Record<string, UserRole> = {
  admins: USER_ROLES.ADMIN,
  editor: USER_ROLES.LIBRARIAN,
  editors: USER_ROLES.LIBRARIAN,
  viewer: USER_ROLES.MEMBER,
  viewers: USER_ROLES.MEMBER,
};

export function isValidRole(role: string): role is UserRole {
  return VALID_ROLES.some(valid => valid === role);
}

/**
 * Resolve a role name or alias, case-insensitively. Returns null when unknown.
 */
export function parseRole(role: string | undefined | null): UserRole | null {
  if (!role) return null;
  const lowerRole = role.trim().toLowerCase();
  if (isValidRole(lowerRole)) return lowerRole;
  return Object.hasOwn(ROLE_ALIASES, lowerRole) ? (ROLE_ALIASES[lowerRole] ?? null) : null;
}

/**
 * Normalize role string to UserRole, defaulting to MEMBER for anything unknown
 */
export function normalizeRole(role: string | undefined | null): UserRole {
  return parseRole(role) ?? USER_ROLES.MEMBER;
}
