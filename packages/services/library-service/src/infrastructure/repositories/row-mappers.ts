import { normalizeRole } from '@shelfwise/shared-contracts';
import type { Profile, User } from '@domains/accounts';
import type { ProfileRow, UserRow } from '../database/schemas';

export function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.passwordHash,
    role: normalizeRole(row.role),
    createdAt: row.createdAt,
  };
}

export function rowToProfile(row: ProfileRow): Profile {
  return { userId: row.userId, bio: row.bio, updatedAt: row.updatedAt };
}
