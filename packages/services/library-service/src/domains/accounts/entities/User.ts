import type { UserRole } from '@shelfwise/shared-contracts';

export interface User {
  id: number;
  username: string;
  email: string | null;
  passwordHash: string;
  role: UserRole;
  createdAt: Date;
}

export interface NewUser {
  username: string;
  email: string | null;
  passwordHash: string;
  role: UserRole;
}

export interface Profile {
  userId: number;
  bio: string;
  updatedAt: Date;
}

/** A user as other people see it. */
export interface UserSummary {
  id: number;
  username: string;
}
