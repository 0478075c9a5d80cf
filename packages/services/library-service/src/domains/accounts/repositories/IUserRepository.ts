import type { UserRole } from '@shelfwise/shared-contracts';
import type { NewUser, Profile, User } from '../entities/User';

export interface IUserRepository {
  findById(id: number): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  /** Throws AccountError.conflict when the username is taken. */
  create(user: NewUser): Promise<User>;
  updateRole(id: number, role: UserRole): Promise<User | null>;
}

export interface IProfileRepository {
  findByUserId(userId: number): Promise<Profile | null>;
  create(userId: number, bio: string): Promise<Profile>;
  update(userId: number, fields: { bio: string }): Promise<Profile | null>;
}
