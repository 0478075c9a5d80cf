import type { UserRole } from '@shelfwise/shared-contracts';
import type { IProfileRepository, IUserRepository, NewUser, Profile, User } from '@domains/accounts';
import { AccountError } from '@application/errors';
import type { ProfileRow, UserRow } from '../../database/schemas';
import { rowToProfile, rowToUser } from '../row-mappers';
import type { MemoryDatabase } from './MemoryDatabase';

export class MemoryUserRepository implements IUserRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async findById(id: number): Promise<User | null> {
    const row = this.db.users.get(id);
    return row ? rowToUser(row) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    for (const row of this.db.users.values()) {
      if (row.username === username) return rowToUser(row);
    }
    return null;
  }

  async create(user: NewUser): Promise<User> {
    if (await this.findByUsername(user.username)) {
      throw AccountError.usernameTaken();
    }
    const row: UserRow = { id: this.db.nextId('users'), ...user, createdAt: new Date() };
    this.db.users.set(row.id, row);
    return rowToUser(row);
  }

  async updateRole(id: number, role: UserRole): Promise<User | null> {
    const existing = this.db.users.get(id);
    if (!existing) return null;
    const updated = { ...existing, role };
    this.db.users.set(id, updated);
    return rowToUser(updated);
  }
}

export class MemoryProfileRepository implements IProfileRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async findByUserId(userId: number): Promise<Profile | null> {
    const row = this.db.profiles.get(userId);
    return row ? rowToProfile(row) : null;
  }

  async create(userId: number, bio: string): Promise<Profile> {
    if (!this.db.users.has(userId)) {
      throw AccountError.validationError('user', `Invalid pk "${userId}" - object does not exist.`);
    }
    if (this.db.profiles.has(userId)) {
      throw AccountError.conflict('This user already has a profile.');
    }
    const row: ProfileRow = { id: this.db.nextId('profiles'), userId, bio, updatedAt: new Date() };
    this.db.profiles.set(userId, row);
    return rowToProfile(row);
  }

  async update(userId: number, fields: { bio: string }): Promise<Profile | null> {
    const existing = this.db.profiles.get(userId);
    if (!existing) return null;
    const updated = { ...existing, bio: fields.bio, updatedAt: new Date() };
    this.db.profiles.set(userId, updated);
    return rowToProfile(updated);
  }
}
