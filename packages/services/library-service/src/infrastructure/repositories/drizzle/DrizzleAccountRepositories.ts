import { eq } from 'drizzle-orm';
import { isUniqueViolation, serializeError } from '@shelfwise/platform-core';
import type { UserRole } from '@shelfwise/shared-contracts';
import type { IProfileRepository, IUserRepository, NewUser, Profile, User } from '@domains/accounts';
import { AccountError } from '@application/errors';
import { getLogger } from '@config/service-config';
import type { DatabaseConnection } from '../../database/DatabaseConnectionFactory';
import { profiles, users } from '../../database/schemas';
import { rowToProfile, rowToUser } from '../row-mappers';

const logger = getLogger('account-repository');

export class DrizzleUserRepository implements IUserRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async findById(id: number): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return row ? rowToUser(row) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.username, username)).limit(1);
    return row ? rowToUser(row) : null;
  }

  async create(user: NewUser): Promise<User> {
    try {
      const [row] = await this.db.insert(users).values(user).returning();
      if (!row) throw AccountError.internalError('Insert returned no row');
      logger.info('User created', { userId: row.id });
      return rowToUser(row);
    } catch (error) {
      if (isUniqueViolation(error)) throw AccountError.usernameTaken();
      logger.error('Failed to create user', { error: serializeError(error) });
      throw error;
    }
  }

  async updateRole(id: number, role: UserRole): Promise<User | null> {
    const [row] = await this.db.update(users).set({ role }).where(eq(users.id, id)).returning();
    return row ? rowToUser(row) : null;
  }
}

export class DrizzleProfileRepository implements IProfileRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async findByUserId(userId: number): Promise<Profile | null> {
    const [row] = await this.db.select().from(profiles).where(eq(profiles.userId, userId)).limit(1);
    return row ? rowToProfile(row) : null;
  }

  async create(userId: number, bio: string): Promise<Profile> {
    try {
      const [row] = await this.db.insert(profiles).values({ userId, bio }).returning();
      if (!row) throw AccountError.internalError('Insert returned no row');
      return rowToProfile(row);
    } catch (error) {
      if (isUniqueViolation(error)) throw AccountError.conflict('This user already has a profile.');
      throw error;
    }
  }

  async update(userId: number, fields: { bio: string }): Promise<Profile | null> {
    const [row] = await this.db
      .update(profiles)
      .set({ bio: fields.bio, updatedAt: new Date() })
      .where(eq(profiles.userId, userId))
      .returning();
    return row ? rowToProfile(row) : null;
  }
}
