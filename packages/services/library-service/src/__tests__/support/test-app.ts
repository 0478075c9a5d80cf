import bcrypt from 'bcryptjs';
import type { Express } from 'express';
import { StandardJWTService } from '@shelfwise/platform-core';
import { USER_ROLES, type UserRole } from '@shelfwise/shared-contracts';
import type { User } from '@domains/accounts';
import { loadServiceConfig, type ServiceConfig } from '@config/service-config';
import { createMemoryRepositories, type Repositories } from '@infrastructure/composition/repositories';
import { MemoryDatabase } from '@infrastructure/repositories';
import { createApp } from '@presentation/app';

export const TEST_PASSWORD = 'test-password';

export const TEST_ENV: NodeJS.ProcessEnv = {
  NODE_ENV: 'test',
  STORE_DRIVER: 'memory',
  JWT_SECRET: 'test-secret',
  BCRYPT_ROUNDS: '4',
};

export interface TestContext {
  app: Express;
  config: ServiceConfig;
  db: MemoryDatabase;
  repositories: Repositories;
  jwt: StandardJWTService;
}

export function createTestContext(env: NodeJS.ProcessEnv = {}): TestContext {
  const config = loadServiceConfig({ ...TEST_ENV, ...env });
  const db = new MemoryDatabase();
  const repositories = createMemoryRepositories(db);
  return {
    app: createApp({ config, repositories }),
    config,
    db,
    repositories,
    jwt: new StandardJWTService(config.jwt),
  };
}

export interface SeededUser {
  user: User;
  token: string;
  authHeader: string;
}

/**
 * Inserts a user straight into the store and signs a token for it.
 */
export async function seedUser(
  ctx: TestContext,
  username: string,
  role: UserRole = USER_ROLES.MEMBER
): Promise<SeededUser> {
  const user = await ctx.repositories.users.create({
    username,
    email: null,
    passwordHash: await bcrypt.hash(TEST_PASSWORD, 4),
    role,
  });
  await ctx.repositories.profiles.create(user.id, '');
  const token = ctx.jwt.sign({ userId: user.id, username: user.username, role: user.role });
  return { user, token, authHeader: `Bearer ${token}` };
}
