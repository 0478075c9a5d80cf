/**
 * Builds every store for the configured driver.
 */

import type { IAuthorRepository, IBookRepository, ILibraryRepository } from '@domains/catalog';
import type { IProfileRepository, IUserRepository } from '@domains/accounts';
import type {
  ICommentRepository,
  IFollowRepository,
  ILikeRepository,
  INotificationRepository,
  IPostRepository,
} from '@domains/social';
import type { ServiceConfig } from '@config/service-config';
import { getLogger } from '@config/service-config';
import { DatabaseConnectionFactory } from '../database/DatabaseConnectionFactory';
import {
  DrizzleAuthorRepository,
  DrizzleBookRepository,
  DrizzleCommentRepository,
  DrizzleFollowRepository,
  DrizzleLibraryRepository,
  DrizzleLikeRepository,
  DrizzleNotificationRepository,
  DrizzlePostRepository,
  DrizzleProfileRepository,
  DrizzleUserRepository,
  MemoryAuthorRepository,
  MemoryBookRepository,
  MemoryCommentRepository,
  MemoryDatabase,
  MemoryFollowRepository,
  MemoryLibraryRepository,
  MemoryLikeRepository,
  MemoryNotificationRepository,
  MemoryPostRepository,
  MemoryProfileRepository,
  MemoryUserRepository,
} from '../repositories';

const logger = getLogger('repositories');

export interface Repositories {
  books: IBookRepository;
  authors: IAuthorRepository;
  libraries: ILibraryRepository;
  users: IUserRepository;
  profiles: IProfileRepository;
  posts: IPostRepository;
  comments: ICommentRepository;
  follows: IFollowRepository;
  likes: ILikeRepository;
  notifications: INotificationRepository;
  healthCheck(): Promise<{ status: 'healthy' | 'unhealthy'; latencyMs: number }>;
  close(): Promise<void>;
}

export function createMemoryRepositories(db: MemoryDatabase = new MemoryDatabase()): Repositories {
  return {
    books: new MemoryBookRepository(db),
    authors: new MemoryAuthorRepository(db),
    libraries: new MemoryLibraryRepository(db),
    users: new MemoryUserRepository(db),
    profiles: new MemoryProfileRepository(db),
    posts: new MemoryPostRepository(db),
    comments: new MemoryCommentRepository(db),
    follows: new MemoryFollowRepository(db),
    likes: new MemoryLikeRepository(db),
    notifications: new MemoryNotificationRepository(db),
    healthCheck: async () => ({ status: 'healthy', latencyMs: 0 }),
    close: async () => db.clear(),
  };
}

export function createPostgresRepositories(factory: DatabaseConnectionFactory): Repositories {
  return {
    books: factory.createDrizzleRepository(DrizzleBookRepository),
    authors: factory.createDrizzleRepository(DrizzleAuthorRepository),
    libraries: factory.createDrizzleRepository(DrizzleLibraryRepository),
    users: factory.createDrizzleRepository(DrizzleUserRepository),
    profiles: factory.createDrizzleRepository(DrizzleProfileRepository),
    posts: factory.createDrizzleRepository(DrizzlePostRepository),
    comments: factory.createDrizzleRepository(DrizzleCommentRepository),
    follows: factory.createDrizzleRepository(DrizzleFollowRepository),
    likes: factory.createDrizzleRepository(DrizzleLikeRepository),
    notifications: factory.createDrizzleRepository(DrizzleNotificationRepository),
    healthCheck: () => factory.healthCheck(),
    close: () => factory.close(),
  };
}

export function createRepositories(config: ServiceConfig): Repositories {
  if (config.storeDriver === 'memory') {
    logger.warn('Using the in-memory store; data is lost on restart');
    return createMemoryRepositories();
  }
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required when STORE_DRIVER is postgres');
  }
  logger.info('Using the postgres store');
  return createPostgresRepositories(
    new DatabaseConnectionFactory({
      url: config.databaseUrl,
      poolMax: config.databasePoolMax,
      statementTimeoutMs: config.timeouts.statement,
    })
  );
}
