import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Post } from '@domains/social';
import { createFakeDatabase, domainErrorFrom, pgError, renderSql, type FakeDatabase } from '../support/fake-database';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('@config/service-config', async importOriginal => ({
  ...(await importOriginal<typeof import('@config/service-config')>()),
  getLogger: () => mockLogger,
}));

import { notifications, posts } from '@infrastructure/database/schemas';
import {
  DrizzleCommentRepository,
  DrizzleFollowRepository,
  DrizzleLikeRepository,
  DrizzlePostRepository,
} from '@infrastructure/repositories';

const posted = new Date('2026-03-02T09:30:00Z');

const verse: Post = {
  id: 3,
  authorId: 1,
  authorUsername: 'ada',
  title: 'Verse',
  content: 'Lines.',
  tags: ['poetry'],
  likeCount: 1,
  createdAt: posted,
  updatedAt: posted,
};

describe('DrizzleFollowRepository', () => {
  let fake: FakeDatabase;
  let repository: DrizzleFollowRepository;

  beforeEach(() => {
    vi.clearAllMocks();
    fake = createFakeDatabase();
    repository = new DrizzleFollowRepository(fake.db);
  });

  it('should report a new follow', async () => {
    fake.enqueue([{ followerId: 1 }]);

    await expect(repository.add(1, 2)).resolves.toBe(true);
    expect(fake.calls.values).toHaveBeenCalledWith({ followerId: 1, followingId: 2 });
  });

  it('should report nothing changed when the follow already exists', async () => {
    fake.enqueue([]);

    await expect(repository.add(1, 2)).resolves.toBe(false);
    expect(fake.calls.onConflictDoNothing).toHaveBeenCalledTimes(1);
  });
});

describe('DrizzleLikeRepository', () => {
  let fake: FakeDatabase;
  let repository: DrizzleLikeRepository;

  beforeEach(() => {
    vi.clearAllMocks();
    fake = createFakeDatabase();
    repository = new DrizzleLikeRepository(fake.db);
  });

  it('should report nothing changed on a second like', async () => {
    fake.enqueue([]);

    await expect(repository.add(2, 3)).resolves.toBe(false);
    expect(fake.calls.onConflictDoNothing).toHaveBeenCalledTimes(1);
  });

  it('should answer 404 when the post is gone', async () => {
    fake.enqueue(pgError('23503'));

    const error = await domainErrorFrom(repository.add(2, 12));

    expect(error.statusCode).toBe(404);
    expect(error.message).toBe('Post not found: 12');
  });

  it('should log and rethrow other failures', async () => {
    fake.enqueue(new Error('connection reset'));

    await expect(repository.add(2, 3)).rejects.toThrow('connection reset');
    expect(mockLogger.error).toHaveBeenCalledWith(
      'Failed to add like',
      expect.objectContaining({ userId: 2, postId: 3 })
    );
  });
});

describe('DrizzlePostRepository', () => {
  let fake: FakeDatabase;
  let repository: DrizzlePostRepository;

  beforeEach(() => {
    vi.clearAllMocks();
    fake = createFakeDatabase();
    repository = new DrizzlePostRepository(fake.db);
  });

  it('should filter by tag with array containment', async () => {
    fake.enqueue([verse], [{ total: 1 }]);

    const result = await repository.list(
      { tag: 'poetry', searchTerms: [], ordering: [{ field: 'created_at', direction: 'desc' }] },
      { page: 1, pageSize: 20 }
    );

    expect(result).toEqual({ items: [verse], total: 1 });
    expect(renderSql(fake.calls.where.mock.calls[0]?.[0])).toBe('"soc_posts"."tags" @> $1');
  });

  it('should skip the query for a feed that follows nobody', async () => {
    const result = await repository.list({ authorIds: [], searchTerms: [], ordering: [] }, { page: 1, pageSize: 20 });

    expect(result).toEqual({ items: [], total: 0 });
    expect(fake.calls.select).not.toHaveBeenCalled();
  });

  it('should remove notifications about the post in the same transaction', async () => {
    fake.enqueue([verse], [], [{ id: 3 }]);

    const result = await repository.delete(3);

    expect(result).toEqual(verse);
    expect(fake.transaction).toHaveBeenCalledTimes(1);
    expect(fake.calls.delete).toHaveBeenNthCalledWith(1, notifications);
    expect(fake.calls.delete).toHaveBeenNthCalledWith(2, posts);
  });

  it('should not open a transaction for a missing post', async () => {
    fake.enqueue([]);

    await expect(repository.delete(3)).resolves.toBeNull();
    expect(fake.transaction).not.toHaveBeenCalled();
  });
});

describe('DrizzleCommentRepository', () => {
  let fake: FakeDatabase;
  let repository: DrizzleCommentRepository;

  beforeEach(() => {
    vi.clearAllMocks();
    fake = createFakeDatabase();
    repository = new DrizzleCommentRepository(fake.db);
  });

  it('should answer 404 when commenting on a missing post', async () => {
    fake.enqueue(pgError('23503'));

    const error = await domainErrorFrom(repository.create({ postId: 12, authorId: 1, content: 'Hello?' }));

    expect(error.statusCode).toBe(404);
    expect(error.message).toBe('Post not found: 12');
  });

  it('should change only the content on update', async () => {
    const comment = {
      id: 8,
      postId: 3,
      authorId: 1,
      authorUsername: 'ada',
      content: 'Edited',
      createdAt: posted,
      updatedAt: posted,
    };
    fake.enqueue([{ id: 8 }], [comment]);

    const result = await repository.update(8, { content: 'Edited', postId: 5 });

    expect(result).toEqual(comment);
    expect(fake.calls.set).toHaveBeenCalledWith({ content: 'Edited', updatedAt: expect.any(Date) });
  });
});
