/**
 * Social repositories over Drizzle ORM.
 * Follow and like inserts use ON CONFLICT DO NOTHING, so a duplicate that
 * loses a race reports "nothing changed" instead of failing.
 */

import { and, arrayContains, count, desc, eq, ilike, inArray, or, sql, type SQL } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import { isForeignKeyViolation, serializeError, type ListResult, type PageRequest } from '@shelfwise/platform-core';
import type { UserSummary } from '@domains/accounts';
import {
  DEFAULT_COMMENT_ORDERING,
  type Comment,
  type CommentInput,
  type CommentQuery,
  type FollowCounts,
  type ICommentRepository,
  type IFollowRepository,
  type ILikeRepository,
  type INotificationRepository,
  type IPostRepository,
  type NewComment,
  type NewNotification,
  type NewPost,
  type Notification,
  type NotificationQuery,
  type Post,
  type PostInput,
  type PostQuery,
} from '@domains/social';
import { SocialError } from '@application/errors';
import { getLogger } from '@config/service-config';
import type { DatabaseConnection } from '../../database/DatabaseConnectionFactory';
import { comments, follows, likes, notifications, posts, users } from '../../database/schemas';
import { containsPattern, offsetOf, orderByTerms } from './query-helpers';

const logger = getLogger('social-repository');

const likeCount = sql<number>`(select count(*) from ${likes} where ${likes.postId} = ${posts.id})`.mapWith(Number);

const postColumns = {
  id: posts.id,
  authorId: posts.authorId,
  authorUsername: users.username,
  title: posts.title,
  content: posts.content,
  tags: posts.tags,
  likeCount,
  createdAt: posts.createdAt,
  updatedAt: posts.updatedAt,
};

function postConditions(query: PostQuery): SQL | undefined {
  const conditions: (SQL | undefined)[] = [];
  if (query.authorId !== undefined) conditions.push(eq(posts.authorId, query.authorId));
  if (query.authorIds !== undefined) conditions.push(inArray(posts.authorId, query.authorIds));
  if (query.tag !== undefined) conditions.push(arrayContains(posts.tags, [query.tag]));
  for (const term of query.searchTerms) {
    const pattern = containsPattern(term);
    conditions.push(
      or(
        ilike(posts.title, pattern),
        ilike(posts.content, pattern),
        sql`exists (select 1 from unnest(${posts.tags}) as tag where tag ilike ${pattern})`
      )
    );
  }
  return and(...conditions);
}

export class DrizzlePostRepository implements IPostRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async get(id: number): Promise<Post | null> {
    const [post] = await this.db
      .select(postColumns)
      .from(posts)
      .innerJoin(users, eq(posts.authorId, users.id))
      .where(eq(posts.id, id))
      .limit(1);
    return post ?? null;
  }

  async list(query: PostQuery, page: PageRequest): Promise<ListResult<Post>> {
    if (query.authorIds !== undefined && query.authorIds.length === 0) {
      return { items: [], total: 0 };
    }
    const where = postConditions(query);
    const [items, [totals]] = await Promise.all([
      this.db
        .select(postColumns)
        .from(posts)
        .innerJoin(users, eq(posts.authorId, users.id))
        .where(where)
        .orderBy(...orderByTerms(query.ordering, { created_at: posts.createdAt, title: posts.title }, posts.id))
        .limit(page.pageSize)
        .offset(offsetOf(page)),
      this.db.select({ total: count() }).from(posts).where(where),
    ]);
    return { items, total: totals?.total ?? 0 };
  }

  async create(fields: NewPost): Promise<Post> {
    let id: number;
    try {
      const [row] = await this.db.insert(posts).values(fields).returning({ id: posts.id });
      if (!row) throw SocialError.internalError('Insert returned no row');
      id = row.id;
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw SocialError.validationError('author', `Invalid pk "${fields.authorId}" - object does not exist.`);
      }
      throw error;
    }
    const created = await this.get(id);
    if (!created) throw SocialError.internalError(`Post ${id} vanished after insert`);
    return created;
  }

  async update(id: number, fields: Partial<PostInput>): Promise<Post | null> {
    const rows = await this.db
      .update(posts)
      .set({ ...fields, updatedAt: new Date() })
      .where(eq(posts.id, id))
      .returning({ id: posts.id });
    return rows.length > 0 ? this.get(id) : null;
  }

  /**
   * Comments and likes cascade; notifications only hold the post id, so
   * they are removed in the same transaction.
   */
  async delete(id: number): Promise<Post | null> {
    const existing = await this.get(id);
    if (!existing) return null;
    const deleted = await this.db.transaction(async tx => {
      await tx
        .delete(notifications)
        .where(and(eq(notifications.targetType, 'post'), eq(notifications.targetId, id)));
      return tx.delete(posts).where(eq(posts.id, id)).returning({ id: posts.id });
    });
    return deleted.length > 0 ? existing : null;
  }
}

const commentColumns = {
  id: comments.id,
  postId: comments.postId,
  authorId: comments.authorId,
  authorUsername: users.username,
  content: comments.content,
  createdAt: comments.createdAt,
  updatedAt: comments.updatedAt,
};

export class DrizzleCommentRepository implements ICommentRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async get(id: number): Promise<Comment | null> {
    const [comment] = await this.db
      .select(commentColumns)
      .from(comments)
      .innerJoin(users, eq(comments.authorId, users.id))
      .where(eq(comments.id, id))
      .limit(1);
    return comment ?? null;
  }

  async list(query: CommentQuery, page: PageRequest): Promise<ListResult<Comment>> {
    const where = and(
      query.postId !== undefined ? eq(comments.postId, query.postId) : undefined,
      query.authorId !== undefined ? eq(comments.authorId, query.authorId) : undefined
    );
    const ordering = query.ordering.length > 0 ? query.ordering : DEFAULT_COMMENT_ORDERING;
    const [items, [totals]] = await Promise.all([
      this.db
        .select(commentColumns)
        .from(comments)
        .innerJoin(users, eq(comments.authorId, users.id))
        .where(where)
        .orderBy(...orderByTerms(ordering, { created_at: comments.createdAt }, comments.id))
        .limit(page.pageSize)
        .offset(offsetOf(page)),
      this.db.select({ total: count() }).from(comments).where(where),
    ]);
    return { items, total: totals?.total ?? 0 };
  }

  async create(fields: NewComment): Promise<Comment> {
    let id: number;
    try {
      const [row] = await this.db.insert(comments).values(fields).returning({ id: comments.id });
      if (!row) throw SocialError.internalError('Insert returned no row');
      id = row.id;
    } catch (error) {
      // the author comes from a verified token, so a broken reference is the post
      if (isForeignKeyViolation(error)) throw SocialError.notFound('Post', fields.postId);
      throw error;
    }
    const created = await this.get(id);
    if (!created) throw SocialError.internalError(`Comment ${id} vanished after insert`);
    return created;
  }

  async update(id: number, fields: Partial<CommentInput>): Promise<Comment | null> {
    if (fields.content === undefined) return this.get(id);
    const rows = await this.db
      .update(comments)
      .set({ content: fields.content, updatedAt: new Date() })
      .where(eq(comments.id, id))
      .returning({ id: comments.id });
    return rows.length > 0 ? this.get(id) : null;
  }

  async delete(id: number): Promise<Comment | null> {
    const existing = await this.get(id);
    if (!existing) return null;
    const rows = await this.db.delete(comments).where(eq(comments.id, id)).returning({ id: comments.id });
    return rows.length > 0 ? existing : null;
  }
}

export class DrizzleFollowRepository implements IFollowRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async add(followerId: number, followingId: number): Promise<boolean> {
    const rows = await this.db
      .insert(follows)
      .values({ followerId, followingId })
      .onConflictDoNothing()
      .returning({ followerId: follows.followerId });
    return rows.length > 0;
  }

  async remove(followerId: number, followingId: number): Promise<boolean> {
    const rows = await this.db
      .delete(follows)
      .where(and(eq(follows.followerId, followerId), eq(follows.followingId, followingId)))
      .returning({ followerId: follows.followerId });
    return rows.length > 0;
  }

  async exists(followerId: number, followingId: number): Promise<boolean> {
    const rows = await this.db
      .select({ followerId: follows.followerId })
      .from(follows)
      .where(and(eq(follows.followerId, followerId), eq(follows.followingId, followingId)))
      .limit(1);
    return rows.length > 0;
  }

  private async listEdgeUsers(
    match: SQL,
    joinColumn: typeof follows.followerId | typeof follows.followingId,
    page: PageRequest
  ): Promise<ListResult<UserSummary>> {
    const [items, [totals]] = await Promise.all([
      this.db
        .select({ id: users.id, username: users.username })
        .from(follows)
        .innerJoin(users, eq(users.id, joinColumn))
        .where(match)
        .orderBy(users.username)
        .limit(page.pageSize)
        .offset(offsetOf(page)),
      this.db.select({ total: count() }).from(follows).where(match),
    ]);
    return { items, total: totals?.total ?? 0 };
  }

  async listFollowers(userId: number, page: PageRequest): Promise<ListResult<UserSummary>> {
    return this.listEdgeUsers(eq(follows.followingId, userId), follows.followerId, page);
  }

  async listFollowing(userId: number, page: PageRequest): Promise<ListResult<UserSummary>> {
    return this.listEdgeUsers(eq(follows.followerId, userId), follows.followingId, page);
  }

  async followingIds(userId: number): Promise<number[]> {
    const rows = await this.db
      .select({ id: follows.followingId })
      .from(follows)
      .where(eq(follows.followerId, userId));
    return rows.map(row => row.id);
  }

  async counts(userId: number): Promise<FollowCounts> {
    const [[followers], [following]] = await Promise.all([
      this.db.select({ total: count() }).from(follows).where(eq(follows.followingId, userId)),
      this.db.select({ total: count() }).from(follows).where(eq(follows.followerId, userId)),
    ]);
    return { followers: followers?.total ?? 0, following: following?.total ?? 0 };
  }
}

export class DrizzleLikeRepository implements ILikeRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async add(userId: number, postId: number): Promise<boolean> {
    try {
      const rows = await this.db
        .insert(likes)
        .values({ userId, postId })
        .onConflictDoNothing()
        .returning({ id: likes.id });
      return rows.length > 0;
    } catch (error) {
      if (isForeignKeyViolation(error)) throw SocialError.notFound('Post', postId);
      logger.error('Failed to add like', { userId, postId, error: serializeError(error) });
      throw error;
    }
  }

  async remove(userId: number, postId: number): Promise<boolean> {
    const rows = await this.db
      .delete(likes)
      .where(and(eq(likes.userId, userId), eq(likes.postId, postId)))
      .returning({ id: likes.id });
    return rows.length > 0;
  }
}

const actors = alias(users, 'actors');

const notificationColumns = {
  id: notifications.id,
  recipientId: notifications.recipientId,
  actorId: notifications.actorId,
  actorUsername: actors.username,
  verb: notifications.verb,
  targetType: notifications.targetType,
  targetId: notifications.targetId,
  isRead: notifications.isRead,
  createdAt: notifications.createdAt,
};

type NotificationSelection = Omit<Notification, 'targetType'> & { targetType: string };

function toNotification(row: NotificationSelection): Notification {
  return { ...row, targetType: 'post' };
}

export class DrizzleNotificationRepository implements INotificationRepository {
  constructor(private readonly db: DatabaseConnection) {}

  private async findById(id: number): Promise<Notification | null> {
    const [row] = await this.db
      .select(notificationColumns)
      .from(notifications)
      .innerJoin(actors, eq(notifications.actorId, actors.id))
      .where(eq(notifications.id, id))
      .limit(1);
    return row ? toNotification(row) : null;
  }

  async create(notification: NewNotification): Promise<Notification> {
    const [row] = await this.db.insert(notifications).values(notification).returning({ id: notifications.id });
    const created = row ? await this.findById(row.id) : null;
    if (!created) throw SocialError.internalError('Notification insert returned no row');
    return created;
  }

  async list(recipientId: number, query: NotificationQuery, page: PageRequest): Promise<ListResult<Notification>> {
    const where = and(
      eq(notifications.recipientId, recipientId),
      query.unreadOnly ? eq(notifications.isRead, false) : undefined
    );
    const [rows, [totals]] = await Promise.all([
      this.db
        .select(notificationColumns)
        .from(notifications)
        .innerJoin(actors, eq(notifications.actorId, actors.id))
        .where(where)
        .orderBy(desc(notifications.createdAt), desc(notifications.id))
        .limit(page.pageSize)
        .offset(offsetOf(page)),
      this.db.select({ total: count() }).from(notifications).where(where),
    ]);
    return { items: rows.map(toNotification), total: totals?.total ?? 0 };
  }

  async markRead(id: number, recipientId: number): Promise<Notification | null> {
    const rows = await this.db
      .update(notifications)
      .set({ isRead: true })
      .where(and(eq(notifications.id, id), eq(notifications.recipientId, recipientId)))
      .returning({ id: notifications.id });
    return rows.length > 0 ? this.findById(id) : null;
  }

  async markAllRead(recipientId: number): Promise<number> {
    const rows = await this.db
      .update(notifications)
      .set({ isRead: true })
      .where(and(eq(notifications.recipientId, recipientId), eq(notifications.isRead, false)))
      .returning({ id: notifications.id });
    return rows.length;
  }
}
