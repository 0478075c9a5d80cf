import type { ListResult, PageRequest } from '@shelfwise/platform-core';
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
  type PostOrderField,
  type PostQuery,
} from '@domains/social';
import { SocialError } from '@application/errors';
import type { CommentRow, NotificationRow, PostRow } from '../../database/schemas';
import { edgeKey, includesIgnoreCase, paginate, sortByTerms, type MemoryDatabase, type SortValue } from './MemoryDatabase';

export class MemoryPostRepository implements IPostRepository {
  constructor(private readonly db: MemoryDatabase) {}

  private toPost(row: PostRow): Post {
    let likeCount = 0;
    for (const like of this.db.likes.values()) {
      if (like.postId === row.id) likeCount += 1;
    }
    return {
      ...row,
      authorUsername: this.db.users.get(row.authorId)?.username ?? '',
      likeCount,
    };
  }

  async get(id: number): Promise<Post | null> {
    const row = this.db.posts.get(id);
    return row ? this.toPost(row) : null;
  }

  async list(query: PostQuery, page: PageRequest): Promise<ListResult<Post>> {
    const matches = [...this.db.posts.values()].filter(row => {
      if (query.authorId !== undefined && row.authorId !== query.authorId) return false;
      if (query.authorIds !== undefined && !query.authorIds.includes(row.authorId)) return false;
      if (query.tag !== undefined && !row.tags.includes(query.tag)) return false;
      return query.searchTerms.every(
        term =>
          includesIgnoreCase(row.title, term) ||
          includesIgnoreCase(row.content, term) ||
          row.tags.some(tag => includesIgnoreCase(tag, term))
      );
    });
    const ordered = sortByTerms(matches, query.ordering, orderValue);
    const slice = paginate(ordered, page);
    return { items: slice.items.map(row => this.toPost(row)), total: slice.total };
  }

  async create(fields: NewPost): Promise<Post> {
    if (!this.db.users.has(fields.authorId)) {
      throw SocialError.validationError('author', `Invalid pk "${fields.authorId}" - object does not exist.`);
    }
    const now = new Date();
    const row: PostRow = { id: this.db.nextId('posts'), ...fields, createdAt: now, updatedAt: now };
    this.db.posts.set(row.id, row);
    return this.toPost(row);
  }

  async update(id: number, fields: Partial<PostInput>): Promise<Post | null> {
    const existing = this.db.posts.get(id);
    if (!existing) return null;
    const updated = { ...existing, ...fields, updatedAt: new Date() };
    this.db.posts.set(id, updated);
    return this.toPost(updated);
  }

  async delete(id: number): Promise<Post | null> {
    const existing = this.db.posts.get(id);
    if (!existing) return null;
    const post = this.toPost(existing);
    this.db.deletePost(id);
    return post;
  }
}

export class MemoryCommentRepository implements ICommentRepository {
  constructor(private readonly db: MemoryDatabase) {}

  private toComment(row: CommentRow): Comment {
    return { ...row, authorUsername: this.db.users.get(row.authorId)?.username ?? '' };
  }

  async get(id: number): Promise<Comment | null> {
    const row = this.db.comments.get(id);
    return row ? this.toComment(row) : null;
  }

  async list(query: CommentQuery, page: PageRequest): Promise<ListResult<Comment>> {
    const matches = [...this.db.comments.values()].filter(
      row =>
        (query.postId === undefined || row.postId === query.postId) &&
        (query.authorId === undefined || row.authorId === query.authorId)
    );
    const ordering = query.ordering.length > 0 ? query.ordering : DEFAULT_COMMENT_ORDERING;
    const slice = paginate(sortByTerms(matches, ordering, row => row.createdAt), page);
    return { items: slice.items.map(row => this.toComment(row)), total: slice.total };
  }

  async create(fields: NewComment): Promise<Comment> {
    if (!this.db.posts.has(fields.postId)) {
      throw SocialError.notFound('Post', fields.postId);
    }
    if (!this.db.users.has(fields.authorId)) {
      throw SocialError.validationError('author', `Invalid pk "${fields.authorId}" - object does not exist.`);
    }
    const now = new Date();
    const row: CommentRow = { id: this.db.nextId('comments'), ...fields, createdAt: now, updatedAt: now };
    this.db.comments.set(row.id, row);
    return this.toComment(row);
  }

  async update(id: number, fields: Partial<CommentInput>): Promise<Comment | null> {
    const existing = this.db.comments.get(id);
    if (!existing) return null;
    const updated =
      fields.content !== undefined ? { ...existing, content: fields.content, updatedAt: new Date() } : existing;
    this.db.comments.set(id, updated);
    return this.toComment(updated);
  }

  async delete(id: number): Promise<Comment | null> {
    const existing = this.db.comments.get(id);
    if (!existing) return null;
    this.db.comments.delete(id);
    return this.toComment(existing);
  }
}

function orderValue(row: PostRow, field: PostOrderField): SortValue {
  return field === 'title' ? row.title : row.createdAt;
}

export class MemoryFollowRepository implements IFollowRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async add(followerId: number, followingId: number): Promise<boolean> {
    const key = edgeKey(followerId, followingId);
    if (this.db.follows.has(key)) return false;
    this.db.follows.set(key, { followerId, followingId, createdAt: new Date() });
    return true;
  }

  async remove(followerId: number, followingId: number): Promise<boolean> {
    return this.db.follows.delete(edgeKey(followerId, followingId));
  }

  async exists(followerId: number, followingId: number): Promise<boolean> {
    return this.db.follows.has(edgeKey(followerId, followingId));
  }

  private summaries(ids: number[], page: PageRequest): ListResult<UserSummary> {
    const users: UserSummary[] = [];
    for (const id of ids) {
      const row = this.db.users.get(id);
      if (row) users.push({ id: row.id, username: row.username });
    }
    users.sort((a, b) => a.username.localeCompare(b.username));
    return paginate(users, page);
  }

  async listFollowers(userId: number, page: PageRequest): Promise<ListResult<UserSummary>> {
    const ids = [...this.db.follows.values()].filter(edge => edge.followingId === userId).map(edge => edge.followerId);
    return this.summaries(ids, page);
  }

  async listFollowing(userId: number, page: PageRequest): Promise<ListResult<UserSummary>> {
    return this.summaries(await this.followingIds(userId), page);
  }

  async followingIds(userId: number): Promise<number[]> {
    return [...this.db.follows.values()].filter(edge => edge.followerId === userId).map(edge => edge.followingId);
  }

  async counts(userId: number): Promise<FollowCounts> {
    let followers = 0;
    let following = 0;
    for (const edge of this.db.follows.values()) {
      if (edge.followingId === userId) followers += 1;
      if (edge.followerId === userId) following += 1;
    }
    return { followers, following };
  }
}

export class MemoryLikeRepository implements ILikeRepository {
  constructor(private readonly db: MemoryDatabase) {}

  async add(userId: number, postId: number): Promise<boolean> {
    const key = edgeKey(userId, postId);
    if (this.db.likes.has(key)) return false;
    this.db.likes.set(key, { id: this.db.nextId('likes'), userId, postId, createdAt: new Date() });
    return true;
  }

  async remove(userId: number, postId: number): Promise<boolean> {
    return this.db.likes.delete(edgeKey(userId, postId));
  }
}

export class MemoryNotificationRepository implements INotificationRepository {
  constructor(private readonly db: MemoryDatabase) {}

  private toNotification(row: NotificationRow): Notification {
    return {
      ...row,
      targetType: 'post',
      actorUsername: this.db.users.get(row.actorId)?.username ?? '',
    };
  }

  async create(notification: NewNotification): Promise<Notification> {
    const row: NotificationRow = {
      id: this.db.nextId('notifications'),
      ...notification,
      isRead: false,
      createdAt: new Date(),
    };
    this.db.notifications.set(row.id, row);
    return this.toNotification(row);
  }

  async list(recipientId: number, query: NotificationQuery, page: PageRequest): Promise<ListResult<Notification>> {
    const matches = [...this.db.notifications.values()].filter(
      row => row.recipientId === recipientId && (!query.unreadOnly || !row.isRead)
    );
    const ordered = sortByTerms(matches, [{ field: 'created_at', direction: 'desc' }], row => row.createdAt);
    const slice = paginate(ordered, page);
    return { items: slice.items.map(row => this.toNotification(row)), total: slice.total };
  }

  async markRead(id: number, recipientId: number): Promise<Notification | null> {
    const existing = this.db.notifications.get(id);
    if (!existing || existing.recipientId !== recipientId) return null;
    const updated = { ...existing, isRead: true };
    this.db.notifications.set(id, updated);
    return this.toNotification(updated);
  }

  async markAllRead(recipientId: number): Promise<number> {
    let changed = 0;
    for (const [id, row] of this.db.notifications) {
      if (row.recipientId === recipientId && !row.isRead) {
        this.db.notifications.set(id, { ...row, isRead: true });
        changed += 1;
      }
    }
    return changed;
  }
}
