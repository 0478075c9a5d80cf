import type { EntityStore, ListResult, PageRequest } from '@shelfwise/platform-core';
import type { UserSummary } from '../../accounts/entities/User';
import type { NewPost, Post, PostInput, PostQuery } from '../entities/Post';
import type { Comment, CommentInput, CommentQuery, NewComment } from '../entities/Comment';
import type { NewNotification, Notification, NotificationQuery } from '../entities/Notification';

/**
 * Deleting a post removes its comments, its likes and the notifications
 * that point at it.
 */
export type IPostRepository = EntityStore<Post, NewPost, Partial<PostInput>, PostQuery>;

/** A missing post on create is a 404; updates only change `content`. */
export type ICommentRepository = EntityStore<Comment, NewComment, Partial<CommentInput>, CommentQuery>;

export interface FollowCounts {
  followers: number;
  following: number;
}

/**
 * Follow edges. `add` and `remove` report whether anything changed, so a
 * duplicate insert (including one lost to a concurrent writer) is a no-op.
 */
export interface IFollowRepository {
  add(followerId: number, followingId: number): Promise<boolean>;
  remove(followerId: number, followingId: number): Promise<boolean>;
  exists(followerId: number, followingId: number): Promise<boolean>;
  listFollowers(userId: number, page: PageRequest): Promise<ListResult<UserSummary>>;
  listFollowing(userId: number, page: PageRequest): Promise<ListResult<UserSummary>>;
  followingIds(userId: number): Promise<number[]>;
  counts(userId: number): Promise<FollowCounts>;
}

export interface ILikeRepository {
  /** False when the user already likes the post. */
  add(userId: number, postId: number): Promise<boolean>;
  remove(userId: number, postId: number): Promise<boolean>;
}

export interface INotificationRepository {
  create(notification: NewNotification): Promise<Notification>;
  list(recipientId: number, query: NotificationQuery, page: PageRequest): Promise<ListResult<Notification>>;
  markRead(id: number, recipientId: number): Promise<Notification | null>;
  markAllRead(recipientId: number): Promise<number>;
}
