/**
 * Like / Unlike Use Cases
 *
 * A like notifies the post's author, except when they like their own post.
 * The like edge is unique, so a second like fails whether it arrives
 * after the first or alongside it.
 */

import {
  NOTIFICATION_VERBS,
  type ILikeRepository,
  type INotificationRepository,
  type IPostRepository,
  type Post,
} from '@domains/social';
import { SocialError } from '@application/errors';
import { getLogger } from '@config/service-config';
import type { StoreGuard } from '../store-guard';

const logger = getLogger('like-use-cases');

export interface LikeResult {
  post: Post;
  notified: boolean;
}

async function loadPost(posts: IPostRepository, guard: StoreGuard, postId: number): Promise<Post> {
  const post = await guard('posts.get', () => posts.get(postId));
  if (!post) {
    throw SocialError.notFound('Post', postId);
  }
  return post;
}

export class LikePostUseCase {
  constructor(
    private readonly posts: IPostRepository,
    private readonly likes: ILikeRepository,
    private readonly notifications: INotificationRepository,
    private readonly guard: StoreGuard
  ) {}

  async execute(userId: number, postId: number): Promise<LikeResult> {
    const post = await loadPost(this.posts, this.guard, postId);

    const added = await this.guard('likes.add', () => this.likes.add(userId, postId));
    if (!added) {
      throw SocialError.rule('You have already liked this post.');
    }

    const notified = post.authorId !== userId;
    if (notified) {
      await this.guard('notifications.create', () =>
        this.notifications.create({
          recipientId: post.authorId,
          actorId: userId,
          verb: NOTIFICATION_VERBS.LIKED_POST,
          targetType: 'post',
          targetId: postId,
        })
      );
    }
    logger.info('Post liked', { postId, userId, notified });

    const refreshed = await loadPost(this.posts, this.guard, postId);
    return { post: refreshed, notified };
  }
}

export class UnlikePostUseCase {
  constructor(
    private readonly posts: IPostRepository,
    private readonly likes: ILikeRepository,
    private readonly guard: StoreGuard
  ) {}

  async execute(userId: number, postId: number): Promise<Post> {
    await loadPost(this.posts, this.guard, postId);

    const removed = await this.guard('likes.remove', () => this.likes.remove(userId, postId));
    if (!removed) {
      throw SocialError.rule('You have not liked this post.');
    }
    logger.info('Post unliked', { postId, userId });
    return loadPost(this.posts, this.guard, postId);
  }
}
