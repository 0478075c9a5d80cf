/**
 * Follow / Unfollow Use Cases
 *
 * Following is idempotent: a second follow (or one that loses a race to an
 * identical insert) changes nothing and still succeeds. Unfollowing someone
 * you do not follow is an error.
 */

import type { IUserRepository, User } from '@domains/accounts';
import type { IFollowRepository } from '@domains/social';
import { SocialError } from '@application/errors';
import { getLogger } from '@config/service-config';
import type { StoreGuard } from '../store-guard';

const logger = getLogger('follow-use-cases');

export interface FollowResult {
  target: { id: number; username: string };
  /** False when the edge already existed. */
  created: boolean;
}

async function loadTarget(users: IUserRepository, guard: StoreGuard, userId: number): Promise<User> {
  const target = await guard('users.findById', () => users.findById(userId));
  if (!target) {
    throw SocialError.notFound('User', userId);
  }
  return target;
}

export class FollowUserUseCase {
  constructor(
    private readonly users: IUserRepository,
    private readonly follows: IFollowRepository,
    private readonly guard: StoreGuard
  ) {}

  async execute(followerId: number, targetId: number): Promise<FollowResult> {
    if (followerId === targetId) {
      throw SocialError.rule('You cannot follow yourself.');
    }
    const target = await loadTarget(this.users, this.guard, targetId);

    const created = await this.guard('follows.add', () => this.follows.add(followerId, targetId));
    if (created) {
      logger.info('Follow created', { followerId, followingId: targetId });
    }
    return { target: { id: target.id, username: target.username }, created };
  }
}

export class UnfollowUserUseCase {
  constructor(
    private readonly users: IUserRepository,
    private readonly follows: IFollowRepository,
    private readonly guard: StoreGuard
  ) {}

  async execute(followerId: number, targetId: number): Promise<{ target: { id: number; username: string } }> {
    const target = await loadTarget(this.users, this.guard, targetId);

    const removed = await this.guard('follows.remove', () => this.follows.remove(followerId, targetId));
    if (!removed) {
      throw SocialError.rule('You are not following this user.');
    }
    logger.info('Follow removed', { followerId, followingId: targetId });
    return { target: { id: target.id, username: target.username } };
  }
}
