import type { ListResult, PageRequest } from '@shelfwise/platform-core';
import type { IUserRepository, UserSummary } from '@domains/accounts';
import type { IFollowRepository } from '@domains/social';
import { SocialError } from '@application/errors';
import type { StoreGuard } from '../store-guard';

export type FollowDirection = 'followers' | 'following';

export class ListFollowsUseCase {
  constructor(
    private readonly users: IUserRepository,
    private readonly follows: IFollowRepository,
    private readonly guard: StoreGuard
  ) {}

  async execute(userId: number, direction: FollowDirection, page: PageRequest): Promise<ListResult<UserSummary>> {
    const user = await this.guard('users.findById', () => this.users.findById(userId));
    if (!user) {
      throw SocialError.notFound('User', userId);
    }
    return direction === 'followers'
      ? this.guard('follows.listFollowers', () => this.follows.listFollowers(userId, page))
      : this.guard('follows.listFollowing', () => this.follows.listFollowing(userId, page));
  }
}
