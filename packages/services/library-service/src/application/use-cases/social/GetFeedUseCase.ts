import type { ListResult, PageRequest } from '@shelfwise/platform-core';
import { DEFAULT_POST_ORDERING, type IFollowRepository, type IPostRepository, type Post } from '@domains/social';
import type { StoreGuard } from '../store-guard';

/**
 * Posts by everyone the user follows, newest first.
 */
export class GetFeedUseCase {
  constructor(
    private readonly follows: IFollowRepository,
    private readonly posts: IPostRepository,
    private readonly guard: StoreGuard
  ) {}

  async execute(userId: number, page: PageRequest): Promise<ListResult<Post>> {
    const authorIds = await this.guard('follows.followingIds', () => this.follows.followingIds(userId));
    return this.guard('posts.list', () =>
      this.posts.list({ authorIds, searchTerms: [], ordering: DEFAULT_POST_ORDERING }, page)
    );
  }
}
