import type { IProfileRepository, IUserRepository } from '@domains/accounts';
import type { IFollowRepository } from '@domains/social';
import { AccountError } from '@application/errors';
import { toPublicUserWire, type PublicUserWire } from '@application/serializers';
import type { StoreGuard } from '../store-guard';

export class GetUserProfileUseCase {
  constructor(
    private readonly users: IUserRepository,
    private readonly profiles: IProfileRepository,
    private readonly follows: IFollowRepository,
    private readonly guard: StoreGuard
  ) {}

  async execute(userId: number, viewerId: number | null): Promise<PublicUserWire> {
    const user = await this.guard('users.findById', () => this.users.findById(userId));
    if (!user) {
      throw AccountError.notFound('User', userId);
    }

    const [profile, counts] = await Promise.all([
      this.guard('profiles.findByUserId', () => this.profiles.findByUserId(userId)),
      this.guard('follows.counts', () => this.follows.counts(userId)),
    ]);
    const isFollowing =
      viewerId === null || viewerId === userId
        ? undefined
        : await this.guard('follows.exists', () => this.follows.exists(viewerId, userId));

    return toPublicUserWire(user, profile, counts, isFollowing);
  }
}
