import type { UpdateProfileRequest } from '@shelfwise/shared-contracts';
import type { IProfileRepository } from '@domains/accounts';
import { toProfileWire, type ProfileWire } from '@application/serializers';
import { getLogger } from '@config/service-config';
import type { StoreGuard } from '../store-guard';

const logger = getLogger('update-profile-use-case');

export class UpdateProfileUseCase {
  constructor(
    private readonly profiles: IProfileRepository,
    private readonly guard: StoreGuard
  ) {}

  /**
   * Users registered before profiles existed get one on first edit.
   */
  async execute(userId: number, request: UpdateProfileRequest): Promise<ProfileWire> {
    const updated = await this.guard('profiles.update', () => this.profiles.update(userId, { bio: request.bio }));
    const profile = updated ?? (await this.guard('profiles.create', () => this.profiles.create(userId, request.bio)));
    logger.info('Profile updated', { userId });
    return toProfileWire(profile);
  }
}
