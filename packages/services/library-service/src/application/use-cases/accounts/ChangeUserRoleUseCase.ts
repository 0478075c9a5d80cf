import type { UserRole } from '@shelfwise/shared-contracts';
import type { IProfileRepository, IUserRepository } from '@domains/accounts';
import { AccountError } from '@application/errors';
import { toAccountWire, type AccountWire } from '@application/serializers';
import { getLogger } from '@config/service-config';
import type { StoreGuard } from '../store-guard';

const logger = getLogger('change-user-role-use-case');

/**
 * Admin-only; the route guard enforces that before this runs.
 */
export class ChangeUserRoleUseCase {
  constructor(
    private readonly users: IUserRepository,
    private readonly profiles: IProfileRepository,
    private readonly guard: StoreGuard
  ) {}

  async execute(actorId: number, userId: number, role: UserRole): Promise<AccountWire> {
    const user = await this.guard('users.updateRole', () => this.users.updateRole(userId, role));
    if (!user) {
      throw AccountError.notFound('User', userId);
    }
    logger.info('User role changed', { userId, role, actorId });
    const profile = await this.guard('profiles.findByUserId', () => this.profiles.findByUserId(userId));
    return toAccountWire(user, profile);
  }
}
