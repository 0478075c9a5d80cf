import bcrypt from 'bcryptjs';
import { USER_ROLES } from '@shelfwise/shared-contracts';
import type { IProfileRepository, IUserRepository, User } from '@domains/accounts';
import { getLogger } from '@config/service-config';
import type { StoreGuard } from '../store-guard';

const logger = getLogger('bootstrap-admin');

/**
 * Makes sure the configured admin account exists at startup. An existing
 * user with that name is promoted; its password is left alone.
 */
export class EnsureBootstrapAdminUseCase {
  constructor(
    private readonly users: IUserRepository,
    private readonly profiles: IProfileRepository,
    private readonly bcryptRounds: number,
    private readonly guard: StoreGuard
  ) {}

  async execute(credentials: { username: string; password: string }): Promise<User> {
    const existing = await this.guard('users.findByUsername', () => this.users.findByUsername(credentials.username));

    if (existing) {
      if (existing.role === USER_ROLES.ADMIN) return existing;
      const promoted = await this.guard('users.updateRole', () => this.users.updateRole(existing.id, USER_ROLES.ADMIN));
      logger.info('Promoted bootstrap user to admin', { userId: existing.id });
      return promoted ?? existing;
    }

    const passwordHash = await bcrypt.hash(credentials.password, this.bcryptRounds);
    const admin = await this.guard('users.create', () =>
      this.users.create({ username: credentials.username, email: null, passwordHash, role: USER_ROLES.ADMIN })
    );
    await this.guard('profiles.create', () => this.profiles.create(admin.id, ''));
    logger.info('Created bootstrap admin', { userId: admin.id });
    return admin;
  }
}
