import type { IProfileRepository, IUserRepository } from '@domains/accounts';
import { AccountError } from '@application/errors';
import { toAccountWire, type AccountWire } from '@application/serializers';
import type { StoreGuard } from '../store-guard';

export class GetCurrentUserUseCase {
  constructor(
    private readonly users: IUserRepository,
    private readonly profiles: IProfileRepository,
    private readonly guard: StoreGuard
  ) {}

  async execute(userId: number): Promise<AccountWire> {
    const user = await this.guard('users.findById', () => this.users.findById(userId));
    if (!user) {
      // token outlived its account
      throw AccountError.unauthorized('User account no longer exists.');
    }
    const profile = await this.guard('profiles.findByUserId', () => this.profiles.findByUserId(userId));
    return toAccountWire(user, profile);
  }
}
