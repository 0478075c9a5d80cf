import bcrypt from 'bcryptjs';
import type { LoginRequest } from '@shelfwise/shared-contracts';
import type { StandardJWTService } from '@shelfwise/platform-core';
import type { IProfileRepository, IUserRepository } from '@domains/accounts';
import { AccountError } from '@application/errors';
import { toAccountWire } from '@application/serializers';
import { getLogger } from '@config/service-config';
import type { StoreGuard } from '../store-guard';
import type { AuthResult } from './RegisterUserUseCase';

const logger = getLogger('login-user-use-case');

export class LoginUserUseCase {
  constructor(
    private readonly users: IUserRepository,
    private readonly profiles: IProfileRepository,
    private readonly jwtService: StandardJWTService,
    private readonly guard: StoreGuard
  ) {}

  async execute(request: LoginRequest): Promise<AuthResult> {
    const user = await this.guard('users.findByUsername', () => this.users.findByUsername(request.username));
    if (!user) {
      logger.info('Login failed: unknown username');
      throw AccountError.invalidCredentials();
    }

    const passwordValid = await bcrypt.compare(request.password, user.passwordHash);
    if (!passwordValid) {
      logger.info('Login failed: wrong password', { userId: user.id });
      throw AccountError.invalidCredentials();
    }

    const profile = await this.guard('profiles.findByUserId', () => this.profiles.findByUserId(user.id));
    const token = this.jwtService.sign({ userId: user.id, username: user.username, role: user.role });
    return { user: toAccountWire(user, profile), token };
  }
}
