/**
 * Register User Use Case
 * Creates the user, then its profile, then issues an access token.
 */

import bcrypt from 'bcryptjs';
import { USER_ROLES, type RegisterRequest } from '@shelfwise/shared-contracts';
import type { StandardJWTService } from '@shelfwise/platform-core';
import type { IProfileRepository, IUserRepository } from '@domains/accounts';
import { AccountError } from '@application/errors';
import { toAccountWire, type AccountWire } from '@application/serializers';
import { getLogger } from '@config/service-config';
import type { StoreGuard } from '../store-guard';

const logger = getLogger('register-user-use-case');

export interface AuthResult {
  user: AccountWire;
  token: string;
}

export class RegisterUserUseCase {
  constructor(
    private readonly users: IUserRepository,
    private readonly profiles: IProfileRepository,
    private readonly jwtService: StandardJWTService,
    private readonly bcryptRounds: number,
    private readonly guard: StoreGuard
  ) {}

  async execute(request: RegisterRequest): Promise<AuthResult> {
    const existing = await this.guard('users.findByUsername', () => this.users.findByUsername(request.username));
    if (existing) {
      throw AccountError.usernameTaken();
    }

    const passwordHash = await bcrypt.hash(request.password, this.bcryptRounds);
    const user = await this.guard('users.create', () =>
      this.users.create({
        username: request.username,
        email: request.email ?? null,
        passwordHash,
        role: USER_ROLES.MEMBER,
      })
    );
    const profile = await this.guard('profiles.create', () => this.profiles.create(user.id, request.bio ?? ''));

    logger.info('User registered', { userId: user.id });

    const token = this.jwtService.sign({ userId: user.id, username: user.username, role: user.role });
    return { user: toAccountWire(user, profile), token };
  }
}
