/**
 * Auth Controller
 * Registration, login and the signed-in user's own account.
 */

import type { Request, Response } from 'express';
import {
  LoginRequestSchema,
  RegisterRequestSchema,
  UpdateProfileRequestSchema,
  createSuccessEnvelope,
} from '@shelfwise/shared-contracts';
import { parseBody } from '@shelfwise/platform-core';
import type {
  GetCurrentUserUseCase,
  LoginUserUseCase,
  RegisterUserUseCase,
  UpdateProfileUseCase,
} from '@application/use-cases';
import { ServiceErrors, sendEnvelope, sendSuccess } from '../utils/response-helpers';
import { callerId } from '../utils/request-helpers';

export interface AuthControllerDeps {
  registerUser: RegisterUserUseCase;
  loginUser: LoginUserUseCase;
  getCurrentUser: GetCurrentUserUseCase;
  updateProfile: UpdateProfileUseCase;
}

export class AuthController {
  constructor(private readonly deps: AuthControllerDeps) {}

  async register(req: Request, res: Response): Promise<void> {
    try {
      const request = parseBody(RegisterRequestSchema, req.body);
      const result = await this.deps.registerUser.execute(request);
      sendEnvelope(res, 201, {
        ...createSuccessEnvelope('User registered successfully', 'user', result.user),
        token: result.token,
      });
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to register user');
    }
  }

  async login(req: Request, res: Response): Promise<void> {
    try {
      const request = parseBody(LoginRequestSchema, req.body);
      const result = await this.deps.loginUser.execute(request);
      sendEnvelope(res, 200, {
        ...createSuccessEnvelope('Login successful', 'user', result.user),
        token: result.token,
      });
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to log in');
    }
  }

  async getCurrentUser(req: Request, res: Response): Promise<void> {
    try {
      const user = await this.deps.getCurrentUser.execute(callerId(req));
      sendSuccess(res, 'User retrieved successfully', 'user', user);
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to get current user');
    }
  }

  async updateProfile(req: Request, res: Response): Promise<void> {
    try {
      const request = parseBody(UpdateProfileRequestSchema, req.body);
      const profile = await this.deps.updateProfile.execute(callerId(req), request);
      sendSuccess(res, 'Profile updated successfully', 'profile', profile);
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to update profile');
    }
  }
}
