import type { Request, Response } from 'express';
import { UpdateRoleRequestSchema, buildPaginationMeta, createListEnvelope } from '@shelfwise/shared-contracts';
import { parseBody, parsePage } from '@shelfwise/platform-core';
import type {
  ChangeUserRoleUseCase,
  FollowDirection,
  FollowUserUseCase,
  GetUserProfileUseCase,
  ListFollowsUseCase,
  UnfollowUserUseCase,
} from '@application/use-cases';
import { toUserSummaryWire } from '@application/serializers';
import { ServiceErrors, sendEnvelope, sendSuccess } from '../utils/response-helpers';
import { callerId, optionalCallerId, pathId } from '../utils/request-helpers';

export interface UserControllerDeps {
  getUserProfile: GetUserProfileUseCase;
  changeUserRole: ChangeUserRoleUseCase;
  followUser: FollowUserUseCase;
  unfollowUser: UnfollowUserUseCase;
  listFollows: ListFollowsUseCase;
}

export class UserController {
  constructor(private readonly deps: UserControllerDeps) {}

  async getUser(req: Request, res: Response): Promise<void> {
    try {
      const user = await this.deps.getUserProfile.execute(pathId(req, 'User'), optionalCallerId(req));
      sendSuccess(res, 'User retrieved successfully', 'user', user);
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to get user');
    }
  }

  async changeRole(req: Request, res: Response): Promise<void> {
    try {
      const userId = pathId(req, 'User');
      const { role } = parseBody(UpdateRoleRequestSchema, req.body);
      const user = await this.deps.changeUserRole.execute(callerId(req), userId, role);
      sendSuccess(res, 'User role updated successfully', 'user', user);
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to update user role');
    }
  }

  async follow(req: Request, res: Response): Promise<void> {
    try {
      const { target, created } = await this.deps.followUser.execute(callerId(req), pathId(req, 'User'));
      const message = created
        ? `You are now following ${target.username}.`
        : `You are already following ${target.username}.`;
      sendSuccess(res, message, 'following', target);
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to follow user');
    }
  }

  async unfollow(req: Request, res: Response): Promise<void> {
    try {
      const { target } = await this.deps.unfollowUser.execute(callerId(req), pathId(req, 'User'));
      sendSuccess(res, `You have unfollowed ${target.username}.`, 'unfollowed', target);
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to unfollow user');
    }
  }

  async listFollowers(req: Request, res: Response): Promise<void> {
    await this.listFollows(req, res, 'followers');
  }

  async listFollowing(req: Request, res: Response): Promise<void> {
    await this.listFollows(req, res, 'following');
  }

  private async listFollows(req: Request, res: Response, direction: FollowDirection): Promise<void> {
    try {
      const page = parsePage(req.query);
      const result = await this.deps.listFollows.execute(pathId(req, 'User'), direction, page);
      const label = direction === 'followers' ? 'Followers' : 'Following';
      sendEnvelope(
        res,
        200,
        createListEnvelope(
          `${label} retrieved successfully`,
          direction,
          result.items.map(toUserSummaryWire),
          buildPaginationMeta(result.total, page.page, page.pageSize)
        )
      );
    } catch (error) {
      ServiceErrors.fromException(res, error, `Failed to list ${direction}`);
    }
  }
}
