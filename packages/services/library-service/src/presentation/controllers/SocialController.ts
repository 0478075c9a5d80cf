/**
 * Social Controller
 * Likes, the follow feed and notifications. Post CRUD itself goes through
 * the generic resource handler.
 */

import type { Request, Response } from 'express';
import { buildPaginationMeta, createListEnvelope } from '@shelfwise/shared-contracts';
import { parsePage, readBoolean } from '@shelfwise/platform-core';
import type {
  GetFeedUseCase,
  LikePostUseCase,
  ListNotificationsUseCase,
  MarkAllNotificationsReadUseCase,
  MarkNotificationReadUseCase,
  UnlikePostUseCase,
} from '@application/use-cases';
import { PostSerializer, toNotificationWire } from '@application/serializers';
import { ServiceErrors, sendEnvelope, sendSuccess } from '../utils/response-helpers';
import { callerId, pathId } from '../utils/request-helpers';

export interface SocialControllerDeps {
  likePost: LikePostUseCase;
  unlikePost: UnlikePostUseCase;
  getFeed: GetFeedUseCase;
  listNotifications: ListNotificationsUseCase;
  markNotificationRead: MarkNotificationReadUseCase;
  markAllNotificationsRead: MarkAllNotificationsReadUseCase;
}

const postSerializer = new PostSerializer();

export class SocialController {
  constructor(private readonly deps: SocialControllerDeps) {}

  async like(req: Request, res: Response): Promise<void> {
    try {
      const { post } = await this.deps.likePost.execute(callerId(req), pathId(req, 'Post'));
      sendSuccess(res, 'Post liked successfully', 'post', postSerializer.toWire(post));
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to like post');
    }
  }

  async unlike(req: Request, res: Response): Promise<void> {
    try {
      const post = await this.deps.unlikePost.execute(callerId(req), pathId(req, 'Post'));
      sendSuccess(res, 'Post unliked successfully', 'post', postSerializer.toWire(post));
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to unlike post');
    }
  }

  async feed(req: Request, res: Response): Promise<void> {
    try {
      const page = parsePage(req.query);
      const result = await this.deps.getFeed.execute(callerId(req), page);
      sendEnvelope(
        res,
        200,
        createListEnvelope(
          'Feed retrieved successfully',
          'posts',
          result.items.map(post => postSerializer.toWire(post)),
          buildPaginationMeta(result.total, page.page, page.pageSize)
        )
      );
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to get feed');
    }
  }

  async listNotifications(req: Request, res: Response): Promise<void> {
    try {
      const page = parsePage(req.query);
      const unreadOnly = readBoolean(req.query, 'unread') ?? false;
      const result = await this.deps.listNotifications.execute(callerId(req), { unreadOnly }, page);
      sendEnvelope(
        res,
        200,
        createListEnvelope(
          'Notifications retrieved successfully',
          'notifications',
          result.items.map(toNotificationWire),
          buildPaginationMeta(result.total, page.page, page.pageSize)
        )
      );
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to list notifications');
    }
  }

  async markRead(req: Request, res: Response): Promise<void> {
    try {
      const notification = await this.deps.markNotificationRead.execute(callerId(req), pathId(req, 'Notification'));
      sendSuccess(res, 'Notification marked as read', 'notification', toNotificationWire(notification));
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to mark notification as read');
    }
  }

  async markAllRead(req: Request, res: Response): Promise<void> {
    try {
      const updated = await this.deps.markAllNotificationsRead.execute(callerId(req));
      sendSuccess(res, 'All notifications marked as read', 'updated', updated);
    } catch (error) {
      ServiceErrors.fromException(res, error, 'Failed to mark notifications as read');
    }
  }
}
