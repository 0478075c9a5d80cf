import type { ListResult, PageRequest } from '@shelfwise/platform-core';
import type { INotificationRepository, Notification, NotificationQuery } from '@domains/social';
import { SocialError } from '@application/errors';
import type { StoreGuard } from '../store-guard';

export class ListNotificationsUseCase {
  constructor(
    private readonly notifications: INotificationRepository,
    private readonly guard: StoreGuard
  ) {}

  execute(recipientId: number, query: NotificationQuery, page: PageRequest): Promise<ListResult<Notification>> {
    return this.guard('notifications.list', () => this.notifications.list(recipientId, query, page));
  }
}

export class MarkNotificationReadUseCase {
  constructor(
    private readonly notifications: INotificationRepository,
    private readonly guard: StoreGuard
  ) {}

  /** Someone else's notification is reported as missing. */
  async execute(recipientId: number, notificationId: number): Promise<Notification> {
    const notification = await this.guard('notifications.markRead', () =>
      this.notifications.markRead(notificationId, recipientId)
    );
    if (!notification) {
      throw SocialError.notFound('Notification', notificationId);
    }
    return notification;
  }
}

export class MarkAllNotificationsReadUseCase {
  constructor(
    private readonly notifications: INotificationRepository,
    private readonly guard: StoreGuard
  ) {}

  execute(recipientId: number): Promise<number> {
    return this.guard('notifications.markAllRead', () => this.notifications.markAllRead(recipientId));
  }
}
