export const NOTIFICATION_VERBS = {
  LIKED_POST: 'liked your post',
} as const;

export type NotificationTargetType = 'post';

export interface Notification {
  id: number;
  recipientId: number;
  actorId: number;
  actorUsername: string;
  verb: string;
  targetType: NotificationTargetType;
  targetId: number;
  isRead: boolean;
  createdAt: Date;
}

export interface NewNotification {
  recipientId: number;
  actorId: number;
  verb: string;
  targetType: NotificationTargetType;
  targetId: number;
}

export interface NotificationQuery {
  unreadOnly: boolean;
}
