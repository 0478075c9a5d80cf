import type { Notification } from '@domains/social';

export function toNotificationWire(notification: Notification): Record<string, unknown> {
  return {
    id: notification.id,
    actor: notification.actorId,
    actor_username: notification.actorUsername,
    verb: notification.verb,
    target_type: notification.targetType,
    target_id: notification.targetId,
    is_read: notification.isRead,
    created_at: notification.createdAt.toISOString(),
  };
}
