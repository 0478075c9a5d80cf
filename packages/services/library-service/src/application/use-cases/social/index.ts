export { FollowUserUseCase, UnfollowUserUseCase, type FollowResult } from './FollowUserUseCase';
export { ListFollowsUseCase, type FollowDirection } from './ListFollowsUseCase';
export { LikePostUseCase, UnlikePostUseCase, type LikeResult } from './LikePostUseCase';
export { GetFeedUseCase } from './GetFeedUseCase';
export {
  ListNotificationsUseCase,
  MarkNotificationReadUseCase,
  MarkAllNotificationsReadUseCase,
} from './NotificationUseCases';
