export * from './entities/Post';
export * from './entities/Comment';
export * from './entities/Notification';
export type {
  IPostRepository,
  ICommentRepository,
  IFollowRepository,
  ILikeRepository,
  INotificationRepository,
  FollowCounts,
} from './repositories/ISocialRepositories';
