export { BookSerializer, BookWireSchema, containsMarkup, summarizeBook } from './BookSerializer';
export { AuthorSerializer, AuthorWireSchema, summarizeAuthor } from './AuthorSerializer';
export { LibrarySerializer, LibraryWireSchema, summarizeLibrary } from './LibrarySerializer';
export { PostSerializer, PostWireSchema, summarizePost } from './PostSerializer';
export { CommentSerializer, CommentWireSchema, summarizeComment } from './CommentSerializer';
export { toStatsWire, type BookStatsWire } from './StatsSerializer';
export {
  toAccountWire,
  toProfileWire,
  toPublicUserWire,
  toUserSummaryWire,
  type AccountWire,
  type ProfileWire,
  type PublicUserWire,
} from './AccountViews';
export { toNotificationWire } from './NotificationViews';
