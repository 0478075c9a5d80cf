export {
  createAuthorHandler,
  createBookHandler,
  createCommentHandler,
  createLibraryHandler,
  createPostHandler,
} from './resource-definitions';
