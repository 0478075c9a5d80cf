export { bookQueryFilter } from './BookQueryFilter';
export { authorQueryFilter } from './AuthorQueryFilter';
export { postQueryFilter } from './PostQueryFilter';
export { libraryQueryFilter } from './LibraryQueryFilter';
export { commentQueryFilter } from './CommentQueryFilter';
