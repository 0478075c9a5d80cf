/**
 * Resource handlers for the CRUD endpoints: books, authors, libraries,
 * posts and comments.
 * Each is the generic ResourceHandler with this service's store,
 * serializer, filter and access policy plugged in.
 */

import { ResourceHandler, ownershipPolicy } from '@shelfwise/platform-core';
import type {
  Author,
  AuthorInput,
  AuthorQuery,
  Book,
  BookInput,
  BookQuery,
  IAuthorRepository,
  IBookRepository,
  ILibraryRepository,
  Library,
  LibraryInput,
  LibraryQuery,
} from '@domains/catalog';
import type {
  Comment,
  CommentInput,
  CommentQuery,
  ICommentRepository,
  IPostRepository,
  NewComment,
  NewPost,
  Post,
  PostInput,
  PostQuery,
} from '@domains/social';
import { SocialError } from '@application/errors';
import {
  authorQueryFilter,
  bookQueryFilter,
  commentQueryFilter,
  libraryQueryFilter,
  postQueryFilter,
} from '@application/filters';
import {
  AuthorSerializer,
  BookSerializer,
  CommentSerializer,
  LibrarySerializer,
  PostSerializer,
  summarizeAuthor,
  summarizeBook,
  summarizeComment,
  summarizeLibrary,
  summarizePost,
} from '@application/serializers';
import { getLogger } from '@config/service-config';

export function createBookHandler(store: IBookRepository, storeTimeoutMs: number) {
  return new ResourceHandler<Book, BookInput, BookInput, BookQuery>({
    name: 'Book',
    pluralName: 'Books',
    dataKey: 'book',
    listKey: 'books',
    store,
    serializer: new BookSerializer(),
    filter: bookQueryFilter,
    idOf: book => book.id,
    toCreateFields: input => input,
    summarize: summarizeBook,
    storeTimeoutMs,
    logger: getLogger('books'),
  });
}

export function createAuthorHandler(store: IAuthorRepository, storeTimeoutMs: number) {
  return new ResourceHandler<Author, AuthorInput, AuthorInput, AuthorQuery>({
    name: 'Author',
    pluralName: 'Authors',
    dataKey: 'author',
    listKey: 'authors',
    store,
    serializer: new AuthorSerializer(),
    filter: authorQueryFilter,
    idOf: author => author.id,
    toCreateFields: input => input,
    summarize: summarizeAuthor,
    storeTimeoutMs,
    logger: getLogger('authors'),
  });
}

export function createLibraryHandler(store: ILibraryRepository, storeTimeoutMs: number) {
  return new ResourceHandler<Library, LibraryInput, LibraryInput, LibraryQuery>({
    name: 'Library',
    pluralName: 'Libraries',
    dataKey: 'library',
    listKey: 'libraries',
    store,
    serializer: new LibrarySerializer(),
    filter: libraryQueryFilter,
    idOf: library => library.id,
    toCreateFields: input => input,
    summarize: summarizeLibrary,
    storeTimeoutMs,
    logger: getLogger('libraries'),
  });
}

/** Posts belong to whoever wrote them. */
export function createPostHandler(store: IPostRepository, storeTimeoutMs: number) {
  return new ResourceHandler<Post, PostInput, NewPost, PostQuery>({
    name: 'Post',
    pluralName: 'Posts',
    dataKey: 'post',
    listKey: 'posts',
    store,
    serializer: new PostSerializer(),
    filter: postQueryFilter,
    idOf: post => post.id,
    toCreateFields: (input, ctx) => {
      if (!ctx.isAuthenticated) {
        throw SocialError.unauthorized();
      }
      return { ...input, authorId: ctx.userId };
    },
    summarize: summarizePost,
    policy: ownershipPolicy<Post>(post => post.authorId),
    storeTimeoutMs,
    logger: getLogger('posts'),
  });
}

export function createCommentHandler(store: ICommentRepository, storeTimeoutMs: number) {
  return new ResourceHandler<Comment, CommentInput, NewComment, CommentQuery>({
    name: 'Comment',
    pluralName: 'Comments',
    dataKey: 'comment',
    listKey: 'comments',
    store,
    serializer: new CommentSerializer(),
    filter: commentQueryFilter,
    idOf: comment => comment.id,
    toCreateFields: (input, ctx) => {
      if (!ctx.isAuthenticated) {
        throw SocialError.unauthorized();
      }
      if (input.postId === undefined) {
        throw SocialError.validationError('post', 'This field is required.');
      }
      return { postId: input.postId, authorId: ctx.userId, content: input.content };
    },
    summarize: summarizeComment,
    policy: ownershipPolicy<Comment>(comment => comment.authorId),
    storeTimeoutMs,
    logger: getLogger('comments'),
  });
}
