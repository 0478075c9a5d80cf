/**
 * In-process tables for STORE_DRIVER=memory.
 *
 * Rows have the same shape as the Drizzle schema's. Foreign keys with
 * ON DELETE CASCADE are mirrored in the delete helpers below; uniqueness
 * is enforced by the repositories.
 */

import type {
  AuthorRow,
  BookRow,
  CommentRow,
  FollowRow,
  LibrarianRow,
  LibraryBookRow,
  LibraryRow,
  LikeRow,
  NotificationRow,
  PostRow,
  ProfileRow,
  UserRow,
} from '../../database/schemas';
import type { OrderTerm } from '@shelfwise/platform-core';

type Table =
  | 'authors'
  | 'books'
  | 'libraries'
  | 'librarians'
  | 'users'
  | 'profiles'
  | 'posts'
  | 'comments'
  | 'likes'
  | 'notifications';

export function edgeKey(a: number, b: number): string {
  return `${a}:${b}`;
}

export class MemoryDatabase {
  readonly authors = new Map<number, AuthorRow>();
  readonly books = new Map<number, BookRow>();
  readonly libraries = new Map<number, LibraryRow>();
  readonly libraryBooks = new Map<string, LibraryBookRow>();
  /** Keyed by library id. */
  readonly librarians = new Map<number, LibrarianRow>();
  readonly users = new Map<number, UserRow>();
  readonly profiles = new Map<number, ProfileRow>();
  readonly posts = new Map<number, PostRow>();
  readonly comments = new Map<number, CommentRow>();
  readonly follows = new Map<string, FollowRow>();
  readonly likes = new Map<string, LikeRow>();
  readonly notifications = new Map<number, NotificationRow>();

  private readonly sequences = new Map<Table, number>();

  nextId(table: Table): number {
    const next = (this.sequences.get(table) ?? 0) + 1;
    this.sequences.set(table, next);
    return next;
  }

  deleteAuthor(id: number): void {
    this.authors.delete(id);
    for (const book of [...this.books.values()]) {
      if (book.authorId === id) this.deleteBook(book.id);
    }
  }

  deleteBook(id: number): void {
    this.books.delete(id);
    for (const [key, edge] of this.libraryBooks) {
      if (edge.bookId === id) this.libraryBooks.delete(key);
    }
  }

  deleteLibrary(id: number): void {
    this.libraries.delete(id);
    this.librarians.delete(id);
    for (const [key, edge] of this.libraryBooks) {
      if (edge.libraryId === id) this.libraryBooks.delete(key);
    }
  }

  /** Also drops the post's comments, likes and the notifications pointing at it. */
  deletePost(id: number): void {
    this.posts.delete(id);
    for (const [commentId, comment] of this.comments) {
      if (comment.postId === id) this.comments.delete(commentId);
    }
    for (const [key, like] of this.likes) {
      if (like.postId === id) this.likes.delete(key);
    }
    for (const [notificationId, notification] of this.notifications) {
      if (notification.targetType === 'post' && notification.targetId === id) {
        this.notifications.delete(notificationId);
      }
    }
  }

  clear(): void {
    this.authors.clear();
    this.books.clear();
    this.libraries.clear();
    this.libraryBooks.clear();
    this.librarians.clear();
    this.users.clear();
    this.profiles.clear();
    this.posts.clear();
    this.comments.clear();
    this.follows.clear();
    this.likes.clear();
    this.notifications.clear();
    this.sequences.clear();
  }
}

export type SortValue = string | number | Date;

function compareValues(a: SortValue, b: SortValue): number {
  if (typeof a === 'string' && typeof b === 'string') return a.localeCompare(b);
  const left = a instanceof Date ? a.getTime() : Number(a);
  const right = b instanceof Date ? b.getTime() : Number(b);
  return left - right;
}

/**
 * Sort by the order terms, then by id so pages are stable.
 */
export function sortByTerms<T extends { id: number }, TField extends string>(
  items: T[],
  terms: OrderTerm<TField>[],
  valueOf: (item: T, field: TField) => SortValue
): T[] {
  return [...items].sort((a, b) => {
    for (const term of terms) {
      const result = compareValues(valueOf(a, term.field), valueOf(b, term.field));
      if (result !== 0) return term.direction === 'desc' ? -result : result;
    }
    const lastDirection = terms[terms.length - 1]?.direction;
    return lastDirection === 'desc' ? b.id - a.id : a.id - b.id;
  });
}

export function paginate<T>(items: T[], page: { page: number; pageSize: number }): { items: T[]; total: number } {
  const start = (page.page - 1) * page.pageSize;
  return { items: items.slice(start, start + page.pageSize), total: items.length };
}

export function includesIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}
