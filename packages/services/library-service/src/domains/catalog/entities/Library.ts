import type { OrderTerm } from '@shelfwise/platform-core';
import type { Book } from './Book';

export interface Librarian {
  id: number;
  name: string;
}

/**
 * A branch holding some of the catalog's books, run by at most one librarian.
 */
export interface Library {
  id: number;
  name: string;
  books: Book[];
  librarian: Librarian | null;
}

export interface LibraryInput {
  name: string;
  /** Replaces the whole holding when present. */
  bookIds: number[];
  /** Librarian's name; null removes the librarian. */
  librarian: string | null;
}

export type LibraryOrderField = 'name';

export const LIBRARY_ORDER_FIELDS: readonly LibraryOrderField[] = ['name'];

export const DEFAULT_LIBRARY_ORDERING: OrderTerm<LibraryOrderField>[] = [{ field: 'name', direction: 'asc' }];

export interface LibraryQuery {
  /** Libraries holding this book. */
  bookId?: number;
  /** Every term must appear in the library's or its librarian's name. */
  searchTerms: string[];
  ordering: OrderTerm<LibraryOrderField>[];
}

export const MAX_LIBRARY_NAME_LENGTH = 100;
