import type { OrderTerm } from '@shelfwise/platform-core';

export interface Book {
  id: number;
  title: string;
  publicationYear: number;
  authorId: number;
  authorName: string;
}

/** Validated book fields as they arrive from a client. */
export interface BookInput {
  title: string;
  publicationYear: number;
  authorId: number;
}

export type BookOrderField = 'title' | 'publication_year' | 'author__name';

export const BOOK_ORDER_FIELDS: readonly BookOrderField[] = ['title', 'publication_year', 'author__name'];

/** Newest publication year first, then title. */
export const DEFAULT_BOOK_ORDERING: OrderTerm<BookOrderField>[] = [
  { field: 'publication_year', direction: 'desc' },
  { field: 'title', direction: 'asc' },
];

export interface BookQuery {
  authorId?: number;
  publicationYear?: number;
  yearFrom?: number;
  yearTo?: number;
  titleContains?: string;
  /** Every term must appear in the title or the author's name. */
  searchTerms: string[];
  ordering: OrderTerm<BookOrderField>[];
}

export const MIN_PUBLICATION_YEAR = 1000;
export const MAX_TITLE_LENGTH = 200;
