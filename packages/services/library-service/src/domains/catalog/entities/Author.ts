import type { OrderTerm } from '@shelfwise/platform-core';
import type { Book } from './Book';

export interface Author {
  id: number;
  name: string;
  /** Read-only; books are written through the book resource. */
  books: Book[];
}

export interface AuthorInput {
  name: string;
}

export type AuthorOrderField = 'name';

export const AUTHOR_ORDER_FIELDS: readonly AuthorOrderField[] = ['name'];

export const DEFAULT_AUTHOR_ORDERING: OrderTerm<AuthorOrderField>[] = [{ field: 'name', direction: 'asc' }];

export interface AuthorQuery {
  searchTerms: string[];
  ordering: OrderTerm<AuthorOrderField>[];
}
