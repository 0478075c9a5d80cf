import type { EntityStore } from '@shelfwise/platform-core';
import type { Book, BookInput, BookQuery } from '../entities/Book';
import type { BookStats } from '../entities/BookStats';

export interface IBookRepository extends EntityStore<Book, BookInput, Partial<BookInput>, BookQuery> {
  getStats(): Promise<BookStats>;
}
