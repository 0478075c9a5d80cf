import type { EntityStore } from '@shelfwise/platform-core';
import type { Author, AuthorInput, AuthorQuery } from '../entities/Author';

/**
 * Deleting an author also deletes its books.
 */
export type IAuthorRepository = EntityStore<Author, AuthorInput, Partial<AuthorInput>, AuthorQuery>;
