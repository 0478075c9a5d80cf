import type { EntityStore } from '@shelfwise/platform-core';
import type { Library, LibraryInput, LibraryQuery } from '../entities/Library';

/**
 * Unknown book ids are a 400 on `books`. Deleting a library removes its
 * librarian; deleting a book removes it from every library.
 */
export type ILibraryRepository = EntityStore<Library, LibraryInput, Partial<LibraryInput>, LibraryQuery>;
