/**
 * Library Serializer
 *
 * Wire form: `{ id, name, book_count, books, librarian }` where `librarian`
 * is `{ id, name }` or null. Clients write `books` as a list of book ids
 * and `librarian` as a name (null to remove).
 */

import { z } from 'zod';
import type { Serializer, ValidationResult } from '@shelfwise/platform-core';
import { MAX_LIBRARY_NAME_LENGTH, type Library, type LibraryInput } from '@domains/catalog';
import { BookSerializer } from './BookSerializer';
import { NOT_AN_OBJECT, integerField, invalid, requiredText, valid } from './wire-fields';

const PK_EXPECTED = 'Incorrect type. Expected pk value.';

export const LibraryWireSchema = z.object(
  {
    name: requiredText(MAX_LIBRARY_NAME_LENGTH),
    books: z
      .array(integerField(PK_EXPECTED).refine(id => id > 0, PK_EXPECTED), {
        invalid_type_error: 'Expected a list of items.',
      })
      .transform(ids => [...new Set(ids)])
      .optional(),
    librarian: requiredText(100).nullable().optional(),
  },
  { invalid_type_error: NOT_AN_OBJECT }
);

export class LibrarySerializer implements Serializer<Library, LibraryInput> {
  private readonly books = new BookSerializer();

  toWire(library: Library): Record<string, unknown> {
    return {
      id: library.id,
      name: library.name,
      book_count: library.books.length,
      books: library.books.map(book => this.books.toWire(book)),
      librarian: library.librarian,
    };
  }

  /** A full write without `books` or `librarian` clears them. */
  fromWire(data: unknown, partial: false): ValidationResult<LibraryInput>;
  fromWire(data: unknown, partial: true): ValidationResult<Partial<LibraryInput>>;
  fromWire(data: unknown, partial: boolean): ValidationResult<LibraryInput> | ValidationResult<Partial<LibraryInput>> {
    if (!partial) {
      const parsed = LibraryWireSchema.safeParse(data);
      if (!parsed.success) return invalid(parsed.error);
      return valid({
        name: parsed.data.name,
        bookIds: parsed.data.books ?? [],
        librarian: parsed.data.librarian ?? null,
      });
    }

    const parsed = LibraryWireSchema.partial().safeParse(data);
    if (!parsed.success) return invalid(parsed.error);
    const fields: Partial<LibraryInput> = {};
    if (parsed.data.name !== undefined) fields.name = parsed.data.name;
    if (parsed.data.books !== undefined) fields.bookIds = parsed.data.books;
    if (parsed.data.librarian !== undefined) fields.librarian = parsed.data.librarian;
    return valid(fields);
  }
}

export function summarizeLibrary(library: Library): Record<string, unknown> {
  return { id: library.id, name: library.name, book_count: library.books.length };
}
