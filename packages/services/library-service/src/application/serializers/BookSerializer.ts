/**
 * Book Serializer
 *
 * Wire form: `{ id, title, publication_year, author, author_name }`.
 * Author existence is checked by the store; here `author` only has to be
 * a positive integer.
 */

import { z } from 'zod';
import type { Serializer, ValidationResult } from '@shelfwise/platform-core';
import { MAX_TITLE_LENGTH, MIN_PUBLICATION_YEAR, type Book, type BookInput } from '@domains/catalog';
import { NOT_AN_OBJECT, integerField, invalid, requiredText, valid } from './wire-fields';

const MARKUP_PATTERNS = ['<script', 'javascript:', 'onclick=', 'onerror='];

export function containsMarkup(value: string): boolean {
  const lowered = value.toLowerCase();
  return MARKUP_PATTERNS.some(pattern => lowered.includes(pattern));
}

export const BookWireSchema = z.object(
  {
    title: requiredText(MAX_TITLE_LENGTH).refine(title => !containsMarkup(title), 'Title contains invalid characters.'),
    publication_year: integerField().superRefine((year, ctx) => {
      const currentYear = new Date().getFullYear();
      if (year > currentYear) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Publication year cannot be in the future. Current year is ${currentYear}, but received ${year}.`,
        });
      } else if (year < MIN_PUBLICATION_YEAR) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Publication year seems too early. Please check the year: ${year}.`,
        });
      }
    }),
    author: integerField('Incorrect type. Expected pk value.').refine(
      id => id > 0,
      'Incorrect type. Expected pk value.'
    ),
  },
  { invalid_type_error: NOT_AN_OBJECT }
);

const PartialBookWireSchema = BookWireSchema.partial();

export class BookSerializer implements Serializer<Book, BookInput> {
  toWire(book: Book): Record<string, unknown> {
    return {
      id: book.id,
      title: book.title,
      publication_year: book.publicationYear,
      author: book.authorId,
      author_name: book.authorName,
    };
  }

  fromWire(data: unknown, partial: false): ValidationResult<BookInput>;
  fromWire(data: unknown, partial: true): ValidationResult<Partial<BookInput>>;
  fromWire(data: unknown, partial: boolean): ValidationResult<BookInput> | ValidationResult<Partial<BookInput>> {
    if (!partial) {
      const parsed = BookWireSchema.safeParse(data);
      if (!parsed.success) return invalid(parsed.error);
      return valid({
        title: parsed.data.title,
        publicationYear: parsed.data.publication_year,
        authorId: parsed.data.author,
      });
    }

    const parsed = PartialBookWireSchema.safeParse(data);
    if (!parsed.success) return invalid(parsed.error);
    const fields: Partial<BookInput> = {};
    if (parsed.data.title !== undefined) fields.title = parsed.data.title;
    if (parsed.data.publication_year !== undefined) fields.publicationYear = parsed.data.publication_year;
    if (parsed.data.author !== undefined) fields.authorId = parsed.data.author;
    return valid(fields);
  }
}

/** What a delete reports back. */
export function summarizeBook(book: Book): Record<string, unknown> {
  return { id: book.id, title: book.title, author: book.authorName };
}
