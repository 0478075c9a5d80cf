import { z } from 'zod';
import type { Serializer, ValidationResult } from '@shelfwise/platform-core';
import type { Author, AuthorInput } from '@domains/catalog';
import { BookSerializer } from './BookSerializer';
import { BLANK, NOT_AN_OBJECT, NOT_A_STRING, REQUIRED, invalid, maxLength, valid } from './wire-fields';

function authorNameProblem(name: string): string | null {
  if (name.length === 0) return BLANK;
  if (name.length < 2) return 'Author name must be at least 2 characters long.';
  if (name.length > 100) return maxLength(100);
  if (!/\p{L}/u.test(name)) return 'Author name must contain at least one letter.';
  return null;
}

export const AuthorWireSchema = z.object(
  {
    name: z
      .string({ required_error: REQUIRED, invalid_type_error: NOT_A_STRING })
      .trim()
      .superRefine((name, ctx) => {
        const problem = authorNameProblem(name);
        if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
      }),
  },
  { invalid_type_error: NOT_AN_OBJECT }
);

/**
 * Author wire form embeds the author's books; they are never written through it.
 */
export class AuthorSerializer implements Serializer<Author, AuthorInput> {
  private readonly books = new BookSerializer();

  toWire(author: Author): Record<string, unknown> {
    return {
      id: author.id,
      name: author.name,
      book_count: author.books.length,
      books: author.books.map(book => this.books.toWire(book)),
    };
  }

  fromWire(data: unknown, partial: false): ValidationResult<AuthorInput>;
  fromWire(data: unknown, partial: true): ValidationResult<Partial<AuthorInput>>;
  fromWire(data: unknown, partial: boolean): ValidationResult<AuthorInput> | ValidationResult<Partial<AuthorInput>> {
    if (!partial) {
      const parsed = AuthorWireSchema.safeParse(data);
      return parsed.success ? valid({ name: parsed.data.name }) : invalid(parsed.error);
    }
    const parsed = AuthorWireSchema.partial().safeParse(data);
    if (!parsed.success) return invalid(parsed.error);
    return valid(parsed.data.name !== undefined ? { name: parsed.data.name } : {});
  }
}

export function summarizeAuthor(author: Author): Record<string, unknown> {
  return { id: author.id, name: author.name, book_count: author.books.length };
}
