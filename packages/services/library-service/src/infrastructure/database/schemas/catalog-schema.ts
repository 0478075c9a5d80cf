/**
 * Catalog Schema
 * Authors and their books, and the libraries holding them. Deleting an
 * author removes its books; deleting a book removes it from every library.
 */

import { pgTable, serial, varchar, integer, timestamp, index, primaryKey, uniqueIndex } from 'drizzle-orm/pg-core';

export const authors = pgTable(
  'cat_authors',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 100 }).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  table => ({
    nameIdx: index('cat_authors_name_idx').on(table.name),
  })
);

export const books = pgTable(
  'cat_books',
  {
    id: serial('id').primaryKey(),
    title: varchar('title', { length: 200 }).notNull(),
    publicationYear: integer('publication_year').notNull(),
    authorId: integer('author_id')
      .notNull()
      .references(() => authors.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  table => ({
    authorIdx: index('cat_books_author_id_idx').on(table.authorId),
    yearIdx: index('cat_books_publication_year_idx').on(table.publicationYear),
    titleAuthorUnique: uniqueIndex('cat_books_title_author_unique').on(table.title, table.authorId),
  })
);

export const libraries = pgTable(
  'cat_libraries',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 100 }).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  table => ({
    nameIdx: index('cat_libraries_name_idx').on(table.name),
  })
);

export const libraryBooks = pgTable(
  'cat_library_books',
  {
    libraryId: integer('library_id')
      .notNull()
      .references(() => libraries.id, { onDelete: 'cascade' }),
    bookId: integer('book_id')
      .notNull()
      .references(() => books.id, { onDelete: 'cascade' }),
  },
  table => ({
    pk: primaryKey({ columns: [table.libraryId, table.bookId] }),
    bookIdx: index('cat_library_books_book_id_idx').on(table.bookId),
  })
);

// One librarian per library
export const librarians = pgTable(
  'cat_librarians',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 100 }).notNull(),
    libraryId: integer('library_id')
      .notNull()
      .references(() => libraries.id, { onDelete: 'cascade' }),
  },
  table => ({
    libraryUnique: uniqueIndex('cat_librarians_library_unique').on(table.libraryId),
  })
);

export type AuthorRow = typeof authors.$inferSelect;
export type NewAuthorRow = typeof authors.$inferInsert;
export type BookRow = typeof books.$inferSelect;
export type NewBookRow = typeof books.$inferInsert;
export type LibraryRow = typeof libraries.$inferSelect;
export type LibraryBookRow = typeof libraryBooks.$inferSelect;
export type LibrarianRow = typeof librarians.$inferSelect;
