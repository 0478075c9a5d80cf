/**
 * Catalog repositories over Drizzle ORM
 */

import { and, count, eq, gte, ilike, inArray, lte, or, sql, type SQL } from 'drizzle-orm';
import {
  DomainError,
  isForeignKeyViolation,
  isUniqueViolation,
  serializeError,
  type ListResult,
  type PageRequest,
} from '@shelfwise/platform-core';
import {
  DEFAULT_BOOK_ORDERING,
  type Author,
  type AuthorInput,
  type AuthorQuery,
  type Book,
  type BookHighlight,
  type BookInput,
  type BookQuery,
  type BookStats,
  type IAuthorRepository,
  type IBookRepository,
  type ILibraryRepository,
  type Library,
  type LibraryInput,
  type LibraryQuery,
} from '@domains/catalog';
import { CatalogError } from '@application/errors';
import { getLogger } from '@config/service-config';
import type { DatabaseConnection, DatabaseTransaction } from '../../database/DatabaseConnectionFactory';
import { authors, books, librarians, libraries, libraryBooks } from '../../database/schemas';
import { containsPattern, offsetOf, orderByTerms } from './query-helpers';

const logger = getLogger('catalog-repository');

const bookColumns = {
  id: books.id,
  title: books.title,
  publicationYear: books.publicationYear,
  authorId: books.authorId,
  authorName: authors.name,
};

const bookOrderColumns = {
  title: books.title,
  publication_year: books.publicationYear,
  author__name: authors.name,
};

function bookConditions(query: BookQuery): SQL | undefined {
  const conditions: (SQL | undefined)[] = [];
  if (query.authorId !== undefined) conditions.push(eq(books.authorId, query.authorId));
  if (query.publicationYear !== undefined) conditions.push(eq(books.publicationYear, query.publicationYear));
  if (query.yearFrom !== undefined) conditions.push(gte(books.publicationYear, query.yearFrom));
  if (query.yearTo !== undefined) conditions.push(lte(books.publicationYear, query.yearTo));
  if (query.titleContains !== undefined) conditions.push(ilike(books.title, containsPattern(query.titleContains)));
  for (const term of query.searchTerms) {
    conditions.push(or(ilike(books.title, containsPattern(term)), ilike(authors.name, containsPattern(term))));
  }
  return and(...conditions);
}

/**
 * Constraint violations from Postgres become the catalog's field errors
 */
function translateWriteError(error: unknown, fields: Partial<BookInput>): never {
  if (isForeignKeyViolation(error)) {
    throw CatalogError.unknownAuthor(fields.authorId ?? 0);
  }
  if (isUniqueViolation(error)) {
    throw CatalogError.duplicateBook();
  }
  logger.error('Book write failed', { error: serializeError(error) });
  throw error;
}

export class DrizzleBookRepository implements IBookRepository {
  constructor(private readonly db: DatabaseConnection) {}

  async get(id: number): Promise<Book | null> {
    const [book] = await this.db
      .select(bookColumns)
      .from(books)
      .innerJoin(authors, eq(books.authorId, authors.id))
      .where(eq(books.id, id))
      .limit(1);
    return book ?? null;
  }

  async list(query: BookQuery, page: PageRequest): Promise<ListResult<Book>> {
    const where = bookConditions(query);
    const [items, [totals]] = await Promise.all([
      this.db
        .select(bookColumns)
        .from(books)
        .innerJoin(authors, eq(books.authorId, authors.id))
        .where(where)
        .orderBy(...orderByTerms(query.ordering, bookOrderColumns, books.id))
        .limit(page.pageSize)
        .offset(offsetOf(page)),
      this.db.select({ total: count() }).from(books).innerJoin(authors, eq(books.authorId, authors.id)).where(where),
    ]);
    return { items, total: totals?.total ?? 0 };
  }

  async create(fields: BookInput): Promise<Book> {
    let id: number;
    try {
      const [row] = await this.db.insert(books).values(fields).returning({ id: books.id });
      if (!row) throw CatalogError.internalError('Insert returned no row');
      id = row.id;
    } catch (error) {
      translateWriteError(error, fields);
    }
    const created = await this.get(id);
    if (!created) throw CatalogError.internalError(`Book ${id} vanished after insert`);
    return created;
  }

  async update(id: number, fields: Partial<BookInput>): Promise<Book | null> {
    if (Object.keys(fields).length === 0) return this.get(id);
    try {
      const rows = await this.db.update(books).set(fields).where(eq(books.id, id)).returning({ id: books.id });
      if (rows.length === 0) return null;
    } catch (error) {
      translateWriteError(error, fields);
    }
    return this.get(id);
  }

  async delete(id: number): Promise<Book | null> {
    const existing = await this.get(id);
    if (!existing) return null;
    const rows = await this.db.delete(books).where(eq(books.id, id)).returning({ id: books.id });
    return rows.length > 0 ? existing : null;
  }

  async getStats(): Promise<BookStats> {
    const decade = sql<number>`(${books.publicationYear} / 10) * 10`.mapWith(Number);
    const highlightColumns = { title: books.title, year: books.publicationYear, author: authors.name };

    const [[bookTotals], [authorTotals], [latest], [oldest], decades] = await Promise.all([
      this.db.select({ total: count() }).from(books),
      this.db.select({ total: count() }).from(authors),
      this.db
        .select(highlightColumns)
        .from(books)
        .innerJoin(authors, eq(books.authorId, authors.id))
        .orderBy(...orderByTerms(DEFAULT_BOOK_ORDERING, bookOrderColumns, books.id))
        .limit(1),
      this.db
        .select(highlightColumns)
        .from(books)
        .innerJoin(authors, eq(books.authorId, authors.id))
        .orderBy(
          ...orderByTerms(
            [
              { field: 'publication_year', direction: 'asc' },
              { field: 'title', direction: 'asc' },
            ],
            bookOrderColumns,
            books.id
          )
        )
        .limit(1),
      this.db.select({ decade, count: count() }).from(books).groupBy(decade).orderBy(decade),
    ]);

    const toHighlight = (row: BookHighlight | undefined): BookHighlight | null => row ?? null;
    return {
      totalBooks: bookTotals?.total ?? 0,
      totalAuthors: authorTotals?.total ?? 0,
      latest: toHighlight(latest),
      oldest: toHighlight(oldest),
      countsByDecade: decades,
    };
  }
}

export class DrizzleAuthorRepository implements IAuthorRepository {
  constructor(private readonly db: DatabaseConnection) {}

  private async withBooks(rows: { id: number; name: string }[]): Promise<Author[]> {
    if (rows.length === 0) return [];
    const authored = await this.db
      .select(bookColumns)
      .from(books)
      .innerJoin(authors, eq(books.authorId, authors.id))
      .where(inArray(books.authorId, rows.map(row => row.id)))
      .orderBy(...orderByTerms(DEFAULT_BOOK_ORDERING, bookOrderColumns, books.id));

    return rows.map(row => ({
      id: row.id,
      name: row.name,
      books: authored.filter(book => book.authorId === row.id),
    }));
  }

  async get(id: number): Promise<Author | null> {
    const rows = await this.db.select({ id: authors.id, name: authors.name }).from(authors).where(eq(authors.id, id));
    const [author] = await this.withBooks(rows);
    return author ?? null;
  }

  async list(query: AuthorQuery, page: PageRequest): Promise<ListResult<Author>> {
    const where = and(...query.searchTerms.map(term => ilike(authors.name, containsPattern(term))));
    const [rows, [totals]] = await Promise.all([
      this.db
        .select({ id: authors.id, name: authors.name })
        .from(authors)
        .where(where)
        .orderBy(...orderByTerms(query.ordering, { name: authors.name }, authors.id))
        .limit(page.pageSize)
        .offset(offsetOf(page)),
      this.db.select({ total: count() }).from(authors).where(where),
    ]);
    return { items: await this.withBooks(rows), total: totals?.total ?? 0 };
  }

  async create(fields: AuthorInput): Promise<Author> {
    const [row] = await this.db.insert(authors).values(fields).returning({ id: authors.id, name: authors.name });
    if (!row) throw CatalogError.internalError('Insert returned no row');
    return { ...row, books: [] };
  }

  async update(id: number, fields: Partial<AuthorInput>): Promise<Author | null> {
    if (Object.keys(fields).length === 0) return this.get(id);
    const rows = await this.db.update(authors).set(fields).where(eq(authors.id, id)).returning({ id: authors.id });
    return rows.length > 0 ? this.get(id) : null;
  }

  /** Books go with the author through ON DELETE CASCADE. */
  async delete(id: number): Promise<Author | null> {
    const existing = await this.get(id);
    if (!existing) return null;
    const rows = await this.db.delete(authors).where(eq(authors.id, id)).returning({ id: authors.id });
    return rows.length > 0 ? existing : null;
  }
}

function libraryConditions(query: LibraryQuery): SQL | undefined {
  const conditions: (SQL | undefined)[] = [];
  if (query.bookId !== undefined) {
    conditions.push(
      sql`exists (select 1 from ${libraryBooks} where ${libraryBooks.libraryId} = ${libraries.id} and ${libraryBooks.bookId} = ${query.bookId})`
    );
  }
  for (const term of query.searchTerms) {
    conditions.push(or(ilike(libraries.name, containsPattern(term)), ilike(librarians.name, containsPattern(term))));
  }
  return and(...conditions);
}

function translateLibraryWriteError(error: unknown, fields: Partial<LibraryInput>): never {
  // a book deleted between the existence check and the insert
  if (isForeignKeyViolation(error)) {
    throw CatalogError.unknownBooks(fields.bookIds ?? []);
  }
  if (!(error instanceof DomainError)) {
    logger.error('Library write failed', { error: serializeError(error) });
  }
  throw error;
}

export class DrizzleLibraryRepository implements ILibraryRepository {
  constructor(private readonly db: DatabaseConnection) {}

  private async withRelations(rows: { id: number; name: string }[]): Promise<Library[]> {
    if (rows.length === 0) return [];
    const ids = rows.map(row => row.id);
    const [held, staff] = await Promise.all([
      this.db
        .select({ libraryId: libraryBooks.libraryId, ...bookColumns })
        .from(libraryBooks)
        .innerJoin(books, eq(libraryBooks.bookId, books.id))
        .innerJoin(authors, eq(books.authorId, authors.id))
        .where(inArray(libraryBooks.libraryId, ids))
        .orderBy(...orderByTerms(DEFAULT_BOOK_ORDERING, bookOrderColumns, books.id)),
      this.db
        .select({ id: librarians.id, name: librarians.name, libraryId: librarians.libraryId })
        .from(librarians)
        .where(inArray(librarians.libraryId, ids)),
    ]);

    return rows.map(row => {
      const librarian = staff.find(entry => entry.libraryId === row.id);
      return {
        id: row.id,
        name: row.name,
        books: held
          .filter(entry => entry.libraryId === row.id)
          .map(entry => ({
            id: entry.id,
            title: entry.title,
            publicationYear: entry.publicationYear,
            authorId: entry.authorId,
            authorName: entry.authorName,
          })),
        librarian: librarian ? { id: librarian.id, name: librarian.name } : null,
      };
    });
  }

  /**
   * Holding and librarian, each only when supplied. Runs inside the
   * library's own write transaction.
   */
  private async writeRelations(tx: DatabaseTransaction, libraryId: number, fields: Partial<LibraryInput>): Promise<void> {
    if (fields.bookIds !== undefined) {
      const wanted = fields.bookIds;
      if (wanted.length > 0) {
        const found = await tx.select({ id: books.id }).from(books).where(inArray(books.id, wanted));
        const missing = wanted.filter(id => !found.some(row => row.id === id));
        if (missing.length > 0) throw CatalogError.unknownBooks(missing);
      }
      await tx.delete(libraryBooks).where(eq(libraryBooks.libraryId, libraryId));
      if (wanted.length > 0) {
        await tx
          .insert(libraryBooks)
          .values(wanted.map(bookId => ({ libraryId, bookId })))
          .onConflictDoNothing();
      }
    }

    if (fields.librarian === null) {
      await tx.delete(librarians).where(eq(librarians.libraryId, libraryId));
    } else if (fields.librarian !== undefined) {
      await tx
        .insert(librarians)
        .values({ libraryId, name: fields.librarian })
        .onConflictDoUpdate({ target: librarians.libraryId, set: { name: fields.librarian } });
    }
  }

  async get(id: number): Promise<Library | null> {
    const rows = await this.db
      .select({ id: libraries.id, name: libraries.name })
      .from(libraries)
      .where(eq(libraries.id, id));
    const [library] = await this.withRelations(rows);
    return library ?? null;
  }

  async list(query: LibraryQuery, page: PageRequest): Promise<ListResult<Library>> {
    const where = libraryConditions(query);
    const [rows, [totals]] = await Promise.all([
      this.db
        .select({ id: libraries.id, name: libraries.name })
        .from(libraries)
        .leftJoin(librarians, eq(librarians.libraryId, libraries.id))
        .where(where)
        .orderBy(...orderByTerms(query.ordering, { name: libraries.name }, libraries.id))
        .limit(page.pageSize)
        .offset(offsetOf(page)),
      this.db
        .select({ total: count() })
        .from(libraries)
        .leftJoin(librarians, eq(librarians.libraryId, libraries.id))
        .where(where),
    ]);
    return { items: await this.withRelations(rows), total: totals?.total ?? 0 };
  }

  async create(fields: LibraryInput): Promise<Library> {
    let id: number;
    try {
      id = await this.db.transaction(async tx => {
        const [row] = await tx.insert(libraries).values({ name: fields.name }).returning({ id: libraries.id });
        if (!row) throw CatalogError.internalError('Insert returned no row');
        await this.writeRelations(tx, row.id, fields);
        return row.id;
      });
    } catch (error) {
      translateLibraryWriteError(error, fields);
    }
    const created = await this.get(id);
    if (!created) throw CatalogError.internalError(`Library ${id} vanished after insert`);
    return created;
  }

  async update(id: number, fields: Partial<LibraryInput>): Promise<Library | null> {
    let found: boolean;
    try {
      found = await this.db.transaction(async tx => {
        const rows =
          fields.name !== undefined
            ? await tx.update(libraries).set({ name: fields.name }).where(eq(libraries.id, id)).returning({ id: libraries.id })
            : await tx.select({ id: libraries.id }).from(libraries).where(eq(libraries.id, id));
        if (rows.length === 0) return false;
        await this.writeRelations(tx, id, fields);
        return true;
      });
    } catch (error) {
      translateLibraryWriteError(error, fields);
    }
    return found ? this.get(id) : null;
  }

  /** Librarian and holding go through ON DELETE CASCADE. */
  async delete(id: number): Promise<Library | null> {
    const existing = await this.get(id);
    if (!existing) return null;
    const rows = await this.db.delete(libraries).where(eq(libraries.id, id)).returning({ id: libraries.id });
    return rows.length > 0 ? existing : null;
  }
}
