import type { ListResult, PageRequest } from '@shelfwise/platform-core';
import {
  DEFAULT_BOOK_ORDERING,
  type Author,
  type AuthorInput,
  type AuthorQuery,
  type Book,
  type BookHighlight,
  type BookInput,
  type BookOrderField,
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
import type { BookRow, LibraryRow } from '../../database/schemas';
import {
  MemoryDatabase,
  edgeKey,
  includesIgnoreCase,
  paginate,
  sortByTerms,
  type SortValue,
} from './MemoryDatabase';

export class MemoryBookRepository implements IBookRepository {
  constructor(private readonly db: MemoryDatabase) {}

  private authorName(authorId: number): string {
    return this.db.authors.get(authorId)?.name ?? '';
  }

  toBook(row: BookRow): Book {
    return {
      id: row.id,
      title: row.title,
      publicationYear: row.publicationYear,
      authorId: row.authorId,
      authorName: this.authorName(row.authorId),
    };
  }

  private assertWritable(fields: BookInput, excludeId?: number): void {
    if (!this.db.authors.has(fields.authorId)) {
      throw CatalogError.unknownAuthor(fields.authorId);
    }
    for (const row of this.db.books.values()) {
      if (row.id !== excludeId && row.title === fields.title && row.authorId === fields.authorId) {
        throw CatalogError.duplicateBook();
      }
    }
  }

  async get(id: number): Promise<Book | null> {
    const row = this.db.books.get(id);
    return row ? this.toBook(row) : null;
  }

  async list(query: BookQuery, page: PageRequest): Promise<ListResult<Book>> {
    const matches = [...this.db.books.values()].map(row => this.toBook(row)).filter(book => matchesBookQuery(book, query));
    const ordered = sortByTerms(matches, query.ordering, bookOrderValue);
    return paginate(ordered, page);
  }

  async create(fields: BookInput): Promise<Book> {
    this.assertWritable(fields);
    const row: BookRow = { id: this.db.nextId('books'), ...fields, createdAt: new Date() };
    this.db.books.set(row.id, row);
    return this.toBook(row);
  }

  async update(id: number, fields: Partial<BookInput>): Promise<Book | null> {
    const existing = this.db.books.get(id);
    if (!existing) return null;
    const merged = { ...existing, ...fields };
    this.assertWritable(merged, id);
    this.db.books.set(id, merged);
    return this.toBook(merged);
  }

  async delete(id: number): Promise<Book | null> {
    const existing = this.db.books.get(id);
    if (!existing) return null;
    const book = this.toBook(existing);
    this.db.deleteBook(id);
    return book;
  }

  async getStats(): Promise<BookStats> {
    const all = [...this.db.books.values()].map(row => this.toBook(row));
    const byDecade = new Map<number, number>();
    for (const book of all) {
      const decade = Math.floor(book.publicationYear / 10) * 10;
      byDecade.set(decade, (byDecade.get(decade) ?? 0) + 1);
    }
    const newestFirst = sortByTerms(all, DEFAULT_BOOK_ORDERING, bookOrderValue);
    const oldestFirst = sortByTerms(
      all,
      [
        { field: 'publication_year', direction: 'asc' },
        { field: 'title', direction: 'asc' },
      ],
      bookOrderValue
    );

    return {
      totalBooks: all.length,
      totalAuthors: this.db.authors.size,
      latest: highlight(newestFirst[0]),
      oldest: highlight(oldestFirst[0]),
      countsByDecade: [...byDecade.entries()]
        .sort(([a], [b]) => a - b)
        .map(([decade, count]) => ({ decade, count })),
    };
  }
}

function highlight(book: Book | undefined): BookHighlight | null {
  return book ? { title: book.title, year: book.publicationYear, author: book.authorName } : null;
}

export function matchesBookQuery(book: Book, query: BookQuery): boolean {
  if (query.authorId !== undefined && book.authorId !== query.authorId) return false;
  if (query.publicationYear !== undefined && book.publicationYear !== query.publicationYear) return false;
  if (query.yearFrom !== undefined && book.publicationYear < query.yearFrom) return false;
  if (query.yearTo !== undefined && book.publicationYear > query.yearTo) return false;
  if (query.titleContains !== undefined && !includesIgnoreCase(book.title, query.titleContains)) return false;
  return query.searchTerms.every(
    term => includesIgnoreCase(book.title, term) || includesIgnoreCase(book.authorName, term)
  );
}

export class MemoryAuthorRepository implements IAuthorRepository {
  private readonly books: MemoryBookRepository;

  constructor(private readonly db: MemoryDatabase) {
    this.books = new MemoryBookRepository(db);
  }

  private async toAuthor(id: number, name: string): Promise<Author> {
    const { items } = await this.books.list(
      { authorId: id, searchTerms: [], ordering: DEFAULT_BOOK_ORDERING },
      { page: 1, pageSize: Number.MAX_SAFE_INTEGER }
    );
    return { id, name, books: items };
  }

  async get(id: number): Promise<Author | null> {
    const row = this.db.authors.get(id);
    return row ? this.toAuthor(row.id, row.name) : null;
  }

  async list(query: AuthorQuery, page: PageRequest): Promise<ListResult<Author>> {
    const matches = [...this.db.authors.values()].filter(row =>
      query.searchTerms.every(term => includesIgnoreCase(row.name, term))
    );
    const ordered = sortByTerms(matches, query.ordering, row => row.name);
    const slice = paginate(ordered, page);
    return { items: await Promise.all(slice.items.map(row => this.toAuthor(row.id, row.name))), total: slice.total };
  }

  async create(fields: AuthorInput): Promise<Author> {
    const id = this.db.nextId('authors');
    this.db.authors.set(id, { id, name: fields.name, createdAt: new Date() });
    return this.toAuthor(id, fields.name);
  }

  async update(id: number, fields: Partial<AuthorInput>): Promise<Author | null> {
    const existing = this.db.authors.get(id);
    if (!existing) return null;
    const merged = { ...existing, ...fields };
    this.db.authors.set(id, merged);
    return this.toAuthor(id, merged.name);
  }

  async delete(id: number): Promise<Author | null> {
    const existing = this.db.authors.get(id);
    if (!existing) return null;
    const author = await this.toAuthor(id, existing.name);
    this.db.deleteAuthor(id);
    return author;
  }
}

export class MemoryLibraryRepository implements ILibraryRepository {
  private readonly books: MemoryBookRepository;

  constructor(private readonly db: MemoryDatabase) {
    this.books = new MemoryBookRepository(db);
  }

  private heldBookIds(libraryId: number): number[] {
    return [...this.db.libraryBooks.values()].filter(edge => edge.libraryId === libraryId).map(edge => edge.bookId);
  }

  private toLibrary(row: LibraryRow): Library {
    const held = new Set(this.heldBookIds(row.id));
    const books = [...this.db.books.values()].filter(book => held.has(book.id)).map(book => this.books.toBook(book));
    const librarian = this.db.librarians.get(row.id);
    return {
      id: row.id,
      name: row.name,
      books: sortByTerms(books, DEFAULT_BOOK_ORDERING, bookOrderValue),
      librarian: librarian ? { id: librarian.id, name: librarian.name } : null,
    };
  }

  private assertBooksExist(bookIds: number[]): void {
    const missing = bookIds.filter(id => !this.db.books.has(id));
    if (missing.length > 0) {
      throw CatalogError.unknownBooks(missing);
    }
  }

  private replaceBooks(libraryId: number, bookIds: number[]): void {
    for (const [key, edge] of this.db.libraryBooks) {
      if (edge.libraryId === libraryId) this.db.libraryBooks.delete(key);
    }
    for (const bookId of bookIds) {
      this.db.libraryBooks.set(edgeKey(libraryId, bookId), { libraryId, bookId });
    }
  }

  private assignLibrarian(libraryId: number, name: string | null): void {
    if (name === null) {
      this.db.librarians.delete(libraryId);
      return;
    }
    const existing = this.db.librarians.get(libraryId);
    this.db.librarians.set(libraryId, { id: existing?.id ?? this.db.nextId('librarians'), name, libraryId });
  }

  async get(id: number): Promise<Library | null> {
    const row = this.db.libraries.get(id);
    return row ? this.toLibrary(row) : null;
  }

  async list(query: LibraryQuery, page: PageRequest): Promise<ListResult<Library>> {
    const matches = [...this.db.libraries.values()].filter(row => {
      if (query.bookId !== undefined && !this.db.libraryBooks.has(edgeKey(row.id, query.bookId))) return false;
      const librarianName = this.db.librarians.get(row.id)?.name ?? '';
      return query.searchTerms.every(
        term => includesIgnoreCase(row.name, term) || includesIgnoreCase(librarianName, term)
      );
    });
    const ordered = sortByTerms(matches, query.ordering, row => row.name);
    const slice = paginate(ordered, page);
    return { items: slice.items.map(row => this.toLibrary(row)), total: slice.total };
  }

  async create(fields: LibraryInput): Promise<Library> {
    this.assertBooksExist(fields.bookIds);
    const row: LibraryRow = { id: this.db.nextId('libraries'), name: fields.name, createdAt: new Date() };
    this.db.libraries.set(row.id, row);
    this.replaceBooks(row.id, fields.bookIds);
    this.assignLibrarian(row.id, fields.librarian);
    return this.toLibrary(row);
  }

  async update(id: number, fields: Partial<LibraryInput>): Promise<Library | null> {
    const existing = this.db.libraries.get(id);
    if (!existing) return null;
    if (fields.bookIds !== undefined) this.assertBooksExist(fields.bookIds);

    const updated = fields.name !== undefined ? { ...existing, name: fields.name } : existing;
    this.db.libraries.set(id, updated);
    if (fields.bookIds !== undefined) this.replaceBooks(id, fields.bookIds);
    if (fields.librarian !== undefined) this.assignLibrarian(id, fields.librarian);
    return this.toLibrary(updated);
  }

  async delete(id: number): Promise<Library | null> {
    const existing = this.db.libraries.get(id);
    if (!existing) return null;
    const library = this.toLibrary(existing);
    this.db.deleteLibrary(id);
    return library;
  }
}

function bookOrderValue(book: Book, field: BookOrderField): SortValue {
  switch (field) {
    case 'title':
      return book.title;
    case 'publication_year':
      return book.publicationYear;
    case 'author__name':
      return book.authorName;
  }
}
