import { describe, it, expect, beforeEach } from 'vitest';
import { DomainError } from '@shelfwise/platform-core';
import { DEFAULT_BOOK_ORDERING } from '@domains/catalog';
import {
  MemoryAuthorRepository,
  MemoryBookRepository,
  MemoryDatabase,
  MemoryFollowRepository,
  MemoryUserRepository,
} from '@infrastructure/repositories';

const everything = { page: 1, pageSize: 100 };

describe('Memory catalog repositories', () => {
  let db: MemoryDatabase;
  let books: MemoryBookRepository;
  let authors: MemoryAuthorRepository;

  beforeEach(() => {
    db = new MemoryDatabase();
    books = new MemoryBookRepository(db);
    authors = new MemoryAuthorRepository(db);
  });

  it('should delete an author together with their books', async () => {
    const author = await authors.create({ name: 'Octavia Butler' });
    const other = await authors.create({ name: 'Samuel Delany' });
    await books.create({ title: 'Kindred', publicationYear: 1979, authorId: author.id });
    await books.create({ title: 'Dawn', publicationYear: 1987, authorId: author.id });
    await books.create({ title: 'Dhalgren', publicationYear: 1975, authorId: other.id });

    const deleted = await authors.delete(author.id);

    expect(deleted?.books.map(book => book.title)).toEqual(['Dawn', 'Kindred']);
    const remaining = await books.list({ searchTerms: [], ordering: DEFAULT_BOOK_ORDERING }, everything);
    expect(remaining.items.map(book => book.title)).toEqual(['Dhalgren']);
  });

  it('should reject a second book with the same title by the same author', async () => {
    const author = await authors.create({ name: 'Octavia Butler' });
    await books.create({ title: 'Kindred', publicationYear: 1979, authorId: author.id });

    const duplicate = books.create({ title: 'Kindred', publicationYear: 1980, authorId: author.id });

    await expect(duplicate).rejects.toMatchObject({
      statusCode: 409,
      message: 'A book with this title by this author already exists.',
    });
    expect(db.books.size).toBe(1);
  });

  it('should allow the same title by a different author', async () => {
    const first = await authors.create({ name: 'Author One' });
    const second = await authors.create({ name: 'Author Two' });
    await books.create({ title: 'Collected Poems', publicationYear: 1990, authorId: first.id });

    const book = await books.create({ title: 'Collected Poems', publicationYear: 1995, authorId: second.id });

    expect(book.authorName).toBe('Author Two');
  });

  it('should report an unknown author as a field error', async () => {
    const orphan = { title: 'Orphan', publicationYear: 2000, authorId: 42 };

    await expect(books.create(orphan)).rejects.toBeInstanceOf(DomainError);
    await expect(books.create(orphan)).rejects.toMatchObject({
      statusCode: 400,
      details: { fields: { author: ['Invalid pk "42" - object does not exist.'] } },
    });
    expect(db.books.size).toBe(0);
  });

  it('should keep the uniqueness rule on update', async () => {
    const author = await authors.create({ name: 'Octavia Butler' });
    await books.create({ title: 'Kindred', publicationYear: 1979, authorId: author.id });
    const dawn = await books.create({ title: 'Dawn', publicationYear: 1987, authorId: author.id });

    await expect(books.update(dawn.id, { title: 'Kindred' })).rejects.toMatchObject({ statusCode: 409 });
    expect((await books.update(dawn.id, { publicationYear: 1988 }))?.publicationYear).toBe(1988);
  });

  it('should compute catalog statistics', async () => {
    const author = await authors.create({ name: 'Octavia Butler' });
    await books.create({ title: 'Kindred', publicationYear: 1979, authorId: author.id });
    await books.create({ title: 'Wild Seed', publicationYear: 1980, authorId: author.id });
    await books.create({ title: 'Dawn', publicationYear: 1987, authorId: author.id });

    expect(await books.getStats()).toEqual({
      totalBooks: 3,
      totalAuthors: 1,
      latest: { title: 'Dawn', year: 1987, author: 'Octavia Butler' },
      oldest: { title: 'Kindred', year: 1979, author: 'Octavia Butler' },
      countsByDecade: [
        { decade: 1970, count: 1 },
        { decade: 1980, count: 2 },
      ],
    });
  });

  it('should report empty statistics for an empty catalog', async () => {
    expect(await books.getStats()).toEqual({
      totalBooks: 0,
      totalAuthors: 0,
      latest: null,
      oldest: null,
      countsByDecade: [],
    });
  });
});

describe('Memory follow repository', () => {
  it('should keep a single edge when following twice', async () => {
    const db = new MemoryDatabase();
    const users = new MemoryUserRepository(db);
    const follows = new MemoryFollowRepository(db);
    const ada = await users.create({ username: 'ada', email: null, passwordHash: 'x', role: 'member' });
    const bob = await users.create({ username: 'bob', email: null, passwordHash: 'x', role: 'member' });

    expect(await follows.add(ada.id, bob.id)).toBe(true);
    expect(await follows.add(ada.id, bob.id)).toBe(false);

    expect(db.follows.size).toBe(1);
    expect(await follows.counts(bob.id)).toEqual({ followers: 1, following: 0 });
    expect((await follows.listFollowers(bob.id, everything)).items).toEqual([{ id: ada.id, username: 'ada' }]);
  });
});
