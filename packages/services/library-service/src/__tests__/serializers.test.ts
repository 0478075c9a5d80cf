import { describe, it, expect } from 'vitest';
import {
  AuthorSerializer,
  BookSerializer,
  CommentSerializer,
  LibrarySerializer,
  PostSerializer,
  containsMarkup,
  summarizeBook,
  toStatsWire,
} from '@application/serializers';
import type { Author, Book } from '@domains/catalog';

const currentYear = new Date().getFullYear();

const book: Book = {
  id: 7,
  title: 'The Dispossessed',
  publicationYear: 1974,
  authorId: 2,
  authorName: 'Ursula K. Le Guin',
};

describe('BookSerializer', () => {
  const serializer = new BookSerializer();

  it('should render the snake_case wire form', () => {
    expect(serializer.toWire(book)).toEqual({
      id: 7,
      title: 'The Dispossessed',
      publication_year: 1974,
      author: 2,
      author_name: 'Ursula K. Le Guin',
    });
  });

  it('should accept numeric strings and trim the title', () => {
    const result = serializer.fromWire({ title: '  Lathe of Heaven ', publication_year: '1971', author: '2' }, false);

    expect(result).toEqual({
      success: true,
      data: { title: 'Lathe of Heaven', publicationYear: 1971, authorId: 2 },
    });
  });

  it('should reject a year in the future', () => {
    const year = currentYear + 1;
    const result = serializer.fromWire({ title: 'Later', publication_year: year, author: 1 }, false);

    expect(result).toEqual({
      success: false,
      errors: {
        publication_year: [
          `Publication year cannot be in the future. Current year is ${currentYear}, but received ${year}.`,
        ],
      },
    });
  });

  it('should reject a year before 1000', () => {
    const result = serializer.fromWire({ title: 'Early', publication_year: 999, author: 1 }, false);

    expect(result).toEqual({
      success: false,
      errors: { publication_year: ['Publication year seems too early. Please check the year: 999.'] },
    });
  });

  it('should report every missing field', () => {
    const result = serializer.fromWire({}, false);

    expect(result).toEqual({
      success: false,
      errors: {
        title: ['This field is required.'],
        publication_year: ['This field is required.'],
        author: ['This field is required.'],
      },
    });
  });

  it('should reject markup in titles', () => {
    const result = serializer.fromWire({ title: '<SCRIPT>alert(1)</script>', publication_year: 1990, author: 1 }, false);

    expect(result).toEqual({ success: false, errors: { title: ['Title contains invalid characters.'] } });
  });

  it('should reject a non-integer author reference', () => {
    const result = serializer.fromWire({ title: 'Valid', publication_year: 1990, author: 'abc' }, false);

    expect(result).toEqual({ success: false, errors: { author: ['Incorrect type. Expected pk value.'] } });
  });

  it('should validate only supplied fields in partial mode', () => {
    expect(serializer.fromWire({ publication_year: 1980, colour: 'blue' }, true)).toEqual({
      success: true,
      data: { publicationYear: 1980 },
    });
    expect(serializer.fromWire({ title: '   ' }, true)).toEqual({
      success: false,
      errors: { title: ['This field may not be blank.'] },
    });
  });

  it('should summarise deletions with the author name', () => {
    expect(summarizeBook(book)).toEqual({ id: 7, title: 'The Dispossessed', author: 'Ursula K. Le Guin' });
  });
});

describe('containsMarkup', () => {
  it('should match case-insensitively', () => {
    expect(containsMarkup('a JavaScript:void(0) link')).toBe(true);
    expect(containsMarkup('img OnError=x')).toBe(true);
    expect(containsMarkup('Scripts for the stage')).toBe(false);
  });
});

describe('AuthorSerializer', () => {
  const serializer = new AuthorSerializer();

  it('should embed books and count them', () => {
    const author: Author = { id: 2, name: 'Ursula K. Le Guin', books: [book] };

    expect(serializer.toWire(author)).toEqual({
      id: 2,
      name: 'Ursula K. Le Guin',
      book_count: 1,
      books: [
        { id: 7, title: 'The Dispossessed', publication_year: 1974, author: 2, author_name: 'Ursula K. Le Guin' },
      ],
    });
  });

  it.each([
    ['', 'This field may not be blank.'],
    ['A', 'Author name must be at least 2 characters long.'],
    ['12', 'Author name must contain at least one letter.'],
    ['x'.repeat(101), 'Ensure this field has no more than 100 characters.'],
  ])('should reject the name %j', (name, message) => {
    expect(serializer.fromWire({ name }, false)).toEqual({ success: false, errors: { name: [message] } });
  });

  it('should trim valid names', () => {
    expect(serializer.fromWire({ name: '  Italo Calvino ' }, false)).toEqual({
      success: true,
      data: { name: 'Italo Calvino' },
    });
  });

  it('should ignore nested books on input', () => {
    expect(serializer.fromWire({ books: [{ title: 'x' }] }, true)).toEqual({ success: true, data: {} });
  });
});

describe('PostSerializer', () => {
  it('should require non-blank content', () => {
    const result = new PostSerializer().fromWire({ title: 'Hello', content: '' }, false);

    expect(result).toEqual({ success: false, errors: { content: ['This field may not be blank.'] } });
  });

  it('should default tags to an empty list on a full write', () => {
    const result = new PostSerializer().fromWire({ title: 'Hello', content: 'Body' }, false);

    expect(result).toEqual({ success: true, data: { title: 'Hello', content: 'Body', tags: [] } });
  });

  it('should cap the number of tags', () => {
    const tags = Array.from({ length: 11 }, (_, index) => `tag${index}`);

    const result = new PostSerializer().fromWire({ title: 'Hello', content: 'Body', tags }, false);

    expect(result).toEqual({ success: false, errors: { tags: ['Ensure this field has no more than 10 elements.'] } });
  });
});

describe('LibrarySerializer', () => {
  const serializer = new LibrarySerializer();

  it('should clear books and librarian on a full write that omits them', () => {
    expect(serializer.fromWire({ name: 'Annex' }, false)).toEqual({
      success: true,
      data: { name: 'Annex', bookIds: [], librarian: null },
    });
  });

  it('should accept numeric strings as book ids and drop repeats', () => {
    expect(serializer.fromWire({ name: 'Annex', books: ['3', 3, 5] }, false)).toEqual({
      success: true,
      data: { name: 'Annex', bookIds: [3, 5], librarian: null },
    });
  });

  it('should reject books that are not a list', () => {
    expect(serializer.fromWire({ name: 'Annex', books: '3' }, false)).toEqual({
      success: false,
      errors: { books: ['Expected a list of items.'] },
    });
  });

  it('should keep only the supplied fields on a partial write', () => {
    expect(serializer.fromWire({ librarian: null }, true)).toEqual({ success: true, data: { librarian: null } });
  });

  it('should embed books and count them', () => {
    const wire = serializer.toWire({ id: 3, name: 'Annex', books: [book], librarian: { id: 1, name: 'Mira Holt' } });

    expect(wire).toEqual({
      id: 3,
      name: 'Annex',
      book_count: 1,
      books: [new BookSerializer().toWire(book)],
      librarian: { id: 1, name: 'Mira Holt' },
    });
  });
});

describe('CommentSerializer', () => {
  const serializer = new CommentSerializer();

  it('should read the post id on create', () => {
    expect(serializer.fromWire({ content: 'Agreed.', post: '5' }, false)).toEqual({
      success: true,
      data: { content: 'Agreed.', postId: 5 },
    });
  });

  it('should never move a comment on update', () => {
    expect(serializer.fromWire({ content: 'Edited', post: 9 }, true)).toEqual({
      success: true,
      data: { content: 'Edited' },
    });
  });
});

describe('toStatsWire', () => {
  it('should rename fields for the wire', () => {
    const wire = toStatsWire({
      totalBooks: 2,
      totalAuthors: 1,
      latest: { title: 'B', year: 1990, author: 'A' },
      oldest: { title: 'C', year: 1950, author: 'A' },
      countsByDecade: [
        { decade: 1950, count: 1 },
        { decade: 1990, count: 1 },
      ],
    });

    expect(wire).toEqual({
      total_books: 2,
      total_authors: 1,
      latest: { title: 'B', year: 1990, author: 'A' },
      oldest: { title: 'C', year: 1950, author: 'A' },
      counts_by_decade: [
        { decade: 1950, count: 1 },
        { decade: 1990, count: 1 },
      ],
    });
  });
});
