import { describe, it, expect } from 'vitest';
import { createAnonymousContext } from '@shelfwise/shared-contracts';
import {
  authorQueryFilter,
  bookQueryFilter,
  commentQueryFilter,
  libraryQueryFilter,
  postQueryFilter,
} from '@application/filters';

const anonymous = createAnonymousContext();

describe('bookQueryFilter', () => {
  it('should fall back to the default ordering with no parameters', () => {
    expect(bookQueryFilter.parse({}, anonymous)).toEqual({
      authorId: undefined,
      publicationYear: undefined,
      yearFrom: undefined,
      yearTo: undefined,
      titleContains: undefined,
      searchTerms: [],
      ordering: [
        { field: 'publication_year', direction: 'desc' },
        { field: 'title', direction: 'asc' },
      ],
    });
  });

  it('should keep the tightest of the range aliases', () => {
    const query = bookQueryFilter.parse(
      { publication_year__gte: '1940', year_from: '1950', publication_year__lte: '1990', year_to: '1980' },
      anonymous
    );

    expect(query.yearFrom).toBe(1950);
    expect(query.yearTo).toBe(1980);
  });

  it('should drop malformed values instead of failing', () => {
    const query = bookQueryFilter.parse(
      { author: 'tolkien', publication_year: '19x4', ordering: 'price,-title', unknown: 'x' },
      anonymous
    );

    expect(query.authorId).toBeUndefined();
    expect(query.publicationYear).toBeUndefined();
    expect(query.ordering).toEqual([{ field: 'title', direction: 'desc' }]);
  });

  it('should split search terms on commas and whitespace', () => {
    const query = bookQueryFilter.parse({ search: 'ring, tolkien  fellowship', title__icontains: ' Ring ' }, anonymous);

    expect(query.searchTerms).toEqual(['ring', 'tolkien', 'fellowship']);
    expect(query.titleContains).toBe('Ring');
  });

  it('should advertise its parameters', () => {
    expect(bookQueryFilter.capabilities.available_search).toEqual(['title', 'author__name']);
    expect(bookQueryFilter.capabilities.available_ordering).toEqual(['title', 'publication_year', 'author__name']);
  });
});

describe('authorQueryFilter', () => {
  it('should order by name unless told otherwise', () => {
    expect(authorQueryFilter.parse({ search: 'le guin' }, anonymous)).toEqual({
      searchTerms: ['le', 'guin'],
      ordering: [{ field: 'name', direction: 'asc' }],
    });
    expect(authorQueryFilter.parse({ ordering: '-name' }, anonymous).ordering).toEqual([
      { field: 'name', direction: 'desc' },
    ]);
  });
});

describe('postQueryFilter', () => {
  it('should filter by author and default to newest first', () => {
    expect(postQueryFilter.parse({ author: '4' }, anonymous)).toEqual({
      authorId: 4,
      searchTerms: [],
      ordering: [{ field: 'created_at', direction: 'desc' }],
    });
  });

  it('should match tags case-insensitively', () => {
    expect(postQueryFilter.parse({ tag: 'Poetry' }, anonymous).tag).toBe('poetry');
  });
});

describe('libraryQueryFilter', () => {
  it('should filter by book and search names', () => {
    expect(libraryQueryFilter.parse({ book: '3', search: 'harbor holt' }, anonymous)).toEqual({
      bookId: 3,
      searchTerms: ['harbor', 'holt'],
      ordering: [{ field: 'name', direction: 'asc' }],
    });
  });
});

describe('commentQueryFilter', () => {
  it('should default to oldest first', () => {
    expect(commentQueryFilter.parse({ post: '2' }, anonymous)).toEqual({
      postId: 2,
      authorId: undefined,
      ordering: [{ field: 'created_at', direction: 'asc' }],
    });
  });
});
