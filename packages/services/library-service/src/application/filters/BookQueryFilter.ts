/**
 * Book list filters. Each parameter narrows independently; all of them
 * combine with AND. Anything malformed is dropped rather than rejected.
 *
 *   ?author=3&publication_year=1954
 *   ?year_from=1950&year_to=1980          (alias of publication_year__gte/__lte)
 *   ?title__icontains=ring&search=tolkien,fellowship
 *   ?ordering=-publication_year,title
 */

import {
  parseOrdering,
  readInteger,
  readSearchTerms,
  readString,
  type QueryFilter,
  type QueryParams,
} from '@shelfwise/platform-core';
import { BOOK_ORDER_FIELDS, DEFAULT_BOOK_ORDERING, type BookQuery } from '@domains/catalog';

function tightest(values: (number | undefined)[], pick: (a: number, b: number) => number): number | undefined {
  return values.reduce<number | undefined>((acc, value) => {
    if (value === undefined) return acc;
    return acc === undefined ? value : pick(acc, value);
  }, undefined);
}

export const bookQueryFilter: QueryFilter<BookQuery> = {
  capabilities: {
    available_filters: [
      'author',
      'publication_year',
      'publication_year__gte',
      'publication_year__lte',
      'year_from',
      'year_to',
      'title__icontains',
    ],
    available_search: ['title', 'author__name'],
    available_ordering: [...BOOK_ORDER_FIELDS],
  },

  parse(params: QueryParams): BookQuery {
    const ordering = parseOrdering(params, BOOK_ORDER_FIELDS);
    return {
      authorId: readInteger(params, 'author'),
      publicationYear: readInteger(params, 'publication_year'),
      yearFrom: tightest([readInteger(params, 'publication_year__gte'), readInteger(params, 'year_from')], Math.max),
      yearTo: tightest([readInteger(params, 'publication_year__lte'), readInteger(params, 'year_to')], Math.min),
      titleContains: readString(params, 'title__icontains'),
      searchTerms: readSearchTerms(params),
      ordering: ordering.length > 0 ? ordering : DEFAULT_BOOK_ORDERING,
    };
  },
};
