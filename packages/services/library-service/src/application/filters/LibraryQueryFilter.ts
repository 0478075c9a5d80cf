import { parseOrdering, readInteger, readSearchTerms, type QueryFilter, type QueryParams } from '@shelfwise/platform-core';
import { DEFAULT_LIBRARY_ORDERING, LIBRARY_ORDER_FIELDS, type LibraryQuery } from '@domains/catalog';

/**
 *   ?book=4&search=harbor&ordering=-name
 */
export const libraryQueryFilter: QueryFilter<LibraryQuery> = {
  capabilities: {
    available_filters: ['book'],
    available_search: ['name', 'librarian__name'],
    available_ordering: [...LIBRARY_ORDER_FIELDS],
  },

  parse(params: QueryParams): LibraryQuery {
    const ordering = parseOrdering(params, LIBRARY_ORDER_FIELDS);
    return {
      bookId: readInteger(params, 'book'),
      searchTerms: readSearchTerms(params),
      ordering: ordering.length > 0 ? ordering : DEFAULT_LIBRARY_ORDERING,
    };
  },
};
