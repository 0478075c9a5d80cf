import { parseOrdering, readSearchTerms, type QueryFilter, type QueryParams } from '@shelfwise/platform-core';
import { AUTHOR_ORDER_FIELDS, DEFAULT_AUTHOR_ORDERING, type AuthorQuery } from '@domains/catalog';

export const authorQueryFilter: QueryFilter<AuthorQuery> = {
  capabilities: {
    available_filters: [],
    available_search: ['name'],
    available_ordering: [...AUTHOR_ORDER_FIELDS],
  },

  parse(params: QueryParams): AuthorQuery {
    const ordering = parseOrdering(params, AUTHOR_ORDER_FIELDS);
    return {
      searchTerms: readSearchTerms(params),
      ordering: ordering.length > 0 ? ordering : DEFAULT_AUTHOR_ORDERING,
    };
  },
};
