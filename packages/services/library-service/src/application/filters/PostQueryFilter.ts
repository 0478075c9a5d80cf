import {
  parseOrdering,
  readInteger,
  readSearchTerms,
  readString,
  type QueryFilter,
  type QueryParams,
} from '@shelfwise/platform-core';
import { DEFAULT_POST_ORDERING, POST_ORDER_FIELDS, type PostQuery } from '@domains/social';

export const postQueryFilter: QueryFilter<PostQuery> = {
  capabilities: {
    available_filters: ['author', 'tag'],
    available_search: ['title', 'content', 'tags'],
    available_ordering: [...POST_ORDER_FIELDS],
  },

  parse(params: QueryParams): PostQuery {
    const ordering = parseOrdering(params, POST_ORDER_FIELDS);
    return {
      authorId: readInteger(params, 'author'),
      // tags are stored lowercased
      tag: readString(params, 'tag')?.toLowerCase(),
      searchTerms: readSearchTerms(params),
      ordering: ordering.length > 0 ? ordering : DEFAULT_POST_ORDERING,
    };
  },
};
