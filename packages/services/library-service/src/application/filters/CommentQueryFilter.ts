import { parseOrdering, readInteger, type QueryFilter, type QueryParams } from '@shelfwise/platform-core';
import { COMMENT_ORDER_FIELDS, DEFAULT_COMMENT_ORDERING, type CommentQuery } from '@domains/social';

export const commentQueryFilter: QueryFilter<CommentQuery> = {
  capabilities: {
    available_filters: ['post', 'author'],
    available_search: [],
    available_ordering: [...COMMENT_ORDER_FIELDS],
  },

  parse(params: QueryParams): CommentQuery {
    const ordering = parseOrdering(params, COMMENT_ORDER_FIELDS);
    return {
      postId: readInteger(params, 'post'),
      authorId: readInteger(params, 'author'),
      ordering: ordering.length > 0 ? ordering : DEFAULT_COMMENT_ORDERING,
    };
  },
};
