import type { OrderTerm } from '@shelfwise/platform-core';

export interface Post {
  id: number;
  authorId: number;
  authorUsername: string;
  title: string;
  content: string;
  tags: string[];
  likeCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface PostInput {
  title: string;
  content: string;
  /** Lowercased, without duplicates. */
  tags: string[];
}

export interface NewPost extends PostInput {
  authorId: number;
}

export type PostOrderField = 'created_at' | 'title';

export const POST_ORDER_FIELDS: readonly PostOrderField[] = ['created_at', 'title'];

export const DEFAULT_POST_ORDERING: OrderTerm<PostOrderField>[] = [{ field: 'created_at', direction: 'desc' }];

export interface PostQuery {
  authorId?: number;
  /** Restricts to posts by any of these users; an empty list matches nothing. */
  authorIds?: number[];
  /** Posts carrying this tag. */
  tag?: string;
  /** Every term must appear in the title, the content or one of the tags. */
  searchTerms: string[];
  ordering: OrderTerm<PostOrderField>[];
}

export const MAX_TAGS_PER_POST = 10;
export const MAX_TAG_LENGTH = 50;
