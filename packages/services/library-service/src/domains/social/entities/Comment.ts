import type { OrderTerm } from '@shelfwise/platform-core';

export interface Comment {
  id: number;
  postId: number;
  authorId: number;
  authorUsername: string;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * `postId` only counts on create; a comment never moves to another post.
 */
export interface CommentInput {
  content: string;
  postId?: number;
}

export interface NewComment {
  postId: number;
  authorId: number;
  content: string;
}

export type CommentOrderField = 'created_at';

export const COMMENT_ORDER_FIELDS: readonly CommentOrderField[] = ['created_at'];

/** Oldest first, as a thread reads. */
export const DEFAULT_COMMENT_ORDERING: OrderTerm<CommentOrderField>[] = [{ field: 'created_at', direction: 'asc' }];

export interface CommentQuery {
  postId?: number;
  authorId?: number;
  ordering: OrderTerm<CommentOrderField>[];
}

export const MAX_COMMENT_LENGTH = 2000;
