import { z } from 'zod';
import type { Serializer, ValidationResult } from '@shelfwise/platform-core';
import { MAX_COMMENT_LENGTH, type Comment, type CommentInput } from '@domains/social';
import { NOT_AN_OBJECT, integerField, invalid, requiredText, valid } from './wire-fields';

const PK_EXPECTED = 'Incorrect type. Expected pk value.';

export const CommentWireSchema = z.object(
  {
    content: requiredText(MAX_COMMENT_LENGTH),
    post: integerField(PK_EXPECTED)
      .refine(id => id > 0, PK_EXPECTED)
      .optional(),
  },
  { invalid_type_error: NOT_AN_OBJECT }
);

export class CommentSerializer implements Serializer<Comment, CommentInput> {
  toWire(comment: Comment): Record<string, unknown> {
    return {
      id: comment.id,
      post: comment.postId,
      author: comment.authorId,
      author_username: comment.authorUsername,
      content: comment.content,
      created_at: comment.createdAt.toISOString(),
      updated_at: comment.updatedAt.toISOString(),
    };
  }

  fromWire(data: unknown, partial: false): ValidationResult<CommentInput>;
  fromWire(data: unknown, partial: true): ValidationResult<Partial<CommentInput>>;
  fromWire(data: unknown, partial: boolean): ValidationResult<CommentInput> | ValidationResult<Partial<CommentInput>> {
    if (!partial) {
      const parsed = CommentWireSchema.safeParse(data);
      if (!parsed.success) return invalid(parsed.error);
      return valid(
        parsed.data.post !== undefined
          ? { content: parsed.data.content, postId: parsed.data.post }
          : { content: parsed.data.content }
      );
    }
    const parsed = CommentWireSchema.partial().safeParse(data);
    if (!parsed.success) return invalid(parsed.error);
    return valid(parsed.data.content !== undefined ? { content: parsed.data.content } : {});
  }
}

export function summarizeComment(comment: Comment): Record<string, unknown> {
  return { id: comment.id, post: comment.postId, author: comment.authorUsername };
}
