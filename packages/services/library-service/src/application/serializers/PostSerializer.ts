import { z } from 'zod';
import type { Serializer, ValidationResult } from '@shelfwise/platform-core';
import { MAX_TAGS_PER_POST, MAX_TAG_LENGTH, type Post, type PostInput } from '@domains/social';
import { NOT_AN_OBJECT, invalid, requiredText, valid } from './wire-fields';

const MAX_CONTENT_LENGTH = 10000;

const TagListSchema = z
  .array(requiredText(MAX_TAG_LENGTH), { invalid_type_error: 'Expected a list of items.' })
  .max(MAX_TAGS_PER_POST, `Ensure this field has no more than ${MAX_TAGS_PER_POST} elements.`)
  .transform(tags => [...new Set(tags.map(tag => tag.toLowerCase()))]);

export const PostWireSchema = z.object(
  {
    title: requiredText(200),
    content: requiredText(MAX_CONTENT_LENGTH),
    tags: TagListSchema.optional(),
  },
  { invalid_type_error: NOT_AN_OBJECT }
);

export class PostSerializer implements Serializer<Post, PostInput> {
  toWire(post: Post): Record<string, unknown> {
    return {
      id: post.id,
      author: post.authorId,
      author_username: post.authorUsername,
      title: post.title,
      content: post.content,
      tags: post.tags,
      like_count: post.likeCount,
      created_at: post.createdAt.toISOString(),
      updated_at: post.updatedAt.toISOString(),
    };
  }

  fromWire(data: unknown, partial: false): ValidationResult<PostInput>;
  fromWire(data: unknown, partial: true): ValidationResult<Partial<PostInput>>;
  fromWire(data: unknown, partial: boolean): ValidationResult<PostInput> | ValidationResult<Partial<PostInput>> {
    if (!partial) {
      const parsed = PostWireSchema.safeParse(data);
      if (!parsed.success) return invalid(parsed.error);
      return valid({ title: parsed.data.title, content: parsed.data.content, tags: parsed.data.tags ?? [] });
    }
    const parsed = PostWireSchema.partial().safeParse(data);
    if (!parsed.success) return invalid(parsed.error);
    const fields: Partial<PostInput> = {};
    if (parsed.data.title !== undefined) fields.title = parsed.data.title;
    if (parsed.data.content !== undefined) fields.content = parsed.data.content;
    if (parsed.data.tags !== undefined) fields.tags = parsed.data.tags;
    return valid(fields);
  }
}

export function summarizePost(post: Post): Record<string, unknown> {
  return { id: post.id, title: post.title, author: post.authorUsername };
}
