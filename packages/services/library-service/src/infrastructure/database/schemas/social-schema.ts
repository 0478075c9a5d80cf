/**
 * Social Schema
 * Posts with their tags and comments, follow edges, likes and the
 * notifications likes produce
 */

import { sql } from 'drizzle-orm';
import {
  pgTable,
  serial,
  varchar,
  integer,
  text,
  boolean,
  timestamp,
  index,
  primaryKey,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { users } from './account-schema';

export const posts = pgTable(
  'soc_posts',
  {
    id: serial('id').primaryKey(),
    authorId: integer('author_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    title: varchar('title', { length: 200 }).notNull(),
    content: text('content').notNull(),
    // lowercased on the way in
    tags: text('tags')
      .array()
      .notNull()
      .default(sql`'{}'::text[]`),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  table => ({
    authorIdx: index('soc_posts_author_id_idx').on(table.authorId),
    createdAtIdx: index('soc_posts_created_at_idx').on(table.createdAt),
  })
);

export const comments = pgTable(
  'soc_comments',
  {
    id: serial('id').primaryKey(),
    postId: integer('post_id')
      .notNull()
      .references(() => posts.id, { onDelete: 'cascade' }),
    authorId: integer('author_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    content: text('content').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  table => ({
    postIdx: index('soc_comments_post_id_idx').on(table.postId, table.createdAt),
  })
);

// Directed edge: follower → following
export const follows = pgTable(
  'soc_follows',
  {
    followerId: integer('follower_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    followingId: integer('following_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  table => ({
    pk: primaryKey({ columns: [table.followerId, table.followingId] }),
    followingIdx: index('soc_follows_following_id_idx').on(table.followingId),
  })
);

export const likes = pgTable(
  'soc_likes',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    postId: integer('post_id')
      .notNull()
      .references(() => posts.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  table => ({
    userPostUnique: uniqueIndex('soc_likes_user_post_unique').on(table.userId, table.postId),
  })
);

export const notifications = pgTable(
  'soc_notifications',
  {
    id: serial('id').primaryKey(),
    recipientId: integer('recipient_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    actorId: integer('actor_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    verb: varchar('verb', { length: 255 }).notNull(),
    targetType: varchar('target_type', { length: 50 }).notNull(),
    targetId: integer('target_id').notNull(),
    isRead: boolean('is_read').default(false).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  table => ({
    recipientIdx: index('soc_notifications_recipient_idx').on(table.recipientId, table.createdAt),
  })
);

export type PostRow = typeof posts.$inferSelect;
export type CommentRow = typeof comments.$inferSelect;
export type NotificationRow = typeof notifications.$inferSelect;
export type FollowRow = typeof follows.$inferSelect;
export type LikeRow = typeof likes.$inferSelect;
