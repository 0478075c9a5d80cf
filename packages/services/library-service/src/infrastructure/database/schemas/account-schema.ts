/**
 * Account Schema
 * Users and their one-to-one profiles
 */

import { pgTable, serial, varchar, integer, text, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';
import { USER_ROLES } from '@shelfwise/shared-contracts';

export const users = pgTable(
  'acc_users',
  {
    id: serial('id').primaryKey(),
    username: varchar('username', { length: 150 }).notNull(),
    email: varchar('email', { length: 254 }),
    passwordHash: varchar('password_hash', { length: 255 }).notNull(),
    role: varchar('role', { length: 20 }).default(USER_ROLES.MEMBER).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  table => ({
    usernameUnique: uniqueIndex('acc_users_username_unique').on(table.username),
  })
);

export const profiles = pgTable('acc_profiles', {
  id: serial('id').primaryKey(),
  userId: integer('user_id')
    .notNull()
    .unique()
    .references(() => users.id, { onDelete: 'cascade' }),
  bio: text('bio').default('').notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export type UserRow = typeof users.$inferSelect;
export type NewUserRow = typeof users.$inferInsert;
export type ProfileRow = typeof profiles.$inferSelect;
