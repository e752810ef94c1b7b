/**
 * PostgreSQL Schema Definitions
 *
 * The same tables as schema.ts, declared for PostgreSQL. The DDL applied at
 * startup lives in schema.pg.sql.
 */

import { boolean, pgTable, serial, varchar } from 'drizzle-orm/pg-core';

export const pgUsers = pgTable('users', {
  id: serial('id').primaryKey(),

  email: varchar('email', { length: 255 }).notNull().unique(),

  username: varchar('username', { length: 255 }).notNull().unique(),

  fullName: varchar('full_name', { length: 255 }),

  isActive: boolean('is_active').notNull().default(true),
});

export type PgUserRow = typeof pgUsers.$inferSelect;
