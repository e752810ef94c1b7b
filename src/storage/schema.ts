/**
 * Database Schema Definitions
 *
 * Drizzle ORM table definitions for SQLite. The matching DDL that creates
 * these tables at startup lives in schema.sql next to this file; keep the
 * two in step, along with the PostgreSQL pair (schema.pg.ts, schema.pg.sql).
 */

import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/**
 * Users Table
 *
 * The example CRUD resource. Both email and username carry a UNIQUE
 * constraint so the database rejects duplicates even if two inserts race
 * past the application-level check.
 */
export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),

  email: text('email').notNull().unique(),

  username: text('username').notNull().unique(),

  // Display name, optional
  fullName: text('full_name'),

  // Stored as 0/1, surfaced as boolean
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
});

export type UserRow = typeof users.$inferSelect;
export type NewUserRow = typeof users.$inferInsert;
