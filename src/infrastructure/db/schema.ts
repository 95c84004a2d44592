import { pgTable, uuid, varchar, timestamp, boolean, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for mirrored tracker projects.
 *
 * `external_id` is the correlation key for every upsert and carries the
 * unique constraint; `id` is local only. Placeholders have a null
 * `external_last_modified` so the first genuine snapshot always wins.
 */
export const projects = pgTable('projects', {
  id: uuid('id').primaryKey().defaultRandom(),
  external_id: varchar('external_id', { length: 255 }).notNull().unique(),
  key: varchar('key', { length: 255 }),
  name: varchar('name', { length: 1024 }),
  is_placeholder: boolean('is_placeholder').notNull().default(false),
  external_last_modified: timestamp('external_last_modified', { withTimezone: true }),
  local_modified_at: timestamp('local_modified_at', { withTimezone: true }),
  last_synced_at: timestamp('last_synced_at', { withTimezone: true }).notNull().defaultNow(),
  deleted_at: timestamp('deleted_at', { withTimezone: true }),
}, (table) => [
  index('idx_projects_deleted_at').on(table.deleted_at),
]);

/**
 * Drizzle schema for mirrored tracker issues.
 *
 * `project_id` references the owning project's local id; a hard-deleted
 * project takes its issues with it.
 */
export const issues = pgTable('issues', {
  id: uuid('id').primaryKey().defaultRandom(),
  external_id: varchar('external_id', { length: 255 }).notNull().unique(),
  project_id: uuid('project_id').notNull().references(() => projects.id, { onDelete: 'cascade' }),
  key: varchar('key', { length: 255 }),
  summary: varchar('summary', { length: 4096 }),
  status: varchar('status', { length: 255 }),
  external_last_modified: timestamp('external_last_modified', { withTimezone: true }),
  local_modified_at: timestamp('local_modified_at', { withTimezone: true }),
  last_synced_at: timestamp('last_synced_at', { withTimezone: true }).notNull().defaultNow(),
  deleted_at: timestamp('deleted_at', { withTimezone: true }),
}, (table) => [
  index('idx_issues_project_id').on(table.project_id),
  index('idx_issues_deleted_at').on(table.deleted_at),
]);
