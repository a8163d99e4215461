import { sql } from 'drizzle-orm';
import { pgTable, text, varchar, integer, index, check } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `events` table.
 *
 * `event_id` is the primary key and the only access path besides the
 * status index used by filtered scans. `date` stays the canonical
 * `YYYY-MM-DD` string rather than a DATE column so it round-trips verbatim.
 *
 * `PgRecordStore.ensureSchema` creates the same table; keep the two in step.
 */
export const events = pgTable('events', {
  event_id: varchar('event_id', { length: 2048 }).primaryKey(),
  title: text('title').notNull(),
  description: text('description').notNull(),
  date: varchar('date', { length: 10 }).notNull(),
  location: text('location').notNull(),
  capacity: integer('capacity').notNull(),
  organizer: text('organizer').notNull(),
  status: text('status').notNull(),
}, (table) => [
  index('idx_events_status').on(table.status),
  check('events_capacity_check', sql`${table.capacity} >= 0`),
]);

export type EventRow = typeof events.$inferSelect;
