import { sqliteTable, integer, text, real, index } from 'drizzle-orm/sqlite-core';
import type { ActionDetails, EventPayload } from '../../domain/index.js';

/**
 * Drizzle schema for the `events` table.
 *
 * Append-only. The only column ever updated is `processed`, and only
 * by the worker (false → true, once).
 */
export const events = sqliteTable('events', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  user: text('user'),
  action: text('action').notNull(),
  payload: text('payload', { mode: 'json' }).$type<EventPayload>(),
  timestamp: real('timestamp').notNull(),
  processed: integer('processed', { mode: 'boolean' }).notNull().default(false),
}, (table) => [
  index('idx_events_processed_timestamp').on(table.processed, table.timestamp),
  index('idx_events_timestamp').on(table.timestamp),
]);

/**
 * Drizzle schema for the `actions` table.
 *
 * One row per triggering event. `event_id` is not an FK constraint;
 * events are never deleted so the reference always resolves.
 */
export const actions = sqliteTable('actions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  event_id: integer('event_id').notNull(),
  action_type: text('action_type', { enum: ['email_alert'] }).notNull(),
  details: text('details', { mode: 'json' }).notNull().$type<ActionDetails>(),
  timestamp: real('timestamp').notNull(),
}, (table) => [
  index('idx_actions_event_id').on(table.event_id),
  index('idx_actions_timestamp').on(table.timestamp),
]);

/** Immutable audit trail of every delivery attempt outcome. */
export const deliveryLog = sqliteTable('delivery_log', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  event_id: integer('event_id'),
  recipient: text('recipient').notNull(),
  subject: text('subject').notNull(),
  status: text('status', { enum: ['sent', 'failed', 'queued', 'dead_lettered'] }).notNull(),
  error: text('error'),
  attempt: integer('attempt').notNull(),
  created_at: real('created_at').notNull(),
}, (table) => [
  index('idx_delivery_log_event_id').on(table.event_id),
]);

/**
 * Pending notifications awaiting retry.
 *
 * Rows are deleted on successful delivery. Dead-lettered rows keep
 * `dead_lettered_at` set and are skipped by the retry scan.
 */
export const deliveryQueue = sqliteTable('delivery_queue', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  event_id: integer('event_id'),
  subject: text('subject').notNull(),
  body: text('body').notNull(),
  recipient: text('recipient').notNull(),
  attempts: integer('attempts').notNull().default(0),
  next_retry_at: real('next_retry_at').notNull().default(0),
  created_at: real('created_at').notNull(),
  last_error: text('last_error'),
  dead_lettered_at: real('dead_lettered_at'),
}, (table) => [
  index('idx_delivery_queue_next_retry_at').on(table.next_retry_at),
]);
