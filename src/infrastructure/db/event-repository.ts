import { and, asc, desc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { events } from './schema.js';
import type { Event, NewEvent } from '../../domain/index.js';

/**
 * Appends an event. `processed` always starts false.
 * Returns the stored row including its assigned id.
 */
export async function insertEvent(db: Database, event: NewEvent): Promise<Event> {
  const rows = await db
    .insert(events)
    .values({
      user: event.user,
      action: event.action,
      payload: event.payload,
      timestamp: event.timestamp,
      processed: false,
    })
    .returning();

  const row = rows[0];
  if (row === undefined) {
    throw new Error('Event insert returned no row');
  }
  return row;
}

/**
 * Fetches events the worker has not evaluated yet.
 * Oldest timestamp first; ties keep insertion order.
 */
export async function fetchUnprocessedEvents(db: Database, limit: number): Promise<Event[]> {
  return db
    .select()
    .from(events)
    .where(eq(events.processed, false))
    .orderBy(asc(events.timestamp), asc(events.id))
    .limit(limit);
}

/**
 * Flags an event as processed.
 *
 * Idempotent: the predicate only matches unprocessed rows, so a second
 * call changes nothing and returns false.
 */
export async function markEventProcessed(db: Database, eventId: number): Promise<boolean> {
  const result = await db
    .update(events)
    .set({ processed: true })
    .where(and(eq(events.id, eventId), eq(events.processed, false)));

  return result.changes > 0;
}

/** Most recent events, newest first. */
export async function fetchRecentEvents(db: Database, limit: number): Promise<Event[]> {
  return db
    .select()
    .from(events)
    .orderBy(desc(events.timestamp), desc(events.id))
    .limit(limit);
}

/** Returns undefined if not found. */
export async function findEventById(db: Database, eventId: number): Promise<Event | undefined> {
  const rows = await db
    .select()
    .from(events)
    .where(eq(events.id, eventId))
    .limit(1);

  return rows[0];
}
