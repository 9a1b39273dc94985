import type { Database } from '../infrastructure/db/index.js';
import { insertEvent } from '../infrastructure/db/index.js';
import type { Event } from '../domain/index.js';
import type { BroadcastManager } from './broadcast-manager.js';
import type { Clock } from './clock.js';
import type { EventInput } from './event-schema.js';

export interface IngestContext {
  db: Database;
  broadcaster: BroadcastManager;
  clock: Clock;
}

/**
 * Use case: record a validated event and announce it to stream observers.
 *
 * Missing `user` and `payload` are stored as null; a missing timestamp
 * is taken from the clock.
 */
export async function ingestEvent(ctx: IngestContext, input: EventInput): Promise<Event> {
  const event = await insertEvent(ctx.db, {
    user: input.user ?? null,
    action: input.action,
    payload: input.payload ?? null,
    timestamp: input.timestamp ?? ctx.clock(),
  });

  ctx.broadcaster.broadcast({ type: 'event', payload: event });
  return event;
}
