import { and, asc, desc, eq, isNull, lte } from 'drizzle-orm';
import type { Database } from './client.js';
import { deliveryQueue } from './schema.js';
import type { DeliveryQueueEntry } from '../../domain/index.js';

export interface NewDeliveryQueueEntry {
  event_id: number | null;
  subject: string;
  body: string;
  recipient: string;
  last_error: string | null;
  /** Becomes both `created_at` and the first `next_retry_at`. */
  now: number;
}

/** Queues a failed notification. The first retry is due immediately. */
export async function enqueueDelivery(db: Database, input: NewDeliveryQueueEntry): Promise<DeliveryQueueEntry> {
  const rows = await db
    .insert(deliveryQueue)
    .values({
      event_id: input.event_id,
      subject: input.subject,
      body: input.body,
      recipient: input.recipient,
      attempts: 0,
      next_retry_at: input.now,
      created_at: input.now,
      last_error: input.last_error,
    })
    .returning();

  const row = rows[0];
  if (row === undefined) {
    throw new Error('Delivery queue insert returned no row');
  }
  return row;
}

/**
 * Live entries whose retry time has elapsed, earliest due first.
 * Dead-lettered entries are excluded.
 */
export async function findDueDeliveries(db: Database, now: number, limit: number): Promise<DeliveryQueueEntry[]> {
  return db
    .select()
    .from(deliveryQueue)
    .where(and(lte(deliveryQueue.next_retry_at, now), isNull(deliveryQueue.dead_lettered_at)))
    .orderBy(asc(deliveryQueue.next_retry_at), asc(deliveryQueue.id))
    .limit(limit);
}

export async function findDeliveryById(db: Database, id: number): Promise<DeliveryQueueEntry | undefined> {
  const rows = await db.select().from(deliveryQueue).where(eq(deliveryQueue.id, id)).limit(1);
  return rows[0];
}

/** All entries (live and dead-lettered), newest first. */
export async function listDeliveryQueue(db: Database): Promise<DeliveryQueueEntry[]> {
  return db.select().from(deliveryQueue).orderBy(desc(deliveryQueue.id));
}

/**
 * Queue fields a retry read before calling the notifier. Post-send
 * updates only apply while the live row still carries them.
 */
export type ObservedQueueState = Pick<DeliveryQueueEntry, 'attempts' | 'next_retry_at'>;

function unchangedSince(id: number, observed: ObservedQueueState) {
  return and(
    eq(deliveryQueue.id, id),
    eq(deliveryQueue.attempts, observed.attempts),
    eq(deliveryQueue.next_retry_at, observed.next_retry_at),
    isNull(deliveryQueue.dead_lettered_at),
  );
}

/**
 * Records a failed retry and schedules the next one.
 * Returns false when the entry is gone or changed since `observed`.
 */
export async function recordDeliveryFailure(
  db: Database,
  id: number,
  observed: ObservedQueueState,
  update: { attempts: number; next_retry_at: number; last_error: string },
): Promise<boolean> {
  const result = await db
    .update(deliveryQueue)
    .set(update)
    .where(unchangedSince(id, observed));

  return result.changes > 0;
}

/** Retires an entry that exhausted its attempts. Same guard as `recordDeliveryFailure`. */
export async function markDeadLettered(
  db: Database,
  id: number,
  observed: ObservedQueueState,
  update: { attempts: number; last_error: string; dead_lettered_at: number },
): Promise<boolean> {
  const result = await db
    .update(deliveryQueue)
    .set(update)
    .where(unchangedSince(id, observed));

  return result.changes > 0;
}

/**
 * Makes an entry due right away with a fresh attempt budget.
 * Also revives dead-lettered entries.
 */
export async function resetDelivery(db: Database, id: number): Promise<DeliveryQueueEntry | undefined> {
  const rows = await db
    .update(deliveryQueue)
    .set({ attempts: 0, next_retry_at: 0, dead_lettered_at: null })
    .where(eq(deliveryQueue.id, id))
    .returning();

  return rows[0];
}

/** Returns true if deleted, false if not found. */
export async function deleteDelivery(db: Database, id: number): Promise<boolean> {
  const result = await db.delete(deliveryQueue).where(eq(deliveryQueue.id, id));
  return result.changes > 0;
}
