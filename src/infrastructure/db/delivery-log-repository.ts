import { asc, desc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { deliveryLog } from './schema.js';
import type { DeliveryLogEntry, DeliveryLogStatus } from '../../domain/index.js';

export interface NewDeliveryLogEntry {
  event_id: number | null;
  recipient: string;
  subject: string;
  status: DeliveryLogStatus;
  error: string | null;
  attempt: number;
  created_at: number;
}

/**
 * Appends an audit entry. The log is write-only from the engine's
 * point of view; retry decisions never read it.
 */
export async function appendDeliveryLog(db: Database, entry: NewDeliveryLogEntry): Promise<DeliveryLogEntry> {
  const rows = await db.insert(deliveryLog).values(entry).returning();

  const row = rows[0];
  if (row === undefined) {
    throw new Error('Delivery log insert returned no row');
  }
  return row;
}

/** Newest entries first. */
export async function fetchDeliveryLog(db: Database, limit: number): Promise<DeliveryLogEntry[]> {
  return db
    .select()
    .from(deliveryLog)
    .orderBy(desc(deliveryLog.id))
    .limit(limit);
}

/** Entries for one event in the order they were written. */
export async function fetchDeliveryLogForEvent(db: Database, eventId: number): Promise<DeliveryLogEntry[]> {
  return db
    .select()
    .from(deliveryLog)
    .where(eq(deliveryLog.event_id, eventId))
    .orderBy(asc(deliveryLog.id));
}
