import type { Database } from '../infrastructure/db/index.js';
import {
  deleteDelivery,
  fetchDeliveryLog,
  listDeliveryQueue,
  resetDelivery,
} from '../infrastructure/db/index.js';
import type { DeliveryLogEntry, DeliveryQueueEntry } from '../domain/index.js';
import type { DeliveryContext, DeliveryOutcome } from './delivery.js';
import { deliverAlert } from './delivery.js';
import { clampLimit } from './query-intel.js';

const DEFAULT_LOG_LIMIT = 200;
const MAX_LOG_LIMIT = 1000;

/** Every queue entry, dead-lettered ones included, newest first. */
export async function listQueue(db: Database): Promise<DeliveryQueueEntry[]> {
  return listDeliveryQueue(db);
}

/**
 * Makes an entry due on the next sweep with a fresh attempt budget.
 * Returns null if not found.
 */
export async function forceRetry(db: Database, queueId: number): Promise<DeliveryQueueEntry | null> {
  const row = await resetDelivery(db, queueId);
  return row ?? null;
}

/** Delete a queue entry. Returns true if deleted, false if not found. */
export async function removeQueued(db: Database, queueId: number): Promise<boolean> {
  return deleteDelivery(db, queueId);
}

/** Delivery log, newest first. Clamps limit to [1, 1000], defaults to 200. */
export async function readDeliveryLog(db: Database, limit?: number): Promise<DeliveryLogEntry[]> {
  return fetchDeliveryLog(db, clampLimit(limit, DEFAULT_LOG_LIMIT, MAX_LOG_LIMIT));
}

/**
 * Sends a fixed test alert through the normal delivery path, so a failure
 * lands in the retry queue like any other alert.
 */
export async function sendTestAlert(ctx: DeliveryContext, recipient: string): Promise<DeliveryOutcome> {
  const sentAt = new Date(ctx.clock() * 1000).toISOString();
  return deliverAlert(ctx, null, {
    subject: 'Test alert',
    body: `This is a test alert sent at ${sentAt}.`,
    recipient,
  });
}
