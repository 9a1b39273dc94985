import type { Logger } from 'pino';
import type { Database } from '../infrastructure/db/index.js';
import { appendDeliveryLog, enqueueDelivery } from '../infrastructure/db/index.js';
import type { Notifier } from '../infrastructure/notifications/index.js';
import type { AlertMessage, DeliveryResult } from '../domain/index.js';
import type { Clock } from './clock.js';
import { sleep } from './sleep.js';

export interface DeliveryContext {
  db: Database;
  notifier: Notifier;
  log: Logger;
  clock: Clock;
  /** Synchronous attempts before falling back to the retry queue. */
  immediateAttempts: number;
  /** Delay before attempt n+1 is `immediateDelayMs * n`. */
  immediateDelayMs: number;
}

export type DeliveryOutcome =
  | { readonly status: 'sent'; readonly attempts: number }
  | { readonly status: 'failed'; readonly attempts: number; readonly error: string; readonly queue_id: number };

/**
 * Calls the notifier once, converting a thrown error into a failed
 * result so callers only branch on the result value.
 */
export async function attemptSend(notifier: Notifier, message: AlertMessage): Promise<DeliveryResult> {
  try {
    return await notifier.send(message);
  } catch (err: unknown) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Initial delivery path for an alert.
 *
 * 1. Up to `immediateAttempts` notifier calls, with a linear delay between them.
 * 2. On success: append a `sent` log entry.
 * 3. When every attempt failed: append a `queued` log entry and hand the
 *    message to the durable retry queue (due immediately).
 *
 * Notifier failures never escape. Storage errors do: the caller decides
 * how to record them.
 */
export async function deliverAlert(
  ctx: DeliveryContext,
  eventId: number | null,
  message: AlertMessage,
): Promise<DeliveryOutcome> {
  const maxAttempts = Math.max(1, ctx.immediateAttempts);
  let reason = 'no delivery attempted';

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const result = await attemptSend(ctx.notifier, message);

    if (result.ok) {
      await appendDeliveryLog(ctx.db, {
        event_id: eventId,
        recipient: message.recipient,
        subject: message.subject,
        status: 'sent',
        error: null,
        attempt,
        created_at: ctx.clock(),
      });
      ctx.log.info(
        { event_id: eventId, recipient: message.recipient, notifier: ctx.notifier.name, attempt },
        'Alert delivered',
      );
      return { status: 'sent', attempts: attempt };
    }

    reason = result.reason;
    ctx.log.warn(
      { event_id: eventId, recipient: message.recipient, attempt, reason },
      'Alert delivery attempt failed',
    );

    if (attempt < maxAttempts && ctx.immediateDelayMs > 0) {
      await sleep(ctx.immediateDelayMs * attempt);
    }
  }

  const now = ctx.clock();
  await appendDeliveryLog(ctx.db, {
    event_id: eventId,
    recipient: message.recipient,
    subject: message.subject,
    status: 'queued',
    error: reason,
    attempt: maxAttempts,
    created_at: now,
  });
  const entry = await enqueueDelivery(ctx.db, {
    event_id: eventId,
    subject: message.subject,
    body: message.body,
    recipient: message.recipient,
    last_error: reason,
    now,
  });

  ctx.log.warn(
    { event_id: eventId, queue_id: entry.id, attempts: maxAttempts, reason },
    'Alert delivery failed, queued for retry',
  );

  return { status: 'failed', attempts: maxAttempts, error: reason, queue_id: entry.id };
}
