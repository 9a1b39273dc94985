import type { Logger } from 'pino';
import type { Database } from '../infrastructure/db/index.js';
import {
  appendDeliveryLog,
  deleteDelivery,
  findDueDeliveries,
  markDeadLettered,
  recordDeliveryFailure,
} from '../infrastructure/db/index.js';
import type { Notifier } from '../infrastructure/notifications/index.js';
import type { DeliveryQueueEntry } from '../domain/index.js';
import type { Clock } from './clock.js';
import { attemptSend } from './delivery.js';
import { sleep } from './sleep.js';

export interface RetryPolicy {
  /** Attempts made from the queue before an entry is dead-lettered. */
  maxAttempts: number;
  /** Ceiling for the exponential delay. */
  maxBackoffSeconds: number;
}

export interface RetryContext {
  db: Database;
  notifier: Notifier;
  log: Logger;
  clock: Clock;
  policy: RetryPolicy;
  batchSize: number;
}

export interface RetrySweepResult {
  sent: number;
  failed: number;
  deadLettered: number;
}

/** Delay before the next retry: 2^attempts seconds, capped. */
export function computeBackoffSeconds(attempts: number, policy: RetryPolicy): number {
  return Math.min(2 ** attempts, policy.maxBackoffSeconds);
}

type RetryOutcome = keyof RetrySweepResult;

/**
 * Retries one entry and records the result.
 *
 * A success removes the entry even if it was reset or deleted during the
 * send, since the alert went out. A failure is only written while the
 * entry still matches the snapshot; otherwise `null` is returned and
 * nothing is logged.
 */
async function retryEntry(ctx: RetryContext, entry: DeliveryQueueEntry): Promise<RetryOutcome | null> {
  const result = await attemptSend(ctx.notifier, {
    subject: entry.subject,
    body: entry.body,
    recipient: entry.recipient,
  });
  const attempts = entry.attempts + 1;
  const now = ctx.clock();

  if (result.ok) {
    await deleteDelivery(ctx.db, entry.id);
    await appendDeliveryLog(ctx.db, {
      event_id: entry.event_id,
      recipient: entry.recipient,
      subject: entry.subject,
      status: 'sent',
      error: null,
      attempt: attempts,
      created_at: now,
    });
    ctx.log.info({ queue_id: entry.id, event_id: entry.event_id, attempts }, 'Queued alert delivered');
    return 'sent';
  }

  if (attempts >= ctx.policy.maxAttempts) {
    const retired = await markDeadLettered(ctx.db, entry.id, entry, {
      attempts,
      last_error: result.reason,
      dead_lettered_at: now,
    });
    if (!retired) {
      ctx.log.info({ queue_id: entry.id }, 'Queue entry changed during retry, leaving it as is');
      return null;
    }
    await appendDeliveryLog(ctx.db, {
      event_id: entry.event_id,
      recipient: entry.recipient,
      subject: entry.subject,
      status: 'dead_lettered',
      error: result.reason,
      attempt: attempts,
      created_at: now,
    });
    ctx.log.error(
      { queue_id: entry.id, event_id: entry.event_id, attempts, reason: result.reason },
      'Queued alert dead-lettered after max attempts',
    );
    return 'deadLettered';
  }

  const nextRetryAt = now + computeBackoffSeconds(attempts, ctx.policy);
  const rescheduled = await recordDeliveryFailure(ctx.db, entry.id, entry, {
    attempts,
    next_retry_at: nextRetryAt,
    last_error: result.reason,
  });
  if (!rescheduled) {
    ctx.log.info({ queue_id: entry.id }, 'Queue entry changed during retry, leaving it as is');
    return null;
  }
  await appendDeliveryLog(ctx.db, {
    event_id: entry.event_id,
    recipient: entry.recipient,
    subject: entry.subject,
    status: 'failed',
    error: result.reason,
    attempt: attempts,
    created_at: now,
  });
  ctx.log.warn(
    { queue_id: entry.id, event_id: entry.event_id, attempts, next_retry_at: nextRetryAt, reason: result.reason },
    'Queued alert retry failed',
  );
  return 'failed';
}

/**
 * One scan of the retry queue.
 *
 * Each due entry is retried once. Entries are isolated from each other:
 * a storage error on one entry is logged and the sweep moves on.
 */
export async function processDueDeliveries(ctx: RetryContext): Promise<RetrySweepResult> {
  const due = await findDueDeliveries(ctx.db, ctx.clock(), ctx.batchSize);
  const summary: RetrySweepResult = { sent: 0, failed: 0, deadLettered: 0 };

  for (const entry of due) {
    try {
      const outcome = await retryEntry(ctx, entry);
      if (outcome !== null) summary[outcome]++;
    } catch (err: unknown) {
      ctx.log.error({ err, queue_id: entry.id }, 'Failed to process queued delivery');
    }
  }

  if (due.length > 0) {
    ctx.log.debug({ due: due.length, ...summary }, 'Retry sweep completed');
  }
  return summary;
}

/**
 * Background task that sweeps the retry queue on a fixed interval.
 *
 * Owns a single task handle; `start()` on a running scheduler is refused.
 */
export class RetryScheduler {
  private task: Promise<void> | null = null;
  private controller: AbortController | null = null;

  constructor(
    private readonly ctx: RetryContext,
    private readonly intervalMs: number,
  ) {}

  get running(): boolean {
    return this.task !== null;
  }

  start(): boolean {
    if (this.task !== null) {
      this.ctx.log.warn('Retry scheduler already running, ignoring start');
      return false;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.task = this.loop(controller.signal);
    return true;
  }

  /** Stops after the sweep in progress (if any) completes. */
  async stop(): Promise<void> {
    const task = this.task;
    if (task === null) return;

    this.controller?.abort();
    await task;
    this.task = null;
    this.controller = null;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    this.ctx.log.info({ intervalMs: this.intervalMs }, 'Retry scheduler started');

    while (!signal.aborted) {
      await sleep(this.intervalMs, signal);
      if (signal.aborted) break;

      try {
        await processDueDeliveries(this.ctx);
      } catch (err: unknown) {
        this.ctx.log.error({ err }, 'Retry sweep failed');
      }
    }

    this.ctx.log.info('Retry scheduler stopped');
  }
}
