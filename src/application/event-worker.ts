import type { Logger } from 'pino';
import type { Database } from '../infrastructure/db/index.js';
import { fetchUnprocessedEvents, insertActionRecord, markEventProcessed } from '../infrastructure/db/index.js';
import { scoreEvent, shouldTrigger } from '../domain/index.js';
import type { ActionDetails, Event, RuleConfig, ScorableEvent } from '../domain/index.js';
import { renderAlert } from './alert-message.js';
import type { BroadcastManager } from './broadcast-manager.js';
import type { DeliveryContext } from './delivery.js';
import { deliverAlert } from './delivery.js';
import { sleep } from './sleep.js';

export type WorkerState = 'stopped' | 'idle' | 'draining';

/** Dependencies bundled for the worker. */
export interface EventWorkerDeps {
  db: Database;
  log: Logger;
  rules: { get(): RuleConfig };
  broadcaster: BroadcastManager;
  delivery: DeliveryContext;
  /** Address that receives triggered alerts. */
  recipient: string;
  /** Replaceable for tests; defaults to the built-in heuristic. */
  scorer?: (event: ScorableEvent) => number;
}

export interface EventWorkerOptions {
  pollIntervalMs: number;
  batchSize: number;
}

/**
 * Supervisor for the background loop that drains unprocessed events.
 *
 * Owns exactly one loop task. Each cycle:
 *
 * 1. Fetch up to `batchSize` unprocessed events, oldest first.
 * 2. Score each one. A scoring failure is logged and the event is
 *    treated as not triggered.
 * 3. Mark the event processed.
 * 4. When the score meets the threshold, start the alert task without
 *    awaiting it, so a slow notifier never stalls the batch.
 *
 * An empty batch puts the worker to sleep for `pollIntervalMs`.
 * Storage errors end the cycle; the next one starts after the poll
 * interval.
 */
export class EventWorker {
  private loopTask: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly scorer: (event: ScorableEvent) => number;
  private currentState: WorkerState = 'stopped';

  constructor(
    private readonly deps: EventWorkerDeps,
    private readonly options: EventWorkerOptions,
  ) {
    this.scorer = deps.scorer ?? scoreEvent;
  }

  get state(): WorkerState {
    return this.currentState;
  }

  get pendingAlerts(): number {
    return this.inFlight.size;
  }

  /** Spawns the loop. Returns false when it is already running. */
  start(): boolean {
    if (this.loopTask !== null) {
      this.deps.log.warn('Event worker already running, ignoring start');
      return false;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.currentState = 'idle';
    this.loopTask = this.loop(controller.signal);
    return true;
  }

  /**
   * Graceful drain: the current batch finishes, then every alert task
   * still in flight is awaited.
   */
  async stop(): Promise<void> {
    const task = this.loopTask;
    if (task === null) return;

    this.controller?.abort();
    await task;
    await this.settle();

    this.loopTask = null;
    this.controller = null;
    this.currentState = 'stopped';
  }

  /** Waits until no alert task is in flight. */
  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /**
   * Processes one batch. Returns the number of events fetched.
   * Storage errors propagate to the caller.
   */
  async runCycle(): Promise<number> {
    const batch = await fetchUnprocessedEvents(this.deps.db, this.options.batchSize);
    if (batch.length === 0) return 0;
    if (this.currentState === 'idle') this.currentState = 'draining';

    for (const event of batch) {
      await this.processEvent(event);
    }

    this.deps.log.debug({ count: batch.length }, 'Batch processed');
    return batch.length;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    this.deps.log.info(
      { pollIntervalMs: this.options.pollIntervalMs, batchSize: this.options.batchSize },
      'Event worker started',
    );

    while (!signal.aborted) {
      let fetched = 0;
      try {
        fetched = await this.runCycle();
      } catch (err: unknown) {
        this.deps.log.error({ err }, 'Worker cycle failed, retrying after poll interval');
      }

      if (fetched === 0) {
        this.currentState = 'idle';
        await sleep(this.options.pollIntervalMs, signal);
      }
    }

    this.deps.log.info('Event worker stopped');
  }

  private async processEvent(event: Event): Promise<void> {
    let score: number | null = null;
    try {
      score = this.scorer(event);
    } catch (err: unknown) {
      this.deps.log.error({ err, event_id: event.id, action: event.action }, 'Failed to score event');
    }

    const config = this.deps.rules.get();
    const triggered = score !== null && shouldTrigger(score, config);

    const marked = await markEventProcessed(this.deps.db, event.id);
    if (!marked) {
      this.deps.log.debug({ event_id: event.id }, 'Event already processed, skipping');
      return;
    }

    if (score === null || !triggered) {
      this.deps.log.debug({ event_id: event.id, score }, 'Event scored below threshold');
      return;
    }

    this.deps.log.info(
      { event_id: event.id, action: event.action, score, threshold: config.score_threshold },
      'Event triggered alert',
    );
    this.track(this.runAlert(event, score));
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.finally(() => {
      this.inFlight.delete(task);
    });
  }

  /** Delivers the alert and records the outcome. Never rejects. */
  private async runAlert(event: Event, score: number): Promise<void> {
    const { recipient } = this.deps;
    let details: ActionDetails;

    try {
      const outcome = await deliverAlert(this.deps.delivery, event.id, renderAlert(event, score, recipient));
      details = outcome.status === 'sent'
        ? { status: 'sent', recipient, score }
        : { status: 'failed', recipient, score, error: outcome.error, queue_id: outcome.queue_id };
    } catch (err: unknown) {
      this.deps.log.error({ err, event_id: event.id }, 'Alert delivery path failed');
      details = { status: 'failed', recipient, score, error: err instanceof Error ? err.message : String(err) };
    }

    try {
      const record = await insertActionRecord(this.deps.db, {
        event_id: event.id,
        action_type: 'email_alert',
        details,
        timestamp: this.deps.delivery.clock(),
      });
      this.deps.broadcaster.broadcast({ type: 'action', payload: record });
    } catch (err: unknown) {
      this.deps.log.error({ err, event_id: event.id }, 'Failed to record action');
    }
  }
}
