import type { Logger } from 'pino';
import type { Database } from '../infrastructure/db/index.js';
import type { EngineConfig } from '../infrastructure/config/index.js';
import type { Notifier } from '../infrastructure/notifications/index.js';
import { BroadcastManager } from './broadcast-manager.js';
import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import type { DeliveryContext } from './delivery.js';
import { EventWorker } from './event-worker.js';
import type { EventWorkerDeps } from './event-worker.js';
import { RetryScheduler } from './retry-scheduler.js';
import { RuleConfigStore } from './rule-config-store.js';

export interface EngineDeps {
  config: EngineConfig;
  db: Database;
  log: Logger;
  notifier: Notifier;
  /** Address that receives triggered and test alerts. */
  recipient: string;
  clock?: Clock;
  scorer?: EventWorkerDeps['scorer'];
}

/**
 * Explicit wiring of every engine component.
 *
 * Nothing here is module-global: each call builds an independent engine,
 * which is how tests run several against separate databases.
 */
export interface Engine {
  readonly db: Database;
  readonly log: Logger;
  readonly clock: Clock;
  readonly recipient: string;
  readonly rules: RuleConfigStore;
  readonly broadcaster: BroadcastManager;
  readonly delivery: DeliveryContext;
  readonly worker: EventWorker;
  readonly retries: RetryScheduler;
  /** Loads the rule document, then starts the worker and retry scheduler. */
  start(): Promise<void>;
  /** Drains the worker, stops the scheduler and closes stream observers. */
  stop(): Promise<void>;
}

export function createEngine(deps: EngineDeps): Engine {
  const { config, db, log, notifier, recipient } = deps;
  const clock = deps.clock ?? systemClock;

  const rules = new RuleConfigStore(
    config.rulesPath,
    { score_threshold: config.defaultScoreThreshold },
    log.child({ component: 'rules' }),
  );
  const broadcaster = new BroadcastManager(log.child({ component: 'broadcast' }), clock);

  const delivery: DeliveryContext = {
    db,
    notifier,
    log: log.child({ component: 'delivery' }),
    clock,
    immediateAttempts: config.delivery.immediateAttempts,
    immediateDelayMs: config.delivery.immediateDelayMs,
  };

  const worker = new EventWorker(
    {
      db,
      log: log.child({ component: 'worker' }),
      rules,
      broadcaster,
      delivery,
      recipient,
      ...(deps.scorer ? { scorer: deps.scorer } : {}),
    },
    config.worker,
  );

  const retries = new RetryScheduler(
    {
      db,
      notifier,
      log: log.child({ component: 'retry' }),
      clock,
      policy: {
        maxAttempts: config.retry.maxAttempts,
        maxBackoffSeconds: config.retry.maxBackoffSeconds,
      },
      batchSize: config.retry.batchSize,
    },
    config.retry.intervalMs,
  );

  return {
    db,
    log,
    clock,
    recipient,
    rules,
    broadcaster,
    delivery,
    worker,
    retries,

    async start(): Promise<void> {
      await rules.load();
      worker.start();
      retries.start();
      log.info({ notifier: notifier.name, recipient }, 'Engine started');
    },

    async stop(): Promise<void> {
      await worker.stop();
      await retries.stop();
      broadcaster.closeAll('server_shutdown');
      log.info('Engine stopped');
    },
  };
}
