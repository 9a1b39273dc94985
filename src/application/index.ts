export { eventSchema } from './event-schema.js';
export type { EventInput } from './event-schema.js';
export { ruleConfigSchema } from './rule-config-schema.js';
export type { RuleConfigInput } from './rule-config-schema.js';
export { RuleConfigStore, RuleConfigError, migrateRuleDocument } from './rule-config-store.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { renderAlert } from './alert-message.js';
export { attemptSend, deliverAlert } from './delivery.js';
export type { DeliveryContext, DeliveryOutcome } from './delivery.js';
export { RetryScheduler, processDueDeliveries, computeBackoffSeconds } from './retry-scheduler.js';
export type { RetryContext, RetryPolicy, RetrySweepResult } from './retry-scheduler.js';
export { BroadcastManager } from './broadcast-manager.js';
export type { StreamMessage, ObserverChannel, SendResult, BroadcastResult, BroadcastStats } from './broadcast-manager.js';
export { EventWorker } from './event-worker.js';
export type { EventWorkerDeps, EventWorkerOptions, WorkerState } from './event-worker.js';
export { ingestEvent } from './ingest-event.js';
export { getIntelSnapshot, clampLimit } from './query-intel.js';
export type { IntelSnapshot } from './query-intel.js';
export { listQueue, forceRetry, removeQueued, readDeliveryLog, sendTestAlert } from './manage-deliveries.js';
export { createEngine } from './engine.js';
export type { Engine, EngineDeps } from './engine.js';
