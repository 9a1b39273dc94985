export type { Event, EventPayload, NewEvent, ActionRecord, ActionDetails, ActionType } from './event.js';
export type {
  AlertMessage,
  DeliveryResult,
  DeliveryLogEntry,
  DeliveryLogStatus,
  DeliveryQueueEntry,
} from './delivery.js';
export type { RuleConfig } from './rule-config.js';
export { RULE_CONFIG_VERSION } from './rule-config.js';
export { scoreEvent, shouldTrigger, extractSignals, baseScoreFor } from './scoring/index.js';
export type { PayloadSignals, ScorableEvent } from './scoring/index.js';
