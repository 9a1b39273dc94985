export { events, actions, deliveryLog, deliveryQueue } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient } from './client.js';
export { ensureSchema } from './migrate.js';
export {
  insertEvent,
  fetchUnprocessedEvents,
  markEventProcessed,
  fetchRecentEvents,
  findEventById,
} from './event-repository.js';
export { insertActionRecord, fetchRecentActions, findActionsByEventId } from './action-repository.js';
export type { NewActionRecord } from './action-repository.js';
export { appendDeliveryLog, fetchDeliveryLog, fetchDeliveryLogForEvent } from './delivery-log-repository.js';
export type { NewDeliveryLogEntry } from './delivery-log-repository.js';
export {
  enqueueDelivery,
  findDueDeliveries,
  findDeliveryById,
  listDeliveryQueue,
  recordDeliveryFailure,
  markDeadLettered,
  resetDelivery,
  deleteDelivery,
} from './delivery-queue-repository.js';
export type { NewDeliveryQueueEntry, ObservedQueueState } from './delivery-queue-repository.js';
