export { createDbClient, ensureSchema } from './db/index.js';
export type { Database, DbClient } from './db/index.js';
export { loadEngineConfig } from './config/index.js';
export type { EngineConfig, LogLevel } from './config/index.js';
export { loadNotificationConfig, createNotifier } from './notifications/index.js';
export type { NotificationConfig, Notifier } from './notifications/index.js';
