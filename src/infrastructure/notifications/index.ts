import type { Logger } from 'pino';
import type { NotificationConfig } from './config.js';
import type { Notifier } from './notifier.js';
import { createWebhookNotifier } from './webhook.js';
import { createLogNotifier } from './log-notifier.js';

export { loadNotificationConfig, DEFAULT_CONFIG } from './config.js';
export type { NotificationConfig } from './config.js';
export type { Notifier } from './notifier.js';
export { createWebhookNotifier } from './webhook.js';
export { createLogNotifier } from './log-notifier.js';

/**
 * Picks the alert transport from config: the webhook when enabled with
 * a URL, otherwise the log notifier.
 */
export function createNotifier(config: NotificationConfig, log: Logger): Notifier {
  if (config.webhook.enabled) {
    if (config.webhook.url) {
      return createWebhookNotifier(config.webhook, log);
    }
    log.warn('Webhook enabled but url is empty, falling back to log notifier');
  }
  return createLogNotifier(log);
}
