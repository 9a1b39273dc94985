import type { Logger } from 'pino';
import type { NotificationConfig } from './config.js';
import type { Notifier } from './notifier.js';
import type { AlertMessage, DeliveryResult } from '../../domain/index.js';

/**
 * Notifier that POSTs alerts as JSON to a webhook URL.
 *
 * Any non-2xx status, network error or timeout is reported as a failed
 * delivery so the caller can queue a retry.
 */
export function createWebhookNotifier(
  config: NotificationConfig['webhook'],
  log: Logger,
): Notifier {
  return {
    name: 'webhook',

    async send(message: AlertMessage): Promise<DeliveryResult> {
      try {
        const response = await fetch(config.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            recipient: message.recipient,
            subject: message.subject,
            body: message.body,
            text: `*${message.subject}*\n${message.body}`,
          }),
          signal: AbortSignal.timeout(config.timeout_ms),
        });

        if (!response.ok) {
          log.warn(
            { status: response.status, recipient: message.recipient },
            'Webhook returned non-OK status',
          );
          return { ok: false, reason: `webhook responded with HTTP ${response.status}` };
        }

        log.info({ recipient: message.recipient, subject: message.subject }, 'Webhook alert sent');
        return { ok: true };
      } catch (err: unknown) {
        log.warn({ err, recipient: message.recipient }, 'Failed to send webhook alert');
        return { ok: false, reason: err instanceof Error ? err.message : String(err) };
      }
    },
  };
}
