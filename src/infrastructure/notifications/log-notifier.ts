import type { Logger } from 'pino';
import type { Notifier } from './notifier.js';
import type { AlertMessage, DeliveryResult } from '../../domain/index.js';

/**
 * Notifier that writes the alert to the structured log.
 *
 * Used when no outbound transport is configured. Always succeeds.
 */
export function createLogNotifier(log: Logger): Notifier {
  return {
    name: 'log',

    async send(message: AlertMessage): Promise<DeliveryResult> {
      log.info(
        {
          recipient: message.recipient,
          subject: message.subject,
          body: message.body,
        },
        'Alert notification (log transport)',
      );
      return { ok: true };
    },
  };
}
