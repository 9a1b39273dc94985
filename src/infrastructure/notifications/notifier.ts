import type { AlertMessage, DeliveryResult } from '../../domain/index.js';

/**
 * Outbound alert transport.
 *
 * Implementations report failure through the result value. The delivery
 * path still guards against implementations that throw.
 */
export interface Notifier {
  readonly name: string;
  send(message: AlertMessage): Promise<DeliveryResult>;
}
