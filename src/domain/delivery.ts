/** Rendered alert handed to a Notifier. */
export interface AlertMessage {
  readonly subject: string;
  readonly body: string;
  readonly recipient: string;
}

/**
 * Result of a single Notifier call.
 *
 * Notifiers report failure as a value. The delivery path also converts
 * thrown errors into `{ ok: false }` so callers only branch on this union.
 */
export type DeliveryResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

export type DeliveryLogStatus = 'sent' | 'failed' | 'queued' | 'dead_lettered';

/** Immutable audit record of a delivery attempt. */
export interface DeliveryLogEntry {
  readonly id: number;
  readonly event_id: number | null;
  readonly recipient: string;
  readonly subject: string;
  readonly status: DeliveryLogStatus;
  readonly error: string | null;
  readonly attempt: number;
  readonly created_at: number;
}

/**
 * A notification waiting for (another) delivery attempt.
 *
 * `dead_lettered_at` is set once the entry exhausted its attempts; such
 * entries stay visible for operators but are never scanned again.
 */
export interface DeliveryQueueEntry {
  readonly id: number;
  readonly event_id: number | null;
  readonly subject: string;
  readonly body: string;
  readonly recipient: string;
  readonly attempts: number;
  readonly next_retry_at: number;
  readonly created_at: number;
  readonly last_error: string | null;
  readonly dead_lettered_at: number | null;
}
