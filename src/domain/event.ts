/**
 * Core domain types for the event intelligence engine.
 *
 * These types define the canonical records the engine stores and
 * streams. They carry no framework dependencies. All timestamps are
 * floating-point seconds since the Unix epoch.
 */

/** Free-form key/value metadata attached to an event. */
export type EventPayload = Record<string, unknown>;

/**
 * Canonical Event entity.
 *
 * `id` is assigned by the store on insert. `processed` flips to true
 * exactly once, when the worker has evaluated the event.
 */
export interface Event {
  readonly id: number;
  readonly user: string | null;
  readonly action: string;
  readonly payload: EventPayload | null;
  readonly timestamp: number;
  readonly processed: boolean;
}

/** Fields accepted by the store when recording a new event. */
export interface NewEvent {
  readonly user: string | null;
  readonly action: string;
  readonly payload: EventPayload | null;
  readonly timestamp: number;
}

export type ActionType = 'email_alert';

/** Outcome of acting on a triggered event. */
export interface ActionDetails {
  readonly status: 'sent' | 'failed';
  readonly recipient: string;
  readonly score: number;
  readonly error?: string;
  readonly queue_id?: number;
}

/** Append-only audit record written once per triggering event. */
export interface ActionRecord {
  readonly id: number;
  readonly event_id: number;
  readonly action_type: ActionType;
  readonly details: ActionDetails;
  readonly timestamp: number;
}
