import type { EventPayload } from '../event.js';

/**
 * Typed view over the payload fields that influence scoring.
 *
 * The payload itself stays an open map; this view only admits values of
 * the expected shape. Anything else reads as absent.
 */
export interface PayloadSignals {
  /** Monetary or magnitude value. Only finite numbers above -1 are kept (log1p domain). */
  readonly value: number | null;
  readonly priority: string | null;
  readonly suspected: boolean;
  /** Repeat count. Only integers are kept. */
  readonly occurrences: number | null;
}

export const NO_SIGNALS: PayloadSignals = {
  value: null,
  priority: null,
  suspected: false,
  occurrences: null,
};

export function extractSignals(payload: EventPayload | null | undefined): PayloadSignals {
  if (payload === null || payload === undefined) return NO_SIGNALS;

  const { value, priority, suspected, occurrences } = payload;

  return {
    value: typeof value === 'number' && Number.isFinite(value) && value > -1 ? value : null,
    priority: typeof priority === 'string' ? priority : null,
    suspected: suspected === true,
    occurrences: typeof occurrences === 'number' && Number.isInteger(occurrences) ? occurrences : null,
  };
}
