import { z } from 'zod';

/**
 * Zod schema for validating an inbound event.
 *
 * - `action` is the only required field.
 * - `timestamp` is seconds since epoch; assigned by the handler if absent.
 * - `payload` is an open-ended object so any event type can carry
 *   its own metadata without a schema per action.
 */
export const eventSchema = z.object({
  user: z.string().max(255).nullish(),
  action: z.string().trim().min(1).max(255),
  payload: z.record(z.string(), z.unknown()).nullish(),
  timestamp: z.number().finite().nonnegative().nullish(),
});

/** Inferred type representing a validated event body (no id yet). */
export type EventInput = z.infer<typeof eventSchema>;
