import type { Database } from '../infrastructure/db/index.js';
import { fetchRecentActions, fetchRecentEvents } from '../infrastructure/db/index.js';
import type { ActionRecord, Event, RuleConfig } from '../domain/index.js';
import type { Clock } from './clock.js';

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 500;

export interface IntelSnapshot {
  events: Event[];
  actions: ActionRecord[];
  rules: RuleConfig;
  now: number;
}

export function clampLimit(limit: number | undefined, fallback: number, max: number = MAX_LIMIT): number {
  return Math.min(Math.max(limit ?? fallback, 1), max);
}

/**
 * Use case: recent events and actions (newest first) with the active
 * rule config. Clamps limit to [1, 500], defaults to 100.
 */
export async function getIntelSnapshot(
  db: Database,
  rules: RuleConfig,
  clock: Clock,
  limit?: number,
): Promise<IntelSnapshot> {
  const n = clampLimit(limit, DEFAULT_LIMIT);
  const [events, actions] = await Promise.all([fetchRecentEvents(db, n), fetchRecentActions(db, n)]);

  return { events, actions, rules, now: clock() };
}
