import type { Event } from '../event.js';
import type { RuleConfig } from '../rule-config.js';
import { baseScoreFor } from './base-scores.js';
import { extractSignals } from './signals.js';

const MAX_VALUE_BOOST = 0.25;
const HIGH_PRIORITY_BOOST = 0.15;
const SUSPECTED_BOOST = 0.2;
const MAX_FREQUENCY_BOOST = 0.25;
const FREQUENCY_STEP = 0.05;

/** Only the fields scoring reads; lets callers score before an id exists. */
export type ScorableEvent = Pick<Event, 'action' | 'payload'>;

/**
 * Heuristic importance score in [0, 1].
 *
 * base(action)
 *   + min(0.25, log1p(value) / 10)
 *   + 0.15 if priority is "high"
 *   + 0.20 if suspected is true
 *   + min(0.25, occurrences * 0.05) if occurrences > 1
 * clamped to [0, 1].
 *
 * Pure function: no I/O, no clock, deterministic for a given event.
 */
export function scoreEvent(event: ScorableEvent): number {
  const signals = extractSignals(event.payload);
  let score = baseScoreFor(event.action);

  if (signals.value !== null) {
    score += Math.min(MAX_VALUE_BOOST, Math.log1p(signals.value) / 10);
  }
  if (signals.priority === 'high') {
    score += HIGH_PRIORITY_BOOST;
  }
  if (signals.suspected) {
    score += SUSPECTED_BOOST;
  }
  if (signals.occurrences !== null && signals.occurrences > 1) {
    score += Math.min(MAX_FREQUENCY_BOOST, signals.occurrences * FREQUENCY_STEP);
  }

  return Math.max(0, Math.min(1, score));
}

export function shouldTrigger(score: number, config: RuleConfig): boolean {
  return score >= config.score_threshold;
}
