export { ACTION_BASE_SCORES, DEFAULT_BASE_SCORE, baseScoreFor } from './base-scores.js';
export { extractSignals, NO_SIGNALS } from './signals.js';
export type { PayloadSignals } from './signals.js';
export { scoreEvent, shouldTrigger } from './score.js';
export type { ScorableEvent } from './score.js';
