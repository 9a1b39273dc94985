/**
 * Starting score per action name, before payload boosts.
 *
 * Actions not listed here start at `DEFAULT_BASE_SCORE`.
 */
export const ACTION_BASE_SCORES: Readonly<Record<string, number>> = {
  signup: 0.3,
  login: 0.1,
  password_reset: 0.25,
  lead_hot: 0.95,
  client_upgrade: 0.9,
  billing_failure: 0.85,
  suspicious_activity: 0.9,
  api_error: 0.4,
  high_value_action: 0.9,
};

export const DEFAULT_BASE_SCORE = 0.2;

export function baseScoreFor(action: string): number {
  return Object.hasOwn(ACTION_BASE_SCORES, action)
    ? (ACTION_BASE_SCORES[action] ?? DEFAULT_BASE_SCORE)
    : DEFAULT_BASE_SCORE;
}
