/**
 * Tunable trigger parameters.
 *
 * Replaced wholesale on update; never mutated field by field.
 */
export interface RuleConfig {
  /** Minimum score (inclusive) at which an event triggers an alert. */
  readonly score_threshold: number;
}

/** Current on-disk layout version of the rule document. */
export const RULE_CONFIG_VERSION = 1;
