import { z } from 'zod';
import { RULE_CONFIG_VERSION } from '../domain/index.js';

/**
 * Schema for the public rule document (GET/PUT /api/v1/rules).
 *
 * Strict: unknown keys are rejected so the document cannot drift
 * into an untyped bag of settings.
 */
export const ruleConfigSchema = z.object({
  score_threshold: z.number().finite().min(0).max(1),
}).strict();

export type RuleConfigInput = z.infer<typeof ruleConfigSchema>;

/** On-disk layout, version 1. */
export const storedRuleConfigSchema = z.object({
  version: z.literal(RULE_CONFIG_VERSION),
  score_threshold: z.number().finite().min(0).max(1),
}).strict();

export type StoredRuleConfig = z.infer<typeof storedRuleConfigSchema>;

/**
 * Unversioned layout written by earlier releases: a bare object whose
 * only meaningful key was `score_threshold`. Other keys are discarded
 * on migration.
 */
export const legacyRuleConfigSchema = z.object({
  score_threshold: z.coerce.number().finite().min(0).max(1).optional(),
}).passthrough();
