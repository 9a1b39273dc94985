import { mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import writeFileAtomic from 'write-file-atomic';
import type { Logger } from 'pino';
import { RULE_CONFIG_VERSION } from '../domain/index.js';
import type { RuleConfig } from '../domain/index.js';
import { legacyRuleConfigSchema, storedRuleConfigSchema } from './rule-config-schema.js';
import type { StoredRuleConfig } from './rule-config-schema.js';

/** Raised when the rule document exists but cannot be understood. */
export class RuleConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuleConfigError';
  }
}

/**
 * Migrates any known on-disk layout to the current rule config.
 *
 * Returns `migrated: true` when the document was not already in the
 * current layout and should be rewritten.
 */
export function migrateRuleDocument(
  raw: unknown,
  defaults: RuleConfig,
): { config: RuleConfig; migrated: boolean } {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new RuleConfigError('Rule document must be a JSON object');
  }

  if (!('version' in raw)) {
    const legacy = legacyRuleConfigSchema.safeParse(raw);
    if (!legacy.success) {
      throw new RuleConfigError('Invalid unversioned rule document', { cause: legacy.error });
    }
    return {
      config: { score_threshold: legacy.data.score_threshold ?? defaults.score_threshold },
      migrated: true,
    };
  }

  if (raw.version !== RULE_CONFIG_VERSION) {
    throw new RuleConfigError(`Unsupported rule document version: ${String(raw.version)}`);
  }

  const current = storedRuleConfigSchema.safeParse(raw);
  if (!current.success) {
    throw new RuleConfigError('Invalid rule document', { cause: current.error });
  }
  return {
    config: { score_threshold: current.data.score_threshold },
    migrated: false,
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Persistent rule document with an in-memory snapshot.
 *
 * The worker calls `get()` on every evaluation. Updates go through
 * `save()`, which writes the file atomically (temp file + rename) and
 * only then swaps the snapshot. `get()` therefore never observes a
 * config that failed to persist, and never a partially updated one.
 */
export class RuleConfigStore {
  private current: RuleConfig;

  constructor(
    private readonly filePath: string,
    private readonly defaults: RuleConfig,
    private readonly log: Logger,
  ) {
    this.current = defaults;
  }

  /** Returns the current snapshot. O(1), no copy. */
  get(): RuleConfig {
    return this.current;
  }

  /**
   * Reads the document from disk, creating it with defaults when the
   * file does not exist and rewriting it when it needed migration.
   */
  async load(): Promise<RuleConfig> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err: unknown) {
      if (!isMissingFile(err)) throw err;

      this.log.info({ path: this.filePath }, 'Rule document not found, writing defaults');
      return this.save(this.defaults);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err: unknown) {
      throw new RuleConfigError(`Rule document at ${this.filePath} is not valid JSON`, { cause: err });
    }

    const { config, migrated } = migrateRuleDocument(raw, this.defaults);
    if (migrated) {
      this.log.info({ path: this.filePath, version: RULE_CONFIG_VERSION }, 'Migrated rule document');
      return this.save(config);
    }

    this.current = config;
    this.log.info({ rules: config }, 'Rule document loaded');
    return config;
  }

  /** Atomically replaces the persisted document, then the snapshot. */
  async save(next: RuleConfig): Promise<RuleConfig> {
    const stored: StoredRuleConfig = {
      version: RULE_CONFIG_VERSION,
      score_threshold: next.score_threshold,
    };

    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFileAtomic(this.filePath, `${JSON.stringify(stored, null, 2)}\n`);

    const snapshot: RuleConfig = { score_threshold: next.score_threshold };
    this.current = snapshot;
    return snapshot;
  }
}
