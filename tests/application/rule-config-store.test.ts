import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { RuleConfigError, RuleConfigStore, migrateRuleDocument } from '../../src/application/rule-config-store.js';
import { fakeLogger } from '../helpers.js';

const DEFAULTS = { score_threshold: 0.8 };

describe('migrateRuleDocument', () => {
  it('accepts the current layout unchanged', () => {
    expect(migrateRuleDocument({ version: 1, score_threshold: 0.4 }, DEFAULTS)).toEqual({
      config: { score_threshold: 0.4 },
      migrated: false,
    });
  });

  it('migrates the unversioned layout', () => {
    expect(migrateRuleDocument({ score_threshold: 0.6, legacy_flag: true }, DEFAULTS)).toEqual({
      config: { score_threshold: 0.6 },
      migrated: true,
    });
  });

  it('coerces numeric strings in the unversioned layout', () => {
    expect(migrateRuleDocument({ score_threshold: '0.7' }, DEFAULTS).config).toEqual({ score_threshold: 0.7 });
  });

  it('fills a missing threshold from the defaults when migrating', () => {
    expect(migrateRuleDocument({}, DEFAULTS).config).toEqual({ score_threshold: 0.8 });
  });

  it('rejects unknown versions', () => {
    expect(() => migrateRuleDocument({ version: 2, score_threshold: 0.5 }, DEFAULTS)).toThrow(
      'Unsupported rule document version: 2',
    );
  });

  it('rejects non-object documents', () => {
    expect(() => migrateRuleDocument([0.5], DEFAULTS)).toThrow(RuleConfigError);
    expect(() => migrateRuleDocument(null, DEFAULTS)).toThrow(RuleConfigError);
  });

  it('rejects an out-of-range threshold', () => {
    expect(() => migrateRuleDocument({ version: 1, score_threshold: 1.5 }, DEFAULTS)).toThrow('Invalid rule document');
  });
});

describe('RuleConfigStore', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rules-'));
    path = join(dir, 'nested', 'rules.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('get() returns the defaults before load', () => {
    const store = new RuleConfigStore(path, DEFAULTS, fakeLogger());
    expect(store.get()).toEqual({ score_threshold: 0.8 });
  });

  it('load() writes the defaults when the file is missing', async () => {
    const store = new RuleConfigStore(path, DEFAULTS, fakeLogger());

    expect(await store.load()).toEqual({ score_threshold: 0.8 });
    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({ version: 1, score_threshold: 0.8 });
  });

  it('save() persists and swaps the snapshot', async () => {
    const store = new RuleConfigStore(path, DEFAULTS, fakeLogger());
    await store.save({ score_threshold: 0.5 });

    expect(store.get()).toEqual({ score_threshold: 0.5 });
    expect(readFileSync(path, 'utf-8')).toBe('{\n  "version": 1,\n  "score_threshold": 0.5\n}\n');
  });

  it('a second store reads what the first one saved', async () => {
    await new RuleConfigStore(path, DEFAULTS, fakeLogger()).save({ score_threshold: 0.35 });

    const reopened = new RuleConfigStore(path, DEFAULTS, fakeLogger());
    expect(await reopened.load()).toEqual({ score_threshold: 0.35 });
    expect(reopened.get()).toEqual({ score_threshold: 0.35 });
  });

  it('load() rewrites an unversioned document in the current layout', async () => {
    const legacyPath = join(dir, 'rules.json');
    writeFileSync(legacyPath, JSON.stringify({ score_threshold: 0.65 }));

    const store = new RuleConfigStore(legacyPath, DEFAULTS, fakeLogger());
    expect(await store.load()).toEqual({ score_threshold: 0.65 });
    expect(JSON.parse(readFileSync(legacyPath, 'utf-8'))).toEqual({ version: 1, score_threshold: 0.65 });
  });

  it('load() rejects a document that is not JSON and keeps the snapshot', async () => {
    const brokenPath = join(dir, 'rules.json');
    writeFileSync(brokenPath, '{ not json');

    const store = new RuleConfigStore(brokenPath, DEFAULTS, fakeLogger());
    await expect(store.load()).rejects.toThrow(RuleConfigError);
    expect(store.get()).toEqual({ score_threshold: 0.8 });
  });

  it('replaces the snapshot wholesale', async () => {
    const store = new RuleConfigStore(path, DEFAULTS, fakeLogger());
    const before = store.get();
    await store.save({ score_threshold: 0.1 });

    expect(before).toEqual({ score_threshold: 0.8 });
    expect(store.get()).not.toBe(before);
  });
});
