import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createEngine, ingestEvent } from '../../src/application/index.js';
import { loadEngineConfig } from '../../src/infrastructure/config/index.js';
import { fetchRecentActions, fetchUnprocessedEvents } from '../../src/infrastructure/db/index.js';
import { createTestDb, fakeClock, fakeLogger, scriptedNotifier } from '../helpers.js';

describe('createEngine', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  function setup(env: Record<string, string> = {}) {
    const dir = mkdtempSync(join(tmpdir(), 'engine-'));
    dirs.push(dir);
    const client = createTestDb();
    const notifier = scriptedNotifier([{ ok: true }]);
    const engine = createEngine({
      config: loadEngineConfig({ DATA_DIR: dir, POLL_INTERVAL_MS: '5', RETRY_INTERVAL_MS: '5', ...env }),
      db: client.db,
      log: fakeLogger(),
      notifier,
      recipient: 'ops@example.com',
      clock: fakeClock(),
    });
    return { dir, client, engine, notifier };
  }

  it('start() writes the default rule document from config', async () => {
    const { dir, client, engine } = setup({ SCORE_THRESHOLD: '0.7' });

    await engine.start();
    await engine.stop();

    expect(engine.rules.get()).toEqual({ score_threshold: 0.7 });
    expect(JSON.parse(readFileSync(join(dir, 'rules.json'), 'utf-8'))).toEqual({ version: 1, score_threshold: 0.7 });
    client.sqlite.close();
  });

  it('processes ingested events in the background until stopped', async () => {
    const { client, engine, notifier } = setup();
    await engine.start();

    await ingestEvent(
      { db: engine.db, broadcaster: engine.broadcaster, clock: engine.clock },
      { action: 'suspicious_activity', payload: { suspected: true } },
    );

    await vi.waitFor(async () => {
      expect(await fetchRecentActions(client.db, 10)).toHaveLength(1);
    });
    await engine.stop();

    expect(await fetchUnprocessedEvents(client.db, 10)).toEqual([]);
    expect(notifier.sent[0]?.subject).toBe('Alert: suspicious_activity (score=1.00)');
    expect(engine.worker.state).toBe('stopped');
    expect(engine.retries.running).toBe(false);
    client.sqlite.close();
  });
});
