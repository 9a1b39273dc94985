import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  RetryScheduler,
  computeBackoffSeconds,
  processDueDeliveries,
} from '../../src/application/retry-scheduler.js';
import type { RetryContext } from '../../src/application/retry-scheduler.js';
import { forceRetry, removeQueued } from '../../src/application/manage-deliveries.js';
import {
  enqueueDelivery,
  fetchDeliveryLog,
  fetchDeliveryLogForEvent,
  findDeliveryById,
  listDeliveryQueue,
  recordDeliveryFailure,
} from '../../src/infrastructure/db/index.js';
import type { DbClient } from '../../src/infrastructure/db/index.js';
import type { Notifier } from '../../src/infrastructure/notifications/index.js';
import { createTestDb, fakeClock, fakeLogger, scriptedNotifier } from '../helpers.js';

const POLICY = { maxAttempts: 8, maxBackoffSeconds: 3600 };

describe('computeBackoffSeconds', () => {
  it('doubles with each attempt', () => {
    expect([1, 2, 3, 4].map((n) => computeBackoffSeconds(n, POLICY))).toEqual([2, 4, 8, 16]);
  });

  it('is capped by maxBackoffSeconds', () => {
    expect(computeBackoffSeconds(20, POLICY)).toBe(3600);
  });
});

describe('processDueDeliveries', () => {
  let client: DbClient;
  let clock: ReturnType<typeof fakeClock>;

  function context(notifier: Notifier, policy = POLICY): RetryContext {
    return { db: client.db, notifier, log: fakeLogger(), clock, policy, batchSize: 10 };
  }

  async function enqueue(subject = 'Alert'): Promise<number> {
    const entry = await enqueueDelivery(client.db, {
      event_id: 1,
      subject,
      body: 'body',
      recipient: 'ops@example.com',
      last_error: 'initial failure',
      now: clock(),
    });
    return entry.id;
  }

  beforeEach(() => {
    client = createTestDb();
    clock = fakeClock(1_000);
  });

  afterEach(() => {
    client.sqlite.close();
  });

  it('does nothing when no entry is due', async () => {
    const notifier = scriptedNotifier([{ ok: true }]);
    expect(await processDueDeliveries(context(notifier))).toEqual({ sent: 0, failed: 0, deadLettered: 0 });
    expect(notifier.sent).toHaveLength(0);
  });

  it('fail, fail, succeed: logs failed, failed, sent and removes the entry', async () => {
    const notifier = scriptedNotifier([
      { ok: false, reason: 'down' },
      { ok: false, reason: 'still down' },
      { ok: true },
    ]);
    const ctx = context(notifier);
    const id = await enqueue();
    const retryTimes: number[] = [];

    await processDueDeliveries(ctx);
    retryTimes.push((await findDeliveryById(client.db, id))?.next_retry_at ?? -1);

    clock.set(retryTimes[0] ?? 0);
    await processDueDeliveries(ctx);
    retryTimes.push((await findDeliveryById(client.db, id))?.next_retry_at ?? -1);

    clock.set(retryTimes[1] ?? 0);
    const last = await processDueDeliveries(ctx);

    expect(retryTimes).toEqual([1_002, 1_006]);
    expect(last).toEqual({ sent: 1, failed: 0, deadLettered: 0 });
    expect(await listDeliveryQueue(client.db)).toEqual([]);

    const log = await fetchDeliveryLogForEvent(client.db, 1);
    expect(log.map((e) => [e.status, e.attempt, e.error])).toEqual([
      ['failed', 1, 'down'],
      ['failed', 2, 'still down'],
      ['sent', 3, null],
    ]);
  });

  it('schedules strictly increasing retry times', async () => {
    const ctx = context(scriptedNotifier([{ ok: false, reason: 'down' }]));
    const id = await enqueue();
    const retryTimes: number[] = [];

    for (let i = 0; i < 5; i++) {
      await processDueDeliveries(ctx);
      const entry = await findDeliveryById(client.db, id);
      retryTimes.push(entry?.next_retry_at ?? -1);
      clock.set(entry?.next_retry_at ?? 0);
    }

    // 1000 + 2, then + 4, + 8, + 16, + 32
    expect(retryTimes).toEqual([1_002, 1_006, 1_014, 1_030, 1_062]);
  });

  it('leaves entries alone until their retry time', async () => {
    const notifier = scriptedNotifier([{ ok: false, reason: 'down' }]);
    const ctx = context(notifier);
    await enqueue();

    await processDueDeliveries(ctx);
    clock.advance(1);
    await processDueDeliveries(ctx);

    expect(notifier.sent).toHaveLength(1);
  });

  it('dead-letters an entry that reaches maxAttempts', async () => {
    const ctx = context(scriptedNotifier([{ ok: false, reason: 'down' }]), { maxAttempts: 2, maxBackoffSeconds: 3600 });
    const id = await enqueue();

    await processDueDeliveries(ctx);
    clock.advance(10);
    const result = await processDueDeliveries(ctx);

    expect(result).toEqual({ sent: 0, failed: 0, deadLettered: 1 });
    expect(await findDeliveryById(client.db, id)).toMatchObject({
      attempts: 2,
      last_error: 'down',
      dead_lettered_at: 1_010,
    });

    const log = await fetchDeliveryLog(client.db, 10);
    expect(log[0]).toMatchObject({ status: 'dead_lettered', attempt: 2 });

    clock.advance(10_000);
    expect(await processDueDeliveries(ctx)).toEqual({ sent: 0, failed: 0, deadLettered: 0 });
  });

  it('keeps an operator reset that lands while the send is in flight', async () => {
    const id = await enqueue();
    const queued = await findDeliveryById(client.db, id);
    if (queued === undefined) throw new Error('entry missing');
    await recordDeliveryFailure(client.db, id, queued, { attempts: 5, next_retry_at: 1_000, last_error: 'down' });

    const notifier: Notifier = {
      name: 'resetting',
      async send() {
        await forceRetry(client.db, id);
        return { ok: false, reason: 'still down' };
      },
    };
    const result = await processDueDeliveries(context(notifier, { maxAttempts: 6, maxBackoffSeconds: 3600 }));

    expect(result).toEqual({ sent: 0, failed: 0, deadLettered: 0 });
    expect(await findDeliveryById(client.db, id)).toMatchObject({
      attempts: 0,
      next_retry_at: 0,
      dead_lettered_at: null,
      last_error: 'down',
    });
    expect(await fetchDeliveryLog(client.db, 10)).toEqual([]);
  });

  it('writes no failed entry for an entry deleted while the send is in flight', async () => {
    const id = await enqueue();
    const notifier: Notifier = {
      name: 'deleting',
      async send() {
        await removeQueued(client.db, id);
        return { ok: false, reason: 'down' };
      },
    };

    const result = await processDueDeliveries(context(notifier));

    expect(result).toEqual({ sent: 0, failed: 0, deadLettered: 0 });
    expect(await listDeliveryQueue(client.db)).toEqual([]);
    expect(await fetchDeliveryLog(client.db, 10)).toEqual([]);
  });

  it('keeps sweeping when one entry fails to process', async () => {
    const blocked = await enqueue('blocked');
    const throwing = await enqueue('throwing');
    const healthy = await enqueue('healthy');
    client.sqlite.exec(
      `CREATE TRIGGER block_queue_update BEFORE UPDATE ON delivery_queue WHEN OLD.id = ${blocked} ` +
        `BEGIN SELECT RAISE(ABORT, 'disk I/O error'); END`,
    );
    const log = fakeLogger();
    const notifier = scriptedNotifier([{ ok: false, reason: 'down' }, 'connection reset', { ok: true }]);

    const result = await processDueDeliveries({ ...context(notifier), log });

    expect(result).toEqual({ sent: 1, failed: 1, deadLettered: 0 });
    expect(notifier.sent.map((m) => m.subject)).toEqual(['blocked', 'throwing', 'healthy']);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ queue_id: blocked, err: expect.any(Error) }),
      'Failed to process queued delivery',
    );

    expect(await findDeliveryById(client.db, blocked)).toMatchObject({ attempts: 0, next_retry_at: 1_000 });
    expect(await findDeliveryById(client.db, throwing)).toMatchObject({
      attempts: 1,
      next_retry_at: 1_002,
      last_error: 'connection reset',
    });
    expect(await findDeliveryById(client.db, healthy)).toBeUndefined();

    const entries = await fetchDeliveryLogForEvent(client.db, 1);
    expect(entries.map((e) => [e.subject, e.status])).toEqual([
      ['throwing', 'failed'],
      ['healthy', 'sent'],
    ]);
  });
});

describe('RetryScheduler', () => {
  it('refuses a second start and stops cleanly', async () => {
    const client = createTestDb();
    const log = fakeLogger();
    const scheduler = new RetryScheduler(
      { db: client.db, notifier: scriptedNotifier([{ ok: true }]), log, clock: fakeClock(), policy: POLICY, batchSize: 10 },
      60_000,
    );

    expect(scheduler.start()).toBe(true);
    expect(scheduler.start()).toBe(false);
    expect(scheduler.running).toBe(true);

    await scheduler.stop();
    expect(scheduler.running).toBe(false);
    expect(log.info).toHaveBeenCalledWith('Retry scheduler stopped');
    client.sqlite.close();
  });

  it('sweeps due entries on its interval', async () => {
    const client = createTestDb();
    const notifier = scriptedNotifier([{ ok: true }]);
    const clock = fakeClock(1_000);
    await enqueueDelivery(client.db, {
      event_id: null, subject: 'Alert', body: 'body', recipient: 'ops@example.com', last_error: null, now: 1_000,
    });
    const scheduler = new RetryScheduler(
      { db: client.db, notifier, log: fakeLogger(), clock, policy: POLICY, batchSize: 10 },
      5,
    );

    scheduler.start();
    await vi.waitFor(async () => {
      expect(await listDeliveryQueue(client.db)).toEqual([]);
    });
    await scheduler.stop();

    expect(notifier.sent).toHaveLength(1);
    client.sqlite.close();
  });
});
