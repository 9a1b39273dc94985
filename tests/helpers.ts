import { vi } from 'vitest';
import type { Logger } from 'pino';
import { createDbClient, ensureSchema } from '../src/infrastructure/db/index.js';
import type { DbClient } from '../src/infrastructure/db/index.js';
import type { Notifier } from '../src/infrastructure/notifications/index.js';
import type { AlertMessage, DeliveryResult } from '../src/domain/index.js';

/** Logger whose methods are spies; `child()` returns the same logger. */
export function fakeLogger(): Logger {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/** Fresh in-memory SQLite database with the schema applied. */
export function createTestDb(): DbClient {
  const client = createDbClient(':memory:');
  ensureSchema(client);
  return client;
}

/** Clock frozen at `start` seconds; advance it with `clock.advance(s)`. */
export function fakeClock(start = 1_700_000_000): (() => number) & { advance(seconds: number): void; set(t: number): void } {
  let now = start;
  const clock = () => now;
  return Object.assign(clock, {
    advance(seconds: number) {
      now += seconds;
    },
    set(t: number) {
      now = t;
    },
  });
}

/**
 * Notifier that replays scripted results in order, then keeps returning
 * the last one. A string entry is thrown as an Error.
 */
export function scriptedNotifier(
  script: Array<DeliveryResult | string>,
): Notifier & { sent: AlertMessage[] } {
  const sent: AlertMessage[] = [];
  let call = 0;

  return {
    name: 'scripted',
    sent,
    async send(message: AlertMessage): Promise<DeliveryResult> {
      sent.push(message);
      const step = script[Math.min(call, script.length - 1)] ?? { ok: true };
      call++;
      if (typeof step === 'string') throw new Error(step);
      return step;
    },
  };
}
