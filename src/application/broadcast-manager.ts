import type { Logger } from 'pino';
import type { ActionRecord, Event } from '../domain/index.js';
import type { Clock } from './clock.js';

/** Messages pushed to every stream observer. */
export type StreamMessage =
  | { type: 'event'; payload: Event }
  | { type: 'action'; payload: ActionRecord };

export type SendResult = { ok: true } | { ok: false; reason: string };

/**
 * Transport-side handle for one connected observer.
 *
 * `send` reports failure through its result; a channel that throws is
 * treated the same as one that returns `ok: false`.
 */
export interface ObserverChannel {
  send(data: string): SendResult;
  close(reason: string): void;
}

export interface BroadcastResult {
  delivered: number;
  dropped: number;
}

export interface BroadcastStats {
  connected_clients: number;
  total_sent: number;
  last_message_ts: number | null;
}

/**
 * Registry of live stream observers keyed by connection id.
 *
 * Fan-out never raises: an observer whose send fails is collected and
 * removed once the loop over the registry has finished.
 */
export class BroadcastManager {
  private readonly observers = new Map<number, ObserverChannel>();
  private nextId = 1;
  private totalSent = 0;
  private lastMessageTs: number | null = null;

  constructor(
    private readonly log: Logger,
    private readonly clock: Clock,
  ) {}

  get size(): number {
    return this.observers.size;
  }

  connect(channel: ObserverChannel): number {
    const id = this.nextId++;
    this.observers.set(id, channel);
    this.log.info({ connectionId: id, observers: this.observers.size }, 'Stream observer connected');
    return id;
  }

  /** Removes the observer without closing its channel. */
  disconnect(id: number): boolean {
    const removed = this.observers.delete(id);
    if (removed) {
      this.log.info({ connectionId: id, observers: this.observers.size }, 'Stream observer disconnected');
    }
    return removed;
  }

  broadcast(message: StreamMessage): BroadcastResult {
    if (this.observers.size === 0) {
      return { delivered: 0, dropped: 0 };
    }

    const data = JSON.stringify(message);
    const failed: Array<[number, string]> = [];
    let delivered = 0;

    for (const [id, channel] of this.observers) {
      let result: SendResult;
      try {
        result = channel.send(data);
      } catch (err: unknown) {
        result = { ok: false, reason: err instanceof Error ? err.message : String(err) };
      }

      if (result.ok) {
        delivered++;
      } else {
        failed.push([id, result.reason]);
      }
    }

    for (const [id, reason] of failed) {
      const channel = this.observers.get(id);
      this.observers.delete(id);
      this.log.warn({ connectionId: id, reason }, 'Dropping stream observer after failed send');
      try {
        channel?.close(reason);
      } catch (err: unknown) {
        this.log.debug({ err, connectionId: id }, 'Observer close failed');
      }
    }

    this.totalSent += delivered;
    this.lastMessageTs = this.clock();
    this.log.debug({ type: message.type, delivered, dropped: failed.length }, 'Broadcast complete');

    return { delivered, dropped: failed.length };
  }

  stats(): BroadcastStats {
    return {
      connected_clients: this.observers.size,
      total_sent: this.totalSent,
      last_message_ts: this.lastMessageTs,
    };
  }

  /** Closes and forgets every observer. */
  closeAll(reason: string): void {
    for (const [id, channel] of this.observers) {
      try {
        channel.close(reason);
      } catch (err: unknown) {
        this.log.debug({ err, connectionId: id }, 'Observer close failed');
      }
    }
    this.observers.clear();
  }
}
