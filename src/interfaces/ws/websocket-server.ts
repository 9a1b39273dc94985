import type { IncomingMessage, Server as HttpServer } from 'node:http';
import { Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import type { Logger } from 'pino';
import type { BroadcastManager, ObserverChannel, SendResult } from '../../application/index.js';
import {
  OPCODE,
  computeAcceptKey,
  encodeCloseFrame,
  encodeControlFrame,
  encodeTextFrame,
  parseFrame,
} from './frames.js';

/**
 * Stream endpoint over raw Node.js HTTP upgrade.
 *
 * Implements RFC 6455 for:
 * - accepting observers on the stream path and registering them with
 *   the BroadcastManager
 * - server heartbeat PING → client PONG (alive tracking)
 * - incoming PING → respond PONG immediately
 * - incoming CLOSE → echo close + teardown
 *
 * Client text frames are ignored; the stream is server → client only.
 * Multiple frames per TCP chunk are consumed in a loop.
 */

export interface StreamServerOptions {
  path?: string;
  heartbeatMs?: number;
  /** Buffered bytes above which an observer counts as unreachable. */
  maxBufferedBytes?: number;
}

interface StreamClient {
  connectionId: number;
  socket: Socket;
  alive: boolean;
  closed: boolean;
  buffer: Buffer;
}

export class StreamServer {
  private readonly clients = new Map<number, StreamClient>();
  private readonly path: string;
  private readonly heartbeatMs: number;
  private readonly maxBufferedBytes: number;
  private pingInterval: ReturnType<typeof setInterval> | null = null;
  private server: HttpServer | null = null;
  private readonly onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    this.handleUpgrade(req, socket, head);
  };

  constructor(
    private readonly broadcaster: BroadcastManager,
    private readonly log: Logger,
    options: StreamServerOptions = {},
  ) {
    this.path = options.path ?? '/stream';
    this.heartbeatMs = options.heartbeatMs ?? 30_000;
    this.maxBufferedBytes = options.maxBufferedBytes ?? 1024 * 1024;
  }

  attach(server: HttpServer): void {
    this.server = server;
    server.on('upgrade', this.onUpgrade);

    // Heartbeat: PING on every tick, drop clients that missed the last one
    this.pingInterval = setInterval(() => {
      for (const client of this.clients.values()) {
        if (!client.alive) {
          this.log.debug({ connectionId: client.connectionId }, 'Heartbeat timeout, removing observer');
          this.teardown(client, 'heartbeat_timeout');
          continue;
        }
        client.alive = false;
        this.rawWrite(client, encodeControlFrame(OPCODE.ping));
      }
    }, this.heartbeatMs);
    this.pingInterval.unref();

    this.log.info({ path: this.path }, 'Stream server attached');
  }

  get clientCount(): number {
    return this.clients.size;
  }

  close(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    this.server?.off('upgrade', this.onUpgrade);
    this.server = null;

    for (const client of [...this.clients.values()]) {
      this.rawWrite(client, encodeCloseFrame(1001, 'server_shutdown'));
      this.teardown(client, 'server_shutdown');
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Upgrade                                                           */
  /* ------------------------------------------------------------------ */

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    if (!(socket instanceof Socket)) {
      socket.destroy();
      return;
    }

    const pathname = (req.url ?? '').split('?')[0];
    if (pathname !== this.path) {
      socket.destroy();
      return;
    }

    const key = req.headers['sec-websocket-key'];
    if (typeof key !== 'string' || key.length === 0) {
      socket.destroy();
      return;
    }

    socket.write(
      'HTTP/1.1 101 Switching Protocols\r\n' +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        `Sec-WebSocket-Accept: ${computeAcceptKey(key)}\r\n` +
        '\r\n',
    );

    socket.setTimeout(0);
    socket.setNoDelay(true);
    socket.setKeepAlive(true, this.heartbeatMs);

    const client: StreamClient = {
      connectionId: 0,
      socket,
      alive: true,
      closed: false,
      buffer: head.length > 0 ? Buffer.from(head) : Buffer.alloc(0),
    };

    client.connectionId = this.broadcaster.connect(this.channelFor(client));
    this.clients.set(client.connectionId, client);

    socket.on('data', (chunk: Buffer) => this.handleData(client, chunk));

    // The HTTP server leaves sockets half-open; a client FIN would never
    // reach 'close' on its own.
    socket.on('end', () => {
      this.teardown(client, 'client_end');
    });

    socket.on('close', (hadError: boolean) => {
      this.teardown(client, hadError ? 'close_error' : 'close');
    });

    socket.on('error', (err) => {
      if (!client.closed) {
        this.log.debug({ connectionId: client.connectionId, err: String(err) }, 'Socket error event');
      }
      this.teardown(client, 'error');
    });

    socket.resume();
  }

  /**
   * Channel handed to the BroadcastManager. A send fails when the socket
   * is gone or has more than `maxBufferedBytes` waiting; the manager then
   * drops the observer and calls `close`.
   */
  private channelFor(client: StreamClient): ObserverChannel {
    return {
      send: (data: string): SendResult => {
        if (client.closed || client.socket.destroyed) {
          return { ok: false, reason: 'socket closed' };
        }
        if (client.socket.writableLength > this.maxBufferedBytes) {
          return { ok: false, reason: 'observer too slow' };
        }
        client.socket.write(encodeTextFrame(data));
        return { ok: true };
      },
      close: (reason: string): void => {
        this.rawWrite(client, encodeCloseFrame(1011, reason));
        this.teardown(client, reason);
      },
    };
  }

  /* ------------------------------------------------------------------ */
  /*  Frames                                                            */
  /* ------------------------------------------------------------------ */

  private handleData(client: StreamClient, chunk: Buffer): void {
    if (client.closed) return;

    client.buffer = Buffer.concat([client.buffer, chunk]);

    while (client.buffer.length > 0) {
      let frame: ReturnType<typeof parseFrame>;
      try {
        frame = parseFrame(client.buffer);
      } catch (err: unknown) {
        this.log.warn({ connectionId: client.connectionId, err }, 'WebSocket frame parse error, closing observer');
        this.rawWrite(client, encodeCloseFrame(1009, 'frame_parse_error'));
        this.teardown(client, 'frame_parse_error');
        return;
      }

      if (!frame) break;

      client.buffer = client.buffer.subarray(frame.nextOffset);
      client.alive = true;

      if (frame.opcode === OPCODE.pong) continue;

      if (frame.opcode === OPCODE.ping) {
        this.rawWrite(client, encodeControlFrame(OPCODE.pong, frame.payload));
        continue;
      }

      if (frame.opcode === OPCODE.close) {
        this.rawWrite(client, encodeControlFrame(OPCODE.close, frame.payload));
        this.teardown(client, 'close_frame');
        return;
      }
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Lifecycle                                                         */
  /* ------------------------------------------------------------------ */

  /** Idempotent; guarded by the `closed` flag. */
  private teardown(client: StreamClient, reason: string): void {
    if (client.closed) return;
    client.closed = true;
    this.clients.delete(client.connectionId);
    this.broadcaster.disconnect(client.connectionId);

    if (!client.socket.destroyed) {
      client.socket.destroySoon();
    }

    this.log.info(
      { connectionId: client.connectionId, reason, clientCount: this.clients.size },
      'Stream observer closed',
    );
  }

  private rawWrite(client: StreamClient, data: Buffer): void {
    if (client.closed || client.socket.destroyed) return;
    client.socket.write(data);
  }
}
