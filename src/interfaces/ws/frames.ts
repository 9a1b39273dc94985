import { createHash } from 'node:crypto';

/**
 * RFC 6455 frame codec used by the stream endpoint.
 *
 * Client-to-server frames are masked (§5.3); server frames never are.
 */

const WS_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';

export const OPCODE = {
  continuation: 0x00,
  text: 0x01,
  binary: 0x02,
  close: 0x08,
  ping: 0x09,
  pong: 0x0a,
} as const;

export interface ParsedFrame {
  fin: boolean;
  opcode: number;
  payload: Buffer;
  /** Offset of the first byte after this frame. */
  nextOffset: number;
}

/** Value of the Sec-WebSocket-Accept header for a client key. */
export function computeAcceptKey(key: string): string {
  return createHash('sha1').update(key + WS_GUID).digest('base64');
}

/**
 * Parse ONE frame from the front of `buf`.
 * Returns null when more bytes are needed.
 * Throws on lengths beyond `maxPayload`.
 */
export function parseFrame(buf: Buffer, maxPayload: number = 1024 * 1024): ParsedFrame | null {
  if (buf.length < 2) return null;

  const b0 = buf.readUInt8(0);
  const b1 = buf.readUInt8(1);

  const fin = (b0 & 0x80) === 0x80;
  const opcode = b0 & 0x0f;
  const masked = (b1 & 0x80) === 0x80;

  let payloadLen = b1 & 0x7f;
  let offset = 2;

  if (payloadLen === 126) {
    if (buf.length < offset + 2) return null;
    payloadLen = buf.readUInt16BE(offset);
    offset += 2;
  } else if (payloadLen === 127) {
    if (buf.length < offset + 8) return null;
    const big = buf.readBigUInt64BE(offset);
    if (big > BigInt(maxPayload)) {
      throw new Error(`WebSocket payload of ${big} bytes exceeds limit`);
    }
    payloadLen = Number(big);
    offset += 8;
  }

  if (payloadLen > maxPayload) {
    throw new Error(`WebSocket payload of ${payloadLen} bytes exceeds limit`);
  }

  const maskLen = masked ? 4 : 0;
  if (buf.length < offset + maskLen + payloadLen) return null;

  let payload: Buffer;
  if (masked) {
    const mask = buf.subarray(offset, offset + 4);
    offset += 4;
    payload = Buffer.allocUnsafe(payloadLen);
    for (let i = 0; i < payloadLen; i++) {
      payload[i] = buf.readUInt8(offset + i) ^ mask.readUInt8(i % 4);
    }
  } else {
    payload = Buffer.from(buf.subarray(offset, offset + payloadLen));
  }

  return { fin, opcode, payload, nextOffset: offset + payloadLen };
}

/** Control frames carry at most 125 bytes (§5.5); longer payloads are dropped. */
export function encodeControlFrame(opcode: number, payload: Buffer = Buffer.alloc(0)): Buffer {
  const body = payload.length > 125 ? Buffer.alloc(0) : payload;
  const header = Buffer.from([0x80 | opcode, body.length]);
  return Buffer.concat([header, body]);
}

export function encodeTextFrame(data: string): Buffer {
  const payload = Buffer.from(data, 'utf-8');
  const len = payload.length;

  let header: Buffer;
  if (len < 126) {
    header = Buffer.from([0x80 | OPCODE.text, len]);
  } else if (len <= 0xffff) {
    header = Buffer.alloc(4);
    header[0] = 0x80 | OPCODE.text;
    header[1] = 126;
    header.writeUInt16BE(len, 2);
  } else {
    header = Buffer.alloc(10);
    header[0] = 0x80 | OPCODE.text;
    header[1] = 127;
    header.writeBigUInt64BE(BigInt(len), 2);
  }

  return Buffer.concat([header, payload]);
}

/** Close frame with a status code and optional UTF-8 reason. */
export function encodeCloseFrame(code: number, reason = ''): Buffer {
  const reasonBytes = Buffer.from(reason, 'utf-8').subarray(0, 123);
  const payload = Buffer.alloc(2 + reasonBytes.length);
  payload.writeUInt16BE(code, 0);
  reasonBytes.copy(payload, 2);
  return encodeControlFrame(OPCODE.close, payload);
}
