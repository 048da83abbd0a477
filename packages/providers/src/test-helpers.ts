/**
 * Builders shared by the event-stream and invoker tests.
 */

import { crc32 } from './event-stream.js';

const encoder = new TextEncoder();

export const CHUNK_HEADERS: Record<string, string> = {
  ':message-type': 'event',
  ':event-type': 'chunk',
  ':content-type': 'application/json',
};

/** Encode one frame with string-typed headers. */
export function encodeFrame(headers: Record<string, string>, payload: Uint8Array): Uint8Array {
  const headerParts: number[] = [];
  for (const [name, value] of Object.entries(headers)) {
    const nameBytes = encoder.encode(name);
    const valueBytes = encoder.encode(value);
    headerParts.push(nameBytes.length, ...nameBytes, 7, valueBytes.length >> 8, valueBytes.length & 0xff, ...valueBytes);
  }

  const headersLength = headerParts.length;
  const totalLength = 12 + headersLength + payload.length + 4;
  const frame = new Uint8Array(totalLength);
  const view = new DataView(frame.buffer);

  view.setUint32(0, totalLength);
  view.setUint32(4, headersLength);
  view.setUint32(8, crc32(frame.subarray(0, 8)));
  frame.set(headerParts, 12);
  frame.set(payload, 12 + headersLength);
  view.setUint32(totalLength - 4, crc32(frame.subarray(0, totalLength - 4)));
  return frame;
}

/** A `chunk` event frame carrying `value` as base64 JSON, the way Bedrock wraps it. */
export function chunkFrame(value: unknown): Uint8Array {
  const bytes = Buffer.from(JSON.stringify(value), 'utf8').toString('base64');
  return encodeFrame(CHUNK_HEADERS, encoder.encode(JSON.stringify({ bytes })));
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
