/**
 * Decoder for the `application/vnd.amazon.eventstream` framing used by
 * the Bedrock streaming endpoint.
 *
 * Frame layout (big-endian):
 *   total length u32 | headers length u32 | prelude CRC32 u32 |
 *   headers | payload | message CRC32 u32
 */

import { MalformedStreamError } from '@sluice/core';

export type HeaderValue = string | number | boolean | bigint | Uint8Array | Date;

export interface EventStreamFrame {
  headers: Record<string, HeaderValue>;
  payload: Uint8Array;
}

const PRELUDE_LENGTH = 12;
const CRC_LENGTH = 4;
const MIN_FRAME_LENGTH = PRELUDE_LENGTH + CRC_LENGTH;

// ---------------------------------------------------------------------------
// CRC32 (IEEE)
// ---------------------------------------------------------------------------

const CRC_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

export function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of bytes) {
    crc = (CRC_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// ---------------------------------------------------------------------------
// Headers
// ---------------------------------------------------------------------------

const textDecoder = new TextDecoder();

function decodeHeaders(view: DataView, bytes: Uint8Array): Record<string, HeaderValue> {
  const headers: Record<string, HeaderValue> = {};
  let offset = 0;

  while (offset < bytes.length) {
    const nameLength = view.getUint8(offset);
    offset += 1;
    const name = textDecoder.decode(bytes.subarray(offset, offset + nameLength));
    offset += nameLength;
    const valueType = view.getUint8(offset);
    offset += 1;

    switch (valueType) {
      case 0:
        headers[name] = true;
        break;
      case 1:
        headers[name] = false;
        break;
      case 2:
        headers[name] = view.getInt8(offset);
        offset += 1;
        break;
      case 3:
        headers[name] = view.getInt16(offset);
        offset += 2;
        break;
      case 4:
        headers[name] = view.getInt32(offset);
        offset += 4;
        break;
      case 5:
        headers[name] = view.getBigInt64(offset);
        offset += 8;
        break;
      case 6:
      case 7: {
        const length = view.getUint16(offset);
        offset += 2;
        const raw = bytes.slice(offset, offset + length);
        headers[name] = valueType === 7 ? textDecoder.decode(raw) : raw;
        offset += length;
        break;
      }
      case 8:
        headers[name] = new Date(Number(view.getBigInt64(offset)));
        offset += 8;
        break;
      case 9:
        headers[name] = bytes.slice(offset, offset + 16);
        offset += 16;
        break;
      default:
        throw new MalformedStreamError(`Unknown event stream header type ${valueType}`, { name });
    }
  }

  return headers;
}

// ---------------------------------------------------------------------------
// Frame decoder
// ---------------------------------------------------------------------------

export function decodeFrame(frame: Uint8Array): EventStreamFrame {
  const view = new DataView(frame.buffer, frame.byteOffset, frame.byteLength);
  const totalLength = view.getUint32(0);
  const headersLength = view.getUint32(4);

  if (totalLength !== frame.byteLength || totalLength < MIN_FRAME_LENGTH + headersLength) {
    throw new MalformedStreamError('Event stream frame length mismatch', {
      totalLength,
      received: frame.byteLength,
    });
  }
  if (crc32(frame.subarray(0, 8)) !== view.getUint32(8)) {
    throw new MalformedStreamError('Event stream prelude checksum mismatch');
  }
  if (crc32(frame.subarray(0, totalLength - CRC_LENGTH)) !== view.getUint32(totalLength - CRC_LENGTH)) {
    throw new MalformedStreamError('Event stream message checksum mismatch');
  }

  const headerBytes = frame.subarray(PRELUDE_LENGTH, PRELUDE_LENGTH + headersLength);
  const headerView = new DataView(headerBytes.buffer, headerBytes.byteOffset, headerBytes.byteLength);

  return {
    headers: decodeHeaders(headerView, headerBytes),
    payload: frame.slice(PRELUDE_LENGTH + headersLength, totalLength - CRC_LENGTH),
  };
}

/**
 * Buffers arbitrary byte slices and emits whole frames as they complete.
 */
export class EventStreamDecoder {
  private buffer = new Uint8Array(0);

  push(bytes: Uint8Array): EventStreamFrame[] {
    const merged = new Uint8Array(this.buffer.length + bytes.length);
    merged.set(this.buffer, 0);
    merged.set(bytes, this.buffer.length);
    this.buffer = merged;

    const frames: EventStreamFrame[] = [];
    while (this.buffer.length >= PRELUDE_LENGTH) {
      const view = new DataView(this.buffer.buffer, this.buffer.byteOffset, this.buffer.byteLength);
      const totalLength = view.getUint32(0);
      if (totalLength < MIN_FRAME_LENGTH) {
        throw new MalformedStreamError('Event stream frame shorter than its prelude', { totalLength });
      }
      if (this.buffer.length < totalLength) break;
      frames.push(decodeFrame(this.buffer.slice(0, totalLength)));
      this.buffer = this.buffer.slice(totalLength);
    }
    return frames;
  }

  /** Bytes received but not yet part of a complete frame. */
  get pending(): number {
    return this.buffer.length;
  }
}
