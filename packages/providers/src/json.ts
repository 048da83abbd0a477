/**
 * JSON codec for wire bodies and stream fragments.
 */

import { MalformedResponseError, MalformedStreamError, isJsonObject } from '@sluice/core';
import type { JsonObject } from '@sluice/core';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encodeJson(value: JsonObject): string {
  return JSON.stringify(value);
}

export function encodeUtf8(text: string): Uint8Array {
  return encoder.encode(text);
}

/** Decode a response body that must hold a single JSON object. */
export function decodeJson(bytes: Uint8Array | string): JsonObject {
  const text = typeof bytes === 'string' ? bytes : decoder.decode(bytes);
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new MalformedResponseError('Response body is not valid JSON', {
      cause: err instanceof Error ? err.message : String(err),
      preview: text.slice(0, 200),
    });
  }
  if (!isJsonObject(value)) {
    throw new MalformedResponseError('Response body is not a JSON object', {
      preview: text.slice(0, 200),
    });
  }
  return value;
}

/** Decode one streamed chunk; anything but a JSON object is a malformed stream. */
export function decodeStreamChunk(bytes: Uint8Array): JsonObject {
  const text = decoder.decode(bytes);
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new MalformedStreamError('Stream chunk is not valid JSON', {
      cause: err instanceof Error ? err.message : String(err),
      preview: text.slice(0, 200),
    });
  }
  if (!isJsonObject(value)) {
    throw new MalformedStreamError('Stream chunk is not a JSON object', { preview: text.slice(0, 200) });
  }
  return value;
}

/**
 * Parse the concatenated fragments of a structured-input delta stream. An
 * empty string is an empty object.
 */
export function parsePartialJson(fragments: string, context: Record<string, unknown> = {}): JsonObject {
  if (fragments.length === 0) return {};
  let value: unknown;
  try {
    value = JSON.parse(fragments);
  } catch (err) {
    throw new MalformedStreamError('Structured input fragments do not form valid JSON', {
      ...context,
      cause: err instanceof Error ? err.message : String(err),
      fragments,
    });
  }
  if (!isJsonObject(value)) {
    throw new MalformedStreamError('Structured input must be a JSON object', {
      ...context,
      fragments,
    });
  }
  return value;
}

/** Freeze an object graph in place and return it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
