/**
 * Stream event schemas for the Anthropic Messages streaming protocol.
 *
 * Chunks arrive as decoded JSON objects. Only kinds listed here are
 * validated; anything else is an unrecognized kind and passes through.
 */

import { z } from 'zod';
import type { JsonObject, JsonValue } from '@sluice/core';

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)]),
);

const jsonObject: z.ZodType<JsonObject> = z.record(jsonValue);

const blockIndex = z.number().int().nonnegative();

const messageStart = z.object({
  type: z.literal('message_start'),
  message: jsonObject,
});

const contentBlockStart = z.object({
  type: z.literal('content_block_start'),
  index: blockIndex,
  content_block: jsonObject,
});

const contentBlockDelta = z.object({
  type: z.literal('content_block_delta'),
  index: blockIndex,
  delta: z.object({ type: z.string() }).passthrough(),
});

const contentBlockStop = z.object({
  type: z.literal('content_block_stop'),
  index: blockIndex,
});

const messageDelta = z.object({
  type: z.literal('message_delta'),
  delta: jsonObject,
  usage: jsonObject.optional(),
});

const messageStop = z.object({ type: z.literal('message_stop') });

const ping = z.object({ type: z.literal('ping') });

const streamError = z.object({
  type: z.literal('error'),
  error: z.object({ type: z.string().optional(), message: z.string().optional() }).passthrough(),
});

export const streamEventSchema = z.discriminatedUnion('type', [
  messageStart,
  contentBlockStart,
  contentBlockDelta,
  contentBlockStop,
  messageDelta,
  messageStop,
  ping,
  streamError,
]);

export type StreamEvent = z.infer<typeof streamEventSchema>;

export type StreamEventKind = StreamEvent['type'];

export const STREAM_EVENT_KINDS: ReadonlySet<string> = new Set<StreamEventKind>([
  'message_start',
  'content_block_start',
  'content_block_delta',
  'content_block_stop',
  'message_delta',
  'message_stop',
  'ping',
  'error',
]);

// Deltas inside content_block_delta, keyed by their own `type`.

export const textDelta = z.object({ type: z.literal('text_delta'), text: z.string() });
export const inputJsonDelta = z.object({
  type: z.literal('input_json_delta'),
  partial_json: z.string(),
});
export const thinkingDelta = z.object({ type: z.literal('thinking_delta'), thinking: z.string() });
export const signatureDelta = z.object({
  type: z.literal('signature_delta'),
  signature: z.string(),
});

export const contentDeltaSchema = z.discriminatedUnion('type', [
  textDelta,
  inputJsonDelta,
  thinkingDelta,
  signatureDelta,
]);

export type ContentDelta = z.infer<typeof contentDeltaSchema>;

export const CONTENT_DELTA_KINDS: ReadonlySet<string> = new Set<ContentDelta['type']>([
  'text_delta',
  'input_json_delta',
  'thinking_delta',
  'signature_delta',
]);

/** One decoded chunk as received; `type` tags its kind. */
export type StreamChunk = JsonObject;
