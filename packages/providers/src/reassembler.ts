/**
 * Streaming response reassembler.
 *
 * A left fold over the chunks of one streamed Messages API response. The
 * accumulator is owned by a single stream: `applyStreamChunk` mutates it in
 * place and returns it, `finalizeStream` turns it into a deep-frozen message
 * shaped like the single-shot response.
 *
 * A delta for a block index that no `content_block_start` introduced is a
 * MalformedStreamError; blocks are never created lazily.
 */

import { InvocationError, MalformedStreamError, isJsonObject } from '@sluice/core';
import type { JsonObject } from '@sluice/core';

import { deepFreeze, parsePartialJson } from './json.js';
import {
  CONTENT_DELTA_KINDS,
  STREAM_EVENT_KINDS,
  contentDeltaSchema,
  streamEventSchema,
} from './stream-events.js';
import type { ContentDelta, StreamChunk, StreamEvent } from './stream-events.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The reassembled message; same shape as a non-streamed response body. */
export type RawMessage = Readonly<JsonObject>;

interface BlockState {
  block: JsonObject;
  /** Concatenated `input_json_delta` fragments not yet parsed. */
  pendingJson?: string;
}

export interface StreamAccumulator {
  message: JsonObject | undefined;
  blocks: (BlockState | undefined)[];
  chunks: number;
  started: boolean;
  finalized: boolean;
}

// ---------------------------------------------------------------------------
// Fold
// ---------------------------------------------------------------------------

export function createAccumulator(): StreamAccumulator {
  return { message: undefined, blocks: [], chunks: 0, started: false, finalized: false };
}

/**
 * Validate a chunk. Returns undefined for kinds this fold does not know,
 * which callers skip.
 */
export function decodeStreamEvent(chunk: StreamChunk): StreamEvent | undefined {
  const kind = chunk['type'];
  if (typeof kind !== 'string' || !STREAM_EVENT_KINDS.has(kind)) return undefined;

  const parsed = streamEventSchema.safeParse(chunk);
  if (!parsed.success) {
    throw new MalformedStreamError(`Malformed ${kind} event`, {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data;
}

export function applyStreamChunk(acc: StreamAccumulator, chunk: StreamChunk): StreamAccumulator {
  if (acc.finalized) {
    throw new MalformedStreamError('Stream accumulator already finalized');
  }
  acc.chunks += 1;

  const event = decodeStreamEvent(chunk);
  if (!event) return acc;

  switch (event.type) {
    case 'message_start': {
      const message = structuredClone(event.message);
      const content = message['content'];
      acc.blocks = Array.isArray(content)
        ? content.map((block) => (isJsonObject(block) ? { block } : undefined))
        : [];
      acc.message = message;
      acc.started = true;
      break;
    }

    case 'content_block_start':
      acc.blocks[event.index] = { block: structuredClone(event.content_block) };
      break;

    case 'content_block_delta': {
      const state = blockAt(acc, event.index);
      if (CONTENT_DELTA_KINDS.has(event.delta.type)) {
        applyDelta(state, parseDelta(event.delta, event.index));
      }
      break;
    }

    case 'content_block_stop':
      flushPendingJson(blockAt(acc, event.index), event.index);
      break;

    case 'message_delta': {
      const message = acc.message;
      if (!acc.started || !message) {
        throw new MalformedStreamError('message_delta arrived before message_start', {
          chunks: acc.chunks,
        });
      }
      const previousUsage = message['usage'];
      Object.assign(message, event.delta);
      if (event.usage) {
        message['usage'] = {
          ...(isJsonObject(previousUsage) ? previousUsage : {}),
          ...event.usage,
        };
      }
      break;
    }

    case 'error': {
      const detail = event.error.message ?? 'unknown error';
      throw new InvocationError(`Stream reported an error: ${detail}`, {
        errorType: event.error.type,
      });
    }

    case 'message_stop':
    case 'ping':
      break;
  }

  return acc;
}

/**
 * Close the fold. Pending structured input is parsed, and the result is
 * deep-frozen. The accumulator cannot take more chunks afterwards.
 */
export function finalizeStream(acc: StreamAccumulator): RawMessage {
  if (acc.finalized) {
    throw new MalformedStreamError('Stream accumulator already finalized');
  }
  if (!acc.started || !acc.message) {
    throw new MalformedStreamError('Stream ended before message_start', { chunks: acc.chunks });
  }

  // Indexed loop: forEach skips the holes left by an unstarted block.
  const content: JsonObject[] = [];
  for (let index = 0; index < acc.blocks.length; index++) {
    const state = acc.blocks[index];
    if (!state) {
      throw new MalformedStreamError(`Content block ${index} was never started`, { index });
    }
    flushPendingJson(state, index);
    content.push(state.block);
  }

  acc.finalized = true;
  return deepFreeze({ ...acc.message, content });
}

/** Fold a complete chunk sequence. */
export function reassembleStream(chunks: Iterable<StreamChunk>): RawMessage {
  const acc = createAccumulator();
  for (const chunk of chunks) applyStreamChunk(acc, chunk);
  return finalizeStream(acc);
}

// ---------------------------------------------------------------------------
// Class wrapper for incremental use
// ---------------------------------------------------------------------------

export class StreamReassembler {
  private readonly acc = createAccumulator();

  push(chunk: StreamChunk): void {
    applyStreamChunk(this.acc, chunk);
  }

  get chunkCount(): number {
    return this.acc.chunks;
  }

  finalize(): RawMessage {
    return finalizeStream(this.acc);
  }
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

function blockAt(acc: StreamAccumulator, index: number): BlockState {
  const state = acc.blocks[index];
  if (!state) {
    throw new MalformedStreamError(
      `Delta for content block ${index} arrived before content_block_start`,
      { index },
    );
  }
  return state;
}

function parseDelta(delta: { type: string }, index: number): ContentDelta {
  const parsed = contentDeltaSchema.safeParse(delta);
  if (!parsed.success) {
    throw new MalformedStreamError(`Malformed ${delta.type} delta`, { index });
  }
  return parsed.data;
}

function applyDelta(state: BlockState, delta: ContentDelta): void {
  const block = state.block;
  switch (delta.type) {
    case 'text_delta': {
      const text = block['text'];
      block['text'] = (typeof text === 'string' ? text : '') + delta.text;
      break;
    }
    case 'input_json_delta':
      state.pendingJson = (state.pendingJson ?? '') + delta.partial_json;
      break;
    case 'thinking_delta': {
      const thinking = block['thinking'];
      block['thinking'] = (typeof thinking === 'string' ? thinking : '') + delta.thinking;
      break;
    }
    case 'signature_delta':
      block['signature'] = delta.signature;
      break;
  }
}

function flushPendingJson(state: BlockState, index: number): void {
  if (state.pendingJson === undefined) return;
  state.block['input'] = parsePartialJson(state.pendingJson, { index });
  state.pendingJson = undefined;
}
