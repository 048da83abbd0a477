import { InvocationError, MalformedStreamError } from '@sluice/core';

import {
  StreamReassembler,
  applyStreamChunk,
  createAccumulator,
  finalizeStream,
  reassembleStream,
} from './reassembler.js';
import type { StreamChunk } from './stream-events.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function messageStart(overrides: StreamChunk = {}): StreamChunk {
  return {
    type: 'message_start',
    message: {
      id: 'msg_1',
      type: 'message',
      role: 'assistant',
      model: 'claude-3-sonnet',
      content: [],
      stop_reason: null,
      usage: { input_tokens: 10, output_tokens: 1 },
      ...overrides,
    },
  };
}

function blockStart(index: number, block: StreamChunk): StreamChunk {
  return { type: 'content_block_start', index, content_block: block };
}

function textDelta(index: number, text: string): StreamChunk {
  return { type: 'content_block_delta', index, delta: { type: 'text_delta', text } };
}

function jsonDelta(index: number, partial: string): StreamChunk {
  return { type: 'content_block_delta', index, delta: { type: 'input_json_delta', partial_json: partial } };
}

function blockStop(index: number): StreamChunk {
  return { type: 'content_block_stop', index };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('reassembleStream', () => {
  it('concatenates text deltas and merges the final message delta', () => {
    const message = reassembleStream([
      messageStart(),
      blockStart(0, { type: 'text', text: '' }),
      textDelta(0, 'Hel'),
      textDelta(0, 'lo'),
      blockStop(0),
      { type: 'message_delta', delta: { stop_reason: 'end_turn' }, usage: { output_tokens: 5 } },
      { type: 'message_stop' },
    ]);

    expect(message).toEqual({
      id: 'msg_1',
      type: 'message',
      role: 'assistant',
      model: 'claude-3-sonnet',
      content: [{ type: 'text', text: 'Hello' }],
      stop_reason: 'end_turn',
      usage: { input_tokens: 10, output_tokens: 5 },
    });
  });

  it('parses structured input from concatenated fragments', () => {
    const message = reassembleStream([
      messageStart(),
      blockStart(0, { type: 'tool_use', id: 'tu_1', name: 'lookup', input: {} }),
      jsonDelta(0, '{"a":'),
      jsonDelta(0, '1}'),
      blockStop(0),
    ]);

    expect(message['content']).toEqual([{ type: 'tool_use', id: 'tu_1', name: 'lookup', input: { a: 1 } }]);
  });

  it('treats a single empty fragment as an empty object', () => {
    const message = reassembleStream([
      messageStart(),
      blockStart(0, { type: 'tool_use', id: 'tu_1', name: 'noop', input: {} }),
      jsonDelta(0, ''),
      blockStop(0),
    ]);

    expect(message['content']).toEqual([{ type: 'tool_use', id: 'tu_1', name: 'noop', input: {} }]);
  });

  it('parses pending fragments at finalize when the block was never stopped', () => {
    const message = reassembleStream([
      messageStart(),
      blockStart(0, { type: 'tool_use', id: 'tu_1', name: 'lookup', input: {} }),
      jsonDelta(0, '{"q":"x"}'),
    ]);

    expect(message['content']).toEqual([{ type: 'tool_use', id: 'tu_1', name: 'lookup', input: { q: 'x' } }]);
  });

  it('keeps blocks ordered by index', () => {
    const message = reassembleStream([
      messageStart(),
      blockStart(0, { type: 'text', text: '' }),
      blockStart(1, { type: 'tool_use', id: 'tu_1', name: 'lookup', input: {} }),
      textDelta(0, 'Checking.'),
      jsonDelta(1, '{}'),
      blockStop(1),
      blockStop(0),
    ]);

    expect(message['content']).toEqual([
      { type: 'text', text: 'Checking.' },
      { type: 'tool_use', id: 'tu_1', name: 'lookup', input: {} },
    ]);
  });

  it('accumulates thinking and keeps the last signature', () => {
    const message = reassembleStream([
      messageStart(),
      blockStart(0, { type: 'thinking', thinking: '' }),
      { type: 'content_block_delta', index: 0, delta: { type: 'thinking_delta', thinking: 'Let me ' } },
      { type: 'content_block_delta', index: 0, delta: { type: 'thinking_delta', thinking: 'see.' } },
      { type: 'content_block_delta', index: 0, delta: { type: 'signature_delta', signature: 'sig-1' } },
      blockStop(0),
    ]);

    expect(message['content']).toEqual([{ type: 'thinking', thinking: 'Let me see.', signature: 'sig-1' }]);
  });

  it('lets later usage counters win key by key', () => {
    const message = reassembleStream([
      messageStart(),
      { type: 'message_delta', delta: {}, usage: { output_tokens: 3 } },
      { type: 'message_delta', delta: {}, usage: { output_tokens: 7 } },
    ]);

    expect(message['usage']).toEqual({ input_tokens: 10, output_tokens: 7 });
  });

  it('merges distinct usage counters from separate deltas', () => {
    const message = reassembleStream([
      messageStart(),
      { type: 'message_delta', delta: {}, usage: { output_tokens: 3 } },
      { type: 'message_delta', delta: {}, usage: { cache_read_input_tokens: 2 } },
    ]);

    expect(message['usage']).toEqual({ input_tokens: 10, output_tokens: 3, cache_read_input_tokens: 2 });
  });

  it('ignores ping and unknown event kinds', () => {
    const message = reassembleStream([
      messageStart(),
      { type: 'ping' },
      { type: 'vendor_heartbeat', at: 1 },
      blockStart(0, { type: 'text', text: 'ok' }),
    ]);

    expect(message['content']).toEqual([{ type: 'text', text: 'ok' }]);
  });

  it('ignores unknown delta types', () => {
    const message = reassembleStream([
      messageStart(),
      blockStart(0, { type: 'text', text: 'a' }),
      { type: 'content_block_delta', index: 0, delta: { type: 'citations_delta', citation: {} } },
    ]);

    expect(message['content']).toEqual([{ type: 'text', text: 'a' }]);
  });

  it('returns a deeply frozen message', () => {
    const message = reassembleStream([messageStart(), blockStart(0, { type: 'text', text: 'x' })]);
    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message['content'])).toBe(true);
  });
});

describe('malformed streams', () => {
  it('rejects a delta for a block that was never started', () => {
    expect(() => reassembleStream([messageStart(), textDelta(0, 'x')])).toThrow(MalformedStreamError);
  });

  it('rejects fragments that do not form JSON', () => {
    expect(() => reassembleStream([
      messageStart(),
      blockStart(0, { type: 'tool_use', id: 'tu_1', name: 'lookup', input: {} }),
      jsonDelta(0, '{"a":'),
      blockStop(0),
    ])).toThrow(MalformedStreamError);
  });

  it('rejects fragments that form a non-object', () => {
    expect(() => reassembleStream([
      messageStart(),
      blockStart(0, { type: 'tool_use', id: 'tu_1', name: 'lookup', input: {} }),
      jsonDelta(0, '[1]'),
    ])).toThrow('Structured input must be a JSON object');
  });

  it('rejects a stream without message_start', () => {
    expect(() => reassembleStream([{ type: 'ping' }]))
      .toThrow('Stream ended before message_start');
  });

  it('rejects a message_delta before message_start', () => {
    expect(() => reassembleStream([
      { type: 'message_delta', delta: { stop_reason: 'end_turn' } },
      messageStart(),
    ])).toThrow('message_delta arrived before message_start');
  });

  it('rejects a known kind with the wrong shape', () => {
    expect(() => reassembleStream([messageStart(), { type: 'content_block_start', index: -1 }]))
      .toThrow('Malformed content_block_start event');
  });

  it('rejects a gap between started blocks at finalize', () => {
    expect(() => reassembleStream([
      messageStart(),
      blockStart(0, { type: 'text', text: '' }),
      blockStart(2, { type: 'text', text: '' }),
      textDelta(2, 'two'),
    ])).toThrow('Content block 1 was never started');
  });

  it('rejects a gap in the block indices at finalize', () => {
    expect(() => reassembleStream([messageStart(), blockStart(1, { type: 'text', text: '' })]))
      .toThrow('Content block 0 was never started');
  });

  it('surfaces stream error events as InvocationError', () => {
    expect(() => reassembleStream([
      messageStart(),
      { type: 'error', error: { type: 'overloaded_error', message: 'Overloaded' } },
    ])).toThrow(InvocationError);
  });
});

describe('accumulator lifecycle', () => {
  it('counts every chunk, including unknown ones', () => {
    const acc = createAccumulator();
    applyStreamChunk(acc, messageStart());
    applyStreamChunk(acc, { type: 'ping' });
    applyStreamChunk(acc, { type: 'mystery' });
    expect(acc.chunks).toBe(3);
  });

  it('refuses chunks after finalize', () => {
    const acc = createAccumulator();
    applyStreamChunk(acc, messageStart());
    finalizeStream(acc);
    expect(() => applyStreamChunk(acc, { type: 'ping' })).toThrow('Stream accumulator already finalized');
    expect(() => finalizeStream(acc)).toThrow('Stream accumulator already finalized');
  });

  it('StreamReassembler folds incrementally', () => {
    const reassembler = new StreamReassembler();
    reassembler.push(messageStart());
    reassembler.push(blockStart(0, { type: 'text', text: '' }));
    reassembler.push(textDelta(0, 'Hi'));
    expect(reassembler.chunkCount).toBe(3);
    expect(reassembler.finalize()['content']).toEqual([{ type: 'text', text: 'Hi' }]);
  });

  it('does not share structure with the chunks it consumed', () => {
    const start = messageStart();
    const block = { type: 'text', text: '' };
    reassembleStream([start, blockStart(0, block), textDelta(0, 'changed')]);
    expect(block.text).toBe('');
  });
});
