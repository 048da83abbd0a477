import { isJsonObject } from '@sluice/core';

import { decodeJson, encodeJson, encodeUtf8 } from './json.js';
import { ParameterNormalizer } from './normalizer.js';
import type { WirePayload } from './normalizer.js';
import { buildClientDefaults, mergeParameters } from './params.js';

// A wire body survives serialization and maps back to the caller's values.

function overTheWire(payload: WirePayload) {
  return decodeJson(encodeUtf8(encodeJson({ ...payload })));
}

describe('normalize → encode → decode', () => {
  const defaults = buildClientDefaults({ completionModel: 'cohere.command-text-v14' });
  const normalizer = new ParameterNormalizer(defaults);

  it('keeps the canonical completion values under their Cohere names', () => {
    const overrides = { max_tokens_to_sample: 77, top_p: 0.5, top_k: 9, stop_sequences: ['###'] };
    const decoded = overTheWire(normalizer.normalize('cohere', {
      operation: 'completion',
      prompt: 'Summarize.',
      overrides,
    }));
    const expected = mergeParameters(defaults.params, overrides);

    expect({
      max_tokens_to_sample: decoded['max_tokens'],
      temperature: decoded['temperature'],
      top_p: decoded['p'],
      top_k: decoded['k'],
      stop_sequences: decoded['stop_sequences'],
      return_likelihoods: decoded['return_likelihoods'],
    }).toEqual({
      max_tokens_to_sample: expected.max_tokens_to_sample,
      temperature: expected.temperature,
      top_p: expected.top_p,
      top_k: expected.top_k,
      stop_sequences: [...expected.stop_sequences],
      return_likelihoods: expected.return_likelihoods,
    });
    expect(decoded['prompt']).toBe('Summarize.');
  });

  it('keeps chat messages and settings', () => {
    const messages = [
      { role: 'user' as const, content: 'Hi' },
      { role: 'assistant' as const, content: [{ type: 'text', text: 'Hello!' }] },
      { role: 'user' as const, content: 'Tell me more.' },
    ];
    const decoded = overTheWire(normalizer.normalize('anthropic', {
      operation: 'chat',
      params: { messages, system: 'Be terse.', temperature: 0.3, stop: ['\n\n'] },
    }));

    expect(decoded['messages']).toEqual(messages);
    expect(decoded['system']).toBe('Be terse.');
    expect(decoded['temperature']).toBe(0.3);
    expect(decoded['stop_sequences']).toEqual(['\n\n']);
  });

  it('keeps the embedding input and extra fields', () => {
    const decoded = overTheWire(normalizer.normalize('amazon', {
      operation: 'embedding',
      text: 'naïve café',
      extra: { embeddingConfig: { outputEmbeddingLength: 256 } },
    }));

    expect(decoded['inputText']).toBe('naïve café');
    const config = decoded['embeddingConfig'];
    expect(isJsonObject(config) ? config['outputEmbeddingLength'] : undefined).toBe(256);
  });
});
