/**
 * Cohere Command on Bedrock. Flat body, short sampling names.
 */

import type { JsonObject } from '@sluice/core';

import type { CanonicalParameters } from './params.js';
import type { ProviderVariant } from './registry.js';
import { CohereResponse } from './responses.js';

function completionBody(params: CanonicalParameters, prompt: string): JsonObject {
  return {
    prompt,
    max_tokens: params.max_tokens_to_sample,
    temperature: params.temperature,
    p: params.top_p,
    k: params.top_k,
    stop_sequences: [...params.stop_sequences],
    return_likelihoods: params.return_likelihoods,
  };
}

export const cohereVariant: ProviderVariant = {
  id: 'cohere',
  completionBody,
  parseResponse: (raw) => new CohereResponse(raw),
};
