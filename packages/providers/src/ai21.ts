/**
 * AI21 Jurassic on Bedrock.
 *
 * camelCase field names, and three nested penalty objects that are always
 * sent complete.
 */

import type { JsonObject } from '@sluice/core';

import type { CanonicalParameters, PenaltySettings } from './params.js';
import type { ProviderVariant } from './registry.js';
import { AI21Response } from './responses.js';

export function toAI21Penalty(penalty: PenaltySettings): JsonObject {
  return {
    scale: penalty.scale,
    applyToWhitespaces: penalty.apply_to_whitespaces,
    applyToPunctuations: penalty.apply_to_punctuations,
    applyToNumbers: penalty.apply_to_numbers,
    applyToStopwords: penalty.apply_to_stopwords,
    applyToEmojis: penalty.apply_to_emojis,
  };
}

function completionBody(params: CanonicalParameters, prompt: string): JsonObject {
  return {
    prompt,
    maxTokens: params.max_tokens_to_sample,
    temperature: params.temperature,
    topP: params.top_p,
    stopSequences: [...params.stop_sequences],
    countPenalty: toAI21Penalty(params.count_penalty),
    presencePenalty: toAI21Penalty(params.presence_penalty),
    frequencyPenalty: toAI21Penalty(params.frequency_penalty),
  };
}

export const ai21Variant: ProviderVariant = {
  id: 'ai21',
  completionBody,
  parseResponse: (raw) => new AI21Response(raw),
};
