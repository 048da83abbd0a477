// Amazon Titan embeddings: `inputText` plus whatever the caller passes through.

import type { JsonObject } from '@sluice/core';

import type { ProviderVariant } from './registry.js';
import { TitanEmbeddingResponse } from './responses.js';

function embeddingBody(text: string, extra: JsonObject): JsonObject {
  return { inputText: text, ...extra };
}

export const titanVariant: ProviderVariant = {
  id: 'amazon',
  embeddingBody,
  parseResponse: (raw) => new TitanEmbeddingResponse(raw),
};
