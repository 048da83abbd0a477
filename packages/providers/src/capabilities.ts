/**
 * Provider capability table.
 *
 * Which operations each Bedrock model family can serve, and how a model id
 * maps to its provider family.
 */

import type { Operation } from '@sluice/core';

export const PROVIDER_IDS = ['anthropic', 'cohere', 'ai21', 'amazon'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

const CAPABILITIES: Readonly<Record<Operation, readonly ProviderId[]>> = {
  completion: ['anthropic', 'cohere', 'ai21'],
  chat: ['anthropic'],
  embedding: ['amazon'],
};

// Claude 3 and later only speak the Messages API.
const CHAT_ONLY_MODEL_PATTERNS: readonly RegExp[] = [
  /claude-3/,
  /claude-(sonnet|opus|haiku)-4/,
];

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

export function supports(operation: Operation, provider: string): boolean {
  return CAPABILITIES[operation].some((id) => id === provider);
}

export function supportedProviders(operation: Operation): readonly ProviderId[] {
  return CAPABILITIES[operation];
}

/** The namespace segment of a model id: `anthropic.claude-v2` → `anthropic`. */
export function providerForModel(modelId: string): string {
  const dot = modelId.indexOf('.');
  return dot === -1 ? modelId : modelId.slice(0, dot);
}

export function isChatOnlyModel(modelId: string): boolean {
  return CHAT_ONLY_MODEL_PATTERNS.some((pattern) => pattern.test(modelId));
}
