/**
 * Anthropic Claude on Bedrock.
 *
 * Text completions use the legacy `prompt` body with a Human/Assistant turn
 * template. Chat uses the Messages API body; `model` is returned inside the
 * body and moved to the model id by the dispatcher.
 */

import type { JsonObject, JsonValue } from '@sluice/core';

import type { CanonicalParameters, ChatParameters, ClientDefaults } from './params.js';
import type { ProviderVariant } from './registry.js';
import { AnthropicResponse } from './responses.js';

export function wrapAnthropicPrompt(prompt: string): string {
  return `\n\nHuman: ${prompt}\n\nAssistant:`;
}

function completionBody(params: CanonicalParameters, prompt: string): JsonObject {
  return {
    prompt: wrapAnthropicPrompt(prompt),
    max_tokens_to_sample: params.max_tokens_to_sample,
    temperature: params.temperature,
    top_k: params.top_k,
    top_p: params.top_p,
    stop_sequences: [...params.stop_sequences],
    anthropic_version: params.anthropic_version,
  };
}

function chatBody(params: ChatParameters, defaults: ClientDefaults): JsonObject {
  // `n` and `user` are never sent; `stop` is the alias of `stop_sequences`.
  const stopSequences = params.stop_sequences ?? params.stop;

  const candidate: Record<string, JsonValue | undefined> = {
    model: params.model ?? defaults.chatModel,
    messages: params.messages.map((m) => ({ role: m.role, content: m.content })),
    system: params.system,
    max_tokens: params.max_tokens ?? defaults.params.max_tokens_to_sample,
    stop_sequences: stopSequences,
    temperature: params.temperature,
    top_p: params.top_p,
    top_k: params.top_k,
    metadata: params.metadata,
    tools: params.tools,
    tool_choice: params.tool_choice,
    anthropic_version: params.anthropic_version ?? defaults.params.anthropic_version,
  };

  const body: JsonObject = {};
  for (const [key, value] of Object.entries(candidate)) {
    if (value !== undefined) body[key] = value;
  }
  return body;
}

export const anthropicVariant: ProviderVariant = {
  id: 'anthropic',
  completionBody,
  chatBody,
  parseResponse: (raw) => new AnthropicResponse(raw),
};
