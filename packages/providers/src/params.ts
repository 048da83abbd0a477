/**
 * Canonical request parameters and their defaults.
 *
 * Canonical keys are the same for every provider; each provider variant
 * renames and nests them for its own wire format.
 */

import type { JsonObject, JsonValue } from '@sluice/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PenaltySettings {
  scale: number;
  apply_to_whitespaces: boolean;
  apply_to_punctuations: boolean;
  apply_to_numbers: boolean;
  apply_to_stopwords: boolean;
  apply_to_emojis: boolean;
}

export interface CanonicalParameters {
  max_tokens_to_sample: number;
  temperature: number;
  top_k: number;
  top_p: number;
  stop_sequences: readonly string[];
  anthropic_version: string;
  return_likelihoods: string;
  count_penalty: PenaltySettings;
  presence_penalty: PenaltySettings;
  frequency_penalty: PenaltySettings;
}

/** Per-call overrides. Penalty objects are replaced whole, never field by field. */
export type CompletionOverrides = Partial<CanonicalParameters>;

export interface ModelNames {
  completionModel: string;
  chatModel: string;
  embeddingModel: string;
}

/** Everything a client fixes at construction time. */
export interface ClientDefaults extends ModelNames {
  params: CanonicalParameters;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string | JsonValue[];
}

/** Unified chat parameters, shaped after the Anthropic Messages API. */
export interface ChatParameters {
  messages: ChatMessage[];
  system?: string | JsonValue[];
  model?: string;
  max_tokens?: number;
  stop?: string[];
  stop_sequences?: string[];
  temperature?: number;
  top_p?: number;
  top_k?: number;
  metadata?: JsonObject;
  tools?: JsonObject[];
  tool_choice?: JsonObject;
  anthropic_version?: string;
  /** Accepted for interface parity, never sent. */
  n?: number;
  /** Accepted for interface parity, never sent. */
  user?: string;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

const NO_PENALTY: PenaltySettings = Object.freeze({
  scale: 0,
  apply_to_whitespaces: false,
  apply_to_punctuations: false,
  apply_to_numbers: false,
  apply_to_stopwords: false,
  apply_to_emojis: false,
});

export const DEFAULT_PARAMETERS: CanonicalParameters = Object.freeze({
  max_tokens_to_sample: 300,
  temperature: 1,
  top_k: 250,
  top_p: 0.999,
  stop_sequences: Object.freeze(['\n\nHuman:']),
  anthropic_version: 'bedrock-2023-05-31',
  return_likelihoods: 'NONE',
  count_penalty: NO_PENALTY,
  presence_penalty: NO_PENALTY,
  frequency_penalty: NO_PENALTY,
});

export const DEFAULT_MODELS: ModelNames = Object.freeze({
  completionModel: 'anthropic.claude-v2',
  chatModel: 'anthropic.claude-3-sonnet-20240229-v1:0',
  embeddingModel: 'amazon.titan-embed-text-v1',
});

// ---------------------------------------------------------------------------
// Merging
// ---------------------------------------------------------------------------

/**
 * Shallow merge of overrides onto a base parameter set. Keys whose override
 * is `undefined` keep the base value. Neither argument is modified.
 */
export function mergeParameters(
  base: CanonicalParameters,
  overrides: CompletionOverrides = {},
): CanonicalParameters {
  return Object.freeze({
    max_tokens_to_sample: overrides.max_tokens_to_sample ?? base.max_tokens_to_sample,
    temperature: overrides.temperature ?? base.temperature,
    top_k: overrides.top_k ?? base.top_k,
    top_p: overrides.top_p ?? base.top_p,
    stop_sequences: overrides.stop_sequences ?? base.stop_sequences,
    anthropic_version: overrides.anthropic_version ?? base.anthropic_version,
    return_likelihoods: overrides.return_likelihoods ?? base.return_likelihoods,
    count_penalty: overrides.count_penalty ?? base.count_penalty,
    presence_penalty: overrides.presence_penalty ?? base.presence_penalty,
    frequency_penalty: overrides.frequency_penalty ?? base.frequency_penalty,
  });
}

/** Build the construction-time defaults for a client. */
export function buildClientDefaults(
  models: Partial<ModelNames> = {},
  defaultOptions: CompletionOverrides = {},
): ClientDefaults {
  return Object.freeze({
    completionModel: models.completionModel ?? DEFAULT_MODELS.completionModel,
    chatModel: models.chatModel ?? DEFAULT_MODELS.chatModel,
    embeddingModel: models.embeddingModel ?? DEFAULT_MODELS.embeddingModel,
    params: mergeParameters(DEFAULT_PARAMETERS, defaultOptions),
  });
}
