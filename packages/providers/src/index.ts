/**
 * @sluice/providers: Bedrock model families behind one request shape.
 */

export { BedrockClient } from './bedrock.js';
export type { BedrockClientOptions, CallOptions, ChunkCallback } from './bedrock.js';

export {
  PROVIDER_IDS,
  isChatOnlyModel,
  isProviderId,
  providerForModel,
  supportedProviders,
  supports,
} from './capabilities.js';
export type { ProviderId } from './capabilities.js';

export {
  DEFAULT_MODELS,
  DEFAULT_PARAMETERS,
  buildClientDefaults,
  mergeParameters,
} from './params.js';
export type {
  CanonicalParameters,
  ChatMessage,
  ChatParameters,
  ClientDefaults,
  CompletionOverrides,
  ModelNames,
  PenaltySettings,
} from './params.js';

export { ParameterNormalizer, assertMessages } from './normalizer.js';
export type { NormalizeRequest, WirePayload } from './normalizer.js';

export {
  ProviderVariantRegistry,
  createDefaultRegistry,
  defaultRegistry,
  parseResponse,
} from './registry.js';
export type { ProviderVariant } from './registry.js';

export {
  AI21Response,
  AnthropicResponse,
  CohereResponse,
  ModelResponse,
  TitanEmbeddingResponse,
} from './responses.js';
export type { ToolCall } from './responses.js';

export {
  StreamReassembler,
  applyStreamChunk,
  createAccumulator,
  finalizeStream,
  reassembleStream,
} from './reassembler.js';
export type { RawMessage, StreamAccumulator } from './reassembler.js';
export type { StreamChunk, StreamEvent } from './stream-events.js';

export { decodeJson, encodeJson, parsePartialJson } from './json.js';

export { FetchInvoker } from './invoker.js';
export type { FetchInvokerConfig } from './invoker.js';
export { EventStreamDecoder } from './event-stream.js';
export { signRequest } from './sigv4.js';
export type { AwsCredentials } from './sigv4.js';

export { createClientFromConfig, getDefaultConfig, loadConfig } from './config.js';
export type { LoadConfigOptions, SluiceConfig } from './config.js';
