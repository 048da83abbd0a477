/**
 * BedrockClient: the caller-facing dispatcher.
 *
 * Each call resolves the provider family from the model id, lets the
 * ParameterNormalizer validate and build the wire body, hands the body to
 * the invoker and wraps the decoded result in the provider's response type.
 * Streamed chat chunks are forwarded to the caller's callback and folded
 * into a StreamReassembler in arrival order.
 *
 * No retries. Whatever the invoker or the stream throws reaches the caller,
 * after the observer has seen it.
 */

import { MalformedResponseError } from '@sluice/core';
import type {
  IModelInvoker,
  IObserver,
  InvocationEvent,
  JsonObject,
  Operation,
} from '@sluice/core';
import { NoopObserver } from '@sluice/observability';

import { providerForModel } from './capabilities.js';
import { decodeJson, decodeStreamChunk, encodeJson } from './json.js';
import { ParameterNormalizer } from './normalizer.js';
import type { NormalizeRequest, WirePayload } from './normalizer.js';
import { buildClientDefaults } from './params.js';
import type { ChatParameters, ClientDefaults, CompletionOverrides } from './params.js';
import { StreamReassembler } from './reassembler.js';
import type { StreamChunk } from './stream-events.js';
import { defaultRegistry, parseResponse } from './registry.js';
import type { ProviderVariantRegistry } from './registry.js';
import { AnthropicResponse, TitanEmbeddingResponse } from './responses.js';
import type { ModelResponse } from './responses.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BedrockClientOptions {
  invoker: IModelInvoker;
  observer?: IObserver;
  completionModel?: string;
  chatModel?: string;
  embeddingModel?: string;
  /** Construction-time overrides of the canonical completion parameters. */
  defaultOptions?: CompletionOverrides;
  registry?: ProviderVariantRegistry;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export type ChunkCallback = (chunk: StreamChunk) => void;

const JSON_CONTENT_TYPE = 'application/json';

interface CallResult {
  response: ModelResponse;
  /** Chunks received; streaming calls only. */
  chunks?: number;
}

interface CallTarget {
  provider: string;
  model: string;
  operation: Operation;
  streaming: boolean;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class BedrockClient {
  readonly defaults: ClientDefaults;

  private readonly invoker: IModelInvoker;
  private readonly observer: IObserver;
  private readonly registry: ProviderVariantRegistry;
  private readonly normalizer: ParameterNormalizer;

  constructor(options: BedrockClientOptions) {
    this.invoker = options.invoker;
    this.observer = options.observer ?? new NoopObserver();
    this.registry = options.registry ?? defaultRegistry;
    this.defaults = buildClientDefaults(
      {
        completionModel: options.completionModel,
        chatModel: options.chatModel,
        embeddingModel: options.embeddingModel,
      },
      options.defaultOptions,
    );
    this.normalizer = new ParameterNormalizer(this.defaults, this.registry);
  }

  /** Single-shot text completion with the configured completion model. */
  async complete(
    prompt: string,
    overrides: CompletionOverrides = {},
    opts: CallOptions = {},
  ): Promise<ModelResponse> {
    const model = this.defaults.completionModel;
    const target: CallTarget = {
      provider: providerForModel(model),
      model,
      operation: 'completion',
      streaming: false,
    };

    return this.track(target, async () => {
      const body = this.normalize(target.provider, { operation: 'completion', prompt, overrides });
      return this.invokeOnce(target, body, opts);
    });
  }

  /**
   * Messages API chat. With `onChunk` the call streams: every chunk reaches
   * the callback before it is folded, and the promise resolves with the
   * reassembled message once the stream ends.
   */
  async chat(
    params: ChatParameters,
    onChunk?: ChunkCallback,
    opts: CallOptions = {},
  ): Promise<AnthropicResponse> {
    const model = params.model ?? this.defaults.chatModel;
    const target: CallTarget = {
      provider: providerForModel(model),
      model,
      operation: 'chat',
      streaming: onChunk !== undefined,
    };

    const response = await this.track(target, async () => {
      const payload = this.normalize(target.provider, { operation: 'chat', params });
      const { model: bodyModel, ...body } = payload;
      const modelId = typeof bodyModel === 'string' ? bodyModel : model;
      const routed = { ...target, model: modelId };

      return onChunk
        ? this.invokeStreaming(routed, body, onChunk, opts)
        : this.invokeOnce(routed, body, opts);
    });

    if (!(response instanceof AnthropicResponse)) {
      throw new MalformedResponseError('Chat response is not a Messages API response', {
        provider: response.provider,
      });
    }
    return response;
  }

  /** Single-shot embedding with the configured embedding model. */
  async embed(
    text: string,
    extra: JsonObject = {},
    opts: CallOptions = {},
  ): Promise<TitanEmbeddingResponse> {
    const model = this.defaults.embeddingModel;
    const target: CallTarget = {
      provider: providerForModel(model),
      model,
      operation: 'embedding',
      streaming: false,
    };

    const response = await this.track(target, async () => {
      const body = this.normalize(target.provider, { operation: 'embedding', text, extra });
      return this.invokeOnce(target, body, opts);
    });

    if (!(response instanceof TitanEmbeddingResponse)) {
      throw new MalformedResponseError('Embedding response is not an embedding', {
        provider: response.provider,
      });
    }
    return response;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private normalize(provider: string, request: NormalizeRequest): WirePayload {
    return this.normalizer.normalize(provider, request);
  }

  private async invokeOnce(
    target: CallTarget,
    body: JsonObject,
    opts: CallOptions,
  ): Promise<CallResult> {
    const serialized = encodeJson(body);
    this.reportRequest(target, serialized);

    const bytes = await this.invoker.invoke({
      modelId: target.model,
      body: serialized,
      contentType: JSON_CONTENT_TYPE,
      accept: JSON_CONTENT_TYPE,
      signal: opts.signal,
    });

    const raw = decodeJson(bytes);
    return { response: parseResponse(target.provider, raw, target.operation, this.registry) };
  }

  private async invokeStreaming(
    target: CallTarget,
    body: JsonObject,
    onChunk: ChunkCallback,
    opts: CallOptions,
  ): Promise<CallResult> {
    const serialized = encodeJson(body);
    this.reportRequest(target, serialized);

    const reassembler = new StreamReassembler();
    const stream = this.invoker.invokeStream({
      modelId: target.model,
      body: serialized,
      contentType: JSON_CONTENT_TYPE,
      accept: JSON_CONTENT_TYPE,
      signal: opts.signal,
    });

    for await (const bytes of stream) {
      const chunk = decodeStreamChunk(bytes);
      onChunk(chunk);
      reassembler.push(chunk);
    }

    const message = reassembler.finalize();
    return {
      response: parseResponse(target.provider, message, target.operation, this.registry),
      chunks: reassembler.chunkCount,
    };
  }

  private reportRequest(target: CallTarget, serialized: string): void {
    this.observer.onRequest({
      provider: target.provider,
      model: target.model,
      operation: target.operation,
      streaming: target.streaming,
      bodyLength: Buffer.byteLength(serialized, 'utf8'),
    });
  }

  /** Time a call, report its outcome, and rethrow failures unchanged. */
  private async track(
    target: CallTarget,
    run: () => Promise<CallResult>,
  ): Promise<ModelResponse> {
    const startTime = Date.now();
    try {
      const result = await run();
      this.observer.onInvocation(invocationEvent(target, result, Date.now() - startTime));
      return result.response;
    } catch (err) {
      this.observer.onError(err instanceof Error ? err : new Error(String(err)), {
        provider: target.provider,
        model: target.model,
        operation: target.operation,
        streaming: target.streaming,
      });
      throw err;
    }
  }
}

function invocationEvent(
  target: CallTarget,
  { response, chunks }: CallResult,
  duration: number,
): InvocationEvent {
  const inputTokens = response.promptTokens;
  const outputTokens = response.completionTokens;

  return {
    provider: target.provider,
    model: target.model,
    operation: target.operation,
    streaming: target.streaming,
    duration,
    usage:
      inputTokens === undefined && outputTokens === undefined
        ? undefined
        : { inputTokens: inputTokens ?? 0, outputTokens: outputTokens ?? 0 },
    stopReason: response.stopReason,
    chunks,
  };
}
