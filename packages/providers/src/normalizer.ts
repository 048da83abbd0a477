/**
 * ParameterNormalizer: canonical parameters in, provider wire body out.
 *
 * Every check that can be made without the network happens here, so a
 * misuse never reaches the invoker.
 */

import {
  InvalidRequestError,
  UnsupportedModelError,
  UnsupportedProviderError,
} from '@sluice/core';
import type { JsonObject, Operation } from '@sluice/core';

import { isChatOnlyModel, supports } from './capabilities.js';
import { deepFreeze } from './json.js';
import { mergeParameters } from './params.js';
import type { ChatParameters, ClientDefaults, CompletionOverrides } from './params.js';
import { defaultRegistry } from './registry.js';
import type { ProviderVariant, ProviderVariantRegistry } from './registry.js';

export type NormalizeRequest =
  | { operation: 'completion'; prompt: string; overrides?: CompletionOverrides }
  | { operation: 'chat'; params: ChatParameters }
  | { operation: 'embedding'; text: string; extra?: JsonObject };

/** A frozen provider-specific body. */
export type WirePayload = Readonly<JsonObject>;

/** Empty or missing `messages` is rejected before anything else, for every provider. */
export function assertMessages(params: ChatParameters): void {
  if (!Array.isArray(params.messages) || params.messages.length === 0) {
    throw new InvalidRequestError('messages argument is required', 'messages');
  }
}

export class ParameterNormalizer {
  constructor(
    private readonly defaults: ClientDefaults,
    private readonly registry: ProviderVariantRegistry = defaultRegistry,
  ) {}

  normalize(provider: string, request: NormalizeRequest): WirePayload {
    if (request.operation === 'chat') {
      assertMessages(request.params);
    }
    const variant = this.resolve(provider, request.operation);

    switch (request.operation) {
      case 'completion': {
        const model = this.defaults.completionModel;
        if (isChatOnlyModel(model)) {
          throw new UnsupportedModelError(
            model,
            'completion',
            `Model "${model}" only supports chat`,
          );
        }
        const build = this.require(variant, variant.completionBody, 'completion');
        const params = mergeParameters(this.defaults.params, request.overrides);
        return deepFreeze(structuredClone(build(params, request.prompt)));
      }

      case 'chat': {
        const build = this.require(variant, variant.chatBody, 'chat');
        return deepFreeze(structuredClone(build(request.params, this.defaults)));
      }

      case 'embedding': {
        const build = this.require(variant, variant.embeddingBody, 'embedding');
        return deepFreeze(structuredClone(build(request.text, request.extra ?? {})));
      }
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private resolve(provider: string, operation: Operation): ProviderVariant {
    if (!supports(operation, provider)) {
      throw new UnsupportedProviderError(provider, operation);
    }
    return this.registry.get(provider, operation);
  }

  private require<F>(variant: ProviderVariant, builder: F | undefined, operation: Operation): F {
    if (!builder) {
      throw new UnsupportedProviderError(variant.id, operation);
    }
    return builder;
  }
}
