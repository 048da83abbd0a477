/**
 * Provider variant registry.
 *
 * Maps provider ids to the variant that builds their wire bodies and wraps
 * their responses. Adding a provider means adding one variant file and
 * registering it here.
 */

import { UnsupportedProviderError } from '@sluice/core';
import type { JsonObject, Operation } from '@sluice/core';

import type { ProviderId } from './capabilities.js';
import type { CanonicalParameters, ChatParameters, ClientDefaults } from './params.js';
import type { ModelResponse } from './responses.js';
import { anthropicVariant } from './anthropic.js';
import { cohereVariant } from './cohere.js';
import { ai21Variant } from './ai21.js';
import { titanVariant } from './titan.js';

// ---------------------------------------------------------------------------
// Variant contract
// ---------------------------------------------------------------------------

export interface ProviderVariant {
  readonly id: ProviderId;
  /** Body for a single-shot text completion; `prompt` is the caller's raw text. */
  completionBody?(params: CanonicalParameters, prompt: string): JsonObject;
  /** Body for a chat call, including the resolved `model`. */
  chatBody?(params: ChatParameters, defaults: ClientDefaults): JsonObject;
  embeddingBody?(text: string, extra: JsonObject): JsonObject;
  parseResponse(raw: JsonObject): ModelResponse;
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class ProviderVariantRegistry {
  private readonly variants = new Map<string, ProviderVariant>();

  /**
   * Register a variant under its id.
   * If a variant with the same id already exists, it is replaced.
   */
  register(variant: ProviderVariant): void {
    this.variants.set(variant.id, variant);
  }

  /**
   * Get a variant by provider id.
   * Throws UnsupportedProviderError if none is registered.
   */
  get(provider: string, operation: Operation): ProviderVariant {
    const variant = this.variants.get(provider);
    if (!variant) {
      throw new UnsupportedProviderError(
        provider,
        operation,
        `No provider variant registered for "${provider}". Available: ${[...this.variants.keys()].join(', ') || '(none)'}`,
      );
    }
    return variant;
  }

  has(provider: string): boolean {
    return this.variants.has(provider);
  }

  list(): string[] {
    return [...this.variants.keys()];
  }
}

export function createDefaultRegistry(): ProviderVariantRegistry {
  const registry = new ProviderVariantRegistry();
  registry.register(anthropicVariant);
  registry.register(cohereVariant);
  registry.register(ai21Variant);
  registry.register(titanVariant);
  return registry;
}

export const defaultRegistry = createDefaultRegistry();

/**
 * Wrap a decoded body in the provider's typed response.
 */
export function parseResponse(
  provider: string,
  raw: JsonObject,
  operation: Operation,
  registry: ProviderVariantRegistry = defaultRegistry,
): ModelResponse {
  return registry.get(provider, operation).parseResponse(raw);
}
