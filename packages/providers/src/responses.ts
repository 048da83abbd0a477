/**
 * Typed response wrappers.
 *
 * Each wrapper holds the decoded body verbatim and exposes read-only
 * accessors for the fields its provider family returns. No wrapper
 * transforms the body.
 */

import { isJsonObject } from '@sluice/core';
import type { JsonObject, JsonValue } from '@sluice/core';

import type { ProviderId } from './capabilities.js';

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

function stringField(obj: JsonObject | undefined, key: string): string | undefined {
  const value = obj?.[key];
  return typeof value === 'string' ? value : undefined;
}

function numberField(obj: JsonObject | undefined, key: string): number | undefined {
  const value = obj?.[key];
  return typeof value === 'number' ? value : undefined;
}

function objectField(obj: JsonObject | undefined, key: string): JsonObject | undefined {
  const value = obj?.[key];
  return isJsonObject(value) ? value : undefined;
}

function objectList(value: JsonValue | undefined): JsonObject[] {
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export abstract class ModelResponse {
  abstract readonly provider: ProviderId;

  constructor(readonly raw: JsonObject) {}

  get model(): string | undefined {
    return stringField(this.raw, 'model');
  }

  get promptTokens(): number | undefined {
    return undefined;
  }

  get completionTokens(): number | undefined {
    return undefined;
  }

  get stopReason(): string | undefined {
    return undefined;
  }

  get totalTokens(): number | undefined {
    const prompt = this.promptTokens;
    const completion = this.completionTokens;
    if (prompt === undefined && completion === undefined) return undefined;
    return (prompt ?? 0) + (completion ?? 0);
  }
}

// ---------------------------------------------------------------------------
// Anthropic (text completions and Messages API)
// ---------------------------------------------------------------------------

export interface ToolCall {
  id: string;
  name: string;
  input: JsonObject;
}

export class AnthropicResponse extends ModelResponse {
  readonly provider = 'anthropic';

  /** Text of a legacy text-completion response. */
  get completion(): string | undefined {
    return stringField(this.raw, 'completion');
  }

  get completions(): string[] {
    const completion = this.completion;
    return completion === undefined ? [] : [completion];
  }

  get content(): JsonObject[] {
    return objectList(this.raw['content']);
  }

  /** Concatenated text of every text block of a Messages API response. */
  get chatCompletion(): string {
    return this.content
      .filter((block) => block['type'] === 'text')
      .map((block) => stringField(block, 'text') ?? '')
      .join('');
  }

  get toolCalls(): ToolCall[] {
    return this.content
      .filter((block) => block['type'] === 'tool_use')
      .map((block) => ({
        id: stringField(block, 'id') ?? '',
        name: stringField(block, 'name') ?? '',
        input: objectField(block, 'input') ?? {},
      }));
  }

  get role(): string | undefined {
    return stringField(this.raw, 'role');
  }

  override get stopReason(): string | undefined {
    return stringField(this.raw, 'stop_reason');
  }

  override get promptTokens(): number | undefined {
    return numberField(objectField(this.raw, 'usage'), 'input_tokens');
  }

  override get completionTokens(): number | undefined {
    return numberField(objectField(this.raw, 'usage'), 'output_tokens');
  }
}

// ---------------------------------------------------------------------------
// Cohere
// ---------------------------------------------------------------------------

export class CohereResponse extends ModelResponse {
  readonly provider = 'cohere';

  get completions(): string[] {
    return objectList(this.raw['generations']).map((g) => stringField(g, 'text') ?? '');
  }

  get completion(): string | undefined {
    return this.completions[0];
  }

  override get stopReason(): string | undefined {
    return stringField(objectList(this.raw['generations'])[0], 'finish_reason');
  }
}

// ---------------------------------------------------------------------------
// AI21 Jurassic
// ---------------------------------------------------------------------------

export class AI21Response extends ModelResponse {
  readonly provider = 'ai21';

  get completions(): string[] {
    return objectList(this.raw['completions']).map(
      (c) => stringField(objectField(c, 'data'), 'text') ?? '',
    );
  }

  get completion(): string | undefined {
    return this.completions[0];
  }

  override get stopReason(): string | undefined {
    const first = objectList(this.raw['completions'])[0];
    return stringField(objectField(first, 'finishReason'), 'reason');
  }

  override get promptTokens(): number | undefined {
    const tokens = objectField(this.raw, 'prompt')?.['tokens'];
    return Array.isArray(tokens) ? tokens.length : undefined;
  }
}

// ---------------------------------------------------------------------------
// Amazon Titan embeddings
// ---------------------------------------------------------------------------

export class TitanEmbeddingResponse extends ModelResponse {
  readonly provider = 'amazon';

  get embedding(): number[] {
    const value = this.raw['embedding'];
    return Array.isArray(value)
      ? value.filter((n): n is number => typeof n === 'number')
      : [];
  }

  get embeddings(): number[][] {
    return [this.embedding];
  }

  override get promptTokens(): number | undefined {
    return numberField(this.raw, 'inputTextTokenCount');
  }
}
