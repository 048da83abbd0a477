/**
 * IObserver: observability contract
 *
 * Receives one event per outgoing request and per finished invocation, plus
 * every error surfaced to a caller.
 */

import type { Operation } from '../errors/index.js';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface RequestEvent {
  provider: string;
  model: string;
  operation: Operation;
  streaming: boolean;
  /** Serialized body length in bytes. */
  bodyLength: number;
}

export interface InvocationEvent {
  provider: string;
  model: string;
  operation: Operation;
  streaming: boolean;
  duration: number;
  usage?: TokenUsage;
  stopReason?: string;
  /** Number of stream chunks received; only set for streaming calls. */
  chunks?: number;
}

export interface IObserver {
  onRequest(event: RequestEvent): void;
  onInvocation(event: InvocationEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
