/**
 * FetchInvoker: IModelInvoker over HTTPS.
 *
 * Calls the Bedrock runtime `InvokeModel` and
 * `InvokeModelWithResponseStream` endpoints with `fetch`, signs with SigV4
 * and unwraps the event-stream framing of streamed responses.
 */

import { z } from 'zod';
import { ConfigError, InvocationError, MalformedStreamError } from '@sluice/core';
import type { IModelInvoker, InvokeRequest } from '@sluice/core';

import { EventStreamDecoder } from './event-stream.js';
import type { EventStreamFrame } from './event-stream.js';
import { signRequest } from './sigv4.js';
import type { AwsCredentials } from './sigv4.js';

export interface FetchInvokerConfig {
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  /** Overrides `https://bedrock-runtime.{region}.amazonaws.com`. */
  baseUrl?: string;
}

const SERVICE = 'bedrock';

const chunkPayload = z.object({ bytes: z.string() });
const exceptionPayload = z.object({ message: z.string().optional() }).passthrough();

const textDecoder = new TextDecoder();

export class FetchInvoker implements IModelInvoker {
  private readonly region: string;
  private readonly baseUrl: string;
  private readonly credentials: AwsCredentials;

  constructor(config: FetchInvokerConfig) {
    if (!config.region) {
      throw new ConfigError('region is required', { field: 'region' });
    }
    if (!config.accessKeyId) {
      throw new ConfigError('accessKeyId is required', { field: 'accessKeyId' });
    }
    if (!config.secretAccessKey) {
      throw new ConfigError('secretAccessKey is required', { field: 'secretAccessKey' });
    }

    this.region = config.region;
    this.baseUrl = (config.baseUrl ?? `https://bedrock-runtime.${config.region}.amazonaws.com`).replace(/\/+$/, '');
    this.credentials = {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
      sessionToken: config.sessionToken,
    };
  }

  async invoke(request: InvokeRequest): Promise<Uint8Array> {
    const response = await this.send(request, 'invoke');
    return new Uint8Array(await response.arrayBuffer());
  }

  async *invokeStream(request: InvokeRequest): AsyncIterable<Uint8Array> {
    const response = await this.send(request, 'invoke-with-response-stream');
    if (!response.body) {
      throw new InvocationError('Streaming response has no body', { modelId: request.modelId });
    }

    const decoder = new EventStreamDecoder();
    const reader = response.body.getReader();
    let drained = false;
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        for (const frame of decoder.push(value)) {
          const chunk = unwrapFrame(frame, request.modelId);
          if (chunk) yield chunk;
        }
      }
      drained = true;
    } finally {
      // Close the connection when the loop exits before the body ends.
      if (!drained) await reader.cancel();
      reader.releaseLock();
    }

    if (decoder.pending > 0) {
      throw new MalformedStreamError('Stream ended inside an event frame', {
        pendingBytes: decoder.pending,
      });
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private endpoint(modelId: string, action: string): URL {
    return new URL(`${this.baseUrl}/model/${encodeURIComponent(modelId)}/${action}`);
  }

  private async send(request: InvokeRequest, action: string): Promise<Response> {
    const url = this.endpoint(request.modelId, action);
    const streaming = action !== 'invoke';
    const headers = signRequest(
      {
        method: 'POST',
        url,
        headers: streaming
          ? {
              'content-type': request.contentType,
              accept: 'application/vnd.amazon.eventstream',
              'x-amzn-bedrock-accept': request.accept,
            }
          : { 'content-type': request.contentType, accept: request.accept },
        body: request.body,
      },
      { region: this.region, service: SERVICE, credentials: this.credentials },
    );

    const response = await fetch(url, {
      method: 'POST',
      headers,
      body: request.body,
      signal: request.signal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new InvocationError(`Bedrock API error (${response.status}): ${text}`, {
        status: response.status,
        modelId: request.modelId,
      });
    }
    return response;
  }
}

/**
 * Turn one frame into chunk bytes. Returns undefined for frames that carry
 * no chunk (events of other types).
 */
export function unwrapFrame(frame: EventStreamFrame, modelId: string): Uint8Array | undefined {
  const messageType = frame.headers[':message-type'];

  if (messageType === 'exception') {
    const exceptionType = frame.headers[':exception-type'];
    throw new InvocationError(
      `Bedrock stream exception ${String(exceptionType)}: ${exceptionMessage(frame.payload)}`,
      { modelId, exceptionType: String(exceptionType) },
    );
  }
  if (messageType === 'error') {
    const errorCode = frame.headers[':error-code'];
    const errorMessage = frame.headers[':error-message'];
    throw new InvocationError(`Bedrock stream error ${String(errorCode)}: ${String(errorMessage)}`, {
      modelId,
      errorCode: String(errorCode),
    });
  }
  if (frame.headers[':event-type'] !== 'chunk') return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(textDecoder.decode(frame.payload));
  } catch (err) {
    throw new MalformedStreamError('Chunk frame payload is not valid JSON', {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const payload = chunkPayload.safeParse(parsed);
  if (!payload.success) {
    throw new MalformedStreamError('Chunk frame payload has no "bytes" field');
  }
  return new Uint8Array(Buffer.from(payload.data.bytes, 'base64'));
}

function exceptionMessage(payload: Uint8Array): string {
  const text = textDecoder.decode(payload);
  try {
    const parsed = exceptionPayload.safeParse(JSON.parse(text));
    return parsed.success && parsed.data.message ? parsed.data.message : text;
  } catch {
    return text;
  }
}
