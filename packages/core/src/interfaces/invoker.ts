/**
 * IModelInvoker: the remote invocation collaborator.
 *
 * The dispatcher hands it a fully serialized body and gets bytes back. How
 * the bytes travel (signing, transport, framing) is the invoker's business.
 */

export interface InvokeRequest {
  modelId: string;
  body: string;
  contentType: string;
  accept: string;
  signal?: AbortSignal;
}

export interface IModelInvoker {
  /** Single-shot invocation. Resolves with the raw response body. */
  invoke(request: InvokeRequest): Promise<Uint8Array>;

  /**
   * Streaming invocation. Yields one serialized chunk per backend event, in
   * the order the backend produced them. The iterator either completes
   * normally after the last chunk or throws.
   */
  invokeStream(request: InvokeRequest): AsyncIterable<Uint8Array>;
}
