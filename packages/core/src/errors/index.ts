/**
 * Error hierarchy for sluice.
 *
 * Every error carries a stable machine-readable `code` and an optional
 * structured `context`. Subclasses that are tied to a provider, model or
 * request field fold that value into the context so loggers can serialize a
 * single object.
 */

export type Operation = 'completion' | 'chat' | 'embedding';

export class SluiceError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

// ---------------------------------------------------------------------------
// Provider / model errors
// ---------------------------------------------------------------------------

export class ProviderError extends SluiceError {
  readonly provider: string;

  constructor(
    message: string,
    provider: string,
    context?: Record<string, unknown>,
    code = 'PROVIDER_ERROR',
  ) {
    super(message, code, { ...context, provider });
    this.provider = provider;
  }
}

/** The provider is not in the support set of the requested operation. */
export class UnsupportedProviderError extends ProviderError {
  readonly operation: Operation;

  constructor(provider: string, operation: Operation, message?: string) {
    super(
      message ?? `Provider "${provider}" does not support ${operation}`,
      provider,
      { operation },
      'UNSUPPORTED_PROVIDER',
    );
    this.operation = operation;
  }
}

/** The model cannot serve the requested operation, e.g. a chat-only model used for completion. */
export class UnsupportedModelError extends SluiceError {
  readonly model: string;
  readonly operation: Operation;

  constructor(model: string, operation: Operation, message?: string) {
    super(
      message ?? `Model "${model}" does not support ${operation}`,
      'UNSUPPORTED_MODEL',
      { model, operation },
    );
    this.model = model;
    this.operation = operation;
  }
}

// ---------------------------------------------------------------------------
// Request / response shape errors
// ---------------------------------------------------------------------------

export class InvalidRequestError extends SluiceError {
  readonly field: string;

  constructor(message: string, field: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', { ...context, field });
    this.field = field;
  }
}

export class MalformedStreamError extends SluiceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MALFORMED_STREAM', context);
  }
}

export class MalformedResponseError extends SluiceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MALFORMED_RESPONSE', context);
  }
}

// ---------------------------------------------------------------------------
// Transport / config errors
// ---------------------------------------------------------------------------

export class InvocationError extends SluiceError {
  readonly status?: number;

  constructor(message: string, context?: Record<string, unknown> & { status?: number }) {
    super(message, 'INVOCATION_ERROR', context);
    this.status = context?.status;
  }
}

export class ConfigError extends SluiceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
  }
}
