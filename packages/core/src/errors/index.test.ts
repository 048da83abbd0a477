import {
  SluiceError,
  ProviderError,
  UnsupportedProviderError,
  UnsupportedModelError,
  InvalidRequestError,
  MalformedStreamError,
  MalformedResponseError,
  InvocationError,
  ConfigError,
} from './index.js';

// ─── SluiceError (base class) ───────────────────────────────────────────────

describe('SluiceError', () => {
  it('creates an error with message and code', () => {
    const err = new SluiceError('something failed', 'SOME_CODE');
    expect(err.message).toBe('something failed');
    expect(err.code).toBe('SOME_CODE');
    expect(err.context).toBeUndefined();
  });

  it('creates an error with optional context', () => {
    const ctx = { key: 'value', num: 42 };
    const err = new SluiceError('failed', 'CODE', ctx);
    expect(err.context).toEqual(ctx);
  });

  it('sets name to SluiceError', () => {
    expect(new SluiceError('msg', 'CODE').name).toBe('SluiceError');
  });

  it('extends Error', () => {
    const err = new SluiceError('msg', 'CODE');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(SluiceError);
  });

  it('has a stack trace', () => {
    const err = new SluiceError('msg', 'CODE');
    expect(err.stack).toContain('SluiceError');
  });
});

// ─── ProviderError ───────────────────────────────────────────────────────────

describe('ProviderError', () => {
  it('sets code to PROVIDER_ERROR', () => {
    expect(new ProviderError('failed', 'cohere').code).toBe('PROVIDER_ERROR');
  });

  it('stores the provider name', () => {
    expect(new ProviderError('failed', 'ai21').provider).toBe('ai21');
  });

  it('merges provider into context', () => {
    const err = new ProviderError('failed', 'anthropic', { status: 429 });
    expect(err.context).toEqual({ status: 429, provider: 'anthropic' });
  });
});

// ─── UnsupportedProviderError ───────────────────────────────────────────────

describe('UnsupportedProviderError', () => {
  it('is a ProviderError with its own code', () => {
    const err = new UnsupportedProviderError('meta', 'completion');
    expect(err).toBeInstanceOf(ProviderError);
    expect(err.code).toBe('UNSUPPORTED_PROVIDER');
    expect(err.name).toBe('UnsupportedProviderError');
  });

  it('builds a default message from provider and operation', () => {
    const err = new UnsupportedProviderError('cohere', 'chat');
    expect(err.message).toBe('Provider "cohere" does not support chat');
    expect(err.context).toEqual({ operation: 'chat', provider: 'cohere' });
  });
});

// ─── UnsupportedModelError ──────────────────────────────────────────────────

describe('UnsupportedModelError', () => {
  it('stores model and operation', () => {
    const err = new UnsupportedModelError('anthropic.claude-3-haiku', 'completion');
    expect(err.code).toBe('UNSUPPORTED_MODEL');
    expect(err.model).toBe('anthropic.claude-3-haiku');
    expect(err.operation).toBe('completion');
    expect(err.message).toBe('Model "anthropic.claude-3-haiku" does not support completion');
  });
});

// ─── Shape errors ───────────────────────────────────────────────────────────

describe('InvalidRequestError', () => {
  it('merges field into context', () => {
    const err = new InvalidRequestError('messages argument is required', 'messages');
    expect(err.code).toBe('INVALID_REQUEST');
    expect(err.field).toBe('messages');
    expect(err.context).toEqual({ field: 'messages' });
  });
});

describe('MalformedStreamError / MalformedResponseError', () => {
  it('use distinct codes', () => {
    expect(new MalformedStreamError('bad').code).toBe('MALFORMED_STREAM');
    expect(new MalformedResponseError('bad').code).toBe('MALFORMED_RESPONSE');
  });
});

describe('InvocationError', () => {
  it('lifts status out of the context', () => {
    const err = new InvocationError('throttled', { status: 429, modelId: 'm' });
    expect(err.status).toBe(429);
    expect(err.context).toEqual({ status: 429, modelId: 'm' });
  });

  it('leaves status undefined without context', () => {
    expect(new InvocationError('reset').status).toBeUndefined();
  });
});

// ─── Cross-cutting error behavior ───────────────────────────────────────────

describe('Error hierarchy', () => {
  const all = () => [
    new ProviderError('msg', 'p'),
    new UnsupportedProviderError('p', 'chat'),
    new UnsupportedModelError('m', 'completion'),
    new InvalidRequestError('msg', 'f'),
    new MalformedStreamError('msg'),
    new MalformedResponseError('msg'),
    new InvocationError('msg'),
    new ConfigError('msg'),
  ];

  it('all error subclasses are instances of SluiceError', () => {
    for (const err of all()) {
      expect(err).toBeInstanceOf(SluiceError);
      expect(err).toBeInstanceOf(Error);
    }
  });

  it('all error subclasses have distinct names and codes', () => {
    expect(new Set(all().map((e) => e.name)).size).toBe(8);
    expect(new Set(all().map((e) => e.code)).size).toBe(8);
  });

  it('errors serialize well with JSON.stringify on context', () => {
    const err = new ProviderError('rate limited', 'cohere', { retryAfter: 5 });
    const parsed = JSON.parse(
      JSON.stringify({ name: err.name, code: err.code, context: err.context }),
    );
    expect(parsed.name).toBe('ProviderError');
    expect(parsed.code).toBe('PROVIDER_ERROR');
    expect(parsed.context.provider).toBe('cohere');
  });
});
