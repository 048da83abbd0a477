import { vi } from 'vitest';
import { MultiObserver } from './multi-observer.js';
import type { IObserver, InvocationEvent } from '@sluice/core';

function makeMockObserver(): IObserver {
  return {
    onRequest: vi.fn(),
    onInvocation: vi.fn(),
    onError: vi.fn(),
    flush: vi.fn(async () => {}),
  };
}

const invocation: InvocationEvent = {
  provider: 'ai21',
  model: 'ai21.j2-ultra-v1',
  operation: 'completion',
  streaming: false,
  duration: 10,
};

describe('MultiObserver', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('forwards every event to every child', () => {
    const a = makeMockObserver();
    const b = makeMockObserver();
    const multi = new MultiObserver([a, b]);
    const err = new Error('x');

    multi.onInvocation(invocation);
    multi.onError(err, { k: 1 });

    for (const child of [a, b]) {
      expect(child.onInvocation).toHaveBeenCalledWith(invocation);
      expect(child.onError).toHaveBeenCalledWith(err, { k: 1 });
    }
  });

  it('keeps forwarding when one child throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const broken = makeMockObserver();
    vi.mocked(broken.onInvocation).mockImplementation(() => {
      throw new Error('broken');
    });
    const healthy = makeMockObserver();

    new MultiObserver([broken, healthy]).onInvocation(invocation);

    expect(healthy.onInvocation).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith(
      '[MultiObserver] child observer threw:',
      expect.any(Error),
    );
  });

  it('flushes all children and tolerates flush failures', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const a: IObserver = {
      ...makeMockObserver(),
      flush: vi.fn(async () => {
        throw new Error('disk full');
      }),
    };
    const b = makeMockObserver();

    await new MultiObserver([a, b]).flush();

    expect(b.flush).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
