/**
 * NoopObserver: silent observer that discards all events.
 *
 * The default for clients built without an observer.
 */

import type { IObserver, RequestEvent, InvocationEvent } from '@sluice/core';

export class NoopObserver implements IObserver {
  onRequest(_event: RequestEvent): void {
    // intentionally empty
  }

  onInvocation(_event: InvocationEvent): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
