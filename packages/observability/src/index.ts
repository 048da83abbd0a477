/**
 * @sluice/observability: structured observability for sluice.
 *
 * Re-exports every observer implementation and the factory registry.
 */

export { ConsoleObserver, LOG_LEVELS } from './console-observer.js';
export type { LogLevel } from './console-observer.js';

export { MultiObserver } from './multi-observer.js';
export { NoopObserver } from './noop-observer.js';

export { createObserver } from './registry.js';
export type { ObservabilityConfig } from './registry.js';
