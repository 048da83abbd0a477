/**
 * ConsoleObserver: structured console logging with ANSI color coding.
 *
 * Formats request and invocation events as human-readable console output,
 * respecting the configured log level. Invocations include duration, token
 * usage and the stop reason.
 */

import type {
  IObserver,
  RequestEvent,
  InvocationEvent,
} from '@sluice/core';

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export class ConsoleObserver implements IObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'info') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  }

  // ---- IObserver ----------------------------------------------------------

  onRequest(event: RequestEvent): void {
    if (!this.shouldLog('debug')) return;
    const ts = this.timestamp();
    console.log(
      `${DIM}${ts}${RESET} ${this.tag('REQUEST', FG.cyan)} ${BOLD}${event.model}${RESET}` +
        ` ${DIM}provider=${RESET}${event.provider}` +
        ` ${DIM}op=${RESET}${event.operation}` +
        (event.streaming ? ` ${FG.magenta}stream${RESET}` : '') +
        ` ${DIM}bytes=${RESET}${event.bodyLength}`,
    );
  }

  onInvocation(event: InvocationEvent): void {
    if (!this.shouldLog('info')) return;
    const ts = this.timestamp();
    const usage = event.usage
      ? ` ${DIM}tokens=${RESET}${event.usage.inputTokens + event.usage.outputTokens}` +
        ` (${event.usage.inputTokens}/${event.usage.outputTokens})`
      : '';
    const chunks = event.chunks !== undefined ? ` ${DIM}chunks=${RESET}${event.chunks}` : '';
    const stop = event.stopReason ? ` ${DIM}stop=${RESET}${event.stopReason}` : '';
    console.log(
      `${DIM}${ts}${RESET} ${this.tag('LLM', FG.blue)} ${FG.green}OK${RESET}` +
        ` ${BOLD}${event.model}${RESET}` +
        ` ${DIM}provider=${RESET}${event.provider}` +
        ` ${DIM}op=${RESET}${event.operation}` +
        usage +
        chunks +
        stop +
        ` ${DIM}duration=${RESET}${this.formatDuration(event.duration)}`,
    );
  }

  onError(error: Error, context: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const ts = this.timestamp();
    const ctx = Object.keys(context).length > 0 ? ` ${DIM}ctx=${RESET}${JSON.stringify(context)}` : '';
    console.error(
      `${DIM}${ts}${RESET} ${this.tag('ERROR', FG.red)} ${BOLD}${error.name}${RESET}: ${error.message}${ctx}`,
    );
  }

  async flush(): Promise<void> {
    // Console output is unbuffered; nothing to flush.
  }
}
