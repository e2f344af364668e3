/**
 * Cooperative deadlines for directory scans.
 *
 * Traversal code calls `check()` at every directory boundary and before each
 * file read; nothing here relies on timers or process signals.
 */

import { ScanTimeoutError } from '../errors/scan-error';

export class OperationAbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

function toAbortError(signal: AbortSignal, message?: string): Error {
  const fallback = message ?? 'Operation aborted';
  const reason: unknown = signal.reason;

  if (reason instanceof Error) {
    return reason;
  }

  if (typeof reason === 'string' && reason.trim().length > 0) {
    return new OperationAbortedError(reason);
  }

  return new OperationAbortedError(fallback);
}

export function throwIfAborted(signal?: AbortSignal, message?: string): void {
  if (!signal || !signal.aborted) {
    return;
  }
  throw toAbortError(signal, message);
}

export interface DeadlineOptions {
  /** Cancellation from the caller (e.g. the MCP request signal) */
  signal?: AbortSignal;
  /** Clock override for tests */
  now?: () => number;
}

export class ScanDeadline {
  private readonly startedAt: number;
  private readonly now: () => number;
  private readonly signal?: AbortSignal;

  /**
   * @param timeoutMs - Wall-clock budget for the whole call; 0 means unbounded
   */
  constructor(
    public readonly timeoutMs: number,
    options: DeadlineOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.signal = options.signal;
    this.startedAt = this.now();
  }

  static unbounded(signal?: AbortSignal): ScanDeadline {
    return new ScanDeadline(0, { signal });
  }

  get elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  get expired(): boolean {
    return this.timeoutMs > 0 && this.elapsedMs > this.timeoutMs;
  }

  check(): void {
    throwIfAborted(this.signal, 'Scan cancelled by caller');
    if (this.expired) {
      throw new ScanTimeoutError(this.timeoutMs, { elapsedMs: this.elapsedMs });
    }
  }
}

/**
 * Deadline for one tool call: the caller's `timeoutMs` when given,
 * otherwise the configured default.
 */
export function deadlineFor(
  timeoutMs: number | undefined,
  defaultTimeoutMs: number,
  signal?: AbortSignal
): ScanDeadline {
  return new ScanDeadline(timeoutMs ?? defaultTimeoutMs, { signal });
}
