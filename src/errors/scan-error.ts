import { HolsterError } from './holster-error';
import { ErrorContext } from './types';

export class ScanTimeoutError extends HolsterError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, context: ErrorContext = {}) {
    super({
      message: `Directory scan exceeded its ${timeoutMs}ms deadline`,
      code: 'SCAN_TIMEOUT',
      category: 'scan',
      context: { ...context, timeoutMs },
      retryable: true,
    });
    this.timeoutMs = timeoutMs;
  }
}
