import {
  ErrorCategory,
  ErrorCode,
  ErrorContext,
  ErrorSeverity,
  HolsterErrorOptions,
  SerializedError,
} from './types';

const HIDDEN_CATEGORIES: ReadonlySet<ErrorCategory> = new Set(['internal', 'unknown']);

/**
 * Base error for every failure the server reports by name.
 *
 * Registry, store, scan and validation failures are `exposable`: their
 * message goes back to the MCP client as a tool error. Internal failures are
 * logged and replaced by a generic message.
 */
export class HolsterError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly retryable: boolean;
  public context?: ErrorContext;
  public readonly cause?: unknown;

  constructor(options: HolsterErrorOptions) {
    super(options.message);
    this.name = new.target.name;
    this.code = options.code;
    this.category = options.category;
    this.severity = options.severity ?? 'error';
    this.retryable = options.retryable ?? false;
    this.context = options.context;
    this.cause = options.cause;
  }

  get exposable(): boolean {
    return !HIDDEN_CATEGORIES.has(this.category);
  }

  get correlationId(): string | undefined {
    return this.context?.correlationId;
  }

  /**
   * Merge `extra` into the context; existing keys are overwritten.
   */
  withContext(extra: ErrorContext): this {
    this.context = { ...this.context, ...extra };
    return this;
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      retryable: this.retryable,
      context: this.context,
      stack: this.stack,
      cause: describeCause(this.cause),
    };
  }

  /**
   * JSON form without stack or cause.
   */
  toPublicObject(): SerializedError {
    const { stack: _stack, cause: _cause, ...rest } = this.toJSON();
    return rest;
  }
}

function describeCause(cause: unknown): SerializedError | string | undefined {
  if (cause === undefined || cause === null) {
    return undefined;
  }
  if (cause instanceof HolsterError) {
    return cause.toJSON();
  }
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  if (typeof cause === 'string') {
    return cause;
  }
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}
