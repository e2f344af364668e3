import { HolsterError } from './holster-error';
import { ErrorLogger } from './logger';
import { ErrorCategory, ErrorCode, ErrorContext } from './types';
import { normalizeError } from './utils';

export interface HandleOptions {
  logger?: ErrorLogger;
  /** Message shown to MCP clients in place of the error's own */
  userMessage?: string;
}

export interface PublicError {
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
  correlationId?: string;
  retryable: boolean;
}

const GENERIC_MESSAGE = 'An unexpected error occurred';

export class ErrorHandler {
  private static logger = new ErrorLogger();

  static useLogger(logger: ErrorLogger): void {
    this.logger = logger;
  }

  /**
   * Normalize `error`, tag it with `operation` and log it. An error that
   * already carries a correlation id was logged by an inner handler and is
   * not logged again.
   */
  static handle(
    error: unknown,
    operation: string,
    context: ErrorContext = {},
    options: HandleOptions = {}
  ): HolsterError {
    const alreadyLogged = error instanceof HolsterError && error.correlationId !== undefined;
    const handled = normalizeError(error, {
      ...context,
      operation,
      ...(options.userMessage ? { userMessage: options.userMessage } : {}),
    });
    if (!alreadyLogged) {
      const correlationId = (options.logger ?? this.logger).logError(handled);
      handled.withContext({ correlationId });
    }
    return handled;
  }

  static toPublicError(error: HolsterError): PublicError {
    const message = error.exposable ? error.message : GENERIC_MESSAGE;
    return {
      code: error.code,
      category: error.category,
      message: error.context?.userMessage ?? message,
      correlationId: error.correlationId,
      retryable: error.retryable,
    };
  }

  /**
   * `"<prefix> (correlationId=…): <public message>"`, the form used for
   * tool failures and startup errors on stderr.
   */
  static describe(prefix: string, error: HolsterError): string {
    const publicError = this.toPublicError(error);
    const correlation = publicError.correlationId ? ` (correlationId=${publicError.correlationId})` : '';
    return `${prefix}${correlation}: ${publicError.message}`;
  }
}
