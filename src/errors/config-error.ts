import { HolsterError } from './holster-error';
import { ErrorContext, ErrorSeverity } from './types';

export interface ConfigErrorOptions {
  context?: ErrorContext;
  severity?: ErrorSeverity;
  cause?: unknown;
  retryable?: boolean;
}

/**
 * Raised for invalid runtime settings (environment variables).
 */
export class ConfigError extends HolsterError {
  constructor(message: string, options: ConfigErrorOptions = {}) {
    super({
      message,
      code: 'CONFIG_INVALID',
      category: 'config',
      severity: options.severity ?? 'error',
      context: options.context,
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
  }
}

/**
 * Raised when the persisted server document is not valid JSON or lacks
 * the `mcpServers` / `unusedMcpServers` maps.
 */
export class CorruptConfigError extends HolsterError {
  constructor(message: string, options: ConfigErrorOptions = {}) {
    super({
      message,
      code: 'CONFIG_CORRUPT',
      category: 'config',
      severity: options.severity ?? 'error',
      context: options.context,
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
  }
}
