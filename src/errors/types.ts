/**
 * Canonical error categories used across mcp-holster.
 */
export type ErrorCategory =
  | 'validation'
  | 'io'
  | 'config'
  | 'registry'
  | 'scan'
  | 'internal'
  | 'unknown';

/**
 * Severity levels for categorized errors.
 */
export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Standardised error codes.
 * Codes follow the convention `<CATEGORY>_<IDENTIFIER>`.
 */
export type ErrorCode =
  | 'VALIDATION_INVALID_INPUT'
  | 'VALIDATION_SCHEMA_MISMATCH'
  | 'IO_NOT_FOUND'
  | 'IO_PERMISSION_DENIED'
  | 'IO_WRITE_FAILED'
  | 'CONFIG_INVALID'
  | 'CONFIG_CORRUPT'
  | 'REGISTRY_DUPLICATE_NAME'
  | 'REGISTRY_NOT_FOUND'
  | 'SCAN_ROOT_NOT_FOUND'
  | 'SCAN_TIMEOUT'
  | 'INTERNAL_UNEXPECTED'
  | 'UNKNOWN';

/**
 * Additional diagnostic context included with every error.
 */
export interface ErrorContext {
  operation?: string;
  module?: string;
  correlationId?: string;
  /** Replaces the message shown to MCP clients */
  userMessage?: string;
  /** Server entry the failure concerns */
  serverName?: string;
  /** File or directory the failure concerns */
  path?: string;
  data?: Record<string, JsonValue>;
  [key: string]: unknown;
}

/**
 * Lightweight JSON-compatible value definition.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface HolsterErrorOptions {
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  severity?: ErrorSeverity;
  context?: ErrorContext;
  cause?: unknown;
  retryable?: boolean;
}

export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  context?: ErrorContext;
  stack?: string;
  cause?: SerializedError | string;
}
