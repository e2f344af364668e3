import { randomUUID } from 'crypto';
import { HolsterError } from './holster-error';
import { ErrorCategory, ErrorCode, ErrorContext } from './types';

/**
 * Destination for log lines. stdout carries the MCP protocol, so the
 * default `console` sink only uses its stderr channels.
 */
export interface LogSink {
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = 'warn' | 'error';

/**
 * One line of structured output. The server name and path are lifted out of
 * the context so records about one entry or one directory can be grepped.
 */
export interface LogRecord {
  level: LogLevel;
  timestamp: string;
  correlationId: string;
  message: string;
  code?: ErrorCode;
  category?: ErrorCategory;
  retryable?: boolean;
  module?: string;
  operation?: string;
  server?: string;
  path?: string;
  context?: ErrorContext;
  stack?: string;
}

type ContextFields = Pick<
  LogRecord,
  'correlationId' | 'module' | 'operation' | 'server' | 'path' | 'context'
>;

function splitContext(context: ErrorContext = {}): ContextFields {
  const { correlationId, module, operation, serverName, path, ...rest } = context;
  return {
    correlationId: correlationId ?? randomUUID(),
    module,
    operation,
    server: serverName,
    path,
    context: Object.keys(rest).length > 0 ? rest : undefined,
  };
}

function plainLine(record: LogRecord): string {
  const code = record.code ? ` [${record.code}]` : '';
  return `[${record.timestamp}] [${record.level.toUpperCase()}]${code} ${record.message} (correlationId=${record.correlationId})`;
}

export class ErrorLogger {
  constructor(
    private readonly sink: LogSink = console,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Log `error` once and return the correlation id it is reported under.
   * An id already present in the error's context is reused.
   */
  logError(error: HolsterError): string {
    const fields = splitContext(error.context);
    this.emit({
      level: error.severity === 'warning' ? 'warn' : 'error',
      timestamp: this.now().toISOString(),
      message: error.message,
      code: error.code,
      category: error.category,
      retryable: error.retryable,
      ...fields,
      stack: error.exposable ? undefined : error.stack,
    });
    return fields.correlationId;
  }

  /**
   * Log a condition that did not fail the operation, such as two discovered
   * directories suggesting the same server name.
   */
  logWarning(message: string, context: ErrorContext = {}): string {
    const fields = splitContext(context);
    this.emit({
      level: 'warn',
      timestamp: this.now().toISOString(),
      message,
      ...fields,
    });
    return fields.correlationId;
  }

  private emit(record: LogRecord): void {
    let line: string;
    try {
      line = JSON.stringify(record);
    } catch {
      line = plainLine(record);
    }
    if (record.level === 'warn') {
      this.sink.warn(line);
    } else {
      this.sink.error(line);
    }
  }
}
