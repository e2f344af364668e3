import { HolsterError } from './holster-error';
import { ErrorCode, ErrorContext, ErrorSeverity } from './types';

export interface IOErrorOptions {
  code?: Extract<ErrorCode, 'IO_NOT_FOUND' | 'IO_PERMISSION_DENIED' | 'IO_WRITE_FAILED'>;
  context?: ErrorContext;
  severity?: ErrorSeverity;
  cause?: unknown;
  retryable?: boolean;
}

export class IOError extends HolsterError {
  constructor(message: string, options: IOErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'IO_NOT_FOUND',
      category: 'io',
      severity: options.severity ?? 'error',
      context: options.context,
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
  }

  /**
   * Map a Node.js errno failure onto the matching IOError code.
   */
  static fromErrno(
    error: unknown,
    message: string,
    context: ErrorContext = {},
    fallbackCode: IOErrorOptions['code'] = 'IO_WRITE_FAILED'
  ): IOError {
    const errno = error instanceof Error && 'code' in error ? error.code : undefined;
    let code = fallbackCode;
    if (errno === 'ENOENT' || errno === 'ENOTDIR') {
      code = 'IO_NOT_FOUND';
    } else if (errno === 'EACCES' || errno === 'EPERM' || errno === 'EROFS') {
      code = 'IO_PERMISSION_DENIED';
    }

    const detail = error instanceof Error ? error.message : String(error);
    return new IOError(`${message}: ${detail}`, {
      code,
      context,
      cause: error,
    });
  }
}
