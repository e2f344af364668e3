import { HolsterError } from './holster-error';
import { IOError } from './io-error';
import { ErrorContext } from './types';

function isFileSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'syscall' in error && 'code' in error && typeof error.code === 'string';
}

/**
 * Turn anything thrown inside a tool or the startup path into a HolsterError.
 *
 * File system failures that escaped a module become IOErrors so the caller
 * sees which path failed. Other errors are internal.
 */
export function normalizeError(error: unknown, context: ErrorContext = {}): HolsterError {
  if (error instanceof HolsterError) {
    return error.withContext(context);
  }

  if (isFileSystemError(error)) {
    const target = typeof error.path === 'string' ? error.path : undefined;
    return IOError.fromErrno(error, 'File system operation failed', {
      ...context,
      ...(target ? { path: target } : {}),
    });
  }

  if (error instanceof Error) {
    return new HolsterError({
      message: error.message,
      code: 'INTERNAL_UNEXPECTED',
      category: 'internal',
      context,
      cause: error,
    });
  }

  return new HolsterError({
    message: typeof error === 'string' ? error : 'Unknown error',
    code: 'UNKNOWN',
    category: 'unknown',
    context,
    cause: error,
  });
}
