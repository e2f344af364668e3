import { ZodError, ZodIssue } from 'zod';
import { HolsterError } from '../errors/holster-error';
import { ErrorCode, ErrorContext } from '../errors/types';

type ValidationCode = Extract<ErrorCode, 'VALIDATION_INVALID_INPUT' | 'VALIDATION_SCHEMA_MISMATCH'>;

export interface ValidationErrorOptions {
  readonly issues?: ZodIssue[];
  readonly cause?: unknown;
  readonly code?: ValidationCode;
  readonly context?: ErrorContext;
}

/**
 * Tool arguments or a server name that cannot be accepted. Raised before
 * the config file is read, so nothing on disk changes.
 */
export class ValidationError extends HolsterError {
  public readonly issues: ZodIssue[];

  constructor(message: string, options: ValidationErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'VALIDATION_INVALID_INPUT',
      category: 'validation',
      context: options.context,
      cause: options.cause,
    });
    this.issues = options.issues ?? [];
  }

  /** One formatted line per zod issue */
  get messages(): string[] {
    return this.issues.map((issue) => formatZodIssue(issue));
  }

  static fromZod(error: ZodError, fallbackMessage = 'Input validation failed'): ValidationError {
    const lines = error.issues.map((issue) => formatZodIssue(issue));
    return new ValidationError(lines.length > 0 ? lines.join('; ') : fallbackMessage, {
      code: 'VALIDATION_SCHEMA_MISMATCH',
      issues: error.issues,
      cause: error,
    });
  }
}

/**
 * `names.[0]` style label for the offending argument.
 */
function fieldLabel(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) {
    return 'value';
  }
  return path.map((segment) => (typeof segment === 'number' ? `[${segment}]` : segment)).join('.');
}

function describeBound(
  field: string,
  type: string,
  comparator: string,
  bound: number | bigint
): string {
  switch (type) {
    case 'string':
      return `${field} must be ${comparator} ${bound} characters`;
    case 'array':
      return `${field} must contain ${comparator} ${bound} items`;
    default:
      return `${field} must be ${comparator} ${bound}`;
  }
}

export function formatZodIssue(issue: ZodIssue): string {
  const field = fieldLabel(issue.path);
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined'
        ? `Parameter "${field}" is required`
        : `Parameter "${field}" must be of type ${issue.expected}`;
    case 'invalid_string':
      return `${field}: ${issue.message}`;
    case 'too_small':
      return describeBound(field, issue.type, issue.inclusive ? 'at least' : 'greater than', issue.minimum);
    case 'too_big':
      return describeBound(field, issue.type, issue.inclusive ? 'at most' : 'less than', issue.maximum);
    case 'unrecognized_keys':
      return `Unknown parameter(s): ${issue.keys.join(', ')}`;
    default:
      return issue.message || `Invalid ${field}`;
  }
}

export function normalizeValidationError(error: unknown): ValidationError {
  if (error instanceof ValidationError) {
    return error;
  }
  if (error instanceof ZodError) {
    return ValidationError.fromZod(error);
  }
  return new ValidationError(error instanceof Error ? error.message : 'Input validation failed', {
    cause: error,
  });
}
