import os from 'os';
import path from 'path';
import { z } from 'zod';

const DEFAULT_MAX_PATH_LENGTH = 4096;

export const pathStringSchema = z
  .string({
    required_error: 'Path value is required',
    invalid_type_error: 'Path must be a string',
  })
  .trim()
  .min(1, 'Path cannot be empty')
  .max(DEFAULT_MAX_PATH_LENGTH, 'Path is too long')
  .refine((value) => !value.includes('\0'), {
    message: 'Path cannot contain null bytes',
  });

/**
 * `__proto__` cannot be stored as a plain object key: assigning it replaces
 * the map's prototype instead of adding an entry.
 */
export function isReservedServerName(name: string): boolean {
  return name === '__proto__';
}

export const RESERVED_NAME_MESSAGE = "Server name '__proto__' is reserved";

export const serverNameSchema = z
  .string({
    required_error: 'Server name is required',
    invalid_type_error: 'Server name must be a string',
  })
  .trim()
  .min(1, 'Server name cannot be empty')
  .max(128, 'Server name is too long')
  .refine((name) => !isReservedServerName(name), { message: RESERVED_NAME_MESSAGE });

/**
 * Expand a leading `~` and resolve to an absolute, normalized path.
 */
export function resolveUserPath(rawPath: string, homeDir: string = os.homedir()): string {
  let expanded = rawPath;
  if (rawPath === '~') {
    expanded = homeDir;
  } else if (rawPath.startsWith('~/') || rawPath.startsWith(`~${path.sep}`)) {
    expanded = path.join(homeDir, rawPath.slice(2));
  }
  return path.resolve(expanded);
}

export const DirectoryPathSchema = pathStringSchema.transform((value) => resolveUserPath(value));

export const TimeoutMsSchema = z
  .number({ invalid_type_error: 'timeoutMs must be a number' })
  .int('timeoutMs must be an integer')
  .nonnegative('timeoutMs must be zero or positive');
