import { describe, expect, test } from '@jest/globals';
import { ConfigError, CorruptConfigError } from '../../src/errors/config-error';
import { HolsterError } from '../../src/errors/holster-error';
import { DuplicateNameError, NotFoundError } from '../../src/errors/registry-error';
import { ScanTimeoutError } from '../../src/errors/scan-error';

describe('HolsterError', () => {
  test('applies defaults and keeps the subclass name', () => {
    const error = new HolsterError({
      message: 'Failure',
      code: 'INTERNAL_UNEXPECTED',
      category: 'internal',
    });

    expect(error.name).toBe('HolsterError');
    expect(error.severity).toBe('error');
    expect(error.retryable).toBe(false);
    expect(error).toBeInstanceOf(Error);
    expect(error.correlationId).toBeUndefined();
  });

  test('withContext merges and returns the same error', () => {
    const error = new HolsterError({
      message: 'Failure',
      code: 'INTERNAL_UNEXPECTED',
      category: 'internal',
      context: { module: 'store', operation: 'load' },
    });

    expect(error.withContext({ operation: 'save', correlationId: 'cid-5' })).toBe(error);
    expect(error.context).toEqual({ module: 'store', operation: 'save', correlationId: 'cid-5' });
    expect(error.correlationId).toBe('cid-5');
  });

  test('toJSON serializes nested causes', () => {
    const inner = new HolsterError({
      message: 'inner',
      code: 'IO_NOT_FOUND',
      category: 'io',
    });
    const outer = new HolsterError({
      message: 'outer',
      code: 'INTERNAL_UNEXPECTED',
      category: 'internal',
      cause: inner,
    });
    const plainCause = new HolsterError({
      message: 'plain',
      code: 'UNKNOWN',
      category: 'unknown',
      cause: new TypeError('bad type'),
    });

    const serialized = outer.toJSON();
    expect(serialized.message).toBe('outer');
    expect(typeof serialized.cause).toBe('object');
    expect(plainCause.toJSON().cause).toBe('TypeError: bad type');
  });

  test('toPublicObject strips stack and cause', () => {
    const error = new HolsterError({
      message: 'hidden',
      code: 'INTERNAL_UNEXPECTED',
      category: 'internal',
      cause: 'root cause',
    });

    expect(error.toJSON().cause).toBe('root cause');
    expect(error.toPublicObject()).toEqual({
      name: 'HolsterError',
      message: 'hidden',
      code: 'INTERNAL_UNEXPECTED',
      category: 'internal',
      severity: 'error',
      retryable: false,
      context: undefined,
    });
  });

  test('exposable is false only for internal and unknown categories', () => {
    const internal = new HolsterError({ message: 'x', code: 'INTERNAL_UNEXPECTED', category: 'internal' });
    const unknown = new HolsterError({ message: 'x', code: 'UNKNOWN', category: 'unknown' });
    expect(internal.exposable).toBe(false);
    expect(unknown.exposable).toBe(false);
    expect(new DuplicateNameError('alpha').exposable).toBe(true);
  });
});

describe('domain errors', () => {
  test('DuplicateNameError names the server', () => {
    const error = new DuplicateNameError('alpha');
    expect(error.message).toBe("Server 'alpha' already exists");
    expect(error.code).toBe('REGISTRY_DUPLICATE_NAME');
    expect(error.category).toBe('registry');
    expect(error.serverName).toBe('alpha');
    expect(error.context?.serverName).toBe('alpha');
  });

  test('NotFoundError distinguishes servers from directories', () => {
    const server = new NotFoundError("Server 'beta' not found", 'beta');
    expect(server.kind).toBe('server');
    expect(server.code).toBe('REGISTRY_NOT_FOUND');
    expect(server.category).toBe('registry');

    const directory = new NotFoundError('Directory not found: /nowhere', '/nowhere', {
      kind: 'directory',
    });
    expect(directory.code).toBe('SCAN_ROOT_NOT_FOUND');
    expect(directory.category).toBe('scan');
    expect(directory.target).toBe('/nowhere');
    expect(directory.context).toEqual({ path: '/nowhere' });
    expect(server.context).toEqual({ serverName: 'beta' });
  });

  test('ScanTimeoutError is retryable and reports the budget', () => {
    const error = new ScanTimeoutError(250, { elapsedMs: 300 });
    expect(error.message).toBe('Directory scan exceeded its 250ms deadline');
    expect(error.retryable).toBe(true);
    expect(error.timeoutMs).toBe(250);
    expect(error.context).toEqual({ elapsedMs: 300, timeoutMs: 250 });
  });

  test('config errors carry distinct codes', () => {
    expect(new ConfigError('bad env').code).toBe('CONFIG_INVALID');
    expect(new CorruptConfigError('bad file').code).toBe('CONFIG_CORRUPT');
    expect(new CorruptConfigError('bad file').name).toBe('CorruptConfigError');
  });
});
