import { HolsterError } from './holster-error';
import { ErrorContext } from './types';

export interface RegistryErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

export class DuplicateNameError extends HolsterError {
  public readonly serverName: string;

  constructor(serverName: string, options: RegistryErrorOptions = {}) {
    super({
      message: `Server '${serverName}' already exists`,
      code: 'REGISTRY_DUPLICATE_NAME',
      category: 'registry',
      context: { ...options.context, serverName },
      cause: options.cause,
    });
    this.serverName = serverName;
  }
}

export type NotFoundKind = 'server' | 'directory';

export interface NotFoundErrorOptions extends RegistryErrorOptions {
  kind?: NotFoundKind;
}

/**
 * Raised for an unknown server name, or for a scan root that does not exist.
 */
export class NotFoundError extends HolsterError {
  public readonly target: string;
  public readonly kind: NotFoundKind;

  constructor(message: string, target: string, options: NotFoundErrorOptions = {}) {
    const kind = options.kind ?? 'server';
    super({
      message,
      code: kind === 'server' ? 'REGISTRY_NOT_FOUND' : 'SCAN_ROOT_NOT_FOUND',
      category: kind === 'server' ? 'registry' : 'scan',
      context:
        kind === 'server'
          ? { ...options.context, serverName: target }
          : { ...options.context, path: target },
      cause: options.cause,
    });
    this.target = target;
    this.kind = kind;
  }
}
