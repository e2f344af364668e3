/**
 * Server Registry
 *
 * Create, list, activate/deactivate and delete server entries. Batch
 * operations validate every name before touching the document, so a batch
 * either commits completely or not at all.
 *
 * @module registry/server-registry
 */

import { DuplicateNameError, NotFoundError } from '../errors/registry-error';
import { ConfigStore } from '../store/config-store';
import {
  ConfigDocument,
  ServerDescriptor,
  ServerEntry,
  ServerListing,
  ServerMap,
} from '../types/servers';
import { RESERVED_NAME_MESSAGE, isReservedServerName } from '../validation/common';
import { ValidationError } from '../validation/errors';

export interface StatusUpdateResult {
  updated: string[];
  activeCount: number;
  inactiveCount: number;
}

export interface DeleteResult {
  deleted: string[];
  remainingActive: number;
  remainingInactive: number;
}

function toEntry(descriptor: ServerDescriptor): ServerEntry {
  const entry: ServerEntry = {
    command: descriptor.command,
    args: [...descriptor.args],
  };
  if (descriptor.env && Object.keys(descriptor.env).length > 0) {
    entry.env = { ...descriptor.env };
  }
  return entry;
}

function has(map: ServerMap, name: string): boolean {
  return Object.hasOwn(map, name);
}

function uniqueNames(names: Iterable<string>): string[] {
  return [...new Set(names)];
}

export class ServerRegistry {
  constructor(private readonly store: ConfigStore) {}

  get configPath(): string {
    return this.store.filePath;
  }

  /**
   * Register a new server in the active bucket.
   *
   * @throws ValidationError for the reserved name `__proto__`
   * @throws DuplicateNameError if the name is already active or inactive
   */
  async create(descriptor: ServerDescriptor): Promise<ServerDescriptor> {
    if (isReservedServerName(descriptor.name)) {
      throw new ValidationError(RESERVED_NAME_MESSAGE, {
        context: { module: 'registry', operation: 'create', serverName: descriptor.name },
      });
    }
    await this.store.update((doc) => {
      if (has(doc.active, descriptor.name) || has(doc.inactive, descriptor.name)) {
        throw new DuplicateNameError(descriptor.name, {
          context: { module: 'registry', operation: 'create' },
        });
      }
      doc.active[descriptor.name] = toEntry(descriptor);
    });
    return descriptor;
  }

  async list(): Promise<ServerListing> {
    const doc = await this.store.load();
    return { active: doc.active, inactive: doc.inactive };
  }

  /**
   * Move servers to the active (`active = true`) or inactive bucket. Each
   * name must currently sit in the opposite bucket.
   *
   * @throws NotFoundError naming the first name not found in the source bucket
   */
  async setStatus(names: Iterable<string>, active: boolean): Promise<StatusUpdateResult> {
    const batch = uniqueNames(names);
    return this.store.update((doc) => {
      const [source, target] = active ? [doc.inactive, doc.active] : [doc.active, doc.inactive];
      const missing = batch.find((name) => !has(source, name));
      if (missing !== undefined) {
        const bucket = active ? 'inactive' : 'active';
        throw new NotFoundError(`Server '${missing}' not found in ${bucket} servers`, missing, {
          context: { module: 'registry', operation: 'setStatus' },
        });
      }

      for (const name of batch) {
        target[name] = source[name];
        delete source[name];
      }
      return { updated: batch, ...counts(doc) };
    });
  }

  /**
   * Remove servers from whichever bucket holds them.
   *
   * @throws NotFoundError naming the first name found in neither bucket
   */
  async delete(names: Iterable<string>): Promise<DeleteResult> {
    const batch = uniqueNames(names);
    return this.store.update((doc) => {
      const missing = batch.find((name) => !has(doc.active, name) && !has(doc.inactive, name));
      if (missing !== undefined) {
        throw new NotFoundError(`Server '${missing}' not found`, missing, {
          context: { module: 'registry', operation: 'delete' },
        });
      }

      for (const name of batch) {
        delete doc.active[name];
        delete doc.inactive[name];
      }
      const { activeCount, inactiveCount } = counts(doc);
      return { deleted: batch, remainingActive: activeCount, remainingInactive: inactiveCount };
    });
  }
}

function counts(doc: ConfigDocument): { activeCount: number; inactiveCount: number } {
  return {
    activeCount: Object.keys(doc.active).length,
    inactiveCount: Object.keys(doc.inactive).length,
  };
}
