/**
 * Config Store
 *
 * Owns the JSON document that lists active (`mcpServers`) and inactive
 * (`unusedMcpServers`) servers. Every operation reads the whole file and
 * every mutation rewrites the whole file through a temp-file rename, so the
 * previous committed state survives a failed write.
 *
 * @module store/config-store
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { CorruptConfigError } from '../errors/config-error';
import { IOError } from '../errors/io-error';
import { ConfigDocument } from '../types/servers';
import { formatZodIssue } from '../validation/errors';
import {
  ACTIVE_KEY,
  ConfigFileSchema,
  INACTIVE_KEY,
} from '../validation/schemas/config-document-schema';
import { pathExists, writeFileAtomic } from '../utils/fs';

export function emptyDocument(): ConfigDocument {
  return { active: {}, inactive: {}, extras: {} };
}

/**
 * Serialize with the server maps first, then any preserved keys.
 */
export function serializeDocument(doc: ConfigDocument): string {
  const file = {
    [ACTIVE_KEY]: doc.active,
    [INACTIVE_KEY]: doc.inactive,
    ...doc.extras,
  };
  return `${JSON.stringify(file, null, 2)}\n`;
}

export function parseDocument(raw: string, source = 'config'): ConfigDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CorruptConfigError(`Config file ${source} is not valid JSON`, {
      context: { module: 'store', source },
      cause: error,
    });
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new CorruptConfigError(`Config file ${source} must contain a JSON object`, {
      context: { module: 'store', source },
    });
  }

  if (Object.hasOwn(parsed, '__proto__')) {
    throw new CorruptConfigError(`Config file ${source} uses the reserved key '__proto__'`, {
      context: { module: 'store', source },
    });
  }

  for (const key of [ACTIVE_KEY, INACTIVE_KEY]) {
    if (!(key in parsed)) {
      throw new CorruptConfigError(`Config file ${source} is missing required key '${key}'`, {
        context: { module: 'store', source, key },
      });
    }
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => formatZodIssue(issue));
    throw new CorruptConfigError(`Config file ${source} is malformed: ${messages.join('; ')}`, {
      context: { module: 'store', source, data: { messages } },
      cause: result.error,
    });
  }

  const { [ACTIVE_KEY]: active, [INACTIVE_KEY]: inactive, ...extras } = result.data;
  return { active, inactive, extras };
}

export class ConfigStore {
  private queue: Promise<void> = Promise.resolve();

  private constructor(public readonly filePath: string) {}

  /**
   * Bind a store to `filePath`, creating the file with two empty server
   * maps (and any missing parent directories) when it does not exist yet.
   *
   * @throws IOError if the directory or file cannot be created
   */
  static async open(filePath: string): Promise<ConfigStore> {
    const resolved = path.resolve(filePath);
    try {
      if (!(await pathExists(resolved))) {
        await writeFileAtomic(resolved, serializeDocument(emptyDocument()), 'utf8');
      }
    } catch (error) {
      throw IOError.fromErrno(error, `Unable to initialise config file at ${resolved}`, {
        module: 'store',
        operation: 'open',
        path: resolved,
      });
    }
    return new ConfigStore(resolved);
  }

  /**
   * @throws CorruptConfigError if the file is not a valid server document
   * @throws IOError if the file cannot be read
   */
  async load(): Promise<ConfigDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      throw IOError.fromErrno(
        error,
        `Unable to read config file ${this.filePath}`,
        { module: 'store', operation: 'load', path: this.filePath },
        'IO_NOT_FOUND'
      );
    }
    return parseDocument(raw, this.filePath);
  }

  async save(doc: ConfigDocument): Promise<void> {
    try {
      await writeFileAtomic(this.filePath, serializeDocument(doc), 'utf8');
    } catch (error) {
      throw IOError.fromErrno(error, `Unable to write config file ${this.filePath}`, {
        module: 'store',
        operation: 'save',
        path: this.filePath,
      });
    }
  }

  /**
   * Load, apply `mutator`, save once. A mutator that throws leaves the file
   * untouched. Calls run one after another in submission order.
   */
  update<T>(mutator: (doc: ConfigDocument) => T): Promise<T> {
    const run = async (): Promise<T> => {
      const doc = await this.load();
      const result = mutator(doc);
      await this.save(doc);
      return result;
    };

    const next = this.queue.then(run);
    // keep the queue alive after a failed mutation
    this.queue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }
}
