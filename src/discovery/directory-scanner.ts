/**
 * Directory Scanner
 *
 * Walks a directory tree to a bounded depth and reports directories that
 * look like MCP server projects. Discovery is best effort: unreadable
 * directories and files count as "no match" and never fail a scan.
 *
 * @module discovery/directory-scanner
 */

import type { Dirent } from 'fs';
import * as path from 'path';
import { IOError } from '../errors/io-error';
import { NotFoundError } from '../errors/registry-error';
import { CandidateDirectory, CandidateIndicator } from '../types/servers';
import { ScanDeadline } from '../utils/deadline';
import { isDirectory, readDirSafe, readTextSafe } from '../utils/fs';
import {
  DEFAULT_HEURISTICS,
  DiscoveryHeuristics,
  containsServerMarkers,
  hasSourceExtension,
  isTraversable,
  mentionsFramework,
} from './heuristics';

export const DEFAULT_MAX_DEPTH = 2;

export interface ScanOptions {
  /**
   * Levels descended below each immediate subdirectory of the root
   * (those sit at level 0).
   */
  maxDepth?: number;
  deadline?: ScanDeadline;
}

/**
 * Truncate `target` just before its first `src` segment, surfacing the
 * enclosing project. Paths without such a segment come back unchanged.
 */
export function projectRoot(target: string): string {
  const segments = target.split(path.sep);
  const index = segments.indexOf('src');
  if (index === -1) {
    return target;
  }
  if (index === 0) {
    return '.';
  }
  const head = segments.slice(0, index).join(path.sep);
  return head === '' ? path.parse(target).root || path.sep : head;
}

function byName(a: Dirent, b: Dirent): number {
  return a.name.localeCompare(b.name);
}

export class DirectoryScanner {
  constructor(private readonly heuristics: DiscoveryHeuristics = DEFAULT_HEURISTICS) {}

  /**
   * Report server-like directories below `root`.
   *
   * A directory matched by its own files is reported and not descended
   * into. Directories at the deepest level fall back to the recursive
   * {@link isServerLike} check.
   *
   * @throws NotFoundError if `root` does not exist or is not a directory
   * @throws ScanTimeoutError if the deadline passes before the walk ends
   */
  async scan(root: string, options: ScanOptions = {}): Promise<string[]> {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    const deadline = options.deadline ?? ScanDeadline.unbounded();
    const resolvedRoot = await this.requireDirectory(root);

    deadline.check();
    const entries = (await readDirSafe(resolvedRoot)) ?? [];
    const found: string[] = [];
    for (const child of this.childDirectories(resolvedRoot, entries)) {
      await this.visit(child, 0, maxDepth, deadline, found);
    }
    return found;
  }

  /**
   * True when a source file anywhere beneath `dir` carries both server
   * markers, or when a manifest directly in `dir` names the framework.
   */
  async isServerLike(dir: string, deadline: ScanDeadline = ScanDeadline.unbounded()): Promise<boolean> {
    deadline.check();
    const entries = await readDirSafe(dir);
    if (!entries) {
      return false;
    }
    if (await this.hasFrameworkManifest(dir, entries, deadline)) {
      return true;
    }
    return this.containsServerSource(dir, entries, deadline);
  }

  /**
   * Presence-only pre-filter over the immediate subdirectories of `root`.
   * No file contents are read. A missing root yields no candidates.
   */
  async listCandidates(root: string): Promise<CandidateDirectory[]> {
    const entries = await readDirSafe(path.resolve(root));
    if (!entries) {
      return [];
    }

    const candidates: CandidateDirectory[] = [];
    for (const child of this.childDirectories(path.resolve(root), entries)) {
      const childEntries = await readDirSafe(child);
      if (!childEntries) {
        continue;
      }

      const indicators: CandidateIndicator[] = [];
      if (childEntries.some((entry) => entry.isFile() && hasSourceExtension(entry.name, this.heuristics))) {
        indicators.push('source');
      }
      if (childEntries.some((entry) => entry.isFile() && this.heuristics.manifestFiles.includes(entry.name))) {
        indicators.push('manifest');
      }
      if (childEntries.some((entry) => entry.isDirectory() && entry.name === 'src')) {
        indicators.push('src');
      }
      if (indicators.length > 0) {
        candidates.push({ path: child, indicators });
      }
    }
    return candidates;
  }

  private async visit(
    dir: string,
    level: number,
    maxDepth: number,
    deadline: ScanDeadline,
    found: string[]
  ): Promise<boolean> {
    deadline.check();
    const entries = await readDirSafe(dir);
    if (!entries) {
      return false;
    }

    if (await this.matchesDirectly(dir, entries, deadline)) {
      found.push(dir);
      return true;
    }

    if (level < maxDepth) {
      let descendantFound = false;
      for (const child of this.childDirectories(dir, entries)) {
        if (await this.visit(child, level + 1, maxDepth, deadline, found)) {
          descendantFound = true;
        }
      }
      return descendantFound;
    }

    if (await this.containsServerSource(dir, entries, deadline)) {
      found.push(dir);
      return true;
    }
    return false;
  }

  private async matchesDirectly(dir: string, entries: Dirent[], deadline: ScanDeadline): Promise<boolean> {
    if (await this.hasFrameworkManifest(dir, entries, deadline)) {
      return true;
    }
    for (const entry of entries) {
      if (entry.isFile() && hasSourceExtension(entry.name, this.heuristics)) {
        if (await this.fileHasMarkers(path.join(dir, entry.name), deadline)) {
          return true;
        }
      }
    }
    return false;
  }

  private async hasFrameworkManifest(dir: string, entries: Dirent[], deadline: ScanDeadline): Promise<boolean> {
    for (const entry of entries) {
      if (!entry.isFile() || !this.heuristics.manifestFiles.includes(entry.name)) {
        continue;
      }
      deadline.check();
      const content = await readTextSafe(path.join(dir, entry.name));
      if (content !== null && mentionsFramework(content, this.heuristics)) {
        return true;
      }
    }
    return false;
  }

  private async containsServerSource(dir: string, entries: Dirent[], deadline: ScanDeadline): Promise<boolean> {
    for (const entry of entries) {
      if (entry.isFile() && hasSourceExtension(entry.name, this.heuristics)) {
        if (await this.fileHasMarkers(path.join(dir, entry.name), deadline)) {
          return true;
        }
      }
    }

    for (const child of this.childDirectories(dir, entries)) {
      deadline.check();
      const childEntries = await readDirSafe(child);
      if (childEntries && (await this.containsServerSource(child, childEntries, deadline))) {
        return true;
      }
    }
    return false;
  }

  private async fileHasMarkers(filePath: string, deadline: ScanDeadline): Promise<boolean> {
    deadline.check();
    const content = await readTextSafe(filePath);
    return content !== null && containsServerMarkers(content, this.heuristics);
  }

  /**
   * Real (non-symlinked), traversable subdirectories in name order.
   */
  private childDirectories(dir: string, entries: Dirent[]): string[] {
    return entries
      .filter((entry) => entry.isDirectory() && isTraversable(entry.name, this.heuristics))
      .sort(byName)
      .map((entry) => path.join(dir, entry.name));
  }

  private async requireDirectory(root: string): Promise<string> {
    const resolved = path.resolve(root);
    let exists: boolean;
    try {
      exists = await isDirectory(resolved);
    } catch (error) {
      throw IOError.fromErrno(
        error,
        `Unable to inspect scan root ${resolved}`,
        { module: 'discovery', operation: 'scan', path: resolved },
        'IO_PERMISSION_DENIED'
      );
    }
    if (!exists) {
      throw new NotFoundError(`Directory not found: ${resolved}`, resolved, {
        kind: 'directory',
        context: { module: 'discovery', operation: 'scan' },
      });
    }
    return resolved;
  }
}
