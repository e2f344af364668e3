/**
 * Server Discovery
 *
 * Combines the scanner and the README extractor into the discovery
 * operations exposed as tools: scanning one root, scanning the usual
 * project folders under the home directory, a presence-only pre-filter, and
 * describing an explicit list of directories.
 *
 * @module discovery/server-discovery
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ErrorLogger } from '../errors/logger';
import { CandidateDirectory, ExtractedDescriptor } from '../types/servers';
import { ScanDeadline } from '../utils/deadline';
import { isDirectory, readDirSafe, runWithConcurrency } from '../utils/fs';
import { DirectoryScanner, projectRoot } from './directory-scanner';
import { isTraversable, DEFAULT_HEURISTICS } from './heuristics';
import { ReadmeConfigExtractor } from './readme-extractor';

/**
 * Folders under the home directory that commonly hold projects.
 */
export const COMMON_LOCATION_NAMES: readonly string[] = [
  'mcp-servers',
  'mcp',
  'projects',
  'Projects',
  'code',
  'dev',
  'src',
  'workspace',
  'repos',
  path.join('Documents', 'GitHub'),
  'Developer',
];

export interface DescriptorCollection {
  /** Keyed by suggested name; a later directory replaces an earlier one */
  servers: Record<string, ExtractedDescriptor>;
  warnings: string[];
}

export interface DiscoveryOptions {
  maxDepth?: number;
  deadline?: ScanDeadline;
}

export interface LocationScan {
  servers: Record<string, ExtractedDescriptor>;
  count: number;
}

export interface PotentialServers {
  locations: string[];
  directories: Record<string, CandidateDirectory[]>;
}

async function existingDirectory(target: string): Promise<boolean> {
  try {
    return await isDirectory(target);
  } catch {
    return false;
  }
}

export class ServerDiscovery {
  constructor(
    private readonly scanner: DirectoryScanner = new DirectoryScanner(),
    private readonly extractor: ReadmeConfigExtractor = new ReadmeConfigExtractor(),
    private readonly logger: ErrorLogger = new ErrorLogger()
  ) {}

  /**
   * Existing well-known folders under `homeDir`, then every non-hidden
   * immediate subdirectory of `homeDir`, each real directory listed once.
   */
  async commonLocations(homeDir: string): Promise<string[]> {
    const candidates = COMMON_LOCATION_NAMES.map((name) => path.join(homeDir, name));
    const entries = (await readDirSafe(homeDir)) ?? [];
    const homeChildren = entries
      .filter((entry) => entry.isDirectory() && isTraversable(entry.name, DEFAULT_HEURISTICS))
      .map((entry) => path.join(homeDir, entry.name))
      .sort();

    const seen = new Set<string>();
    const locations: string[] = [];
    for (const candidate of [...candidates, ...homeChildren]) {
      if (!(await existingDirectory(candidate))) {
        continue;
      }
      const real = await fs.realpath(candidate).catch(() => candidate);
      if (seen.has(real)) {
        continue;
      }
      seen.add(real);
      locations.push(candidate);
    }
    return locations;
  }

  /**
   * Extract a descriptor for each directory's project root. Name collisions
   * keep the later directory and are reported as warnings.
   */
  async describe(
    directories: readonly string[],
    deadline: ScanDeadline = ScanDeadline.unbounded()
  ): Promise<DescriptorCollection> {
    const tasks = directories.map((dir) => async () => {
      deadline.check();
      return this.extractor.extract(projectRoot(dir));
    });
    const descriptors = await runWithConcurrency(tasks, 4);

    const servers: Record<string, ExtractedDescriptor> = {};
    const warnings: string[] = [];
    for (const descriptor of descriptors) {
      const name = descriptor.suggestedName;
      const previous = Object.hasOwn(servers, name) ? servers[name] : undefined;
      if (previous && previous.path !== descriptor.path) {
        const warning = `Server name '${name}' found in both ${previous.path} and ${descriptor.path}; keeping ${descriptor.path}`;
        warnings.push(warning);
        this.logger.logWarning(warning, {
          module: 'discovery',
          operation: 'describe',
          serverName: name,
          path: descriptor.path,
          data: { replaced: previous.path },
        });
      }
      servers[name] = descriptor;
    }
    return { servers, warnings };
  }

  async scanDirectory(root: string, options: DiscoveryOptions = {}): Promise<DescriptorCollection> {
    const deadline = options.deadline ?? ScanDeadline.unbounded();
    const found = await this.scanner.scan(root, { maxDepth: options.maxDepth, deadline });
    return this.describe(found, deadline);
  }

  /**
   * Directories that exist and pass the content check, described.
   * Anything else in `directories` is skipped.
   */
  async scanSpecificDirectories(
    directories: readonly string[],
    deadline: ScanDeadline = ScanDeadline.unbounded()
  ): Promise<DescriptorCollection> {
    const serverLike: string[] = [];
    for (const dir of directories) {
      deadline.check();
      if ((await existingDirectory(dir)) && (await this.scanner.isServerLike(dir, deadline))) {
        serverLike.push(dir);
      }
    }
    return this.describe(serverLike, deadline);
  }

  /**
   * Scan every common location; only locations with servers are listed.
   */
  async discoverCommonLocations(
    homeDir: string,
    options: DiscoveryOptions = {}
  ): Promise<Record<string, LocationScan>> {
    const deadline = options.deadline ?? ScanDeadline.unbounded();
    const results: Record<string, LocationScan> = {};
    for (const location of await this.commonLocations(homeDir)) {
      const { servers } = await this.scanDirectory(location, { ...options, deadline });
      const count = Object.keys(servers).length;
      if (count > 0) {
        results[location] = { servers, count };
      }
    }
    return results;
  }

  async listPotentialServers(homeDir: string): Promise<PotentialServers> {
    const locations = await this.commonLocations(homeDir);
    const directories: Record<string, CandidateDirectory[]> = {};
    for (const location of locations) {
      const candidates = await this.scanner.listCandidates(location);
      if (candidates.length > 0) {
        directories[location] = candidates;
      }
    }
    return { locations, directories };
  }
}
