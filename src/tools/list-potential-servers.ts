/**
 * List Potential Servers Tool
 *
 * Cheap pre-filter: lists folders in common locations that contain a
 * source file, a dependency manifest or a `src` folder, without reading
 * any file contents.
 *
 * @module tools/list-potential-servers
 */

import { DiscoverySettings } from '../config/settings';
import { PotentialServers, ServerDiscovery } from '../discovery/server-discovery';
import { pluralize } from './formatters/discovered-servers';

export interface ListPotentialServersResult extends PotentialServers {
  summary: string;
}

export class ListPotentialServersToolImpl {
  constructor(
    private readonly discovery: ServerDiscovery,
    private readonly settings: DiscoverySettings
  ) {}

  async execute(): Promise<ListPotentialServersResult> {
    const { locations, directories } = await this.discovery.listPotentialServers(
      this.settings.homeDir
    );
    const candidateCount = Object.values(directories).reduce(
      (total, candidates) => total + candidates.length,
      0
    );
    const noun = candidateCount === 1 ? 'directory' : 'directories';
    const summary = `Checked ${pluralize(locations.length, 'location')}; ${candidateCount} potential server ${noun} found.`;
    return { locations, directories, summary };
  }

  formatForLLM(result: ListPotentialServersResult): string {
    const lines = [result.summary];
    for (const [location, candidates] of Object.entries(result.directories)) {
      lines.push('', `${location}:`);
      for (const candidate of candidates) {
        lines.push(`  - ${candidate.path} [${candidate.indicators.join(', ')}]`);
      }
    }
    return lines.join('\n');
  }
}

export const listPotentialServersToolDefinition = {
  name: 'list_potential_servers',
  description:
    'Quickly list folders in common locations that might hold MCP servers (source files, dependency manifests or a src folder), without reading file contents. Follow up with scan_specific_directories.',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
} as const;
