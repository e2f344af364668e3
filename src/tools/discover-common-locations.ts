/**
 * Discover Common Locations Tool
 *
 * Scans the usual project folders under the home directory (plus every
 * non-hidden folder directly in it) for MCP servers.
 *
 * @module tools/discover-common-locations
 */

import { z } from 'zod';
import { DiscoverySettings } from '../config/settings';
import { LocationScan, ServerDiscovery } from '../discovery/server-discovery';
import { deadlineFor } from '../utils/deadline';
import { TimeoutMsSchema } from '../validation/common';
import { validateAndSanitize } from '../validation/middleware';
import { formatDiscoveredServers, pluralize } from './formatters/discovered-servers';

export const DiscoverCommonLocationsParamsSchema = z
  .object({
    maxDepth: z.number().int().min(0).max(10).optional(),
    timeoutMs: TimeoutMsSchema.optional(),
  })
  .strict();

export type DiscoverCommonLocationsParams = z.input<typeof DiscoverCommonLocationsParamsSchema>;

export interface DiscoverCommonLocationsResult {
  locations: Record<string, LocationScan>;
  summary: string;
}

export class DiscoverCommonLocationsToolImpl {
  constructor(
    private readonly discovery: ServerDiscovery,
    private readonly settings: DiscoverySettings
  ) {}

  /**
   * @throws ScanTimeoutError if the whole discovery runs past its deadline
   */
  async execute(params?: unknown, signal?: AbortSignal): Promise<DiscoverCommonLocationsResult> {
    const validated = await validateAndSanitize(params ?? {}, DiscoverCommonLocationsParamsSchema);
    const locations = await this.discovery.discoverCommonLocations(this.settings.homeDir, {
      maxDepth: validated.maxDepth ?? this.settings.scanMaxDepth,
      deadline: deadlineFor(validated.timeoutMs, this.settings.scanTimeoutMs, signal),
    });

    const locationCount = Object.keys(locations).length;
    const serverCount = Object.values(locations).reduce((total, scan) => total + scan.count, 0);
    const summary =
      serverCount === 0
        ? 'No MCP servers found in common locations.'
        : `Found ${pluralize(serverCount, 'MCP server')} in ${pluralize(locationCount, 'location')}.`;

    return { locations, summary };
  }

  formatForLLM(result: DiscoverCommonLocationsResult): string {
    const lines = [result.summary];
    for (const [location, scan] of Object.entries(result.locations)) {
      lines.push('', `${location} (${scan.count}):`, ...formatDiscoveredServers(scan.servers, '  '));
    }
    return lines.join('\n');
  }
}

export const discoverCommonLocationsToolDefinition = {
  name: 'discover_common_locations',
  description:
    'Scan common project folders in the home directory (e.g. ~/mcp-servers, ~/projects, ~/code) and every folder directly under home for MCP servers.',
  inputSchema: {
    type: 'object',
    properties: {
      maxDepth: {
        type: 'integer',
        minimum: 0,
        maximum: 10,
        description: 'Levels to descend below each top-level subdirectory (default 2)',
      },
      timeoutMs: {
        type: 'integer',
        minimum: 0,
        description: 'Abort discovery after this many milliseconds (0 disables the limit)',
      },
    },
    additionalProperties: false,
  },
} as const;
