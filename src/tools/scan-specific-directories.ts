/**
 * Scan Specific Directories Tool
 *
 * Checks each listed directory for server code and proposes a descriptor
 * for those that qualify. When two directories suggest the same name, the
 * later one wins and a warning is returned.
 *
 * @module tools/scan-specific-directories
 */

import { z } from 'zod';
import { DiscoverySettings } from '../config/settings';
import { DescriptorCollection, ServerDiscovery } from '../discovery/server-discovery';
import { deadlineFor } from '../utils/deadline';
import { DirectoryPathSchema, TimeoutMsSchema } from '../validation/common';
import { validateAndSanitize } from '../validation/middleware';
import { formatDiscoveredServers, pluralize } from './formatters/discovered-servers';

export const ScanSpecificDirectoriesParamsSchema = z
  .object({
    paths: z.array(DirectoryPathSchema).min(1, 'paths must contain at least 1 items'),
    timeoutMs: TimeoutMsSchema.optional(),
  })
  .strict();

export type ScanSpecificDirectoriesParams = z.input<typeof ScanSpecificDirectoriesParamsSchema>;

export interface ScanSpecificDirectoriesResult extends DescriptorCollection {
  count: number;
}

export class ScanSpecificDirectoriesToolImpl {
  constructor(
    private readonly discovery: ServerDiscovery,
    private readonly settings: DiscoverySettings
  ) {}

  async execute(params: unknown, signal?: AbortSignal): Promise<ScanSpecificDirectoriesResult> {
    const validated = await validateAndSanitize(params, ScanSpecificDirectoriesParamsSchema);
    const collection = await this.discovery.scanSpecificDirectories(
      validated.paths,
      deadlineFor(validated.timeoutMs, this.settings.scanTimeoutMs, signal)
    );
    return { ...collection, count: Object.keys(collection.servers).length };
  }

  formatForLLM(result: ScanSpecificDirectoriesResult): string {
    if (result.count === 0) {
      return 'None of the given directories contain an MCP server.';
    }
    const lines = [
      `Found ${pluralize(result.count, 'MCP server')}:`,
      '',
      ...formatDiscoveredServers(result.servers),
    ];
    for (const warning of result.warnings) {
      lines.push(`⚠ ${warning}`);
    }
    return lines.join('\n');
  }
}

export const scanSpecificDirectoriesToolDefinition = {
  name: 'scan_specific_directories',
  description:
    'Check specific directories for MCP server code and suggest a config entry for each one that qualifies.',
  inputSchema: {
    type: 'object',
    properties: {
      paths: {
        type: 'array',
        items: { type: 'string' },
        minItems: 1,
        description: 'Directories to check (a leading ~ is expanded)',
      },
      timeoutMs: {
        type: 'integer',
        minimum: 0,
        description: 'Abort after this many milliseconds (0 disables the limit)',
      },
    },
    required: ['paths'],
    additionalProperties: false,
  },
} as const;
