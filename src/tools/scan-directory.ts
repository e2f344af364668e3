/**
 * Scan Directory Tool
 *
 * Scans one directory tree for server projects and proposes a descriptor
 * for each, read from the project's README where possible.
 *
 * @module tools/scan-directory
 */

import { z } from 'zod';
import { DiscoverySettings } from '../config/settings';
import { ServerDiscovery } from '../discovery/server-discovery';
import { ExtractedDescriptor } from '../types/servers';
import { deadlineFor } from '../utils/deadline';
import { DirectoryPathSchema, TimeoutMsSchema } from '../validation/common';
import { validateAndSanitize } from '../validation/middleware';
import { formatDiscoveredServers, pluralize } from './formatters/discovered-servers';

export const ScanDirectoryParamsSchema = z
  .object({
    path: DirectoryPathSchema,
    maxDepth: z.number().int().min(0).max(10).optional(),
    timeoutMs: TimeoutMsSchema.optional(),
  })
  .strict();

export type ScanDirectoryParams = z.input<typeof ScanDirectoryParamsSchema>;

export interface ScanDirectoryResult {
  servers: Record<string, ExtractedDescriptor>;
  count: number;
  scannedDirectory: string;
  warnings: string[];
}

export class ScanDirectoryToolImpl {
  constructor(
    private readonly discovery: ServerDiscovery,
    private readonly settings: DiscoverySettings
  ) {}

  /**
   * @throws NotFoundError if the directory does not exist
   * @throws ScanTimeoutError if the scan runs past its deadline
   */
  async execute(params: unknown, signal?: AbortSignal): Promise<ScanDirectoryResult> {
    const validated = await validateAndSanitize(params, ScanDirectoryParamsSchema);
    const { servers, warnings } = await this.discovery.scanDirectory(validated.path, {
      maxDepth: validated.maxDepth ?? this.settings.scanMaxDepth,
      deadline: deadlineFor(validated.timeoutMs, this.settings.scanTimeoutMs, signal),
    });

    return {
      servers,
      count: Object.keys(servers).length,
      scannedDirectory: validated.path,
      warnings,
    };
  }

  formatForLLM(result: ScanDirectoryResult): string {
    if (result.count === 0) {
      return `No MCP servers found in ${result.scannedDirectory}.`;
    }

    const lines = [
      `Found ${pluralize(result.count, 'MCP server')} in ${result.scannedDirectory}:`,
      '',
      ...formatDiscoveredServers(result.servers),
    ];
    for (const warning of result.warnings) {
      lines.push(`⚠ ${warning}`);
    }
    return lines.join('\n');
  }
}

export const scanDirectoryToolDefinition = {
  name: 'scan_directory',
  description:
    'Scan a directory (two levels deep by default) for MCP server projects and suggest a config entry for each, using the README config snippet when one exists.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Directory to scan (a leading ~ is expanded)',
      },
      maxDepth: {
        type: 'integer',
        minimum: 0,
        maximum: 10,
        description: 'Levels to descend below each top-level subdirectory (default 2)',
      },
      timeoutMs: {
        type: 'integer',
        minimum: 0,
        description: 'Abort the scan after this many milliseconds (0 disables the limit)',
      },
    },
    required: ['path'],
    additionalProperties: false,
  },
} as const;
