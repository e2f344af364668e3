/**
 * List Servers Tool
 *
 * @module tools/list-servers
 */

import { ServerRegistry } from '../registry/server-registry';
import { ServerListing, ServerMap } from '../types/servers';

export class ListServersToolImpl {
  constructor(private readonly registry: ServerRegistry) {}

  async execute(): Promise<ServerListing> {
    return this.registry.list();
  }

  formatForLLM(listing: ServerListing): string {
    const lines: string[] = [
      ...this.formatBucket('Active servers', listing.active),
      '',
      ...this.formatBucket('Inactive servers', listing.inactive),
    ];
    return lines.join('\n');
  }

  private formatBucket(title: string, servers: ServerMap): string[] {
    const names = Object.keys(servers);
    if (names.length === 0) {
      return [`${title}: none`];
    }

    const lines = [`${title} (${names.length}):`];
    for (const name of names) {
      const entry = servers[name];
      lines.push(`- **${name}**: ${[entry.command, ...entry.args].join(' ')}`);
    }
    return lines;
  }
}

export const listServersToolDefinition = {
  name: 'list_servers',
  description: 'List the active and inactive MCP servers in the config file.',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
} as const;
