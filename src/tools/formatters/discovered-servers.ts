import { LocationScan } from '../../discovery/server-discovery';
import { ExtractedDescriptor } from '../../types/servers';

/**
 * Descriptor as sent to MCP clients in `structuredContent`.
 */
export interface DescriptorPayload {
  path: string;
  suggested_name: string;
  command: string;
  args: string[];
  raw_instructions?: string;
}

export function toDescriptorPayload(descriptor: ExtractedDescriptor): DescriptorPayload {
  const payload: DescriptorPayload = {
    path: descriptor.path,
    suggested_name: descriptor.suggestedName,
    command: descriptor.command,
    args: descriptor.args,
  };
  if (descriptor.rawInstructions !== undefined) {
    payload.raw_instructions = descriptor.rawInstructions;
  }
  return payload;
}

export function toServersPayload(
  servers: Record<string, ExtractedDescriptor>
): Record<string, DescriptorPayload> {
  const payload: Record<string, DescriptorPayload> = {};
  for (const [name, descriptor] of Object.entries(servers)) {
    payload[name] = toDescriptorPayload(descriptor);
  }
  return payload;
}

export function toLocationsPayload(
  locations: Record<string, LocationScan>
): Record<string, { servers: Record<string, DescriptorPayload>; count: number }> {
  const payload: Record<string, { servers: Record<string, DescriptorPayload>; count: number }> = {};
  for (const [location, scan] of Object.entries(locations)) {
    payload[location] = { servers: toServersPayload(scan.servers), count: scan.count };
  }
  return payload;
}

/**
 * Markdown list of discovered servers, one block per suggested name.
 */
export function formatDiscoveredServers(
  servers: Record<string, ExtractedDescriptor>,
  indent = ''
): string[] {
  const lines: string[] = [];
  for (const [name, descriptor] of Object.entries(servers)) {
    const commandLine = [descriptor.command, ...descriptor.args].join(' ');
    lines.push(`${indent}- **${name}** at ${descriptor.path}`);
    lines.push(`${indent}  Command: ${commandLine}`);
    if (descriptor.rawInstructions === undefined) {
      lines.push(`${indent}  (no config snippet found in README; defaults used)`);
    }
  }
  return lines;
}

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
