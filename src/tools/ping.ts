/**
 * Ping Tool
 *
 * Liveness check for MCP clients.
 *
 * @module tools/ping
 */

export const PING_RESPONSE = 'Pong!';

export function ping(): string {
  return PING_RESPONSE;
}

export const pingToolDefinition = {
  name: 'ping',
  description: 'Ping the Holster server to check that it is running.',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
} as const;
