/**
 * Update Server Status Tool
 *
 * Moves servers between the active and inactive lists. The batch is
 * all-or-nothing: one unknown name leaves the config file untouched.
 *
 * @module tools/update-server-status
 */

import { z } from 'zod';
import { ServerRegistry, StatusUpdateResult } from '../registry/server-registry';
import { serverNameSchema } from '../validation/common';
import { validateAndSanitize } from '../validation/middleware';

export const UpdateServerStatusParamsSchema = z
  .object({
    names: z.array(serverNameSchema).min(1, 'names must contain at least 1 items'),
    active: z.boolean({
      required_error: 'active is required',
      invalid_type_error: 'active must be a boolean',
    }),
  })
  .strict();

export type UpdateServerStatusParams = z.input<typeof UpdateServerStatusParamsSchema>;

export interface UpdateServerStatusResult extends StatusUpdateResult {
  active: boolean;
}

export class UpdateServerStatusToolImpl {
  constructor(private readonly registry: ServerRegistry) {}

  /**
   * @throws NotFoundError if a name is not in the bucket it would move out of
   */
  async execute(params: unknown): Promise<UpdateServerStatusResult> {
    const validated = await validateAndSanitize(params, UpdateServerStatusParamsSchema);
    const result = await this.registry.setStatus(validated.names, validated.active);
    return { ...result, active: validated.active };
  }

  formatForLLM(result: UpdateServerStatusResult): string {
    const target = result.active ? 'active' : 'inactive';
    return [
      `✓ Moved ${result.updated.length} server(s) to ${target}: ${result.updated.join(', ')}`,
      `Active: ${result.activeCount}, inactive: ${result.inactiveCount}`,
    ].join('\n');
  }
}

export const updateServerStatusToolDefinition = {
  name: 'update_server_status',
  description:
    'Activate or deactivate MCP servers. Activating moves servers from the inactive list to the active list; deactivating does the reverse. Fails without changes if any name is not in the expected list.',
  inputSchema: {
    type: 'object',
    properties: {
      names: {
        type: 'array',
        items: { type: 'string' },
        minItems: 1,
        description: 'Server names to move',
      },
      active: {
        type: 'boolean',
        description: 'true to activate, false to deactivate',
      },
    },
    required: ['names', 'active'],
    additionalProperties: false,
  },
} as const;
