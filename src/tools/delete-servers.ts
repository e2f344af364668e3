/**
 * Delete Servers Tool
 *
 * @module tools/delete-servers
 */

import { z } from 'zod';
import { DeleteResult, ServerRegistry } from '../registry/server-registry';
import { serverNameSchema } from '../validation/common';
import { validateAndSanitize } from '../validation/middleware';

export const DeleteServersParamsSchema = z
  .object({
    names: z.array(serverNameSchema).min(1, 'names must contain at least 1 items'),
  })
  .strict();

export type DeleteServersParams = z.input<typeof DeleteServersParamsSchema>;

export class DeleteServersToolImpl {
  constructor(private readonly registry: ServerRegistry) {}

  /**
   * @throws NotFoundError if a name is in neither list; nothing is deleted
   */
  async execute(params: unknown): Promise<DeleteResult> {
    const validated = await validateAndSanitize(params, DeleteServersParamsSchema);
    return this.registry.delete(validated.names);
  }

  formatForLLM(result: DeleteResult): string {
    return [
      `✓ Deleted ${result.deleted.length} server(s): ${result.deleted.join(', ')}`,
      `Remaining active: ${result.remainingActive}, inactive: ${result.remainingInactive}`,
    ].join('\n');
  }
}

export const deleteServersToolDefinition = {
  name: 'delete_servers',
  description:
    'Delete MCP servers from the config file, whichever list they are in. Fails without changes if any name is unknown.',
  inputSchema: {
    type: 'object',
    properties: {
      names: {
        type: 'array',
        items: { type: 'string' },
        minItems: 1,
        description: 'Server names to delete',
      },
    },
    required: ['names'],
    additionalProperties: false,
  },
} as const;
