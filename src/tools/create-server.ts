/**
 * Create Server Tool
 *
 * Registers a new `uv`-style server entry in the active bucket. The entry's
 * args are synthesized as `--directory <directory> run <script>`.
 *
 * @module tools/create-server
 */

import { z } from 'zod';
import { ServerRegistry } from '../registry/server-registry';
import { ServerDescriptor } from '../types/servers';
import { DirectoryPathSchema, serverNameSchema } from '../validation/common';
import { validateAndSanitize } from '../validation/middleware';

export const CreateServerParamsSchema = z
  .object({
    name: serverNameSchema,
    command: z.string().trim().min(1, 'command cannot be empty'),
    directory: DirectoryPathSchema,
    script: z.string().trim().min(1, 'script cannot be empty'),
    env: z.record(z.string(), z.string()).optional(),
  })
  .strict();

export type CreateServerParams = z.input<typeof CreateServerParamsSchema>;

export function buildServerArgs(directory: string, script: string): string[] {
  return ['--directory', directory, 'run', script];
}

export class CreateServerToolImpl {
  constructor(private readonly registry: ServerRegistry) {}

  /**
   * @throws ValidationError for malformed params
   * @throws DuplicateNameError if the name is already registered
   */
  async execute(params: unknown): Promise<ServerDescriptor> {
    const validated = await validateAndSanitize(params, CreateServerParamsSchema);
    const descriptor: ServerDescriptor = {
      name: validated.name,
      command: validated.command,
      args: buildServerArgs(validated.directory, validated.script),
    };
    if (validated.env) {
      descriptor.env = validated.env;
    }
    return this.registry.create(descriptor);
  }

  formatForLLM(server: ServerDescriptor): string {
    return [
      `✓ Created server **${server.name}** (active)`,
      `   Command: ${server.command} ${server.args.join(' ')}`,
    ].join('\n');
  }
}

export const createServerToolDefinition = {
  name: 'create_server',
  description:
    'Register a new MCP server in the active list. The server is launched as `<command> --directory <directory> run <script>`.',
  inputSchema: {
    type: 'object',
    properties: {
      name: {
        type: 'string',
        description: 'Unique server name',
      },
      command: {
        type: 'string',
        description: 'Executable used to launch the server, e.g. "uv"',
      },
      directory: {
        type: 'string',
        description: 'Project directory of the server (a leading ~ is expanded)',
      },
      script: {
        type: 'string',
        description: 'Script run inside the directory, e.g. "server.py"',
      },
      env: {
        type: 'object',
        description: 'Optional environment variables for the server process',
        additionalProperties: { type: 'string' },
      },
    },
    required: ['name', 'command', 'directory', 'script'],
    additionalProperties: false,
  },
} as const;
