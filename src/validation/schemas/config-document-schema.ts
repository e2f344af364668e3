import { z } from 'zod';
import { RESERVED_NAME_MESSAGE, isReservedServerName } from '../common';

export const ACTIVE_KEY = 'mcpServers';
export const INACTIVE_KEY = 'unusedMcpServers';

/**
 * Keys the store reads. Anything else a client put on the entry (`cwd`,
 * `type`, `url`, ...) is carried through unchanged.
 */
export const ServerEntrySchema = z
  .object({
    command: z.string({ required_error: 'command is required' }),
    args: z.array(z.string()).default([]),
    env: z.record(z.string(), z.string()).optional(),
  })
  .passthrough();

const StoredNameSchema = z.string().refine((name) => !isReservedServerName(name), {
  message: RESERVED_NAME_MESSAGE,
});

export const ServerMapSchema = z.record(StoredNameSchema, ServerEntrySchema);

/**
 * On-disk document. Keys other than the two server maps pass through.
 */
export const ConfigFileSchema = z
  .object({
    [ACTIVE_KEY]: ServerMapSchema,
    [INACTIVE_KEY]: ServerMapSchema,
  })
  .passthrough();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
