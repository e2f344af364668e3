import { z } from 'zod';
import { pathStringSchema } from '../common';

const IntegerString = (label: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${label} must be a non-negative integer`)
    .transform((value) => Number.parseInt(value, 10));

/**
 * Raw environment variables understood by the server.
 */
export const HolsterEnvironmentSchema = z.object({
  HOLSTER_CONFIG_PATH: pathStringSchema.optional(),
  HOLSTER_HOME_DIR: pathStringSchema.optional(),
  HOLSTER_SCAN_MAX_DEPTH: IntegerString('HOLSTER_SCAN_MAX_DEPTH')
    .pipe(z.number().max(10, 'HOLSTER_SCAN_MAX_DEPTH must be at most 10'))
    .optional(),
  HOLSTER_SCAN_TIMEOUT_MS: IntegerString('HOLSTER_SCAN_TIMEOUT_MS').optional(),
});

export type HolsterEnvironment = z.infer<typeof HolsterEnvironmentSchema>;
