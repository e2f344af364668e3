import { z } from 'zod';
import { normalizeValidationError } from './errors';

export type AnyZodSchema = z.ZodTypeAny;

export async function validateAndSanitize<TSchema extends AnyZodSchema>(
  input: unknown,
  schema: TSchema
): Promise<z.infer<TSchema>> {
  try {
    return await schema.parseAsync(input);
  } catch (error) {
    throw normalizeValidationError(error);
  }
}
