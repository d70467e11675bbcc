import { z, ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const JsonObjectSchema = z.record(z.unknown());

/**
 * Inline JSON schema for a zod schema, without `$ref`s or the `$schema` key.
 * Every zod to JSON schema conversion in the project goes through here.
 */
export function toJsonSchema(schema: ZodTypeAny): Record<string, unknown> {
  const converted = JsonObjectSchema.parse(zodToJsonSchema(schema, { $refStrategy: 'none' }));
  delete converted.$schema;
  return converted;
}
