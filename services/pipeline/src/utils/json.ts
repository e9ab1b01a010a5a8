import { z } from 'zod';
import type { JsonObject, JsonValue } from '../jobs/types';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

/** Coerces a JSONB column (already parsed by pg, or raw text) into an object; anything else becomes `{}`. */
export function toJsonObject(value: unknown): JsonObject {
  let candidate = value;
  if (typeof candidate === 'string') {
    try {
      candidate = JSON.parse(candidate);
    } catch {
      return {};
    }
  }
  const parsed = jsonObjectSchema.safeParse(candidate);
  return parsed.success ? parsed.data : {};
}
