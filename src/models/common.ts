import { z } from 'zod';

/** Any JSON object, for responses without a fixed shape (status pages, reports). */
export const jsonObjectSchema = z.record(z.string(), z.unknown());
export type JsonObject = z.infer<typeof jsonObjectSchema>;

export const nullableString = z.string().nullable();
export const nullableNumber = z.number().nullable();
export const nullableBoolean = z.boolean().nullable();

/**
 * Object schema for a backend resource. Every listed field is optional, and
 * fields the schema does not list are kept on the parsed value.
 */
export function resource<Shape extends z.ZodRawShape>(shape: Shape) {
  return z.object(shape).partial().passthrough();
}
