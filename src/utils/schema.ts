import { z } from 'zod';

/**
 * Optional field that also takes `null`, which eBay sends for fields it has no value for.
 * Both read back as `undefined`.
 */
export function optionalField<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

/**
 * Like {@link optionalField}, but a value of the wrong type is dropped as well instead of failing the parse.
 */
export function lenientField<T extends z.ZodTypeAny>(schema: T) {
  return optionalField(schema).catch(undefined);
}
