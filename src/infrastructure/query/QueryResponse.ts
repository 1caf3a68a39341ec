import { z } from 'zod';

const fieldSchema = z
  .object({
    name: z.string(),
    data_type: z.unknown().optional(),
  })
  .passthrough();

const engineErrorSchema = z.union([
  z.string(),
  z.object({ message: z.string(), code: z.union([z.number(), z.string()]).optional() }).passthrough(),
]);

/** One page of a statement reply from the query endpoint's HTTP handler. */
export const queryResponseSchema = z
  .object({
    id: z.string().optional(),
    columns: z.object({ fields: z.array(fieldSchema) }).nullish(),
    data: z.array(z.array(z.unknown())).nullish(),
    next_uri: z.string().nullish(),
    error: engineErrorSchema.nullish(),
    stats: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type QueryResponse = z.infer<typeof queryResponseSchema>;
export type QueryResponseField = z.infer<typeof fieldSchema>;

export function engineErrorMessage(error: z.infer<typeof engineErrorSchema>): string {
  return typeof error === 'string' ? error : error.message;
}
