/**
 * Converge — Runtime Schemas
 *
 * zod schemas for data that crosses a process boundary: state rows read back
 * from SQLite and saved plan documents.
 */

import { z } from "zod";
import type { AttributeMap, StateRecord, Value } from "./types.js";

export const resourceKeySchema = z.object({
  kind: z.string().min(1),
  name: z.string().min(1),
});

export const resourceRefSchema = z
  .object({
    $ref: resourceKeySchema,
    attribute: z.string().optional(),
  })
  .strict();

export const unknownValueSchema = z
  .object({
    $unknown: z.string(),
    attribute: z.string().optional(),
  })
  .strict();

export const valueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    resourceRefSchema,
    unknownValueSchema,
    z.array(valueSchema),
    z.record(valueSchema),
  ]),
);

export const attributeMapSchema: z.ZodType<AttributeMap> = z.record(valueSchema);

export const stateRecordSchema: z.ZodType<StateRecord> = z.object({
  kind: z.string(),
  name: z.string(),
  handle: z.string(),
  attributes: attributeMapSchema,
  computed: attributeMapSchema,
  dependencies: z.array(z.string()),
  updatedAt: z.string(),
});

/** Format zod issues as `path: message` lines. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
