// src/dsl/schema.ts
/**
 * Purpose:
 * - Zod contract for a record's static `fields` shape.
 * - Run once per record type by the structure cache; a shape that fails
 *   here never reaches field resolution.
 */

import { z } from "zod";
import { SCALAR_KINDS, type FieldsShape, type ValueType } from "./types";

export const ValueTypeSchema: z.ZodType<ValueType> = z.lazy(() =>
  z.union([
    z.object({ kind: z.enum(SCALAR_KINDS) }),
    z.object({ kind: z.literal("list"), of: ValueTypeSchema }),
    z.object({ kind: z.literal("optional"), of: ValueTypeSchema }),
  ])
);

export const FieldSpecSchema = z.object({
  type: ValueTypeSchema,
  tags: z.record(z.string()),
});

export const FieldsShapeSchema: z.ZodType<FieldsShape> =
  z.record(FieldSpecSchema);

/** Flattens zod issues into one line: "page.type.kind: Invalid enum value ..." */
export function formatShapeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}
