// src/dsl/types.ts
/**
 * Purpose:
 * - Shared types for the record Field DSL.
 * - Must remain small, closed and serializable (plain objects; no closures),
 *   so the structure cache can validate and interpret a shape without
 *   executing anything.
 *
 * Storage per kind:
 * - string → string, boolean → boolean
 * - int8..int32, uint8..uint32, float32, float64 → number
 * - int64, uint64 → bigint
 * - date → Date | undefined, file → UploadedFile | undefined
 * - list → array, optional → T | undefined, any → unknown
 */

export const NUMBER_INTEGER_KINDS = [
  "int8",
  "int16",
  "int32",
  "uint8",
  "uint16",
  "uint32",
] as const;

export const BIGINT_INTEGER_KINDS = ["int64", "uint64"] as const;

export const FLOAT_KINDS = ["float32", "float64"] as const;

export const SCALAR_KINDS = [
  "string",
  "boolean",
  ...NUMBER_INTEGER_KINDS,
  ...BIGINT_INTEGER_KINDS,
  ...FLOAT_KINDS,
  "date",
  "file",
  "any",
] as const;

export type NumberIntegerKind = (typeof NUMBER_INTEGER_KINDS)[number];
export type BigIntegerKind = (typeof BIGINT_INTEGER_KINDS)[number];
export type IntegerKind = NumberIntegerKind | BigIntegerKind;
export type FloatKind = (typeof FLOAT_KINDS)[number];
export type ScalarKind = (typeof SCALAR_KINDS)[number];

export type ValueType =
  | { kind: ScalarKind }
  | { kind: "list"; of: ValueType }
  | { kind: "optional"; of: ValueType };

export type FieldKind = ValueType["kind"];

/**
 * Field annotation: tag name → tag value.
 * e.g. { query: "page", header: "X-Page", default: "1", numeric: "min=1" }
 */
export type FieldTags = Readonly<Record<string, string>>;

export type FieldSpec = {
  type: ValueType;
  tags: FieldTags;
};

export type FieldsShape = Readonly<Record<string, FieldSpec>>;

/** Reserved tag carrying a field's default literal. */
export const DEFAULT_TAG = "default";

/** Wire-name value that excludes a field from body decoding. */
export const SKIP_WIRE_NAME = "-";
