// src/dsl/index.ts
/**
 * Purpose:
 * - Public export surface for the record Field DSL.
 */

export { field } from "./field";
export { describeType, isZero, zeroValue } from "./values";
export type { RecordType } from "./record";
export type {
  FieldKind,
  FieldSpec,
  FieldTags,
  FieldsShape,
  IntegerKind,
  FloatKind,
  ScalarKind,
  ValueType,
} from "./types";
