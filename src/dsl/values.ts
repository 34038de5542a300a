// src/dsl/values.ts
/**
 * Purpose:
 * - Zero values and zero checks per ValueType.
 * - Human-readable type names for error messages.
 */

import type { ValueType } from "./types";
import { UploadedFile } from "./upload";

export function zeroValue(type: ValueType): unknown {
  switch (type.kind) {
    case "string":
      return "";
    case "boolean":
      return false;
    case "int8":
    case "int16":
    case "int32":
    case "uint8":
    case "uint16":
    case "uint32":
    case "float32":
    case "float64":
      return 0;
    case "int64":
    case "uint64":
      return 0n;
    case "list":
      return [];
    case "date":
    case "file":
    case "optional":
    case "any":
      return undefined;
  }
}

/** undefined/null are zero for every kind; an empty list is zero. */
export function isZero(value: unknown, type: ValueType): boolean {
  if (value === undefined || value === null) return true;

  switch (type.kind) {
    case "list":
      return Array.isArray(value) && value.length === 0;
    case "date":
      return !(value instanceof Date);
    case "file":
      return !(value instanceof UploadedFile);
    case "optional":
    case "any":
      return false;
    default:
      return value === zeroValue(type);
  }
}

export function describeType(type: ValueType): string {
  switch (type.kind) {
    case "list":
      return `list<${describeType(type.of)}>`;
    case "optional":
      return `optional<${describeType(type.of)}>`;
    default:
      return type.kind;
  }
}
