// src/coerce/coerce.ts
/**
 * Purpose:
 * - Value Coercion Unit: converts one dynamically-typed value (from a source,
 *   a body decoder or a default literal) into a field's declared ValueType.
 *
 * Rules:
 * - null/undefined → zero value of the destination, never an error.
 * - "" → "" for string/any, zero value for scalars. A list field keeps its
 *   current elements (coerce() only; convert() has no current value).
 * - list ← array: element-wise; list ← text: split on ",", trimmed, empties
 *   dropped. The first failing element aborts with reason "element".
 * - optional: absent current value is simply replaced by the converted
 *   inner value.
 * - file ← UploadedFile only; any: stored as is (arrays copied).
 */

import type {
  FloatKind,
  IntegerKind,
  ValueType,
} from "../dsl/types";
import {
  BIGINT_INTEGER_KINDS,
  FLOAT_KINDS,
  NUMBER_INTEGER_KINDS,
} from "../dsl/types";
import { UploadedFile } from "../dsl/upload";
import { describeType, zeroValue } from "../dsl/values";
import { CoercionError, unsupported } from "./CoercionError";
import { convertDate } from "./date";
import { convertFloat } from "./float";
import { convertInteger } from "./integer";
import { convertBoolean, convertString, LIST_SEPARATOR } from "./text";

/** Mutable view of one destination field. */
export interface FieldHandle {
  readonly name: string;
  readonly type: ValueType;
  get(): unknown;
  set(value: unknown): void;
}

/** Handle over `target[name]`. */
export function propertyHandle(
  target: object,
  name: string,
  type: ValueType
): FieldHandle {
  return {
    name,
    type,
    get: (): unknown => Reflect.get(target, name),
    set: (value: unknown): void => {
      Reflect.set(target, name, value);
    },
  };
}

const INTEGER_KINDS: ReadonlySet<string> = new Set<string>([
  ...NUMBER_INTEGER_KINDS,
  ...BIGINT_INTEGER_KINDS,
]);
const FLOAT_KIND_SET: ReadonlySet<string> = new Set<string>(FLOAT_KINDS);

function isIntegerKind(kind: string): kind is IntegerKind {
  return INTEGER_KINDS.has(kind);
}

function isFloatKind(kind: string): kind is FloatKind {
  return FLOAT_KIND_SET.has(kind);
}

function listOf(type: ValueType): boolean {
  if (type.kind === "optional") return listOf(type.of);
  return type.kind === "list";
}

export function coerce(handle: FieldHandle, source: unknown): void {
  if (source === "" && listOf(handle.type)) return;
  handle.set(convert(handle.type, source));
}

export function convert(type: ValueType, source: unknown): unknown {
  if (source === undefined || source === null) return zeroValue(type);

  if (source === "") {
    return type.kind === "string" || type.kind === "any"
      ? ""
      : zeroValue(type);
  }

  if (type.kind === "list") return convertList(type.of, source);
  if (type.kind === "optional") return convert(type.of, source);

  const kind = type.kind;
  if (isIntegerKind(kind)) return convertInteger(kind, source);
  if (isFloatKind(kind)) return convertFloat(kind, source);

  switch (kind) {
    case "string":
      return convertString(source);
    case "boolean":
      return convertBoolean(source);
    case "date":
      return convertDate(source);
    case "file":
      if (source instanceof UploadedFile) return source;
      throw unsupported(source, "file");
    case "any":
      return Array.isArray(source) ? [...source] : source;
  }
}

function convertList(of: ValueType, source: unknown): unknown[] {
  let items: readonly unknown[];

  if (Array.isArray(source)) {
    items = source;
  } else if (typeof source === "string") {
    items = source
      .split(LIST_SEPARATOR)
      .map((part) => part.trim())
      .filter((part) => part !== "");
  } else if (source instanceof UploadedFile) {
    items = [source];
  } else {
    throw unsupported(source, `list<${describeType(of)}>`);
  }

  return items.map((item, index) => {
    try {
      return convert(of, item);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new CoercionError(
        "element",
        `slice element with index ${index}: ${detail}`,
        { index, cause: err }
      );
    }
  });
}
