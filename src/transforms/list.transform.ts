// src/transforms/list.transform.ts
/**
 * Purpose:
 * - `list` transform for list fields.
 *
 * Operations:
 * - sort, sort_desc: numbers, bigints and dates by value, the rest as text
 * - unique: first occurrence kept
 * - compact: zero elements dropped ("", 0, false, ...)
 * - limit=N: at most N elements kept
 */

import type { FieldHandle } from "../coerce/coerce";
import { labelOf } from "../coerce/CoercionError";
import { isZero } from "../dsl/values";
import type { FieldTags, ValueType } from "../dsl/types";
import {
  parseOperations,
  requireArg,
  unknownOperation,
  type Operation,
  type Transform,
} from "./Transform";

export const TAG_LIST = "list";

function elementTypeOf(type: ValueType): ValueType | undefined {
  if (type.kind === "optional") return elementTypeOf(type.of);
  if (type.kind === "list") return type.of;
  return undefined;
}

function isNumeric(value: unknown): value is number | bigint {
  return typeof value === "number" || typeof value === "bigint";
}

function compareItems(a: unknown, b: unknown): number {
  if (isNumeric(a) && isNumeric(b)) return a < b ? -1 : a > b ? 1 : 0;
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }

  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function limitOf(op: Operation): number {
  const arg = requireArg(op);
  if (!/^\d+$/.test(arg)) {
    throw new Error(
      `operation "${op.name}": "${arg}" is not a non-negative integer`
    );
  }
  return Number(arg);
}

export class ListTransform implements Transform {
  public readonly tag = TAG_LIST;

  public apply(tags: FieldTags, handle: FieldHandle): void {
    const chain = tags[TAG_LIST];
    if (chain === undefined) return;

    const of = elementTypeOf(handle.type);
    if (of === undefined) {
      throw new Error(`field of type ${handle.type.kind} is not a list`);
    }

    const current = handle.get();
    if (current === undefined || current === null) return;
    if (!Array.isArray(current)) {
      throw new Error(`expected list value, got ${labelOf(current)}`);
    }

    let items: unknown[] = [...current];
    for (const op of parseOperations(chain)) {
      switch (op.name) {
        case "sort":
          items.sort(compareItems);
          break;
        case "sort_desc":
          items.sort((a, b) => compareItems(b, a));
          break;
        case "unique":
          items = [...new Set(items)];
          break;
        case "compact":
          items = items.filter((item) => !isZero(item, of));
          break;
        case "limit":
          items = items.slice(0, limitOf(op));
          break;
        default:
          throw unknownOperation(op);
      }
    }
    handle.set(items);
  }
}
