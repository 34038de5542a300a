// src/transforms/numeric.transform.ts
/**
 * Purpose:
 * - `numeric` transform for number and bigint fields.
 *
 * Operations:
 * - abs, round, ceil, floor, min=N, max=N
 *
 * Notes:
 * - The result is converted back into the field's type, so `min=1000` on an
 *   int8 field fails with a range error instead of storing 1000.
 * - round goes half away from zero; round/ceil/floor leave bigints alone.
 */

import { convert, type FieldHandle } from "../coerce/coerce";
import { labelOf } from "../coerce/CoercionError";
import type { FieldTags } from "../dsl/types";
import {
  parseOperations,
  requireArg,
  unknownOperation,
  type Operation,
  type Transform,
} from "./Transform";

export const TAG_NUMERIC = "numeric";

type Numeric = number | bigint;

function boundOf(op: Operation, like: Numeric): Numeric {
  const arg = requireArg(op);
  if (typeof like === "bigint") {
    if (!/^[+-]?\d+$/.test(arg)) {
      throw new Error(`operation "${op.name}": "${arg}" is not an integer`);
    }
    return BigInt(arg);
  }

  const bound = Number(arg);
  if (!Number.isFinite(bound)) {
    throw new Error(`operation "${op.name}": "${arg}" is not a number`);
  }
  return bound;
}

function applyOperation(value: Numeric, op: Operation): Numeric {
  switch (op.name) {
    case "abs":
      if (typeof value === "bigint") return value < 0n ? -value : value;
      return Math.abs(value);
    case "round": {
      if (typeof value === "bigint") return value;
      // half away from zero: -2.5 → -3
      const rounded = Math.round(Math.abs(value));
      return value < 0 && rounded !== 0 ? -rounded : rounded;
    }
    case "ceil":
      return typeof value === "bigint" ? value : Math.ceil(value);
    case "floor":
      return typeof value === "bigint" ? value : Math.floor(value);
    case "min": {
      const bound = boundOf(op, value);
      return value < bound ? bound : value;
    }
    case "max": {
      const bound = boundOf(op, value);
      return value > bound ? bound : value;
    }
    default:
      throw unknownOperation(op);
  }
}

export class NumericTransform implements Transform {
  public readonly tag = TAG_NUMERIC;

  public apply(tags: FieldTags, handle: FieldHandle): void {
    const chain = tags[TAG_NUMERIC];
    if (chain === undefined) return;

    const current = handle.get();
    if (current === undefined || current === null) return;
    if (typeof current !== "number" && typeof current !== "bigint") {
      throw new Error(`expected numeric value, got ${labelOf(current)}`);
    }

    let value: Numeric = current;
    for (const op of parseOperations(chain)) {
      value = applyOperation(value, op);
    }
    handle.set(convert(handle.type, value));
  }
}
