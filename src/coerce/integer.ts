// src/coerce/integer.ts
/**
 * Purpose:
 * - Fixed-width integer destinations.
 *
 * Invariants:
 * - Every candidate is range-checked in bigint space before it is stored;
 *   nothing is truncated to fit.
 * - Negative values into unsigned kinds fail with reason "sign".
 * - int64/uint64 are stored as bigint, narrower kinds as number.
 */

import type { IntegerKind } from "../dsl/types";
import { CoercionError, unsupported } from "./CoercionError";
import { isRenderable } from "./text";

type Bounds = { min: bigint; max: bigint };

const BOUNDS: Readonly<Record<IntegerKind, Bounds>> = {
  int8: { min: -128n, max: 127n },
  int16: { min: -32768n, max: 32767n },
  int32: { min: -2147483648n, max: 2147483647n },
  int64: { min: -(2n ** 63n), max: 2n ** 63n - 1n },
  uint8: { min: 0n, max: 255n },
  uint16: { min: 0n, max: 65535n },
  uint32: { min: 0n, max: 4294967295n },
  uint64: { min: 0n, max: 2n ** 64n - 1n },
};

// decimal | 0x hex | 0b binary | 0o or leading-0 octal
const INTEGER_TEXT =
  /^([+-]?)(0[xX][0-9a-fA-F]+|0[bB][01]+|0[oO][0-7]+|0[0-7]+|[1-9][0-9]*|0)$/;

export function convertInteger(
  kind: IntegerKind,
  source: unknown
): number | bigint {
  const value = integerFrom(kind, source);
  checkRange(kind, value);
  return kind === "int64" || kind === "uint64" ? value : Number(value);
}

export function checkRange(kind: IntegerKind, value: bigint): void {
  const { min, max } = BOUNDS[kind];

  if (min === 0n && value < 0n) {
    throw new CoercionError(
      "sign",
      `cannot set negative value ${value} to unsigned type ${kind}`
    );
  }

  if (value < min || value > max) {
    throw new CoercionError(
      "range",
      `value ${value} is outside the range of target type ${kind} [${min}, ${max}]`
    );
  }
}

export function parseIntegerText(kind: IntegerKind, text: string): bigint {
  const match = INTEGER_TEXT.exec(text);
  if (!match) {
    throw new CoercionError(
      "syntax",
      `cannot convert string '${text}' to ${kind}`
    );
  }

  const [, sign, digits] = match;
  // BigInt() reads "017" as decimal; rewrite leading-zero octal as 0o17.
  const literal = /^0[0-7]+$/.test(digits) ? `0o${digits.slice(1)}` : digits;
  const magnitude = BigInt(literal);

  return sign === "-" ? -magnitude : magnitude;
}

function integerFrom(kind: IntegerKind, source: unknown): bigint {
  switch (typeof source) {
    case "bigint":
      return source;
    case "number":
      if (Number.isNaN(source)) {
        throw new CoercionError(
          "range",
          `cannot convert NaN to integer type ${kind}`
        );
      }
      if (!Number.isFinite(source)) {
        throw new CoercionError(
          "range",
          `cannot convert ${source > 0 ? "+" : "-"}Infinity to integer type ${kind}`
        );
      }
      if (source < 0 && BOUNDS[kind].min === 0n) {
        throw new CoercionError(
          "sign",
          `cannot set negative value ${source} to unsigned type ${kind}`
        );
      }
      return BigInt(Math.trunc(source));
    case "string":
      return parseIntegerText(kind, source);
    case "object":
      if (source !== null && isRenderable(source)) {
        return parseIntegerText(kind, String(source));
      }
      break;
  }
  throw unsupported(source, kind);
}
