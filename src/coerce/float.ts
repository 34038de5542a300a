// src/coerce/float.ts

import type { FloatKind } from "../dsl/types";
import { CoercionError, unsupported } from "./CoercionError";
import { isRenderable } from "./text";

const FLOAT32_MAX = 3.4028234663852886e38;

const FLOAT_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_TEXT = /^([+-]?)(inf|infinity|nan)$/i;

export function convertFloat(kind: FloatKind, source: unknown): number {
  const value = floatFrom(kind, source);

  if (kind === "float32") {
    if (Number.isFinite(value) && Math.abs(value) > FLOAT32_MAX) {
      throw new CoercionError(
        "range",
        `value ${value} is outside the range of float32`
      );
    }
    return Math.fround(value);
  }

  return value;
}

export function parseFloatText(kind: FloatKind, text: string): number {
  const special = SPECIAL_TEXT.exec(text);
  if (special) {
    if (special[2].toLowerCase() === "nan") return NaN;
    return special[1] === "-" ? -Infinity : Infinity;
  }

  if (!FLOAT_TEXT.test(text)) {
    throw new CoercionError(
      "syntax",
      `cannot convert string '${text}' to ${kind}`
    );
  }

  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new CoercionError(
      "range",
      `value '${text}' is outside the range of ${kind}`
    );
  }
  return value;
}

function floatFrom(kind: FloatKind, source: unknown): number {
  switch (typeof source) {
    case "number":
      return source;
    case "bigint": {
      const value = Number(source);
      if (!Number.isFinite(value)) {
        throw new CoercionError(
          "range",
          `value ${source} is outside the range of ${kind}`
        );
      }
      return value;
    }
    case "string":
      return parseFloatText(kind, source);
    case "object":
      if (source !== null && isRenderable(source)) {
        return parseFloatText(kind, String(source));
      }
      break;
  }
  throw unsupported(source, kind);
}
