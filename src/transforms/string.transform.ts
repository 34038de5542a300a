// src/transforms/string.transform.ts
/**
 * Purpose:
 * - `string` transform for text fields (and optional text fields).
 *
 * Operations:
 * - trim_space, lower, upper, title, snake, kebab
 * - plus any operation registered through the constructor
 *
 * Notes:
 * - An absent optional value is left alone.
 */

import type { FieldHandle } from "../coerce/coerce";
import { labelOf } from "../coerce/CoercionError";
import type { FieldTags } from "../dsl/types";
import {
  parseOperations,
  unknownOperation,
  type Transform,
} from "./Transform";

export const TAG_STRING = "string";

export type StringOperation = (value: string) => string;

function words(value: string): string[] {
  return value
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(/[\s_-]+/)
    .filter((word) => word !== "")
    .map((word) => word.toLowerCase());
}

const BUILTIN_OPERATIONS: Readonly<Record<string, StringOperation>> = {
  trim_space: (value) => value.trim(),
  lower: (value) => value.toLowerCase(),
  upper: (value) => value.toUpperCase(),
  title: (value) =>
    value.replace(
      /(^|\s)(\S+)/g,
      (_match, space: string, word: string) =>
        space + word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
    ),
  snake: (value) => words(value).join("_"),
  kebab: (value) => words(value).join("-"),
};

export class StringTransform implements Transform {
  public readonly tag = TAG_STRING;

  private readonly operations: ReadonlyMap<string, StringOperation>;

  constructor(custom: Readonly<Record<string, StringOperation>> = {}) {
    this.operations = new Map(
      Object.entries({ ...BUILTIN_OPERATIONS, ...custom })
    );
  }

  public apply(tags: FieldTags, handle: FieldHandle): void {
    const chain = tags[TAG_STRING];
    if (chain === undefined) return;

    const current = handle.get();
    if (current === undefined || current === null) return;
    if (typeof current !== "string") {
      throw new Error(`expected text value, got ${labelOf(current)}`);
    }

    let value = current;
    for (const op of parseOperations(chain)) {
      const fn = this.operations.get(op.name);
      if (!fn) throw unknownOperation(op);
      value = fn(value);
    }
    handle.set(value);
  }
}
