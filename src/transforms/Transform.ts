// src/transforms/Transform.ts
/**
 * Purpose:
 * - Contract for pluggable post-resolution transforms, plus the parser for
 *   their tag values: `string: "trim_space,lower"`, `numeric: "min=1,max=50"`.
 *
 * Notes:
 * - apply() runs after sources and defaults, including on pre-filled fields.
 * - A throw aborts the bind; the binder wraps it as TransformError.
 */

import type { FieldHandle } from "../coerce/coerce";
import type { FieldTags } from "../dsl/types";

export interface Transform {
  readonly tag: string;
  apply(tags: FieldTags, handle: FieldHandle): void;
}

export interface Operation {
  readonly name: string;
  readonly arg?: string;
}

export function parseOperations(chain: string): Operation[] {
  const ops: Operation[] = [];
  for (const part of chain.split(",")) {
    const trimmed = part.trim();
    if (trimmed === "") continue;

    const eq = trimmed.indexOf("=");
    if (eq === -1) {
      ops.push({ name: trimmed });
    } else {
      ops.push({
        name: trimmed.slice(0, eq).trim(),
        arg: trimmed.slice(eq + 1).trim(),
      });
    }
  }
  return ops;
}

export function requireArg(op: Operation): string {
  if (op.arg === undefined || op.arg === "") {
    throw new Error(`operation "${op.name}" requires an argument`);
  }
  return op.arg;
}

export function unknownOperation(op: Operation): Error {
  return new Error(`unknown operation "${op.name}"`);
}
