// src/coerce/CoercionError.ts

export type CoercionReason =
  | "range"
  | "sign"
  | "syntax"
  | "unsupported"
  | "element";

/**
 * Raised by the coercion unit. Field-level context (field, source, record
 * type) is added by the binder when it wraps this error.
 */
export class CoercionError extends Error {
  public readonly reason: CoercionReason;
  /** Set for reason "element": index of the failing list element. */
  public readonly index?: number;

  constructor(
    reason: CoercionReason,
    message: string,
    opts?: { index?: number; cause?: unknown }
  ) {
    super(
      message,
      opts?.cause === undefined ? undefined : { cause: opts.cause }
    );
    this.name = "CoercionError";
    this.reason = reason;
    this.index = opts?.index;
  }
}

export function unsupported(source: unknown, target: string): CoercionError {
  return new CoercionError(
    "unsupported",
    `not supported type: cannot set value of type ${labelOf(source)} to ${target}`
  );
}

export function labelOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    const name: unknown = Reflect.get(value.constructor ?? {}, "name");
    return typeof name === "string" && name ? name : "object";
  }
  return typeof value;
}
