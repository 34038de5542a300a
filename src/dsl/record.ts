// src/dsl/record.ts
/**
 * Purpose:
 * - Record-type plumbing: what the binder accepts as a destination and how a
 *   destination's declared shape is found.
 *
 * Notes:
 * - A record type is a zero-argument class. Its static `fields` (optional)
 *   is the declared shape; a class without one still receives body data.
 * - Arrays and plain objects are collection-shaped: body decoding only.
 */

import type { FieldsShape } from "./types";

export type RecordType<T extends object = object> = (new () => T) & {
  readonly fields?: FieldsShape;
};

export type DestinationShape = "record" | "collection" | "unsupported";

export function classifyDestination(value: unknown): DestinationShape {
  if (typeof value !== "object" || value === null) return "unsupported";
  if (Array.isArray(value)) return "collection";

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) return "collection";

  return "record";
}

/** Constructor of a record destination; its `fields` is validated later. */
export function isRecordType(value: unknown): value is RecordType {
  return typeof value === "function" && typeof value.prototype === "object";
}

/** Name used in error messages and logs. */
export function typeNameOf(destination: unknown): string {
  if (Array.isArray(destination)) return "Array";
  if (typeof destination === "object" && destination !== null) {
    const name: unknown = Reflect.get(destination.constructor ?? {}, "name");
    return typeof name === "string" && name ? name : "Object";
  }
  return typeof destination;
}
