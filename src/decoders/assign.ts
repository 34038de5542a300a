// src/decoders/assign.ts
/**
 * Purpose:
 * - Writes a decoded payload into a destination. Shared by the JSON and form
 *   decoders; only the wire-name tag differs.
 *
 * Rules:
 * - Array destination: replaced by the elements of an array payload.
 * - Plain object: receives every top-level key of an object payload.
 * - Record: declared fields take the value under their wire name (tag value,
 *   else property name; "-" excludes), converted to the declared type.
 *   Undeclared properties the instance already owns take the raw value.
 *   Everything else in the payload is ignored.
 */

import { coerce, propertyHandle } from "../coerce/coerce";
import { labelOf } from "../coerce/CoercionError";
import { classifyDestination } from "../dsl/record";
import {
  SKIP_WIRE_NAME,
  type FieldsShape,
  type ValueType,
} from "../dsl/types";
import { messageOf } from "../errors/BindError";
import type { DecodeTarget } from "./BodyDecoder";

type Payload = Record<string, unknown>;

function isPayload(value: unknown): value is Payload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function assignDecoded(
  target: DecodeTarget,
  data: unknown,
  wireTag: string
): void {
  const { value } = target;

  if (Array.isArray(value)) {
    if (!Array.isArray(data)) {
      throw new Error(`cannot decode ${labelOf(data)} into array`);
    }
    value.length = 0;
    value.push(...data);
    return;
  }

  if (!isPayload(data)) {
    throw new Error(`cannot decode ${labelOf(data)} into object`);
  }

  if (classifyDestination(value) === "collection") {
    Object.assign(value, data);
    return;
  }

  assignRecord(value, target.fields, data, wireTag);
}

function assignRecord(
  value: object,
  fields: FieldsShape,
  data: Payload,
  wireTag: string
): void {
  const consumed = new Set<string>();

  for (const [name, def] of Object.entries(fields)) {
    consumed.add(name);

    const wire = def.tags[wireTag] ?? name;
    if (wire === SKIP_WIRE_NAME) continue;
    consumed.add(wire);

    if (!Object.hasOwn(data, wire)) continue;

    assignField(value, name, def.type, data[wire]);
  }

  for (const [key, raw] of Object.entries(data)) {
    if (consumed.has(key) || !Object.hasOwn(value, key)) continue;
    Reflect.set(value, key, raw);
  }
}

/** Converts `raw` into `value[name]`; failures name the field. */
export function assignField(
  value: object,
  name: string,
  type: ValueType,
  raw: unknown
): void {
  try {
    coerce(propertyHandle(value, name, type), raw);
  } catch (err) {
    throw new Error(`field \`${name}\`: ${messageOf(err)}`, { cause: err });
  }
}
