// src/coerce/text.ts
/**
 * Purpose:
 * - string and boolean destinations.
 * - "Render as text": an object whose toString is its own (Date, URL,
 *   CookieValue, ...) converts through it; plain objects and arrays do not.
 */

import { CoercionError, unsupported } from "./CoercionError";

const TRUE_TEXT = new Set(["1", "t", "true", "yes", "y", "on"]);
const FALSE_TEXT = new Set(["0", "f", "false", "no", "n", "off"]);

export const LIST_SEPARATOR = ",";

export function isRenderable(value: object): boolean {
  if (Array.isArray(value)) return false;
  const render: unknown = Reflect.get(value, "toString");
  return typeof render === "function" && render !== Object.prototype.toString;
}

export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return "NaN";
  if (n === Infinity) return "+Inf";
  if (n === -Infinity) return "-Inf";
  return String(n);
}

export function convertString(source: unknown): string {
  switch (typeof source) {
    case "string":
      return source;
    case "number":
      return formatNumber(source);
    case "bigint":
      return source.toString();
    case "boolean":
      return source ? "true" : "false";
    case "object":
      if (source === null) return "";
      if (Array.isArray(source)) {
        const parts: string[] = [];
        for (const item of source) {
          if (typeof item !== "string") throw unsupported(source, "string");
          parts.push(item);
        }
        return parts.join(LIST_SEPARATOR);
      }
      if (isRenderable(source)) return String(source);
      break;
  }
  throw unsupported(source, "string");
}

export function parseBooleanText(text: string): boolean {
  const lowered = text.toLowerCase();
  if (TRUE_TEXT.has(lowered)) return true;
  if (FALSE_TEXT.has(lowered)) return false;
  throw new CoercionError("syntax", `cannot convert string '${text}' to bool`);
}

/** Numbers and bigints are true iff strictly greater than zero. */
export function convertBoolean(source: unknown): boolean {
  switch (typeof source) {
    case "boolean":
      return source;
    case "number":
      return source > 0;
    case "bigint":
      return source > 0n;
    case "string":
      return parseBooleanText(source);
    case "object":
      if (source !== null && isRenderable(source)) {
        return parseBooleanText(String(source));
      }
      break;
  }
  throw unsupported(source, "boolean");
}
