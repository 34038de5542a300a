// src/coerce/date.ts
/**
 * Purpose:
 * - date destinations, parsed with luxon.
 *
 * Layouts, tried in order:
 * - ISO 8601 / RFC 3339 ("2024-03-10", "2024-03-10T15:04:05Z", ...)
 * - SQL-style "2024-03-10 15:04:05[.sss][ +hh:mm]"
 * - HTTP dates (RFC 1123, RFC 850, asctime)
 * - RFC 2822 ("Sun, 10 Mar 2024 15:04:05 +0200")
 * - "03/10/2024" and "03/10/2024 15:04:05"
 *
 * Notes:
 * - Text without an offset is read as UTC.
 * - Date sources are copied; an invalid Date is a syntax error.
 */

import { DateTime } from "luxon";
import { CoercionError, unsupported } from "./CoercionError";
import { isRenderable } from "./text";

const UTC = { zone: "utc" } as const;

const LAYOUTS: ReadonlyArray<(text: string) => DateTime> = [
  (text) => DateTime.fromISO(text, UTC),
  (text) => DateTime.fromSQL(text, UTC),
  (text) => DateTime.fromHTTP(text, UTC),
  (text) => DateTime.fromRFC2822(text, UTC),
  (text) => DateTime.fromFormat(text, "MM/dd/yyyy", UTC),
  (text) => DateTime.fromFormat(text, "MM/dd/yyyy HH:mm:ss", UTC),
];

export function parseDateText(text: string): Date {
  const trimmed = text.trim();
  for (const layout of LAYOUTS) {
    const parsed = layout(trimmed);
    if (parsed.isValid) return parsed.toJSDate();
  }
  throw new CoercionError(
    "syntax",
    `cannot parse '${text}' as date with any known layout`
  );
}

export function convertDate(source: unknown): Date {
  if (source instanceof Date) {
    if (Number.isNaN(source.getTime())) {
      throw new CoercionError("syntax", "cannot convert invalid Date to date");
    }
    return new Date(source.getTime());
  }

  if (typeof source === "string") return parseDateText(source);
  if (typeof source === "object" && source !== null && isRenderable(source)) {
    return parseDateText(String(source));
  }
  throw unsupported(source, "date");
}
