// src/transforms/time.transform.ts
/**
 * Purpose:
 * - `time` transform for date fields, on luxon.
 *
 * Operations:
 * - timezone=Area/City: zone for the day operations after it (default UTC)
 * - truncate=hour|minute|second|<duration>: round down to a multiple of the
 *   duration since the epoch; durations read like "90s", "1h30m", "250ms"
 * - start_of_day, end_of_day: 00:00:00.000 / 23:59:59.999 in the zone
 *
 * Notes:
 * - A Date carries no zone; the stored value is always the instant.
 */

import { DateTime, Info } from "luxon";
import type { FieldHandle } from "../coerce/coerce";
import { labelOf } from "../coerce/CoercionError";
import type { FieldTags } from "../dsl/types";
import {
  parseOperations,
  requireArg,
  unknownOperation,
  type Operation,
  type Transform,
} from "./Transform";

export const TAG_TIME = "time";

const NAMED_UNITS: Readonly<Record<string, number>> = {
  hour: 3_600_000,
  minute: 60_000,
  second: 1_000,
};

const UNIT_MS: Readonly<Record<string, number>> = {
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
  ms: 1,
};

const DURATION_TEXT = /^(\d+(?:\.\d+)?(?:ms|h|m|s))+$/;
const DURATION_PART = /(\d+(?:\.\d+)?)(ms|h|m|s)/g;

export function parseDuration(text: string): number {
  const named = NAMED_UNITS[text];
  if (named !== undefined) return named;

  if (!DURATION_TEXT.test(text)) {
    throw new Error(`invalid duration: ${text}`);
  }

  let total = 0;
  for (const [, amount, unit] of text.matchAll(DURATION_PART)) {
    total += Number(amount) * UNIT_MS[unit];
  }
  if (total < 1) throw new Error(`invalid duration: ${text}`);
  return Math.floor(total);
}

function truncate(value: Date, step: number): Date {
  const ms = value.getTime();
  const rest = ((ms % step) + step) % step;
  return new Date(ms - rest);
}

function zoneOf(op: Operation): string {
  const zone = requireArg(op);
  if (!Info.isValidIANAZone(zone)) {
    throw new Error(`invalid timezone: ${zone}`);
  }
  return zone;
}

export class TimeTransform implements Transform {
  public readonly tag = TAG_TIME;

  public apply(tags: FieldTags, handle: FieldHandle): void {
    const chain = tags[TAG_TIME];
    if (chain === undefined) return;

    const current = handle.get();
    if (current === undefined || current === null) return;
    if (!(current instanceof Date)) {
      throw new Error(`expected date value, got ${labelOf(current)}`);
    }

    let zone = "utc";
    let value = current;
    for (const op of parseOperations(chain)) {
      switch (op.name) {
        case "timezone":
          zone = zoneOf(op);
          break;
        case "truncate":
          value = truncate(value, parseDuration(requireArg(op)));
          break;
        case "start_of_day":
          value = DateTime.fromJSDate(value, { zone })
            .startOf("day")
            .toJSDate();
          break;
        case "end_of_day":
          value = DateTime.fromJSDate(value, { zone }).endOf("day").toJSDate();
          break;
        default:
          throw unknownOperation(op);
      }
    }
    handle.set(value);
  }
}
