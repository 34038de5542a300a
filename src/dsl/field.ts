// src/dsl/field.ts
/**
 * Purpose:
 * - Field factory helpers for the record Field DSL.
 * - Returns plain objects; the structure cache interprets them without
 *   executing closures.
 *
 * Usage:
 *   class SearchQuery {
 *     static readonly fields = {
 *       term: field.string({ query: "q", string: "trim_space" }),
 *       page: field.uint16({ query: "page", default: "1" }),
 *       ids: field.list(field.int32(), { query: "id" }),
 *     } satisfies FieldsShape;
 *
 *     term = "";
 *     page = 0;
 *     ids: number[] = [];
 *   }
 */

import type { FieldSpec, FieldTags, ScalarKind } from "./types";

function scalar(kind: ScalarKind) {
  return (tags?: FieldTags): FieldSpec => ({
    type: { kind },
    tags: { ...(tags ?? {}) },
  });
}

export const field = {
  string: scalar("string"),
  boolean: scalar("boolean"),

  int8: scalar("int8"),
  int16: scalar("int16"),
  int32: scalar("int32"),
  int64: scalar("int64"),

  uint8: scalar("uint8"),
  uint16: scalar("uint16"),
  uint32: scalar("uint32"),
  uint64: scalar("uint64"),

  float32: scalar("float32"),
  float64: scalar("float64"),

  /** Parsed from RFC 3339, RFC 1123/2822, SQL-style or MM/dd/yyyy text. */
  date: scalar("date"),
  /** A multipart file part; see MultipartDecoder. */
  file: scalar("file"),

  any: scalar("any"),

  /**
   * Sequence of `inner`'s type. Without `tags`, the inner field's tags are
   * carried over, so `field.list(field.int32({ query: "id" }))` works too.
   */
  list(inner: FieldSpec, tags?: FieldTags): FieldSpec {
    return {
      type: { kind: "list", of: inner.type },
      tags: { ...(tags ?? inner.tags) },
    };
  },

  /** `inner`'s type or undefined; same tag carry-over as list(). */
  optional(inner: FieldSpec, tags?: FieldTags): FieldSpec {
    return {
      type: { kind: "optional", of: inner.type },
      tags: { ...(tags ?? inner.tags) },
    };
  },
} as const;
