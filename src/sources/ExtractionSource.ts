// src/sources/ExtractionSource.ts
/**
 * Purpose:
 * - Contract for pluggable extraction sources (query, header, cookie, path).
 *
 * Notes:
 * - `tag` is the field-annotation key the source answers to; the structure
 *   cache tags a field with this source when the field's tags carry it.
 * - extract() receives the whole field annotation and reads its own tag.
 * - { ok: false } means "no value here": the next source is tried.
 */

import type { FieldTags } from "../dsl/types";
import type { ExtractionMemo } from "../pool/ExtractionMemo";
import type { BindRequest } from "../request/BindRequest";

export type Extraction = { ok: true; value: unknown } | { ok: false };

export const NO_VALUE: Extraction = { ok: false };

export function found(value: unknown): Extraction {
  return { ok: true, value };
}

export interface ExtractionSource {
  readonly tag: string;
  extract(req: BindRequest, tags: FieldTags, memo: ExtractionMemo): Extraction;
}
