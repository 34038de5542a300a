// src/binder/defaults.ts
/**
 * Purpose:
 * - The registrations a Binder gets when its config names none.
 * - Order here is priority order: query, header, cookie, path.
 */

import { FormDecoder } from "../decoders/form.decoder";
import { JsonDecoder } from "../decoders/json.decoder";
import { MultipartDecoder } from "../decoders/multipart.decoder";
import type { BodyDecoder } from "../decoders/BodyDecoder";
import type { BodyLimit } from "../request/body";
import { CookieSource } from "../sources/cookie.source";
import type { ExtractionSource } from "../sources/ExtractionSource";
import { HeaderSource } from "../sources/header.source";
import { PathSource } from "../sources/path.source";
import { QuerySource, type QuerySourceOptions } from "../sources/query.source";
import { ListTransform } from "../transforms/list.transform";
import { NumericTransform } from "../transforms/numeric.transform";
import { StringTransform } from "../transforms/string.transform";
import { TimeTransform } from "../transforms/time.transform";
import type { Transform } from "../transforms/Transform";

export function defaultSources(
  query: QuerySourceOptions = {}
): ExtractionSource[] {
  return [
    new QuerySource(query),
    new HeaderSource(),
    new CookieSource(),
    new PathSource(),
  ];
}

export function defaultDecoders(limit?: BodyLimit): BodyDecoder[] {
  return [
    new JsonDecoder(limit),
    new FormDecoder(limit),
    new MultipartDecoder(),
  ];
}

export function defaultTransforms(): Transform[] {
  return [
    new StringTransform(),
    new NumericTransform(),
    new ListTransform(),
    new TimeTransform(),
  ];
}
