// src/sources/cookie.source.ts
/**
 * Purpose:
 * - `cookie` source: parses the Cookie header once per bind (cookie.parse)
 *   and yields a CookieValue, which text fields receive as its value.
 */

import { parse } from "cookie";
import type { FieldTags } from "../dsl/types";
import type { ExtractionMemo } from "../pool/ExtractionMemo";
import { headerValue, type BindRequest } from "../request/BindRequest";
import {
  found,
  NO_VALUE,
  type Extraction,
  type ExtractionSource,
} from "./ExtractionSource";

export const TAG_COOKIE = "cookie";

const MEMO_KEY = "cookie";

export class CookieValue {
  constructor(
    public readonly name: string,
    public readonly value: string
  ) {}

  public toString(): string {
    return this.value;
  }
}

type CookieJar = Map<string, string>;

function isCookieJar(value: unknown): value is CookieJar {
  return value instanceof Map;
}

export class CookieSource implements ExtractionSource {
  public readonly tag = TAG_COOKIE;

  public extract(
    req: BindRequest,
    tags: FieldTags,
    memo: ExtractionMemo
  ): Extraction {
    const name = tags[TAG_COOKIE];
    if (name === undefined) return NO_VALUE;

    const jar = memo.getOrCompute(MEMO_KEY, isCookieJar, () =>
      parseCookies(req)
    );

    const value = jar.get(name);
    if (value === undefined) return NO_VALUE;
    return found(new CookieValue(name, value));
  }
}

function parseCookies(req: BindRequest): CookieJar {
  const jar: CookieJar = new Map();
  const header = headerValue(req, "cookie");
  if (!header) return jar;

  for (const [key, value] of Object.entries(parse(header))) {
    if (typeof value === "string") jar.set(key, value);
  }
  return jar;
}
