// src/sources/query.source.ts
/**
 * Purpose:
 * - `query` source: reads query-string parameters.
 *
 * Behavior:
 * - The raw query string is parsed once per bind (qs) and kept in the memo.
 * - A single value containing the split symbol becomes a list, unless
 *   splitting is disabled. Repeated keys become a list.
 * - An absent key is no value; `?name=` is the empty string.
 * - Bracketed keys (a[b]=1) parse as nested objects and are not flat values.
 */

import qs from "qs";
import type { FieldTags } from "../dsl/types";
import type { ExtractionMemo } from "../pool/ExtractionMemo";
import type { BindRequest } from "../request/BindRequest";
import {
  found,
  NO_VALUE,
  type Extraction,
  type ExtractionSource,
} from "./ExtractionSource";

export const TAG_QUERY = "query";
export const DEFAULT_SPLIT_SYMBOL = ",";

const MEMO_KEY = "query";

type QueryValues = Map<string, string[]>;

function isQueryValues(value: unknown): value is QueryValues {
  return value instanceof Map;
}

export interface QuerySourceOptions {
  /** Split single values on the split symbol. Defaults to true. */
  split?: boolean;
  splitSymbol?: string;
}

export class QuerySource implements ExtractionSource {
  public readonly tag = TAG_QUERY;

  private readonly split: boolean;
  private readonly splitSymbol: string;

  constructor(options: QuerySourceOptions = {}) {
    this.split = options.split ?? true;
    this.splitSymbol = options.splitSymbol ?? DEFAULT_SPLIT_SYMBOL;
    if (this.splitSymbol === "") {
      throw new Error("QuerySource: splitSymbol must not be empty.");
    }
  }

  public extract(
    req: BindRequest,
    tags: FieldTags,
    memo: ExtractionMemo
  ): Extraction {
    const name = tags[TAG_QUERY];
    if (name === undefined) return NO_VALUE;

    const query = memo.getOrCompute(MEMO_KEY, isQueryValues, () =>
      parseQuery(req.url)
    );

    const values = query.get(name);
    if (values === undefined || values.length === 0) return NO_VALUE;

    if (values.length > 1) return found(values);

    const [value] = values;
    if (this.split && value.includes(this.splitSymbol)) {
      return found(value.split(this.splitSymbol));
    }
    return found(value);
  }
}

export function parseQuery(url: string): QueryValues {
  const values: QueryValues = new Map();

  const mark = url.indexOf("?");
  if (mark === -1) return values;

  const hash = url.indexOf("#", mark);
  const raw = url.slice(mark + 1, hash === -1 ? undefined : hash);
  if (raw === "") return values;

  const parsed = qs.parse(raw, { parseArrays: false, allowDots: false });
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string") {
      values.set(key, [value]);
    } else if (Array.isArray(value)) {
      values.set(
        key,
        value.filter((item): item is string => typeof item === "string")
      );
    }
  }
  return values;
}
