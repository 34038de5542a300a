// src/sources/header.source.ts
/**
 * Purpose:
 * - `header` source. The tag may name several headers separated by ",":
 *   `header: "X-Request-Id,X-Correlation-Id"` takes the first non-empty one.
 */

import type { FieldTags } from "../dsl/types";
import { headerValue, type BindRequest } from "../request/BindRequest";
import {
  found,
  NO_VALUE,
  type Extraction,
  type ExtractionSource,
} from "./ExtractionSource";

export const TAG_HEADER = "header";

export class HeaderSource implements ExtractionSource {
  public readonly tag = TAG_HEADER;

  public extract(req: BindRequest, tags: FieldTags): Extraction {
    const names = tags[TAG_HEADER];
    if (names === undefined) return NO_VALUE;

    for (const raw of names.split(",")) {
      const name = raw.trim();
      if (name === "") continue;

      const value = headerValue(req, name);
      if (value !== undefined && value !== "") return found(value);
    }
    return NO_VALUE;
  }
}
