// src/sources/path.source.ts
/**
 * Purpose:
 * - `path` source: router path parameters.
 *
 * Notes:
 * - Reads BindRequest.params unless a lookup is supplied, for routers that
 *   keep parameters elsewhere.
 * - An empty parameter counts as absent.
 */

import type { FieldTags } from "../dsl/types";
import type { BindRequest } from "../request/BindRequest";
import {
  found,
  NO_VALUE,
  type Extraction,
  type ExtractionSource,
} from "./ExtractionSource";

export const TAG_PATH = "path";

export type PathLookup = (req: BindRequest, name: string) => string | undefined;

const fromParams: PathLookup = (req, name) => req.params?.[name];

export class PathSource implements ExtractionSource {
  public readonly tag = TAG_PATH;

  constructor(private readonly lookup: PathLookup = fromParams) {}

  public extract(req: BindRequest, tags: FieldTags): Extraction {
    const name = tags[TAG_PATH];
    if (name === undefined) return NO_VALUE;

    const value = this.lookup(req, name);
    if (value === undefined || value === "") return NO_VALUE;
    return found(value);
  }
}
