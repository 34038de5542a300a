// src/decoders/json.decoder.ts
/**
 * Purpose:
 * - `application/json` body decoder. Wire names come from the `json` tag.
 *
 * Notes:
 * - Parsed with lossless-json: integers beyond 2^53 arrive as bigint, so
 *   int64/uint64 fields see the exact digits.
 */

import { isInteger, isSafeNumber, parse } from "lossless-json";
import {
  DEFAULT_BODY_LIMIT,
  readBodyText,
  type BodyLimit,
} from "../request/body";
import type { BindRequest } from "../request/BindRequest";
import { assignDecoded } from "./assign";
import type { BodyDecoder, DecodeTarget } from "./BodyDecoder";

export const CONTENT_TYPE_JSON = "application/json";
export const TAG_JSON = "json";

function parseNumber(text: string): number | bigint {
  return isInteger(text) && !isSafeNumber(text) ? BigInt(text) : Number(text);
}

export class JsonDecoder implements BodyDecoder {
  public readonly contentType = CONTENT_TYPE_JSON;

  constructor(private readonly limit: BodyLimit = DEFAULT_BODY_LIMIT) {}

  public async decode(req: BindRequest, target: DecodeTarget): Promise<void> {
    const text = await readBodyText(req, this.limit);
    const data: unknown = parse(text, undefined, parseNumber);
    assignDecoded(target, data, TAG_JSON);
  }
}
