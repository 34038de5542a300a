// src/decoders/form.decoder.ts
/**
 * Purpose:
 * - `application/x-www-form-urlencoded` body decoder (qs, the parser behind
 *   express.urlencoded({ extended: true })). Wire names come from the `form`
 *   tag. Repeated keys arrive as lists; `a[b]=1` arrives as a nested object.
 * - Array destinations are not supported: a form has no top-level sequence.
 */

import qs from "qs";
import {
  DEFAULT_BODY_LIMIT,
  readBodyText,
  type BodyLimit,
} from "../request/body";
import type { BindRequest } from "../request/BindRequest";
import { assignDecoded } from "./assign";
import type { BodyDecoder, DecodeTarget } from "./BodyDecoder";

export const CONTENT_TYPE_FORM = "application/x-www-form-urlencoded";
export const TAG_FORM = "form";

export class FormDecoder implements BodyDecoder {
  public readonly contentType = CONTENT_TYPE_FORM;

  constructor(private readonly limit: BodyLimit = DEFAULT_BODY_LIMIT) {}

  public async decode(req: BindRequest, target: DecodeTarget): Promise<void> {
    if (Array.isArray(target.value)) {
      throw new Error("form body cannot be decoded into an array");
    }

    const text = await readBodyText(req, this.limit);
    const data: unknown = qs.parse(text, { parseArrays: false });
    assignDecoded(target, data, TAG_FORM);
  }
}
