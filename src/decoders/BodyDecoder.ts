// src/decoders/BodyDecoder.ts
/**
 * Purpose:
 * - Contract for pluggable body decoders, selected by exact media type.
 *
 * Notes:
 * - `contentType` is compared lower-cased, without parameters.
 * - decode() reads `req.body` to the end. Under body preservation the binder
 *   hands it a request whose body is a fresh stream over buffered bytes.
 * - `fields` is the destination's declared shape, or {} for collections and
 *   classes without one.
 */

import type { FieldsShape } from "../dsl/types";
import type { BindRequest } from "../request/BindRequest";

export interface DecodeTarget {
  readonly value: object;
  readonly fields: FieldsShape;
}

export interface BodyDecoder {
  readonly contentType: string;
  decode(req: BindRequest, target: DecodeTarget): Promise<void>;
}
