// src/request/body.ts
/**
 * Purpose:
 * - Body reads for decoders and body preservation, on raw-body (the reader
 *   under Express's own body parsers).
 */

import getRawBody from "raw-body";
import { Readable } from "node:stream";
import { contentLength, type BindRequest } from "./BindRequest";

export const DEFAULT_BODY_LIMIT = "1mb";

export type BodyLimit = number | string;

/** Reads the whole body. A request without a stream yields an empty buffer. */
export async function readBody(
  req: BindRequest,
  limit: BodyLimit = DEFAULT_BODY_LIMIT
): Promise<Buffer> {
  if (req.body === null) return Buffer.alloc(0);

  return getRawBody(req.body, {
    length: contentLength(req),
    limit,
  });
}

export async function readBodyText(
  req: BindRequest,
  limit: BodyLimit = DEFAULT_BODY_LIMIT
): Promise<string> {
  return (await readBody(req, limit)).toString("utf8");
}

/** A fresh, independently readable stream over `bytes`. */
export function replayableBody(bytes: Buffer): Readable {
  return Readable.from([bytes], { objectMode: false });
}
