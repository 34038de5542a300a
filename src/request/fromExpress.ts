// src/request/fromExpress.ts
/**
 * Purpose:
 * - Adapts an Express request to BindRequest.
 *
 * Notes:
 * - The Express request is itself the body stream. Mount binding before any
 *   body parser (express.json(), express.urlencoded()); a stream a parser has
 *   already drained is passed as null.
 * - `originalUrl` keeps the mount path, so query parsing sees the full URL.
 */

import type { Request } from "express";
import type { BindRequest } from "./BindRequest";

export function fromExpress(req: Request): BindRequest {
  return {
    method: req.method,
    url: req.originalUrl || req.url,
    headers: req.headers,
    params: req.params,
    body: req.readableEnded ? null : req,
  };
}
