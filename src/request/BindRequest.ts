// src/request/BindRequest.ts
/**
 * Purpose:
 * - The already-materialized request the binder reads from.
 * - Router- and framework-neutral; see fromExpress() for the Express adapter.
 *
 * Notes:
 * - `url` is path plus raw query string ("/users?id=7").
 * - `headers` keys are lower-case, as Node delivers them.
 * - `body` is the raw body stream. Body preservation rebinds it to a fresh
 *   stream over the buffered bytes and leaves those bytes on `rawBody`.
 */

import type { IncomingHttpHeaders } from "node:http";
import type { Readable } from "node:stream";

export interface BindRequest {
  readonly method: string;
  readonly url: string;
  readonly headers: IncomingHttpHeaders;
  readonly params?: Readonly<Record<string, string | undefined>>;
  body: Readable | null;
  rawBody?: Buffer;
}

const BODYLESS_METHODS: ReadonlySet<string> = new Set(["GET", "HEAD"]);

export function headerValue(
  req: BindRequest,
  name: string
): string | undefined {
  const raw = req.headers[name.toLowerCase()];
  if (Array.isArray(raw)) return raw[0];
  return raw;
}

/** "application/json; charset=utf-8" → "application/json" */
export function mediaType(req: BindRequest): string {
  const raw = headerValue(req, "content-type") ?? "";
  const semi = raw.indexOf(";");
  return (semi === -1 ? raw : raw.slice(0, semi)).trim().toLowerCase();
}

/** Declared length, or undefined when absent or not a number. */
export function contentLength(req: BindRequest): number | undefined {
  const raw = headerValue(req, "content-length");
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return undefined;
  return Number(raw.trim());
}

export function declaresBody(req: BindRequest): boolean {
  if (BODYLESS_METHODS.has(req.method.toUpperCase())) return false;
  if (req.body === null) return false;

  const length = contentLength(req);
  if (length !== undefined) return length > 0;
  return headerValue(req, "transfer-encoding") !== undefined;
}
