// src/express/bindMiddleware.ts
/**
 * Purpose:
 * - Express middleware that binds the request into a record (or a list) and
 *   leaves it on res.locals for the route handler.
 *
 * Usage:
 *   app.get("/search", bindRecord(binder, SearchQuery), (req, res) => {
 *     const q = boundRecord(res, SearchQuery);
 *     ...
 *   });
 *
 * Invariants:
 * - Mount before express.json()/express.urlencoded(): the binder reads the
 *   raw body stream itself.
 * - A bind failure goes to next(err); see bindProblem for the response.
 * - With body preservation on, the bytes the binder read stay reachable
 *   through preservedBody(req), and req.body holds them unless something
 *   already set it. Body parsers mounted later pass the request through
 *   instead of reading the drained stream.
 */

import type { Request, RequestHandler, Response } from "express";
import type { BindOptions, Binder } from "../binder/Binder";
import type { RecordType } from "../dsl/record";
import type { BindRequest } from "../request/BindRequest";
import { fromExpress } from "../request/fromExpress";

const RECORDS_KEY = "boundRecords";
const LIST_KEY = "boundList";

const preserved = new WeakMap<Request, Buffer>();

type BindStep = (req: Request, res: Response) => Promise<void>;

/** Runs `step`, then next(); a rejection goes to next(err). */
function bindHandler(step: BindStep): RequestHandler {
  return (req, res, next): void => {
    void step(req, res).then(() => next(), next);
  };
}

async function bindInto(
  binder: Binder,
  req: Request,
  destination: object,
  options?: BindOptions
): Promise<void> {
  const bound = fromExpress(req);
  try {
    await binder.bind(bound, destination, options);
  } finally {
    carryBack(req, bound);
  }
}

function carryBack(req: Request, bound: BindRequest): void {
  if (bound.rawBody === undefined) return;

  preserved.set(req, bound.rawBody);
  if (req.body === undefined) req.body = bound.rawBody;
  // body-parser's "already parsed" flag
  Reflect.set(req, "_body", true);
}

function recordsOf(res: Response): Map<RecordType, object> {
  const existing: unknown = res.locals[RECORDS_KEY];
  if (existing instanceof Map) return existing;

  const created = new Map<RecordType, object>();
  res.locals[RECORDS_KEY] = created;
  return created;
}

export function bindRecord<T extends object>(
  binder: Binder,
  type: RecordType<T>,
  options?: BindOptions
): RequestHandler {
  return bindHandler(async (req, res) => {
    const record = new type();
    await bindInto(binder, req, record, options);
    recordsOf(res).set(type, record);
  });
}

/** Binds a JSON array body into a list at res.locals.boundList. */
export function bindList(
  binder: Binder,
  options?: BindOptions
): RequestHandler {
  return bindHandler(async (req, res) => {
    const list: unknown[] = [];
    await bindInto(binder, req, list, options);
    res.locals[LIST_KEY] = list;
  });
}

/** Body bytes a preserving bind read from `req`. */
export function preservedBody(req: Request): Buffer | undefined {
  return preserved.get(req);
}

/** The record bindRecord() stored for `type`; throws when there is none. */
export function boundRecord<T extends object>(
  res: Response,
  type: RecordType<T>
): T {
  const record: unknown = recordsOf(res).get(type);
  if (!(record instanceof type)) {
    throw new Error(
      `No bound ${type.name} on this response. Mount bindRecord(binder, ${type.name}) first.`
    );
  }
  return record;
}

export function boundList(res: Response): unknown[] {
  const list: unknown = res.locals[LIST_KEY];
  if (!Array.isArray(list)) {
    throw new Error("No bound list on this response. Mount bindList() first.");
  }
  return list;
}
