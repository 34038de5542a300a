// src/express/problem.ts
/**
 * Purpose:
 * - Express error handler for bind failures: RFC7807-ish JSON as
 *   application/problem+json.
 *
 * Mapping:
 * - Input-caused kinds (DecodeError, CoercionError, TransformError, HookError)
 *   → 400.
 * - Configuration-caused kinds (NilArgument, UnsupportedDestination,
 *   DefaultValueError) → 500, logged.
 * - Anything that is not a BindError passes to the next error handler.
 */

import type { ErrorRequestHandler } from "express";
import { isBindError, type BindErrorKind } from "../errors/BindError";
import { componentLogger } from "../logger/logger";

export type BindProblemJson = {
  type: string;
  title: string;
  status: number;
  detail: string;
  code: BindErrorKind;
  field?: string;
};

const INPUT_KINDS: ReadonlySet<BindErrorKind> = new Set<BindErrorKind>([
  "DecodeError",
  "CoercionError",
  "TransformError",
  "HookError",
]);

const log = componentLogger("bindProblem");

export const bindProblem: ErrorRequestHandler = (err, req, res, next) => {
  if (!isBindError(err)) {
    next(err);
    return;
  }

  const status = INPUT_KINDS.has(err.kind) ? 400 : 500;
  const body: BindProblemJson = {
    type: "about:blank",
    title: status === 400 ? "Bad Request" : "Internal Server Error",
    status,
    detail: err.message,
    code: err.kind,
  };
  if ("field" in err && typeof err.field === "string") body.field = err.field;

  if (status >= 500) {
    log.error(
      { err, method: req.method, url: req.originalUrl },
      "binder misconfiguration"
    );
  }

  res.status(status).type("application/problem+json").json(body);
};
