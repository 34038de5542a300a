// src/errors/BindError.ts
/**
 * Purpose:
 * - Error family surfaced by Binder.bind(). Callers branch on `kind` (or
 *   instanceof) to map failures to HTTP status codes or log lines; the binder
 *   itself knows nothing about responses.
 *
 * Invariants:
 * - The first failure aborts the bind; errors are never retried internally.
 * - Wrapped failures keep the original error on `cause`.
 */

export type BindErrorKind =
  | "NilArgument"
  | "UnsupportedDestination"
  | "DecodeError"
  | "CoercionError"
  | "DefaultValueError"
  | "TransformError"
  | "HookError";

export abstract class BindError extends Error {
  public abstract readonly kind: BindErrorKind;

  protected constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class NilArgumentError extends BindError {
  public readonly kind = "NilArgument" as const;

  constructor(public readonly argument: "request" | "destination" | "callback") {
    super(`${argument} is nil`);
  }
}

export class UnsupportedDestinationError extends BindError {
  public readonly kind = "UnsupportedDestination" as const;

  constructor(public readonly typeName: string, detail?: string) {
    super(
      `destination \`${typeName}\` is not supported${detail ? `: ${detail}` : ""}`
    );
  }
}

export class DecodeError extends BindError {
  public readonly kind = "DecodeError" as const;

  constructor(
    public readonly contentType: string,
    public readonly typeName: string,
    cause: unknown
  ) {
    super(
      `decode \`${contentType}\` request body in \`${typeName}\`: ${messageOf(cause)}`,
      cause
    );
  }
}

export class FieldCoercionError extends BindError {
  public readonly kind = "CoercionError" as const;

  constructor(
    public readonly field: string,
    public readonly source: string,
    public readonly typeName: string,
    cause: unknown
  ) {
    super(
      `set value to field \`${field}\` from \`${source}\` for \`${typeName}\`: ${messageOf(cause)}`,
      cause
    );
  }
}

export class DefaultValueError extends BindError {
  public readonly kind = "DefaultValueError" as const;

  constructor(
    public readonly field: string,
    public readonly defaultValue: string,
    public readonly typeName: string,
    cause: unknown
  ) {
    super(
      `default value "${defaultValue}" for field \`${field}\` of \`${typeName}\`: ${messageOf(cause)}`,
      cause
    );
  }
}

export class TransformError extends BindError {
  public readonly kind = "TransformError" as const;

  constructor(
    public readonly field: string,
    public readonly transform: string,
    public readonly typeName: string,
    cause: unknown
  ) {
    super(
      `transform \`${transform}\` on field \`${field}\` of \`${typeName}\`: ${messageOf(cause)}`,
      cause
    );
  }
}

export class HookError extends BindError {
  public readonly kind = "HookError" as const;

  constructor(public readonly typeName: string, cause: unknown) {
    super(`afterBind of \`${typeName}\`: ${messageOf(cause)}`, cause);
  }
}

type BindErrorByKind = {
  NilArgument: NilArgumentError;
  UnsupportedDestination: UnsupportedDestinationError;
  DecodeError: DecodeError;
  CoercionError: FieldCoercionError;
  DefaultValueError: DefaultValueError;
  TransformError: TransformError;
  HookError: HookError;
};

export function isBindError(err: unknown): err is BindError;
export function isBindError<K extends BindErrorKind>(
  err: unknown,
  kind: K
): err is BindErrorByKind[K];
export function isBindError(err: unknown, kind?: BindErrorKind): boolean {
  if (!(err instanceof BindError)) return false;
  return kind === undefined || err.kind === kind;
}

export function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
