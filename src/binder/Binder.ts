// src/binder/Binder.ts
/**
 * Purpose:
 * - Resolution Engine: binds one request into one destination.
 *
 * Flow (per bind):
 *   DecodeBody → ResolveFields → afterBind hook → done
 *
 * - DecodeBody: decoder picked by media type (parameters ignored). Skipped for
 *   GET/HEAD, for requests without a declared body and for content types
 *   nobody registered. A failure aborts before any field is resolved.
 * - ResolveFields (records only), per field in declaration order:
 *     1. skipFilled and the field is already non-zero → transforms only
 *     2. sources in registration order; the first one with a value wins
 *     3. still zero and a `default` tag → the default literal
 *     4. transforms in registration order
 * - Hook: `afterBind(req)` on the destination, awaited.
 *
 * Invariants:
 * - Registration order is priority order, whatever order the tags appear in
 *   on the field.
 * - One extraction memo per bind, returned to the pool on every exit path.
 * - The first failure aborts the bind; nothing is retried.
 */

import type { Logger } from "pino";
import { StructureCache, type FieldDescriptor } from "../cache/StructureCache";
import {
  coerce,
  propertyHandle,
  type FieldHandle,
} from "../coerce/coerce";
import type { BodyDecoder, DecodeTarget } from "../decoders/BodyDecoder";
import {
  classifyDestination,
  isRecordType,
  typeNameOf,
  type RecordType,
} from "../dsl/record";
import type { FieldsShape } from "../dsl/types";
import { isZero } from "../dsl/values";
import {
  DecodeError,
  DefaultValueError,
  FieldCoercionError,
  HookError,
  NilArgumentError,
  TransformError,
  UnsupportedDestinationError,
} from "../errors/BindError";
import { componentLogger } from "../logger/logger";
import { MemoPool, type ExtractionMemo } from "../pool/ExtractionMemo";
import { RecordPool } from "../pool/RecordPool";
import {
  DEFAULT_BODY_LIMIT,
  readBody,
  replayableBody,
  type BodyLimit,
} from "../request/body";
import {
  declaresBody,
  mediaType,
  type BindRequest,
} from "../request/BindRequest";
import type { ExtractionSource } from "../sources/ExtractionSource";
import type { Transform } from "../transforms/Transform";
import {
  defaultDecoders,
  defaultSources,
  defaultTransforms,
} from "./defaults";

export interface BinderConfig {
  /** Priority order. Defaults to query, header, cookie, path. */
  sources?: readonly ExtractionSource[];
  /** Defaults to JSON, urlencoded form and multipart. */
  decoders?: readonly BodyDecoder[];
  /** Defaults to string, numeric, list, time. */
  transforms?: readonly Transform[];
  /** Leave non-zero fields to transforms only. Defaults to true. */
  skipFilled?: boolean;
  /** Rebind the request body after decoding. Defaults to false. */
  preserveBody?: boolean;
  /** Limit for preserved-body reads. Defaults to "1mb". */
  bodyLimit?: BodyLimit;
  /** Idle extraction memos kept for reuse. */
  memoPoolSize?: number;
  /** Idle instances kept per pooled record type. */
  recordPoolSize?: number;
  logger?: Logger;
}

export interface BindOptions {
  skipFilled?: boolean;
  preserveBody?: boolean;
}

/** Optional post-bind hook on a destination. */
export interface AfterBind {
  afterBind(req: BindRequest): void | Promise<void>;
}

export type PooledBind<T> = <R>(
  req: BindRequest,
  callback: (record: T) => R | Promise<R>
) => Promise<R>;

const EMPTY_SHAPE: FieldsShape = Object.freeze({});

function hasAfterBind(value: object): value is AfterBind {
  return typeof Reflect.get(value, "afterBind") === "function";
}

function registry<T>(
  what: string,
  items: readonly T[],
  keyOf: (item: T) => string
): Map<string, T> {
  const map = new Map<string, T>();
  for (const item of items) {
    const key = keyOf(item);
    if (!key) throw new Error(`Binder: ${what} with an empty key.`);
    if (map.has(key)) {
      throw new Error(`Binder: duplicate ${what} registration for "${key}".`);
    }
    map.set(key, item);
  }
  return map;
}

export class Binder {
  private readonly sources: ReadonlyMap<string, ExtractionSource>;
  private readonly decoders: ReadonlyMap<string, BodyDecoder>;
  private readonly transforms: ReadonlyMap<string, Transform>;

  private readonly skipFilled: boolean;
  private readonly preserveBody: boolean;
  private readonly bodyLimit: BodyLimit;
  private readonly recordPoolSize?: number;

  private readonly cache: StructureCache;
  private readonly memos: MemoPool;
  private readonly pools = new Map<RecordType, RecordPool<object>>();
  private readonly log: Logger;

  constructor(config: BinderConfig = {}) {
    this.sources = registry(
      "source",
      config.sources ?? defaultSources(),
      (s) => s.tag
    );
    this.decoders = registry(
      "decoder",
      config.decoders ?? defaultDecoders(config.bodyLimit),
      (d) => d.contentType.toLowerCase()
    );
    this.transforms = registry(
      "transform",
      config.transforms ?? defaultTransforms(),
      (t) => t.tag
    );

    this.skipFilled = config.skipFilled ?? true;
    this.preserveBody = config.preserveBody ?? false;
    this.bodyLimit = config.bodyLimit ?? DEFAULT_BODY_LIMIT;
    this.recordPoolSize = config.recordPoolSize;

    this.log = config.logger ?? componentLogger("binder");
    this.cache = new StructureCache(
      [...this.sources.keys()],
      [...this.transforms.keys()],
      this.log
    );
    this.memos = new MemoPool(config.memoPoolSize);
  }

  /** Field descriptors the binder resolves for `type`. */
  public describe(type: RecordType): readonly FieldDescriptor[] {
    return this.cache.fields(type);
  }

  public async bind(
    req: BindRequest | null | undefined,
    destination: object | null | undefined,
    options: BindOptions = {}
  ): Promise<void> {
    if (req === null || req === undefined) {
      throw new NilArgumentError("request");
    }
    if (destination === null || destination === undefined) {
      throw new NilArgumentError("destination");
    }

    try {
      await this.run(req, destination, options);
    } catch (err) {
      this.log.debug(
        {
          err,
          method: req.method,
          url: req.url,
          type: typeNameOf(destination),
        },
        "bind failed"
      );
      throw err;
    }
  }

  /**
   * Pooled binding for one record type: acquire an instance, bind into it,
   * hand it to `callback`, release it. The instance is released on every
   * exit path and must not be kept past the callback. Every call for the
   * same type draws from the same pool.
   */
  public pooled<T extends object>(type: RecordType<T>): PooledBind<T> {
    const pool = this.poolFor(type);

    return async <R>(
      req: BindRequest,
      callback: (record: T) => R | Promise<R>
    ): Promise<R> => {
      if (typeof callback !== "function") {
        throw new NilArgumentError("callback");
      }

      const record = pool.acquire();
      try {
        if (!(record instanceof type)) {
          throw new UnsupportedDestinationError(typeNameOf(record));
        }
        await this.bind(req, record);
        return await callback(record);
      } finally {
        pool.release(record);
      }
    };
  }

  /** One pool per record type, shared by every pooled(type) call. */
  private poolFor(type: RecordType): RecordPool<object> {
    const existing = this.pools.get(type);
    if (existing) return existing;

    const created = new RecordPool<object>(type, this.recordPoolSize);
    this.pools.set(type, created);
    return created;
  }

  private async run(
    req: BindRequest,
    destination: object,
    options: BindOptions
  ): Promise<void> {
    const typeName = typeNameOf(destination);
    const shape = classifyDestination(destination);
    if (shape === "unsupported") {
      throw new UnsupportedDestinationError(typeName);
    }

    const ctor: unknown = destination.constructor;
    const type = shape === "record" && isRecordType(ctor) ? ctor : undefined;
    if (shape === "record" && !type) {
      throw new UnsupportedDestinationError(typeName, "no constructor");
    }

    const fields = type ? this.cache.shape(type) : EMPTY_SHAPE;
    const descriptors = type ? this.cache.fields(type) : [];

    await this.decodeBody(
      req,
      { value: destination, fields },
      typeName,
      options.preserveBody ?? this.preserveBody
    );

    if (descriptors.length) {
      const skipFilled = options.skipFilled ?? this.skipFilled;
      const memo = this.memos.acquire();
      try {
        for (const descriptor of descriptors) {
          this.resolveField(
            req,
            destination,
            descriptor,
            memo,
            skipFilled,
            typeName
          );
        }
      } finally {
        this.memos.release(memo);
      }
    }

    if (hasAfterBind(destination)) {
      try {
        await destination.afterBind(req);
      } catch (err) {
        throw new HookError(typeName, err);
      }
    }
  }

  private async decodeBody(
    req: BindRequest,
    target: DecodeTarget,
    typeName: string,
    preserveBody: boolean
  ): Promise<void> {
    if (!declaresBody(req)) return;

    const contentType = mediaType(req);
    const decoder = this.decoders.get(contentType);
    if (!decoder) return;

    if (!preserveBody) {
      try {
        await decoder.decode(req, target);
      } catch (err) {
        throw new DecodeError(contentType, typeName, err);
      }
      return;
    }

    let bytes: Buffer;
    try {
      bytes = await readBody(req, this.bodyLimit);
    } catch (err) {
      throw new DecodeError(contentType, typeName, err);
    }

    try {
      await decoder.decode({ ...req, body: replayableBody(bytes) }, target);
    } catch (err) {
      throw new DecodeError(contentType, typeName, err);
    } finally {
      req.body = replayableBody(bytes);
      req.rawBody = bytes;
    }
  }

  private resolveField(
    req: BindRequest,
    destination: object,
    descriptor: FieldDescriptor,
    memo: ExtractionMemo,
    skipFilled: boolean,
    typeName: string
  ): void {
    const handle = propertyHandle(
      destination,
      descriptor.name,
      descriptor.type
    );

    if (skipFilled && !isZero(handle.get(), descriptor.type)) {
      this.applyTransforms(descriptor, handle, typeName);
      return;
    }

    for (const tag of descriptor.sourceTags) {
      const source = this.sources.get(tag);
      if (!source) continue;

      const extraction = source.extract(req, descriptor.tags, memo);
      if (!extraction.ok) continue;

      try {
        coerce(handle, extraction.value);
      } catch (err) {
        throw new FieldCoercionError(descriptor.name, tag, typeName, err);
      }
      break;
    }

    const { defaultValue } = descriptor;
    if (defaultValue !== undefined && isZero(handle.get(), descriptor.type)) {
      try {
        coerce(handle, defaultValue);
      } catch (err) {
        throw new DefaultValueError(
          descriptor.name,
          defaultValue,
          typeName,
          err
        );
      }
    }

    this.applyTransforms(descriptor, handle, typeName);
  }

  private applyTransforms(
    descriptor: FieldDescriptor,
    handle: FieldHandle,
    typeName: string
  ): void {
    for (const tag of descriptor.transformTags) {
      const transform = this.transforms.get(tag);
      if (!transform) continue;

      try {
        transform.apply(descriptor.tags, handle);
      } catch (err) {
        throw new TransformError(descriptor.name, tag, typeName, err);
      }
    }
  }
}
