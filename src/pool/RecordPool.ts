// src/pool/RecordPool.ts
/**
 * Purpose:
 * - Per-type pool of record instances for Binder.pooled().
 *
 * Invariants:
 * - One template instance is built per pool; releases allocate no instance.
 * - A released instance gets back the template's own properties (arrays,
 *   plain objects, Dates, Maps and Sets as fresh copies) and loses every
 *   other own property. No value bound for request N is observable in
 *   request N+1.
 * - State the pool cannot see (`#private` fields, closures) is the record's
 *   own job: a `reset()` method runs first on every release.
 */

import type { RecordType } from "../dsl/record";
import { ObjectPool } from "./ObjectPool";

/** Optional capability on a pooled record. */
export interface Resettable {
  reset(): void;
}

type Template = ReadonlyMap<string | symbol, unknown>;

function isResettable(value: object): value is Resettable {
  return typeof Reflect.get(value, "reset") === "function";
}

function snapshot(instance: object): Template {
  const template = new Map<string | symbol, unknown>();
  for (const key of Reflect.ownKeys(instance)) {
    template.set(key, Reflect.get(instance, key));
  }
  return template;
}

function freshCopy(value: unknown): unknown {
  if (
    Array.isArray(value) ||
    value instanceof Date ||
    value instanceof Map ||
    value instanceof Set
  ) {
    return structuredClone(value);
  }
  if (typeof value === "object" && value !== null) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) {
      return structuredClone(value);
    }
  }
  return value;
}

export function resetRecord(instance: object, template: Template): void {
  if (isResettable(instance)) instance.reset();

  for (const key of Reflect.ownKeys(instance)) {
    if (!template.has(key)) Reflect.deleteProperty(instance, key);
  }

  for (const [key, value] of template) {
    // own arrow functions are bound to their instance; keep them
    if (typeof value === "function" && Object.hasOwn(instance, key)) continue;
    Reflect.set(instance, key, freshCopy(value));
  }
}

export class RecordPool<T extends object> {
  private readonly pool: ObjectPool<T>;

  constructor(public readonly type: RecordType<T>, maxIdle?: number) {
    const template = snapshot(new type());
    this.pool = new ObjectPool<T>({
      create: () => new type(),
      reset: (instance) => resetRecord(instance, template),
      maxIdle,
    });
  }

  public acquire(): T {
    return this.pool.acquire();
  }

  public release(instance: T): void {
    this.pool.release(instance);
  }

  public size(): number {
    return this.pool.size();
  }
}
