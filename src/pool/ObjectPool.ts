// src/pool/ObjectPool.ts
/**
 * Purpose:
 * - Bounded free list shared by the memo pool and the record pool.
 *
 * Invariants:
 * - acquire() never waits: an empty pool allocates through `create`.
 * - release() runs `reset` before the instance becomes visible to the next
 *   acquire(); instances beyond `maxIdle` are dropped.
 * - Releasing an instance twice is ignored.
 */

export interface ObjectPoolOptions<T> {
  create: () => T;
  reset: (item: T) => void;
  /** Idle instances kept for reuse. Defaults to 64. */
  maxIdle?: number;
}

export class ObjectPool<T extends object> {
  private readonly create: () => T;
  private readonly reset: (item: T) => void;
  private readonly maxIdle: number;

  private readonly idle: T[] = [];
  private readonly idleSet = new WeakSet<T>();

  constructor(options: ObjectPoolOptions<T>) {
    const maxIdle = options.maxIdle ?? 64;
    if (!Number.isInteger(maxIdle) || maxIdle < 0) {
      throw new Error(
        `ObjectPool: maxIdle must be a non-negative integer (got ${maxIdle}).`
      );
    }

    this.create = options.create;
    this.reset = options.reset;
    this.maxIdle = maxIdle;
  }

  public acquire(): T {
    const item = this.idle.pop();
    if (item === undefined) return this.create();

    this.idleSet.delete(item);
    return item;
  }

  public release(item: T): void {
    if (this.idleSet.has(item)) return;

    this.reset(item);
    if (this.idle.length >= this.maxIdle) return;

    this.idle.push(item);
    this.idleSet.add(item);
  }

  /** Idle instances currently held. */
  public size(): number {
    return this.idle.length;
  }
}
