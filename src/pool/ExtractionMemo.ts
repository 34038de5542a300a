// src/pool/ExtractionMemo.ts
/**
 * Purpose:
 * - Per-bind scratch state: a source key ("query", "cookie", ...) mapped to
 *   its parsed form, so fields sharing a source parse the request once.
 *
 * Invariants:
 * - One memo per bind call; drawn from and returned to a MemoPool.
 * - Cleared on release; nothing survives into the next bind.
 */

import { ObjectPool } from "./ObjectPool";

export class ExtractionMemo {
  private readonly entries = new Map<string, unknown>();

  /**
   * Cached value under `key` when it passes `guard`, otherwise the result of
   * `compute()`, which is stored for later fields.
   */
  public getOrCompute<T>(
    key: string,
    guard: (value: unknown) => value is T,
    compute: () => T
  ): T {
    const cached = this.entries.get(key);
    if (guard(cached)) return cached;

    const value = compute();
    this.entries.set(key, value);
    return value;
  }

  public has(key: string): boolean {
    return this.entries.has(key);
  }

  public clear(): void {
    this.entries.clear();
  }
}

export class MemoPool {
  private readonly pool: ObjectPool<ExtractionMemo>;

  constructor(maxIdle?: number) {
    this.pool = new ObjectPool({
      create: () => new ExtractionMemo(),
      reset: (memo) => memo.clear(),
      maxIdle,
    });
  }

  public acquire(): ExtractionMemo {
    return this.pool.acquire();
  }

  public release(memo: ExtractionMemo): void {
    this.pool.release(memo);
  }

  public size(): number {
    return this.pool.size();
  }
}
