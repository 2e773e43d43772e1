/**
 * packages/core/src/layout/cache.ts — Bounded layout result cache.
 *
 * Entries are keyed by constraints plus a structural signature of the input
 * trees. Each entry remembers which node ids it covers so a single node can
 * be invalidated without dropping unrelated results. Insertion order is the
 * eviction order.
 */

import type { LayoutResult } from "./types.js";

type CacheEntry = Readonly<{
  result: LayoutResult;
  ids: ReadonlySet<string>;
}>;

export class LayoutCache {
  readonly #capacity: number;
  readonly #entries = new Map<string, CacheEntry>();

  constructor(capacity: number) {
    this.#capacity = Math.max(1, Math.trunc(capacity));
  }

  get size(): number {
    return this.#entries.size;
  }

  get capacity(): number {
    return this.#capacity;
  }

  get(key: string): LayoutResult | undefined {
    return this.#entries.get(key)?.result;
  }

  set(key: string, result: LayoutResult, ids: ReadonlySet<string>): void {
    this.#entries.delete(key);
    while (this.#entries.size >= this.#capacity) {
      const oldest = this.#entries.keys().next();
      if (oldest.done) break;
      this.#entries.delete(oldest.value);
    }
    this.#entries.set(key, Object.freeze({ result, ids }));
  }

  /** Drops every entry whose trees contain `id`. Returns the number removed. */
  invalidateId(id: string): number {
    let removed = 0;
    for (const [key, entry] of this.#entries) {
      if (entry.ids.has(id)) {
        this.#entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.#entries.clear();
  }
}
