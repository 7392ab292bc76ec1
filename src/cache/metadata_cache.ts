/**
 * @fileoverview Cross-pass metadata cache
 *
 * The only state that outlives an analysis pass. Created once by the host,
 * passed by reference into every pass, and invalidated explicitly when the
 * schema changes. Writes and invalidation swap in a new store instead of
 * mutating the one a reader may be iterating.
 */

import type { TableMetadata } from '../capabilities/types.js';

export interface MetadataCacheStats {
  hits: number;
  misses: number;
  size: number;
  invalidations: number;
}

export class MetadataCache<V = TableMetadata> {
  private store: ReadonlyMap<string, V> = new Map();
  private hits = 0;
  private misses = 0;
  private invalidations = 0;

  get(key: string): V | undefined {
    const value = this.store.get(key);
    if (value === undefined) {
      this.misses += 1;
    } else {
      this.hits += 1;
    }
    return value;
  }

  set(key: string, value: V): void {
    const next = new Map(this.store);
    next.set(key, value);
    this.store = next;
  }

  /** Cached value, or the loader's result stored under `key`. Loader failures are not cached. */
  async getOrLoad(key: string, loader: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const value = await loader();
    this.set(key, value);
    return value;
  }

  /** Drop every entry. */
  invalidate(): void {
    this.store = new Map();
    this.invalidations += 1;
  }

  getStats(): MetadataCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.store.size,
      invalidations: this.invalidations,
    };
  }
}
