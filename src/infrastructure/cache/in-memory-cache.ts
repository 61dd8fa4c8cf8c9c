/**
 * In-memory cache: single-process TTL map.
 * Entries expire lazily on read; `prune()` sweeps the rest.
 */

import type { AppError } from "../../core/errors/app-error.js";
import type { Cache } from "../../core/ports/cache.js";
import { type Result, ok } from "../../core/types/result.js";

interface CacheEntry<V> {
  readonly value: V;
  readonly expiresAt: number | null; // null = no expiry
}

export interface InMemoryCacheOptions {
  /** Applied when `set` is called without a TTL; omitted → entries never expire */
  readonly defaultTtlMs?: number;
  readonly clock?: () => number;
}

export const createInMemoryCache = <V>(options: InMemoryCacheOptions = {}): Cache<V> => {
  const store = new Map<string, CacheEntry<V>>();
  const now = options.clock ?? Date.now;

  const isExpired = (entry: CacheEntry<V>): boolean =>
    entry.expiresAt !== null && entry.expiresAt <= now();

  return {
    async get(key: string): Promise<Result<V | null, AppError>> {
      const entry = store.get(key);
      if (!entry) return ok(null);
      if (isExpired(entry)) {
        store.delete(key);
        return ok(null);
      }
      return ok(entry.value);
    },

    async set(key: string, value: V, ttlMs?: number): Promise<Result<void, AppError>> {
      const ttl = ttlMs ?? options.defaultTtlMs;
      store.set(key, { value, expiresAt: ttl !== undefined ? now() + ttl : null });
      return ok(undefined);
    },

    async del(key: string): Promise<Result<boolean, AppError>> {
      return ok(store.delete(key));
    },

    async prune(): Promise<Result<number, AppError>> {
      let removed = 0;
      for (const [key, entry] of store) {
        if (isExpired(entry)) {
          store.delete(key);
          removed++;
        }
      }
      return ok(removed);
    },

    async close(): Promise<void> {
      store.clear();
    },
  };
};
