/**
 * Port: Cache
 * Key-value store with per-entry TTL.
 * Expired entries are evicted when touched and by `prune()` sweeps.
 */

import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export interface Cache<V> {
  /** Get a value by key. Returns null if not found or expired. */
  get(key: string): Promise<Result<V | null, AppError>>;
  /** Set a value with optional TTL in milliseconds. */
  set(key: string, value: V, ttlMs?: number): Promise<Result<void, AppError>>;
  /** Delete a key. Returns true if it existed. */
  del(key: string): Promise<Result<boolean, AppError>>;
  /** Drop every expired entry, returning how many were removed. */
  prune(): Promise<Result<number, AppError>>;
  close(): Promise<void>;
}
