import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export interface FeedSample {
  readonly weightKg: number;
  readonly externalTimestamp: string;
}

/**
 * Port: Feed Source
 * Pulls the latest sample from an external sensor network.
 * Resolves to null when the feed has no entries.
 */
export interface FeedSource {
  readonly name: string;
  latest(): Promise<Result<FeedSample | null, AppError>>;
}
