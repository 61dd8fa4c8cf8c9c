import type { Reading, ReadingSource } from "../entities/reading.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: Reading Repository
 * Append-only store of sensor samples.
 */
export interface ReadingRepository {
  insert(data: NewReading): Promise<Result<Reading, AppError>>;
  /** Range query on timestamp (>= since), sorted by timestamp */
  find(query: ReadingQuery): Promise<Result<readonly Reading[], AppError>>;
  distinctSensors(): Promise<Result<readonly string[], AppError>>;
  existsByExternalTimestamp(externalTimestamp: string): Promise<Result<boolean, AppError>>;
}

export type NewReading = Omit<Reading, "id">;

export type SortOrder = "asc" | "desc";

export interface ReadingQuery {
  /** Inclusive lower bound, ISO-8601 */
  readonly since?: string | undefined;
  readonly sensorId?: string | undefined;
  readonly source?: ReadingSource | undefined;
  readonly order: SortOrder;
  readonly limit?: number | undefined;
}
