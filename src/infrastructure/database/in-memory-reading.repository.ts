import type { Reading } from "../../core/entities/reading.entity.js";
import type { AppError } from "../../core/errors/app-error.js";
import type {
  NewReading,
  ReadingQuery,
  ReadingRepository,
} from "../../core/ports/reading.repository.js";
import { type Result, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";

const byTimestamp = (a: Reading, b: Reading): number =>
  a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0;

/**
 * In-memory reading store. Insertion order is kept so equal timestamps
 * come back in the order they arrived.
 */
export const createInMemoryReadingRepository = (): ReadingRepository => {
  const readings: Reading[] = [];

  return {
    async insert(data: NewReading): Promise<Result<Reading, AppError>> {
      const reading: Reading = { id: generateId(), ...data };
      readings.push(reading);
      return ok(reading);
    },

    async find(query: ReadingQuery): Promise<Result<readonly Reading[], AppError>> {
      const { since, sensorId, source } = query;
      const matched = readings
        .filter(
          (r) =>
            (since === undefined || r.timestamp >= since) &&
            (sensorId === undefined || r.sensorId === sensorId) &&
            (source === undefined || r.source === source),
        )
        .sort(byTimestamp);

      if (query.order === "desc") matched.reverse();
      return ok(query.limit !== undefined ? matched.slice(0, query.limit) : matched);
    },

    async distinctSensors(): Promise<Result<readonly string[], AppError>> {
      return ok([...new Set(readings.map((r) => r.sensorId))].sort());
    },

    async existsByExternalTimestamp(externalTimestamp: string): Promise<Result<boolean, AppError>> {
      return ok(readings.some((r) => r.externalTimestamp === externalTimestamp));
    },
  };
};
