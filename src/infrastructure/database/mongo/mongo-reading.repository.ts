import type { Db, Filter } from "mongodb";
import type { Reading } from "../../../core/entities/reading.entity.js";
import { type AppError, storage } from "../../../core/errors/app-error.js";
import type {
  NewReading,
  ReadingQuery,
  ReadingRepository,
} from "../../../core/ports/reading.repository.js";
import { type Result, attempt } from "../../../core/types/result.js";
import {
  Collections,
  type ReadingDocument,
  documentToReading,
  readingToDocument,
  timestampSinceFilter,
} from "./documents.js";

export const createMongoReadingRepository = (db: Db): ReadingRepository => {
  const readings = db.collection<ReadingDocument>(Collections.READINGS);

  return {
    insert(data: NewReading): Promise<Result<Reading, AppError>> {
      return attempt(
        async () => {
          const doc = readingToDocument(data);
          const { insertedId } = await readings.insertOne(doc);
          return documentToReading({ ...doc, _id: insertedId });
        },
        (e) => storage("Failed to store reading", e),
      );
    },

    find(query: ReadingQuery): Promise<Result<readonly Reading[], AppError>> {
      const filter: Filter<ReadingDocument> = {
        ...(query.since !== undefined ? timestampSinceFilter(query.since) : {}),
        ...(query.sensorId !== undefined ? { sensor_id: query.sensorId } : {}),
        ...(query.source !== undefined ? { fonte: query.source } : {}),
      };
      const direction = query.order === "asc" ? 1 : -1;

      return attempt(
        async () => {
          let cursor = readings.find(filter).sort({ timestamp: direction, _id: direction });
          if (query.limit !== undefined) cursor = cursor.limit(query.limit);
          const docs = await cursor.toArray();
          return docs.map(documentToReading);
        },
        (e) => storage("Failed to query readings", e),
      );
    },

    distinctSensors(): Promise<Result<readonly string[], AppError>> {
      return attempt(
        async () => (await readings.distinct("sensor_id")).sort(),
        (e) => storage("Failed to list sensors", e),
      );
    },

    existsByExternalTimestamp(externalTimestamp: string): Promise<Result<boolean, AppError>> {
      return attempt(
        async () =>
          (await readings.countDocuments(
            { timestamp_thingspeak: externalTimestamp },
            { limit: 1 },
          )) > 0,
        (e) => storage("Failed to check feed duplicate", e),
      );
    },
  };
};
