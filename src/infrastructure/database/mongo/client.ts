import { type Db, MongoClient } from "mongodb";
import { type AppError, storage } from "../../../core/errors/app-error.js";
import type { Logger } from "../../../core/ports/logger.js";
import { type Result, attempt } from "../../../core/types/result.js";
import { Collections } from "./documents.js";

export interface MongoConnection {
  readonly db: Db;
  /** Round-trip to the server; false on any failure */
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

interface MongoOptions {
  readonly uri: string;
  readonly database: string;
  readonly logger: Logger;
}

const ensureIndexes = async (db: Db): Promise<void> => {
  await Promise.all([
    db.collection(Collections.READINGS).createIndex({ timestamp: -1 }, { name: "timestamp_idx" }),
    db
      .collection(Collections.READINGS)
      .createIndex({ sensor_id: 1, timestamp: -1 }, { name: "sensor_timestamp_idx" }),
    db
      .collection(Collections.READINGS)
      .createIndex({ timestamp_thingspeak: 1 }, { name: "external_timestamp_idx", sparse: true }),
    db
      .collection(Collections.USERS)
      .createIndex({ username: 1 }, { name: "username_unique", unique: true }),
    db.collection(Collections.AUDIT).createIndex({ timestamp: -1 }, { name: "timestamp_idx" }),
    db
      .collection(Collections.AUDIT)
      .createIndex({ usuario: 1, timestamp: -1 }, { name: "user_timestamp_idx" }),
  ]);
};

/**
 * Connect, verify with a ping and ensure indexes.
 * Fails with STORAGE when the server is unreachable.
 */
export const connectMongo = async (
  options: MongoOptions,
): Promise<Result<MongoConnection, AppError>> => {
  const log = options.logger.child({ component: "mongodb" });
  const client = new MongoClient(options.uri, { serverSelectionTimeoutMS: 10_000 });

  client.on("serverHeartbeatFailed", (event) => {
    log.warn("Heartbeat failed", { host: event.connectionId });
  });

  return attempt(
    async () => {
      await client.connect();
      const db = client.db(options.database);
      await db.command({ ping: 1 });
      await ensureIndexes(db);
      log.info("Connected", { database: options.database });

      return {
        db,
        async ping(): Promise<boolean> {
          try {
            await db.command({ ping: 1 });
            return true;
          } catch (e: unknown) {
            log.warn("Ping failed", { error: e });
            return false;
          }
        },
        async close(): Promise<void> {
          await client.close();
          log.info("Disconnected");
        },
      };
    },
    (e) => {
      log.error("Connection failed", { error: e });
      return storage("Cannot connect to MongoDB", e);
    },
  );
};
