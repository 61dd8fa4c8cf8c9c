import { aggregate } from "../../core/analytics/statistics.js";
import {
  DEFAULT_LOCATION,
  type Reading,
  ReadingSource,
} from "../../core/entities/reading.entity.js";
import type { AppError } from "../../core/errors/app-error.js";
import { AuditAction } from "../../core/ports/audit-log.js";
import type { Logger } from "../../core/ports/logger.js";
import type { ReadingRepository } from "../../core/ports/reading.repository.js";
import { type Result, ok } from "../../core/types/result.js";
import type {
  CreateReadingDto,
  ListReadingsQuery,
  ReadingStatsQuery,
} from "../dtos/reading.dto.js";
import type { AuditTrail } from "./audit-trail.js";

/** Actor recorded in the audit trail for sensor pushes */
export const DEVICE_ACTOR = "ESP32";

export const CSV_EXPORT_LIMIT = 1000;
export const CSV_HEADER = "timestamp,sensor_id,peso_kg,temperatura,umidade";

export interface ReadingStats {
  /** Sensor filter applied, or "all" */
  readonly sensor: string;
  readonly count: number;
  readonly totalKg: number;
  readonly meanKg: number;
  readonly maxKg: number;
  readonly minKg: number;
  readonly meanTemperature: number;
  readonly meanHumidity: number;
}

export interface ReadingService {
  ingest(dto: CreateReadingDto): Promise<Result<Reading, AppError>>;
  list(query: ListReadingsQuery, actor: string): Promise<Result<readonly Reading[], AppError>>;
  sensors(): Promise<Result<readonly string[], AppError>>;
  stats(query: ReadingStatsQuery): Promise<Result<ReadingStats, AppError>>;
  exportCsv(actor: string): Promise<Result<string, AppError>>;
}

interface Deps {
  readonly readingRepo: ReadingRepository;
  readonly audit: AuditTrail;
  readonly logger: Logger;
  readonly clock?: () => number;
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

const meanOrZero = (values: readonly number[]): number => {
  const stats = aggregate(values);
  return stats.kind === "ok" ? stats.value.mean : 0;
};

/** RFC 4180: quote fields holding a comma, quote or line break; double inner quotes */
export const csvField = (value: string | number): string => {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export const toCsv = (readings: readonly Reading[]): string => {
  const rows = readings.map((r) =>
    [r.timestamp, r.sensorId, r.weightKg, r.temperature, r.humidity].map(csvField).join(","),
  );
  return `${[CSV_HEADER, ...rows].join("\r\n")}\r\n`;
};

export const createReadingService = (deps: Deps): ReadingService => {
  const { readingRepo, audit } = deps;
  const clock = deps.clock ?? Date.now;
  const log = deps.logger.child({ service: "readings" });

  return {
    async ingest(dto) {
      const stored = await readingRepo.insert({
        timestamp: new Date(dto.timestamp ?? clock()).toISOString(),
        weightKg: dto.peso_kg,
        sensorId: dto.sensor_id,
        temperature: dto.temperatura ?? 0,
        humidity: dto.umidade ?? 0,
        location: dto.localizacao ?? DEFAULT_LOCATION,
        source: ReadingSource.DEVICE,
        externalTimestamp: null,
      });
      if (!stored.ok) return stored;

      log.debug("Reading stored", { sensorId: dto.sensor_id, weightKg: dto.peso_kg });
      await audit.success(DEVICE_ACTOR, AuditAction.CREATE, `Reading received from ${dto.sensor_id}`);
      return stored;
    },

    async list(query, actor) {
      const found = await readingRepo.find({
        sensorId: query.sensor_id,
        order: "desc",
        limit: query.limit,
      });
      if (!found.ok) return found;

      await audit.success(actor, AuditAction.READ, `Listed ${found.value.length} readings`);
      return found;
    },

    sensors() {
      return readingRepo.distinctSensors();
    },

    async stats(query) {
      const since =
        query.days !== undefined
          ? new Date(clock() - query.days * 24 * 60 * 60 * 1000).toISOString()
          : undefined;
      const found = await readingRepo.find({ since, sensorId: query.sensor_id, order: "asc" });
      if (!found.ok) return found;

      const readings = found.value;
      const weights = aggregate(readings.map((r) => r.weightKg));
      const w =
        weights.kind === "ok" ? weights.value : { count: 0, total: 0, mean: 0, max: 0, min: 0 };

      return ok({
        sensor: query.sensor_id ?? "all",
        count: w.count,
        totalKg: round2(w.total),
        meanKg: round2(w.mean),
        maxKg: round2(w.max),
        minKg: round2(w.min),
        meanTemperature: round2(meanOrZero(readings.map((r) => r.temperature))),
        meanHumidity: round2(meanOrZero(readings.map((r) => r.humidity))),
      });
    },

    async exportCsv(actor) {
      const found = await readingRepo.find({ order: "desc", limit: CSV_EXPORT_LIMIT });
      if (!found.ok) return found;

      await audit.success(actor, AuditAction.EXPORT, `CSV export of ${found.value.length} readings`);
      return ok(toCsv(found.value));
    },
  };
};
