import { type Reading, ReadingSource } from "../../core/entities/reading.entity.js";
import type { AppError } from "../../core/errors/app-error.js";
import { AuditAction } from "../../core/ports/audit-log.js";
import type { FeedSource } from "../../core/ports/feed-source.js";
import type { Logger } from "../../core/ports/logger.js";
import type { ReadingRepository } from "../../core/ports/reading.repository.js";
import { type Result, ok } from "../../core/types/result.js";
import type { AuditTrail } from "./audit-trail.js";

export type SyncOutcome =
  | { readonly kind: "stored"; readonly reading: Reading }
  | { readonly kind: "duplicate"; readonly externalTimestamp: string }
  | { readonly kind: "empty" };

export interface FeedSyncService {
  syncOnce(): Promise<Result<SyncOutcome, AppError>>;
  /** Poll on a fixed interval; a tick is skipped while the previous one is still running */
  start(): void;
  stop(): void;
}

interface Deps {
  readonly source: FeedSource;
  readonly readingRepo: ReadingRepository;
  readonly audit: AuditTrail;
  readonly logger: Logger;
  readonly sensorId: string;
  readonly location: string;
  readonly intervalMs: number;
  readonly clock?: () => number;
}

export const createFeedSyncService = (deps: Deps): FeedSyncService => {
  const { source, readingRepo, audit } = deps;
  const clock = deps.clock ?? Date.now;
  const log = deps.logger.child({ service: "feed-sync", source: source.name });

  let timer: ReturnType<typeof setInterval> | null = null;
  let running = false;

  const syncOnce = async (): Promise<Result<SyncOutcome, AppError>> => {
    const latest = await source.latest();
    if (!latest.ok) return latest;

    const sample = latest.value;
    if (sample === null) return ok({ kind: "empty" });

    const seen = await readingRepo.existsByExternalTimestamp(sample.externalTimestamp);
    if (!seen.ok) return seen;
    if (seen.value) return ok({ kind: "duplicate", externalTimestamp: sample.externalTimestamp });

    const stored = await readingRepo.insert({
      timestamp: new Date(clock()).toISOString(),
      weightKg: sample.weightKg,
      sensorId: deps.sensorId,
      temperature: 0,
      humidity: 0,
      location: deps.location,
      source: ReadingSource.FEED,
      externalTimestamp: sample.externalTimestamp,
    });
    if (!stored.ok) return stored;

    log.info("Feed sample stored", {
      weightKg: sample.weightKg,
      externalTimestamp: sample.externalTimestamp,
    });
    await audit.success(
      source.name,
      AuditAction.CREATE,
      `Feed sample ${sample.externalTimestamp} stored for ${deps.sensorId}`,
    );
    return ok({ kind: "stored", reading: stored.value });
  };

  const tick = async (): Promise<void> => {
    if (running) {
      log.debug("Previous sync still running, skipping tick");
      return;
    }
    running = true;
    try {
      const result = await syncOnce();
      if (!result.ok) {
        log.warn("Feed sync failed", { code: result.error.code, error: result.error.message });
      } else if (result.value.kind === "duplicate") {
        log.debug("Feed sample already stored", {
          externalTimestamp: result.value.externalTimestamp,
        });
      }
    } finally {
      running = false;
    }
  };

  return {
    syncOnce,

    start() {
      if (timer !== null) return;
      log.info("Feed polling started", { intervalMs: deps.intervalMs });
      void tick();
      timer = setInterval(() => void tick(), deps.intervalMs);
      timer.unref();
    },

    stop() {
      if (timer === null) return;
      clearInterval(timer);
      timer = null;
      log.info("Feed polling stopped");
    },
  };
};
