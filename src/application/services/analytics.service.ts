import {
  type AggregateStats,
  type AnomalyReport,
  DAY_MS,
  DEFAULT_SENSITIVITY,
  type Forecast,
  type Outcome,
  type PatternAnalysis,
  type PeriodComparison,
  aggregate,
  analysePatterns,
  comparePeriods,
  detectAnomalies,
  forecast,
} from "../../core/analytics/statistics.js";
import type { Reading } from "../../core/entities/reading.entity.js";
import { type AppError, ErrorCode } from "../../core/errors/app-error.js";
import { AuditAction } from "../../core/ports/audit-log.js";
import type { Logger } from "../../core/ports/logger.js";
import type { ReadingRepository } from "../../core/ports/reading.repository.js";
import { type Result, ok } from "../../core/types/result.js";
import type { AuditTrail } from "./audit-trail.js";

/** Forecasts train on this many trailing days */
export const FORECAST_TRAINING_DAYS = 90;
/** Anomalies are judged against this many trailing days */
export const ANOMALY_WINDOW_DAYS = 30;

export interface ExecutiveReport {
  readonly generatedAt: string;
  readonly title: string;
  readonly patterns: Outcome<PatternAnalysis>;
  /** `no_data` when there are too few readings to fit */
  readonly forecast: Outcome<Forecast>;
  readonly anomalies: Outcome<AnomalyReport>;
  readonly comparison: Outcome<PeriodComparison>;
  readonly recommendations: readonly string[];
}

export interface AnalyticsService {
  summary(days: number, actor: string): Promise<Result<Outcome<AggregateStats>, AppError>>;
  patterns(days: number, actor: string): Promise<Result<Outcome<PatternAnalysis>, AppError>>;
  forecast(horizonDays: number, actor: string): Promise<Result<Forecast, AppError>>;
  anomalies(sensitivity: number, actor: string): Promise<Result<Outcome<AnomalyReport>, AppError>>;
  comparison(
    currentDays: number,
    baselineDays: number,
    actor: string,
  ): Promise<Result<Outcome<PeriodComparison>, AppError>>;
  executiveReport(actor: string): Promise<Result<ExecutiveReport, AppError>>;
}

interface Deps {
  readonly readingRepo: ReadingRepository;
  readonly audit: AuditTrail;
  readonly logger: Logger;
  readonly clock?: () => number;
}

export const recommendationsFor = (
  patterns: Outcome<PatternAnalysis>,
  anomalies: Outcome<AnomalyReport>,
): string[] => {
  const recommendations: string[] = [];
  if (patterns.kind === "ok") {
    recommendations.push(`Reinforce collection at ${patterns.value.peakHour}h (peak hour)`);
  }
  if (anomalies.kind === "ok" && anomalies.value.anomalies.length > 0) {
    recommendations.push(`Investigate ${anomalies.value.anomalies.length} detected anomalies`);
  }
  return recommendations.length > 0 ? recommendations : ["System operating within normal patterns"];
};

export const createAnalyticsService = (deps: Deps): AnalyticsService => {
  const { readingRepo, audit } = deps;
  const clock = deps.clock ?? Date.now;
  const log = deps.logger.child({ service: "analytics" });

  /** Ascending readings of the trailing `days` */
  const trailing = (days: number): Promise<Result<readonly Reading[], AppError>> =>
    readingRepo.find({ since: new Date(clock() - days * DAY_MS).toISOString(), order: "asc" });

  const fitForecast = async (horizonDays: number): Promise<Result<Forecast, AppError>> => {
    const readings = await trailing(FORECAST_TRAINING_DAYS);
    if (!readings.ok) return readings;
    return forecast(readings.value, horizonDays, new Date(clock()));
  };

  const findAnomalies = async (
    sensitivity: number,
  ): Promise<Result<Outcome<AnomalyReport>, AppError>> => {
    const readings = await trailing(ANOMALY_WINDOW_DAYS);
    if (!readings.ok) return readings;
    return ok(detectAnomalies(readings.value, sensitivity));
  };

  const compare = async (
    currentDays: number,
    baselineDays: number,
  ): Promise<Result<Outcome<PeriodComparison>, AppError>> => {
    const readings = await trailing(currentDays + baselineDays);
    if (!readings.ok) return readings;
    return ok(comparePeriods(readings.value, currentDays, baselineDays, new Date(clock())));
  };

  const findPatterns = async (days: number): Promise<Result<Outcome<PatternAnalysis>, AppError>> => {
    const readings = await trailing(days);
    if (!readings.ok) return readings;
    return ok(analysePatterns(readings.value));
  };

  return {
    async summary(days, actor) {
      const readings = await trailing(days);
      if (!readings.ok) return readings;

      await audit.success(actor, AuditAction.ANALYZE, `Summary (${days} days)`);
      return ok(aggregate(readings.value.map((r) => r.weightKg)));
    },

    async patterns(days, actor) {
      const result = await findPatterns(days);
      if (!result.ok) return result;

      await audit.success(actor, AuditAction.ANALYZE, `Pattern analysis (${days} days)`);
      return result;
    },

    async forecast(horizonDays, actor) {
      const result = await fitForecast(horizonDays);
      if (!result.ok) return result;

      await audit.success(actor, AuditAction.ANALYZE, `Forecast (${horizonDays} days)`);
      return result;
    },

    async anomalies(sensitivity, actor) {
      const result = await findAnomalies(sensitivity);
      if (!result.ok) return result;

      await audit.success(actor, AuditAction.ANALYZE, "Anomaly detection");
      return result;
    },

    async comparison(currentDays, baselineDays, actor) {
      const result = await compare(currentDays, baselineDays);
      if (!result.ok) return result;

      await audit.success(
        actor,
        AuditAction.ANALYZE,
        `Period comparison (${currentDays} vs ${baselineDays} days)`,
      );
      return result;
    },

    async executiveReport(actor) {
      const patterns = await findPatterns(30);
      if (!patterns.ok) return patterns;

      const fitted = await fitForecast(7);
      let projected: Outcome<Forecast>;
      if (fitted.ok) {
        projected = { kind: "ok", value: fitted.value };
      } else if (fitted.error.code === ErrorCode.INSUFFICIENT_DATA) {
        projected = { kind: "no_data" };
      } else {
        return fitted;
      }

      const anomalies = await findAnomalies(DEFAULT_SENSITIVITY);
      if (!anomalies.ok) return anomalies;

      const comparison = await compare(7, 7);
      if (!comparison.ok) return comparison;

      log.info("Executive report generated", { actor });
      await audit.success(actor, AuditAction.EXPORT, "Executive report generated");

      return ok({
        generatedAt: new Date(clock()).toISOString(),
        title: "Executive Report - Waste Generation",
        patterns: patterns.value,
        forecast: projected,
        anomalies: anomalies.value,
        comparison: comparison.value,
        recommendations: recommendationsFor(patterns.value, anomalies.value),
      });
    },
  };
};
