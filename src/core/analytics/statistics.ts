import type { Reading } from "../entities/reading.entity.js";
import { type AppError, insufficientData } from "../errors/app-error.js";
import { type Result, err, ok } from "../types/result.js";

/**
 * Statistics engine: pure functions over readings.
 * Callers fetch the window; nothing here touches storage or the clock.
 */

/** Analyses that have nothing to say about an empty window return `no_data` */
export type Outcome<T> =
  | { readonly kind: "ok"; readonly value: T }
  | { readonly kind: "no_data" };

const noData = { kind: "no_data" } as const;
const some = <T>(value: T): Outcome<T> => ({ kind: "ok", value });

export const DAY_MS = 24 * 60 * 60 * 1000;

// ── Aggregates ──────────────────────────────────────────────────────────

export interface AggregateStats {
  readonly total: number;
  readonly mean: number;
  readonly max: number;
  readonly min: number;
  /** Population standard deviation (divides by n) */
  readonly stdDev: number;
  readonly median: number;
  readonly count: number;
}

const sum = (values: readonly number[]): number => values.reduce((acc, v) => acc + v, 0);

const meanOf = (values: readonly number[]): number =>
  values.length === 0 ? 0 : sum(values) / values.length;

const populationStdDev = (values: readonly number[], mean: number, allEqual: boolean): number => {
  // Float noise in the mean of identical values must not produce a non-zero spread
  if (allEqual || values.length === 0) return 0;
  const variance = sum(values.map((v) => (v - mean) ** 2)) / values.length;
  return Math.sqrt(variance);
};

const medianOf = (sorted: readonly number[]): number => {
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? 0) + upper) / 2;
};

export const aggregate = (values: readonly number[]): Outcome<AggregateStats> => {
  if (values.length === 0) return noData;

  const sorted = [...values].sort((a, b) => a - b);
  const min = sorted[0] ?? 0;
  const max = sorted[sorted.length - 1] ?? 0;
  const mean = meanOf(values);

  return some({
    total: sum(values),
    mean,
    max,
    min,
    stdDev: populationStdDev(values, mean, min === max),
    median: medianOf(sorted),
    count: values.length,
  });
};

const weights = (readings: readonly Reading[]): number[] => readings.map((r) => r.weightKg);

// ── Forecast ────────────────────────────────────────────────────────────

export const Confidence = {
  HIGH: "High",
  MEDIUM: "Medium",
  LOW: "Low",
} as const;

export type Confidence = (typeof Confidence)[keyof typeof Confidence];

export const MIN_FORECAST_READINGS = 10;

export interface LinearFit {
  readonly slope: number;
  readonly intercept: number;
  /** Coefficient of determination, clamped to [0, 1] */
  readonly r2: number;
}

export interface ForecastPoint {
  /** 1-based offset from today */
  readonly day: number;
  /** UTC calendar date, YYYY-MM-DD */
  readonly date: string;
  readonly predictedKg: number;
}

export interface Forecast extends LinearFit {
  readonly model: "linear_regression";
  readonly trainingDays: number;
  readonly confidence: Confidence;
  readonly predictions: readonly ForecastPoint[];
}

export interface DailyTotal {
  readonly date: string;
  readonly totalKg: number;
}

/** Sum weights per UTC calendar day, oldest day first */
export const dailyTotals = (readings: readonly Reading[]): DailyTotal[] => {
  const totals = new Map<string, number>();
  for (const r of readings) {
    const date = r.timestamp.slice(0, 10);
    totals.set(date, (totals.get(date) ?? 0) + r.weightKg);
  }
  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, totalKg]) => ({ date, totalKg }));
};

/**
 * Ordinary least squares for y = intercept + slope·x.
 * A single distinct x has no slope: the fit is the flat mean line with r2 = 0.
 * A constant y over several x is fitted exactly: r2 = 1.
 */
export const fitLine = (xs: readonly number[], ys: readonly number[]): LinearFit => {
  const n = Math.min(xs.length, ys.length);
  const xMean = meanOf(xs.slice(0, n));
  const yMean = meanOf(ys.slice(0, n));

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = (xs[i] ?? 0) - xMean;
    sxx += dx * dx;
    sxy += dx * ((ys[i] ?? 0) - yMean);
  }

  if (sxx === 0) return { slope: 0, intercept: yMean, r2: 0 };

  const slope = sxy / sxx;
  const intercept = yMean - slope * xMean;

  const first = ys[0];
  if (ys.slice(0, n).every((y) => y === first)) return { slope, intercept, r2: 1 };

  let ssRes = 0;
  let ssTot = 0;
  for (let i = 0; i < n; i++) {
    const y = ys[i] ?? 0;
    const predicted = intercept + slope * (xs[i] ?? 0);
    ssRes += (y - predicted) ** 2;
    ssTot += (y - yMean) ** 2;
  }

  const r2 = Math.min(1, Math.max(0, 1 - ssRes / ssTot));
  return { slope, intercept, r2 };
};

export const confidenceFor = (r2: number): Confidence => {
  if (r2 > 0.7) return Confidence.HIGH;
  if (r2 > 0.4) return Confidence.MEDIUM;
  return Confidence.LOW;
};

/**
 * Fit daily totals against their day index (0..K-1, days with data only)
 * and project the next `horizonDays` days. Predictions never go below zero.
 */
export const forecast = (
  readings: readonly Reading[],
  horizonDays: number,
  now: Date,
): Result<Forecast, AppError> => {
  if (readings.length < MIN_FORECAST_READINGS) {
    return err(insufficientData(MIN_FORECAST_READINGS, readings.length));
  }

  const daily = dailyTotals(readings);
  const xs = daily.map((_, i) => i);
  const ys = daily.map((d) => d.totalKg);
  const fit = fitLine(xs, ys);

  const predictions: ForecastPoint[] = [];
  for (let i = 0; i < horizonDays; i++) {
    const x = daily.length + i;
    predictions.push({
      day: i + 1,
      date: new Date(now.getTime() + (i + 1) * DAY_MS).toISOString().slice(0, 10),
      predictedKg: Math.max(0, fit.intercept + fit.slope * x),
    });
  }

  return ok({
    model: "linear_regression",
    trainingDays: daily.length,
    ...fit,
    confidence: confidenceFor(fit.r2),
    predictions,
  });
};

// ── Anomalies ───────────────────────────────────────────────────────────

export const Severity = {
  CRITICAL: "Critical",
  HIGH: "High",
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

export const DEFAULT_SENSITIVITY = 2.0;

export interface Anomaly {
  readonly readingId: string;
  readonly timestamp: string;
  readonly sensorId: string;
  readonly weightKg: number;
  /** Standard deviations above the mean; 0 when the window has no spread */
  readonly deviations: number;
  readonly severity: Severity;
}

export interface AnomalyReport {
  readonly mean: number;
  readonly stdDev: number;
  readonly sensitivity: number;
  readonly threshold: number;
  readonly anomalies: readonly Anomaly[];
}

/** Flag readings strictly above mean + k·σ; Critical beyond 1.5× that threshold */
export const detectAnomalies = (
  readings: readonly Reading[],
  sensitivity: number = DEFAULT_SENSITIVITY,
): Outcome<AnomalyReport> => {
  const stats = aggregate(weights(readings));
  if (stats.kind === "no_data") return noData;

  const { mean, stdDev } = stats.value;
  const threshold = mean + sensitivity * stdDev;

  const anomalies = readings
    .filter((r) => r.weightKg > threshold)
    .map(
      (r): Anomaly => ({
        readingId: r.id,
        timestamp: r.timestamp,
        sensorId: r.sensorId,
        weightKg: r.weightKg,
        deviations: stdDev === 0 ? 0 : (r.weightKg - mean) / stdDev,
        severity: r.weightKg > threshold * 1.5 ? Severity.CRITICAL : Severity.HIGH,
      }),
    );

  return some({ mean, stdDev, sensitivity, threshold, anomalies });
};

// ── Period comparison ───────────────────────────────────────────────────

export const Tendency = {
  INCREASE: "Increase",
  DECREASE: "Decrease",
} as const;

export type Tendency = (typeof Tendency)[keyof typeof Tendency];

export interface PeriodSummary {
  readonly days: number;
  /** Inclusive start, ISO-8601 */
  readonly from: string;
  /** Exclusive end for the baseline; `now` for the current period */
  readonly to: string;
  readonly total: number;
  /** 0 when the period has no readings */
  readonly mean: number;
  readonly count: number;
}

export interface PeriodComparison {
  readonly current: PeriodSummary;
  readonly baseline: PeriodSummary;
  readonly change: {
    readonly totalPercent: number;
    readonly meanPercent: number;
    readonly tendency: Tendency;
  };
}

/** Percent change from `baseline` to `current`; 0 when the baseline is 0 */
export const percentChange = (current: number, baseline: number): number =>
  baseline === 0 ? 0 : ((current - baseline) / baseline) * 100;

const summarise = (readings: readonly Reading[], days: number, from: string, to: string) => {
  const values = weights(readings);
  return { days, from, to, total: sum(values), mean: meanOf(values), count: values.length };
};

/**
 * Compare the trailing `currentDays` window with the `baselineDays` window
 * immediately before it.
 */
export const comparePeriods = (
  readings: readonly Reading[],
  currentDays: number,
  baselineDays: number,
  now: Date,
): Outcome<PeriodComparison> => {
  const nowIso = now.toISOString();
  const currentStart = new Date(now.getTime() - currentDays * DAY_MS).toISOString();
  const baselineStart = new Date(
    now.getTime() - (currentDays + baselineDays) * DAY_MS,
  ).toISOString();

  const inCurrent = readings.filter((r) => r.timestamp >= currentStart);
  const inBaseline = readings.filter(
    (r) => r.timestamp >= baselineStart && r.timestamp < currentStart,
  );
  if (inCurrent.length === 0 && inBaseline.length === 0) return noData;

  const current = summarise(inCurrent, currentDays, currentStart, nowIso);
  const baseline = summarise(inBaseline, baselineDays, baselineStart, currentStart);

  const totalPercent = percentChange(current.total, baseline.total);
  return some({
    current,
    baseline,
    change: {
      totalPercent,
      meanPercent: percentChange(current.mean, baseline.mean),
      tendency: totalPercent > 0 ? Tendency.INCREASE : Tendency.DECREASE,
    },
  });
};

// ── Generation patterns ─────────────────────────────────────────────────

export interface BucketStats {
  readonly total: number;
  readonly mean: number;
  readonly count: number;
}

export interface HourBucket extends BucketStats {
  readonly hour: number;
}

export interface WeekdayBucket extends BucketStats {
  readonly weekday: Weekday;
}

export const WEEKDAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export interface PatternAnalysis {
  readonly stats: AggregateStats;
  readonly dailyMeanKg: number;
  readonly byHour: readonly HourBucket[];
  readonly byWeekday: readonly WeekdayBucket[];
  /** UTC hour with the largest total */
  readonly peakHour: number;
  readonly peakDay: DailyTotal;
  readonly meanTemperature: number;
  readonly meanHumidity: number;
}

const bucket = (values: readonly number[]): BucketStats => ({
  total: sum(values),
  mean: meanOf(values),
  count: values.length,
});

const groupBy = <K>(readings: readonly Reading[], key: (r: Reading) => K): Map<K, number[]> => {
  const groups = new Map<K, number[]>();
  for (const r of readings) {
    const k = key(r);
    const group = groups.get(k);
    if (group) group.push(r.weightKg);
    else groups.set(k, [r.weightKg]);
  }
  return groups;
};

/** getUTCDay() is Sunday-based; WEEKDAYS is Monday-based */
const weekdayOf = (timestamp: string): Weekday =>
  WEEKDAYS[(new Date(timestamp).getUTCDay() + 6) % 7] ?? "Monday";

const maxBy = <T>(items: readonly T[], score: (item: T) => number): T | undefined => {
  let best: T | undefined;
  for (const item of items) {
    if (best === undefined || score(item) > score(best)) best = item;
  }
  return best;
};

export const analysePatterns = (readings: readonly Reading[]): Outcome<PatternAnalysis> => {
  const stats = aggregate(weights(readings));
  if (stats.kind === "no_data") return noData;

  const byHour = [...groupBy(readings, (r) => new Date(r.timestamp).getUTCHours()).entries()]
    .sort(([a], [b]) => a - b)
    .map(([hour, values]): HourBucket => ({ hour, ...bucket(values) }));

  const weekdayGroups = groupBy(readings, (r) => weekdayOf(r.timestamp));
  const byWeekday = WEEKDAYS.flatMap((weekday): WeekdayBucket[] => {
    const values = weekdayGroups.get(weekday);
    return values ? [{ weekday, ...bucket(values) }] : [];
  });

  const daily = dailyTotals(readings);

  return some({
    stats: stats.value,
    dailyMeanKg: meanOf(daily.map((d) => d.totalKg)),
    byHour,
    byWeekday,
    peakHour: maxBy(byHour, (b) => b.total)?.hour ?? 0,
    peakDay: maxBy(daily, (d) => d.totalKg) ?? { date: "", totalKg: 0 },
    meanTemperature: meanOf(readings.map((r) => r.temperature)),
    meanHumidity: meanOf(readings.map((r) => r.humidity)),
  });
};
