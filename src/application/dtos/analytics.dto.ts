import { z } from "zod";

const days = (fallback: number, max: number) =>
  z.coerce.number().int().min(1).max(max).default(fallback);

export const windowQuery = z.object({
  days: days(30, 365),
});

export const forecastQuery = z.object({
  days: days(7, 90),
});

export const anomaliesQuery = z.object({
  sensitivity: z.coerce.number().positive().max(10).default(2.0),
});

export const comparisonQuery = z.object({
  current: days(7, 365),
  baseline: days(7, 365),
});

export type WindowQuery = z.infer<typeof windowQuery>;
export type ForecastQuery = z.infer<typeof forecastQuery>;
export type AnomaliesQuery = z.infer<typeof anomaliesQuery>;
export type ComparisonQuery = z.infer<typeof comparisonQuery>;
