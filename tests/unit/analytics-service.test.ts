import { beforeEach, describe, expect, it } from "vitest";
import { recommendationsFor } from "../../src/application/services/analytics.service.js";
import { ErrorCode } from "../../src/core/errors/app-error.js";
import { AuditAction } from "../../src/core/ports/audit-log.js";
import { reading } from "../support/fixtures.js";
import { type Harness, createHarness } from "../support/harness.js";

describe("AnalyticsService", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness("2024-03-15T12:00:00Z");
  });

  /** 5 kg every morning at 08:00 UTC, 2024-03-06 through 2024-03-15 */
  const seedSteadyDays = async () => {
    for (let day = 6; day <= 15; day++) {
      const date = `2024-03-${String(day).padStart(2, "0")}T08:00:00Z`;
      await h.readingRepo.insert(reading(date, 5));
    }
  };

  describe("with no readings", () => {
    it("reports no data rather than failing", async () => {
      expect(await h.analyticsService.summary(7, "ana")).toEqual({ ok: true, value: { kind: "no_data" } });
      expect(await h.analyticsService.patterns(30, "ana")).toEqual({ ok: true, value: { kind: "no_data" } });
      expect(await h.analyticsService.anomalies(2, "ana")).toEqual({ ok: true, value: { kind: "no_data" } });
      expect(await h.analyticsService.comparison(7, 7, "ana")).toEqual({
        ok: true,
        value: { kind: "no_data" },
      });
    });

    it("refuses a forecast with too few readings", async () => {
      const result = await h.analyticsService.forecast(7, "ana");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.INSUFFICIENT_DATA);
        expect(result.error.details).toEqual({ required: 10, available: 0 });
      }
    });

    it("still produces an executive report", async () => {
      const report = await h.analyticsService.executiveReport("ana");
      expect(report).toEqual({
        ok: true,
        value: {
          generatedAt: "2024-03-15T12:00:00.000Z",
          title: "Executive Report - Waste Generation",
          patterns: { kind: "no_data" },
          forecast: { kind: "no_data" },
          anomalies: { kind: "no_data" },
          comparison: { kind: "no_data" },
          recommendations: ["System operating within normal patterns"],
        },
      });
    });
  });

  describe("with ten steady days", () => {
    beforeEach(seedSteadyDays);

    it("summarises only the trailing window", async () => {
      const result = await h.analyticsService.summary(7, "ana");
      expect(result.ok && result.value).toMatchObject({
        kind: "ok",
        value: { count: 7, total: 35, mean: 5, stdDev: 0 },
      });
    });

    it("audits each analysis under the caller", async () => {
      await h.analyticsService.summary(7, "ana");
      const logs = await h.auditLog.query({ username: "ana" });
      expect(logs.ok && logs.value.map((e) => [e.action, e.description])).toEqual([
        [AuditAction.ANALYZE, "Summary (7 days)"],
      ]);
    });

    it("forecasts a flat line with high confidence", async () => {
      const result = await h.analyticsService.forecast(3, "ana");
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(result.value).toMatchObject({
        model: "linear_regression",
        trainingDays: 10,
        slope: 0,
        intercept: 5,
        r2: 1,
        confidence: "High",
      });
      expect(result.value.predictions).toEqual([
        { day: 1, date: "2024-03-16", predictedKg: 5 },
        { day: 2, date: "2024-03-17", predictedKg: 5 },
        { day: 3, date: "2024-03-18", predictedKg: 5 },
      ]);
    });

    it("compares the last week with the one before", async () => {
      const result = await h.analyticsService.comparison(7, 7, "ana");
      expect(result.ok).toBe(true);
      if (!result.ok || result.value.kind !== "ok") return;

      const { current, baseline, change } = result.value.value;
      expect([current.count, current.total]).toEqual([7, 35]);
      expect([baseline.count, baseline.total]).toEqual([3, 15]);
      expect(change.totalPercent).toBeCloseTo(133.33, 2);
      expect(change.meanPercent).toBe(0);
      expect(change.tendency).toBe("Increase");
    });

    it("recommends the peak hour in the executive report", async () => {
      const report = await h.analyticsService.executiveReport("ana");
      expect(report.ok).toBe(true);
      if (!report.ok) return;

      expect(report.value.forecast.kind).toBe("ok");
      expect(report.value.recommendations).toEqual(["Reinforce collection at 8h (peak hour)"]);

      const logs = await h.auditLog.query({ username: "ana", limit: 1 });
      expect(logs.ok && logs.value[0]?.action).toBe(AuditAction.EXPORT);
    });
  });

  describe("anomalies", () => {
    it("judges only the trailing thirty days", async () => {
      await h.readingRepo.insert(reading("2024-02-01T08:00:00Z", 100));
      await h.readingRepo.insert(reading("2024-03-13T08:00:00Z", 1));
      await h.readingRepo.insert(reading("2024-03-14T08:00:00Z", 2));
      await h.readingRepo.insert(reading("2024-03-15T08:00:00Z", 9));

      const result = await h.analyticsService.anomalies(1, "ana");
      expect(result.ok).toBe(true);
      if (!result.ok || result.value.kind !== "ok") return;

      expect(result.value.value.mean).toBe(4);
      expect(result.value.value.anomalies.map((a) => [a.weightKg, a.severity])).toEqual([[9, "High"]]);
    });
  });
});

describe("recommendationsFor", () => {
  it("falls back to the all-clear message", () => {
    expect(recommendationsFor({ kind: "no_data" }, { kind: "no_data" })).toEqual([
      "System operating within normal patterns",
    ]);
  });

  it("mentions anomalies when any were found", () => {
    const anomalies = {
      kind: "ok" as const,
      value: {
        mean: 4,
        stdDev: 1,
        sensitivity: 2,
        threshold: 6,
        anomalies: [
          {
            readingId: "r-1",
            timestamp: "2024-03-15T08:00:00.000Z",
            sensorId: "bin-1",
            weightKg: 9,
            deviations: 5,
            severity: "Critical" as const,
          },
        ],
      },
    };
    expect(recommendationsFor({ kind: "no_data" }, anomalies)).toEqual(["Investigate 1 detected anomalies"]);
  });
});
