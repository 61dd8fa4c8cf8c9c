import { describe, expect, it } from "vitest";
import { createHealthService } from "../../src/application/services/health.service.js";
import { noopLogger } from "../../src/infrastructure/logging/logger.js";

describe("HealthService", () => {
  it("is ok with no probes", async () => {
    const status = await createHealthService({ logger: noopLogger, version: "1.0.0" }).check();
    expect(status).toMatchObject({ status: "ok", version: "1.0.0", checks: {} });
  });

  it("marks itself down when any probe fails or throws", async () => {
    const service = createHealthService({
      logger: noopLogger,
      version: "1.0.0",
      probes: [
        { name: "mongodb", check: async () => true },
        { name: "feed", check: async () => false },
        {
          name: "cache",
          check: async () => {
            throw new Error("timed out");
          },
        },
      ],
    });

    const status = await service.check();
    expect(status.status).toBe("down");
    expect(status.checks["mongodb"]?.status).toBe("ok");
    expect(status.checks["feed"]?.status).toBe("down");
    expect(status.checks["cache"]).toMatchObject({ status: "down", details: "timed out" });
  });
});
