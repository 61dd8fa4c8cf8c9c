import type { Logger } from "../../core/ports/logger.js";

export type HealthState = "ok" | "degraded" | "down";

export interface HealthStatus {
  readonly status: HealthState;
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly checks: Record<string, ComponentHealth>;
}

export interface ComponentHealth {
  readonly status: HealthState;
  readonly latencyMs?: number | undefined;
  readonly details?: string | undefined;
}

/** A named dependency probe; resolves false when the dependency is unusable */
export interface HealthProbe {
  readonly name: string;
  check(): Promise<boolean>;
}

export interface HealthService {
  check(): Promise<HealthStatus>;
}

interface Deps {
  readonly logger: Logger;
  readonly version: string;
  readonly probes?: readonly HealthProbe[];
}

const elapsed = (start: number): number => Math.round((performance.now() - start) * 100) / 100;

export const createHealthService = (deps: Deps): HealthService => {
  const { logger, version } = deps;
  const probes = deps.probes ?? [];

  const run = async (probe: HealthProbe): Promise<[string, ComponentHealth]> => {
    const start = performance.now();
    try {
      const healthy = await probe.check();
      return [probe.name, { status: healthy ? "ok" : "down", latencyMs: elapsed(start) }];
    } catch (e: unknown) {
      const details = e instanceof Error ? e.message : String(e);
      return [probe.name, { status: "down", latencyMs: elapsed(start), details }];
    }
  };

  return {
    async check(): Promise<HealthStatus> {
      logger.debug("Running deep health check");

      const checks = Object.fromEntries(await Promise.all(probes.map(run)));
      const failed = Object.entries(checks)
        .filter(([, c]) => c.status !== "ok")
        .map(([name]) => name);

      const status: HealthState = failed.length === 0 ? "ok" : "down";
      if (failed.length > 0) logger.warn("Health check failed", { failedComponents: failed });

      return {
        status,
        version,
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
        checks,
      };
    },
  };
};
