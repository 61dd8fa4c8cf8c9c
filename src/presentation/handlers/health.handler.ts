import type { HealthService } from "../../application/services/health.service.js";

/**
 * Health handler with two modes:
 * - Deep check: dependency probes (for /readiness)
 * - Shallow check: liveness only (for /health and load balancer probes)
 */
export const healthHandler = (healthService: HealthService) => {
  const deepCheck = async (): Promise<Response> => {
    const status = await healthService.check();
    const httpCode = status.status === "ok" ? 200 : 503;
    return Response.json({ data: status }, { status: httpCode });
  };

  const shallowCheck = (): Response =>
    Response.json({ data: { status: "ok", uptime: process.uptime() } });

  return { deepCheck, shallowCheck };
};
