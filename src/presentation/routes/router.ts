import type { AdminService } from "../../application/services/admin.service.js";
import type { AnalyticsService } from "../../application/services/analytics.service.js";
import type { AuthService } from "../../application/services/auth.service.js";
import type { HealthService } from "../../application/services/health.service.js";
import type { MfaService } from "../../application/services/mfa.service.js";
import type { ReadingService } from "../../application/services/reading.service.js";
import type { Logger } from "../../core/ports/logger.js";
import type { RequestContext } from "../context.js";
import { adminHandlers } from "../handlers/admin.handler.js";
import { analyticsHandlers } from "../handlers/analytics.handler.js";
import { authHandlers } from "../handlers/auth.handler.js";
import { healthHandler } from "../handlers/health.handler.js";
import { mfaHandlers } from "../handlers/mfa.handler.js";
import { readingHandlers } from "../handlers/reading.handler.js";
import { reportHandlers } from "../handlers/report.handler.js";

/**
 * Static routes use O(1) map lookup.
 * Parametric routes (admin users) use prefix matching.
 */
type RouteHandler = (req: Request, ctx: RequestContext) => Promise<Response>;

export interface RouterDeps {
  readonly authService: AuthService;
  readonly mfaService: MfaService;
  readonly readingService: ReadingService;
  readonly analyticsService: AnalyticsService;
  readonly adminService: AdminService;
  readonly healthService: HealthService;
  /** Device key for sensor pushes; ingestion is open when absent */
  readonly ingestApiKey: string | undefined;
  readonly logger: Logger;
}

/** Admin route prefix for parametric matching */
const ADMIN_USERS_PREFIX = "/api/v1/admin/users/";

export const createRouter = (deps: RouterDeps) => {
  const { logger, authService } = deps;
  const health = healthHandler(deps.healthService);
  const auth = authHandlers(authService);
  const mfa = mfaHandlers(authService, deps.mfaService);
  const readings = readingHandlers(deps.readingService, authService, deps.ingestApiKey);
  const analytics = analyticsHandlers(deps.analyticsService, authService);
  const reports = reportHandlers(deps.analyticsService, deps.readingService, authService);
  const admin = adminHandlers(deps.adminService, authService);

  const notFound404 = (method: string, path: string, requestId: string): Response => {
    logger.debug("Route not found", { method, path });
    return Response.json(
      { error: { code: "NOT_FOUND", message: `${method} ${path} not found` }, requestId },
      { status: 404 },
    );
  };

  const routes = new Map<string, RouteHandler>([
    // Health: shallow for liveness probes, deep for readiness
    ["GET /health", async () => health.shallowCheck()],
    ["GET /readiness", async () => health.deepCheck()],

    // Auth
    ["POST /api/v1/auth/login", auth.login],
    ["POST /api/v1/auth/mfa/verify", auth.verifyMfa],
    ["POST /api/v1/auth/logout", auth.logout],
    ["GET /api/v1/auth/me", auth.me],

    // Two-factor enrolment
    ["POST /api/v1/mfa/setup", mfa.setup],
    ["POST /api/v1/mfa/activate", mfa.activate],
    ["POST /api/v1/mfa/disable", mfa.disable],

    // Readings
    ["POST /api/v1/readings", readings.ingest],
    ["GET /api/v1/readings", readings.list],
    ["GET /api/v1/readings/stats", readings.stats],
    ["GET /api/v1/sensors", readings.sensors],

    // Analytics
    ["GET /api/v1/analytics/summary", analytics.summary],
    ["GET /api/v1/analytics/patterns", analytics.patterns],
    ["GET /api/v1/analytics/forecast", analytics.forecast],
    ["GET /api/v1/analytics/anomalies", analytics.anomalies],
    ["GET /api/v1/analytics/comparison", analytics.comparison],

    // Reports
    ["GET /api/v1/reports/executive", reports.executive],
    ["GET /api/v1/reports/csv", reports.csv],

    // Admin & audit
    ["POST /api/v1/admin/users", admin.createUser],
    ["GET /api/v1/admin/users", admin.listUsers],
    ["GET /api/v1/audit/logs", admin.auditLogs],
  ]);

  /**
   * Match parametric admin routes: /api/v1/admin/users/:username{/password}
   */
  const matchAdmin = (method: string, path: string): RouteHandler | null => {
    if (!path.startsWith(ADMIN_USERS_PREFIX)) return null;

    const segments = path.substring(ADMIN_USERS_PREFIX.length).split("/");
    const [encoded, action] = segments;
    if (encoded === undefined || encoded === "" || segments.length > 2) return null;

    let username: string;
    try {
      username = decodeURIComponent(encoded);
    } catch {
      return null;
    }

    if (action === undefined) {
      if (method === "PATCH") return (req, ctx) => admin.updateUser(req, ctx, username);
      if (method === "DELETE") return (req, ctx) => admin.deleteUser(req, ctx, username);
      return null;
    }
    if (action === "password" && method === "PUT") {
      return (req, ctx) => admin.changePassword(req, ctx, username);
    }
    return null;
  };

  return {
    handle(req: Request, ctx: RequestContext): Promise<Response> {
      const handler = routes.get(`${req.method} ${ctx.path}`);
      if (handler) return handler(req, ctx);

      const adminHandler = matchAdmin(req.method, ctx.path);
      if (adminHandler) return adminHandler(req, ctx);

      return Promise.resolve(notFound404(req.method, ctx.path, ctx.requestId));
    },
  };
};

export type Router = ReturnType<typeof createRouter>;
