import { beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import type { AppConfig } from "../../src/infrastructure/config/config.js";
import { noopLogger } from "../../src/infrastructure/logging/logger.js";
import { createRouter } from "../../src/presentation/routes/router.js";
import {
  type AppServer,
  BodyTooLargeError,
  MAX_BODY_BYTES,
  bridgeErrorResponse,
  createServer,
} from "../../src/presentation/server.js";
import { type Harness, TEST_PASSWORD, createHarness } from "../support/harness.js";

const DEVICE_KEY = "test-device-key";

const config: Pick<AppConfig, "env" | "port" | "host" | "cors" | "log"> = {
  env: "test",
  port: 0,
  host: "127.0.0.1",
  cors: { origins: ["https://app.example.test"] },
  log: { level: "error", format: "json" },
};

const loginBody = z.object({
  data: z.object({ token: z.string(), mfaRequired: z.boolean() }),
});

const setupBody = z.object({ data: z.object({ secret: z.string() }) });

interface CallOptions {
  readonly token?: string;
  readonly body?: unknown;
  readonly headers?: Record<string, string>;
}

describe("HTTP API", () => {
  let h: Harness;
  let server: AppServer;

  beforeEach(() => {
    h = createHarness("2024-03-15T12:00:00Z");
    const router = createRouter({
      authService: h.authService,
      mfaService: h.mfaService,
      readingService: h.readingService,
      analyticsService: h.analyticsService,
      adminService: h.adminService,
      healthService: h.healthService,
      ingestApiKey: DEVICE_KEY,
      logger: noopLogger,
    });
    server = createServer({ config, logger: noopLogger, router });
  });

  const call = (method: string, path: string, options: CallOptions = {}): Promise<Response> => {
    const headers: Record<string, string> = { ...options.headers };
    if (options.token !== undefined) headers["authorization"] = `Bearer ${options.token}`;
    if (options.body !== undefined) headers["content-type"] = "application/json";
    return server.handle(
      new Request(`http://localhost${path}`, {
        method,
        headers,
        body: options.body === undefined ? null : JSON.stringify(options.body),
      }),
    );
  };

  const login = async (username: string, password = TEST_PASSWORD) => {
    const res = await call("POST", "/api/v1/auth/login", { body: { username, password } });
    expect(res.status).toBe(200);
    return loginBody.parse(await res.json()).data;
  };

  const tokenFor = async (username: string, role: "admin" | "gestor" | "usuario") => {
    await h.seedUser(username, role);
    return (await login(username)).token;
  };

  describe("health and plumbing", () => {
    it("answers liveness with request id and security headers", async () => {
      const res = await call("GET", "/health", { headers: { "x-request-id": "req-42" } });
      expect(res.status).toBe(200);
      expect(res.headers.get("x-request-id")).toBe("req-42");
      expect(res.headers.get("x-content-type-options")).toBe("nosniff");
      expect(res.headers.get("strict-transport-security")).toBeNull();
    });

    it("answers readiness from the probes", async () => {
      const res = await call("GET", "/readiness");
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ data: { status: "ok", version: "test", checks: {} } });
    });

    it("returns 404 for unknown routes", async () => {
      const res = await call("GET", "/api/v1/nothing", { headers: { "x-request-id": "req-1" } });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: "NOT_FOUND", message: "GET /api/v1/nothing not found" },
        requestId: "req-1",
      });
    });

    it("answers CORS preflights for allowed origins only", async () => {
      const allowed = await call("OPTIONS", "/api/v1/readings", {
        headers: { origin: "https://app.example.test" },
      });
      expect(allowed.status).toBe(204);
      expect(allowed.headers.get("access-control-allow-origin")).toBe("https://app.example.test");

      const denied = await call("OPTIONS", "/api/v1/readings", {
        headers: { origin: "https://evil.example.test" },
      });
      expect(denied.status).toBe(403);
    });

    it("turns a thrown handler error into a 500", async () => {
      const failing = createServer({
        config,
        logger: noopLogger,
        router: {
          handle: async () => {
            throw new Error("boom");
          },
        },
      });
      const res = await failing.handle(
        new Request("http://localhost/health", { headers: { "x-request-id": "req-9" } }),
      );
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: { code: "INTERNAL", message: "Internal server error" },
        requestId: "req-9",
      });
    });
  });

  describe("authentication", () => {
    it("logs in and reads the profile", async () => {
      const token = await tokenFor("ana", "gestor");
      const res = await call("GET", "/api/v1/auth/me", { token });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ data: { username: "ana", role: "gestor" } });
    });

    it("reports why a login failed", async () => {
      await h.seedUser("ana", "gestor");
      const res = await call("POST", "/api/v1/auth/login", {
        body: { username: "ana", password: "wrong-password" },
      });
      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        error: { code: "UNAUTHORIZED", reason: "WRONG_PASSWORD" },
      });
    });

    it("validates the login body", async () => {
      const res = await call("POST", "/api/v1/auth/login", { body: { username: "ana" } });
      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({ error: { code: "VALIDATION" } });
    });

    it("requires a token", async () => {
      const res = await call("GET", "/api/v1/auth/me");
      expect(res.status).toBe(401);
    });

    it("invalidates the token on logout", async () => {
      const token = await tokenFor("ana", "usuario");
      expect((await call("POST", "/api/v1/auth/logout", { token })).status).toBe(204);
      expect((await call("GET", "/api/v1/auth/me", { token })).status).toBe(401);
    });
  });

  describe("two-factor", () => {
    it("enrols over HTTP and then gates login on a code", async () => {
      const token = await tokenFor("ana", "gestor");

      const setup = await call("POST", "/api/v1/mfa/setup", { token });
      expect(setup.status).toBe(200);
      const { secret } = setupBody.parse(await setup.json()).data;

      const activated = await call("POST", "/api/v1/mfa/activate", {
        token,
        body: { code: h.codeFor(secret) },
      });
      expect(await activated.json()).toEqual({ data: { message: "Two-factor authentication enabled" } });

      const second = await login("ana");
      expect(second.mfaRequired).toBe(true);

      const blocked = await call("GET", "/api/v1/auth/me", { token: second.token });
      expect(blocked.status).toBe(401);
      expect(await blocked.json()).toMatchObject({ error: { reason: "MFA_PENDING" } });

      const wrong = await call("POST", "/api/v1/auth/mfa/verify", {
        token: second.token,
        body: { code: h.codeFor(secret, 3600) },
      });
      expect(wrong.status).toBe(400);
      expect(await wrong.json()).toMatchObject({ error: { code: "MFA", reason: "INVALID_CODE" } });

      const verified = await call("POST", "/api/v1/auth/mfa/verify", {
        token: second.token,
        body: { code: h.codeFor(secret) },
      });
      expect(verified.status).toBe(200);
      expect(await verified.json()).toMatchObject({ data: { user: { username: "ana", mfaEnabled: true } } });

      expect((await call("GET", "/api/v1/auth/me", { token: second.token })).status).toBe(200);
    });
  });

  describe("readings", () => {
    it("requires the device key for ingestion", async () => {
      const missing = await call("POST", "/api/v1/readings", { body: { peso_kg: 2, sensor_id: "bin-1" } });
      expect(missing.status).toBe(401);

      const wrong = await call("POST", "/api/v1/readings", {
        body: { peso_kg: 2, sensor_id: "bin-1" },
        headers: { "x-api-key": "other-device-key" },
      });
      expect(wrong.status).toBe(401);
    });

    it("stores a pushed reading and serves it back", async () => {
      const created = await call("POST", "/api/v1/readings", {
        body: { peso_kg: "2.5", sensor_id: "bin-1", temperatura: 22 },
        headers: { "x-api-key": DEVICE_KEY },
      });
      expect(created.status).toBe(201);
      expect(await created.json()).toMatchObject({ data: { timestamp: "2024-03-15T12:00:00.000Z" } });

      const token = await tokenFor("leo", "usuario");
      const listed = await call("GET", "/api/v1/readings?limit=5", { token });
      expect(await listed.json()).toMatchObject({
        data: [{ sensorId: "bin-1", weightKg: 2.5, temperature: 22, humidity: 0 }],
      });

      const sensors = await call("GET", "/api/v1/sensors", { token });
      expect(await sensors.json()).toEqual({ data: ["bin-1"] });

      const stats = await call("GET", "/api/v1/readings/stats?sensor_id=bin-1", { token });
      expect(await stats.json()).toMatchObject({ data: { sensor: "bin-1", count: 1, totalKg: 2.5 } });
    });

    it("rejects a malformed reading", async () => {
      const res = await call("POST", "/api/v1/readings", {
        body: { peso_kg: -3, sensor_id: "bin-1" },
        headers: { "x-api-key": DEVICE_KEY },
      });
      expect(res.status).toBe(422);
    });
  });

  describe("analytics and reports", () => {
    it("keeps analytics from plain users", async () => {
      const token = await tokenFor("leo", "usuario");
      const res = await call("GET", "/api/v1/analytics/summary", { token });
      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({
        error: { code: "FORBIDDEN", message: "Missing permission: analyze", reason: "INSUFFICIENT_ROLE" },
      });
    });

    it("answers an empty window with no_data", async () => {
      const token = await tokenFor("ana", "gestor");
      const res = await call("GET", "/api/v1/analytics/summary?days=7", { token });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ data: { kind: "no_data" } });
    });

    it("reports too few readings for a forecast", async () => {
      const token = await tokenFor("ana", "gestor");
      const res = await call("GET", "/api/v1/analytics/forecast", { token });
      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({
        error: { code: "INSUFFICIENT_DATA", details: { required: 10, available: 0 } },
      });
    });

    it("validates analytics query parameters", async () => {
      const token = await tokenFor("ana", "gestor");
      const res = await call("GET", "/api/v1/analytics/anomalies?sensitivity=-1", { token });
      expect(res.status).toBe(422);
    });

    it("downloads readings as CSV", async () => {
      await h.readingService.ingest({ peso_kg: 1.5, sensor_id: "bin-1" });
      const token = await tokenFor("ana", "gestor");

      const res = await call("GET", "/api/v1/reports/csv", { token });
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("text/csv; charset=utf-8");
      expect(res.headers.get("content-disposition")).toBe('attachment; filename="leituras.csv"');
      expect(await res.text()).toBe(
        "timestamp,sensor_id,peso_kg,temperatura,umidade\r\n2024-03-15T12:00:00.000Z,bin-1,1.5,0,0\r\n",
      );
    });

    it("builds the executive report", async () => {
      const token = await tokenFor("ana", "gestor");
      const res = await call("GET", "/api/v1/reports/executive", { token });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { forecast: { kind: "no_data" }, recommendations: ["System operating within normal patterns"] },
      });
    });
  });

  describe("administration", () => {
    it("manages a user through its lifecycle", async () => {
      const token = await tokenFor("root", "admin");

      const created = await call("POST", "/api/v1/admin/users", {
        token,
        body: { username: "bia", password: "bia-password", name: "Bia" },
      });
      expect(created.status).toBe(201);
      expect(await created.json()).toMatchObject({ data: { username: "bia", role: "usuario", email: null } });

      const updated = await call("PATCH", "/api/v1/admin/users/bia", { token, body: { role: "gestor" } });
      expect(await updated.json()).toMatchObject({ data: { role: "gestor" } });

      const changed = await call("PUT", "/api/v1/admin/users/bia/password", {
        token,
        body: { password: "new-bia-password" },
      });
      expect(changed.status).toBe(204);
      expect((await login("bia", "new-bia-password")).mfaRequired).toBe(false);

      expect((await call("DELETE", "/api/v1/admin/users/bia", { token })).status).toBe(204);
      expect((await call("DELETE", "/api/v1/admin/users/bia", { token })).status).toBe(404);
    });

    it("forbids deleting yourself", async () => {
      const token = await tokenFor("root", "admin");
      const res = await call("DELETE", "/api/v1/admin/users/root", { token });
      expect(res.status).toBe(403);
    });

    it("lets managers edit users but not create them", async () => {
      const token = await tokenFor("ana", "gestor");
      expect((await call("GET", "/api/v1/admin/users", { token })).status).toBe(200);

      const res = await call("POST", "/api/v1/admin/users", {
        token,
        body: { username: "bia", password: "bia-password", name: "Bia" },
      });
      expect(res.status).toBe(403);
    });

    it("keeps the audit log for admins", async () => {
      const managerToken = await tokenFor("ana", "gestor");
      const denied = await call("GET", "/api/v1/audit/logs", { token: managerToken });
      expect(denied.status).toBe(403);
      expect(await denied.json()).toMatchObject({ error: { message: "Insufficient permissions" } });

      const adminToken = await tokenFor("root", "admin");
      const res = await call("GET", "/api/v1/audit/logs?username=ana&limit=1", { token: adminToken });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ data: [{ username: "ana", action: "LOGIN", status: "success" }] });
    });

    it("ignores unknown admin sub-routes", async () => {
      const token = await tokenFor("root", "admin");
      expect((await call("GET", "/api/v1/admin/users/bia/extra", { token })).status).toBe(404);
      expect((await call("POST", "/api/v1/admin/users/bia", { token })).status).toBe(404);
      expect((await call("DELETE", "/api/v1/admin/users/%E0%A4%A", { token })).status).toBe(404);
    });
  });
});

describe("request bridge failures", () => {
  it("answers an oversized body with 413", async () => {
    const res = bridgeErrorResponse(new BodyTooLargeError(), noopLogger);
    expect(res.status).toBe(413);
    const body = z
      .object({
        error: z.object({ code: z.string(), message: z.string(), details: z.unknown() }),
        requestId: z.string(),
      })
      .parse(await res.json());
    expect(body.error).toEqual({
      code: "PAYLOAD_TOO_LARGE",
      message: "Request body too large",
      details: { limitBytes: MAX_BODY_BYTES },
    });
  });

  it("hides other bridge errors behind a 500", async () => {
    const res = bridgeErrorResponse(new Error("socket reset"), noopLogger);
    expect(res.status).toBe(500);
    const body = z
      .object({ error: z.object({ code: z.string(), message: z.string() }) })
      .parse(await res.json());
    expect(body.error).toEqual({ code: "INTERNAL", message: "Internal server error" });
  });
});
