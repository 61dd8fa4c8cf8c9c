import { beforeEach, describe, expect, it } from "vitest";
import { ErrorCode, ErrorReason } from "../../src/core/errors/app-error.js";
import { AuditAction, AuditStatus } from "../../src/core/ports/audit-log.js";
import { brand } from "../../src/core/types/brand.js";
import { type Harness, SESSION_TTL_MS, TEST_PASSWORD, createHarness } from "../support/harness.js";

describe("AuthService", () => {
  let h: Harness;

  beforeEach(async () => {
    h = createHarness("2024-03-15T12:00:00Z");
    await h.seedUser("ana", "gestor");
  });

  const login = async (username = "ana", password = TEST_PASSWORD) => {
    const result = await h.authService.authenticate({ username, password });
    if (!result.ok) throw new Error(result.error.message);
    return result.value;
  };

  describe("authenticate", () => {
    it("rejects an unknown user and audits the attempt", async () => {
      const result = await h.authService.authenticate({ username: "ghost", password: "x" });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.UNAUTHORIZED);
        expect(result.error.reason).toBe(ErrorReason.USER_NOT_FOUND);
      }

      const logs = await h.auditLog.query({ username: "ghost" });
      expect(logs.ok && logs.value.map((e) => [e.action, e.status])).toEqual([
        [AuditAction.LOGIN, AuditStatus.ERROR],
      ]);
    });

    it("rejects a wrong password", async () => {
      const result = await h.authService.authenticate({ username: "ana", password: "nope-nope" });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.reason).toBe(ErrorReason.WRONG_PASSWORD);
    });

    it("rejects a deactivated account before checking the password", async () => {
      await h.userRepo.update("ana", { active: false });
      const result = await h.authService.authenticate({ username: "ana", password: "nope-nope" });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.reason).toBe(ErrorReason.USER_DISABLED);
    });

    it("opens a full session and stamps the last login", async () => {
      const response = await login();
      expect(response.mfaRequired).toBe(false);
      expect(response.token).toMatch(/^[A-Za-z0-9_-]{43}$/);
      expect(response.user.lastLoginAt).toBe("2024-03-15T12:00:00.000Z");
      expect(response.user).not.toHaveProperty("passwordHash");

      const resolved = await h.authService.resolveSession(response.token);
      expect(resolved).toEqual({
        ok: true,
        value: { token: response.token, username: "ana", role: "gestor", mfaPending: false },
      });
    });
  });

  describe("resolveSession", () => {
    it("rejects an unknown token", async () => {
      const result = await h.authService.resolveSession(brand<string, "SessionToken">("nope"));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.reason).toBe(ErrorReason.INVALID_SESSION);
    });

    it("expires sessions after their TTL", async () => {
      const { token } = await login();
      h.advance(SESSION_TTL_MS);
      const result = await h.authService.resolveSession(token);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.reason).toBe(ErrorReason.INVALID_SESSION);
    });

    it("picks up role changes on the next request", async () => {
      const { token } = await login();
      await h.userRepo.update("ana", { role: "usuario" });
      const result = await h.authService.resolveSession(token);
      expect(result.ok && result.value.role).toBe("usuario");
    });

    it("drops sessions of deactivated users", async () => {
      const { token } = await login();
      await h.userRepo.update("ana", { active: false });

      const result = await h.authService.resolveSession(token);
      expect(result.ok).toBe(false);
      expect(await h.sessions.get(token)).toEqual({ ok: true, value: null });
    });

    it("drops sessions of deleted users", async () => {
      const { token } = await login();
      await h.userRepo.delete("ana");
      const result = await h.authService.resolveSession(token);
      expect(result.ok).toBe(false);
    });
  });

  describe("two-factor login", () => {
    let secret: string;

    beforeEach(async () => {
      secret = await h.enrolMfa("ana");
    });

    it("keeps the session pending until a code is verified", async () => {
      const response = await login();
      expect(response.mfaRequired).toBe(true);

      const pending = await h.authService.resolveSession(response.token);
      expect(pending.ok && pending.value.mfaPending).toBe(true);

      if (!pending.ok) return;
      const completed = await h.authService.completeMfa(pending.value, h.codeFor(secret));
      expect(completed.ok && completed.value.username).toBe("ana");

      const promoted = await h.authService.resolveSession(response.token);
      expect(promoted.ok && promoted.value.mfaPending).toBe(false);
    });

    it("rejects a wrong code and stays pending", async () => {
      const response = await login();
      const pending = await h.authService.resolveSession(response.token);
      if (!pending.ok) throw new Error("session missing");

      const completed = await h.authService.completeMfa(pending.value, h.codeFor(secret, 3600));
      expect(completed.ok).toBe(false);
      if (!completed.ok) {
        expect(completed.error.code).toBe(ErrorCode.MFA);
        expect(completed.error.reason).toBe(ErrorReason.INVALID_CODE);
      }

      const still = await h.authService.resolveSession(response.token);
      expect(still.ok && still.value.mfaPending).toBe(true);
    });

    it("keeps the login expiry after the code is verified", async () => {
      const response = await login();
      const pending = await h.authService.resolveSession(response.token);
      if (!pending.ok) throw new Error("session missing");

      h.advance(SESSION_TTL_MS / 2);
      const completed = await h.authService.completeMfa(pending.value, h.codeFor(secret));
      expect(completed.ok).toBe(true);

      h.advance(SESSION_TTL_MS / 2);
      const expired = await h.authService.resolveSession(response.token);
      expect(expired.ok).toBe(false);
      if (!expired.ok) expect(expired.error.reason).toBe(ErrorReason.INVALID_SESSION);
    });

    it("refuses to complete a session that is not pending", async () => {
      const completed = await h.authService.completeMfa(
        { token: brand<string, "SessionToken">("t"), username: "ana", role: "gestor", mfaPending: false },
        h.codeFor(secret),
      );
      expect(completed.ok).toBe(false);
      if (!completed.ok) expect(completed.error.reason).toBe(ErrorReason.MFA_NOT_REQUIRED);
    });
  });

  describe("logout", () => {
    it("invalidates the token and audits it", async () => {
      const { token } = await login();
      const auth = await h.authService.resolveSession(token);
      if (!auth.ok) throw new Error("session missing");

      expect(await h.authService.logout(auth.value)).toEqual({ ok: true, value: undefined });
      expect((await h.authService.resolveSession(token)).ok).toBe(false);

      const logs = await h.auditLog.query({ username: "ana", limit: 1 });
      expect(logs.ok && logs.value[0]?.action).toBe(AuditAction.LOGOUT);
    });
  });
});
