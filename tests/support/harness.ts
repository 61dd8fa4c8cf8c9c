import type { CreateUserDto } from "../../src/application/dtos/admin.dto.js";
import { createAdminService } from "../../src/application/services/admin.service.js";
import { createAnalyticsService } from "../../src/application/services/analytics.service.js";
import { createAuditTrail } from "../../src/application/services/audit-trail.js";
import { createAuthService } from "../../src/application/services/auth.service.js";
import { createHealthService } from "../../src/application/services/health.service.js";
import { createMfaService } from "../../src/application/services/mfa.service.js";
import { createReadingService } from "../../src/application/services/reading.service.js";
import type { UserProfile, UserRole } from "../../src/core/entities/user.entity.js";
import type { Session } from "../../src/core/ports/session-store.js";
import type { QrRenderer } from "../../src/core/ports/totp-service.js";
import { ok } from "../../src/core/types/result.js";
import { createInMemoryCache } from "../../src/infrastructure/cache/in-memory-cache.js";
import { createInMemoryAuditLog } from "../../src/infrastructure/database/in-memory-audit-log.js";
import { createInMemoryReadingRepository } from "../../src/infrastructure/database/in-memory-reading.repository.js";
import { createInMemoryUserRepository } from "../../src/infrastructure/database/in-memory-user.repository.js";
import { noopLogger } from "../../src/infrastructure/logging/logger.js";
import { createPasswordHasher } from "../../src/infrastructure/security/password-hasher.js";
import { createSessionStore } from "../../src/infrastructure/security/session-store.js";
import { createTotpService } from "../../src/infrastructure/security/totp-service.js";

export const SESSION_TTL_MS = 60 * 60 * 1000;
export const PENDING_TTL_MS = 10 * 60 * 1000;
export const TEST_PASSWORD = "test-password";

/** Renders the text itself, base64'd, so tests can read the URI back */
export const fakeQr: QrRenderer = {
  toDataUri: async (text) => ok(`data:image/png;base64,${Buffer.from(text).toString("base64")}`),
};

/**
 * Every service wired over in-memory adapters and a controllable clock.
 */
export const createHarness = (startIso = "2024-03-15T12:00:00Z") => {
  let now = Date.parse(startIso);
  const clock = (): number => now;
  const logger = noopLogger;

  const userRepo = createInMemoryUserRepository(clock);
  const readingRepo = createInMemoryReadingRepository();
  const auditLog = createInMemoryAuditLog(clock);
  const passwordHasher = createPasswordHasher({ iterations: 1_000 });
  const sessionCache = createInMemoryCache<Session>({ clock });
  const pendingSecrets = createInMemoryCache<string>({ clock });
  const sessions = createSessionStore({ cache: sessionCache, ttlMs: SESSION_TTL_MS, clock });
  const totp = createTotpService();
  const audit = createAuditTrail(auditLog, logger);

  const mfaService = createMfaService({
    userRepo,
    totp,
    qr: fakeQr,
    pendingSecrets,
    pendingTtlMs: PENDING_TTL_MS,
    issuer: "Lixeira Inteligente",
    audit,
    logger,
    clock,
  });
  const authService = createAuthService({
    userRepo,
    passwordHasher,
    sessions,
    mfa: mfaService,
    audit,
    logger,
    clock,
  });
  const readingService = createReadingService({ readingRepo, audit, logger, clock });
  const analyticsService = createAnalyticsService({ readingRepo, audit, logger, clock });
  const adminService = createAdminService({ userRepo, passwordHasher, auditLog, audit, logger });
  const healthService = createHealthService({ logger, version: "test" });

  const seedUser = async (username: string, role: UserRole): Promise<UserProfile> => {
    const dto: CreateUserDto = {
      username,
      password: TEST_PASSWORD,
      name: `User ${username}`,
      role,
      email: null,
    };
    const created = await adminService.createUser(dto, "system");
    if (!created.ok) throw new Error(`seed failed: ${created.error.message}`);
    return created.value;
  };

  /** The TOTP code valid right now for `secret` */
  const codeFor = (secret: string, offsetSeconds = 0): string => {
    const code = totp.codeAt(secret, Math.floor(now / 1000) + offsetSeconds);
    if (!code.ok) throw new Error(code.error.message);
    return code.value;
  };

  /** Provision and activate two-factor for a user; returns the secret */
  const enrolMfa = async (username: string): Promise<string> => {
    const provisioned = await mfaService.provision(username);
    if (!provisioned.ok) throw new Error(provisioned.error.message);
    const activated = await mfaService.activate(username, codeFor(provisioned.value.secret));
    if (!activated.ok) throw new Error(activated.error.message);
    return provisioned.value.secret;
  };

  return {
    clock,
    advance: (ms: number): void => {
      now += ms;
    },
    logger,
    userRepo,
    readingRepo,
    auditLog,
    passwordHasher,
    sessionCache,
    pendingSecrets,
    sessions,
    totp,
    audit,
    mfaService,
    authService,
    readingService,
    analyticsService,
    adminService,
    healthService,
    seedUser,
    codeFor,
    enrolMfa,
  };
};

export type Harness = ReturnType<typeof createHarness>;
