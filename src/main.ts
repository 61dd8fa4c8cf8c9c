import { createAdminService } from "./application/services/admin.service.js";
import { createAnalyticsService } from "./application/services/analytics.service.js";
import { createAuditTrail } from "./application/services/audit-trail.js";
import { createAuthService } from "./application/services/auth.service.js";
import { type FeedSyncService, createFeedSyncService } from "./application/services/feed-sync.service.js";
import { type HealthProbe, createHealthService } from "./application/services/health.service.js";
import { createMfaService } from "./application/services/mfa.service.js";
import { createReadingService } from "./application/services/reading.service.js";
import type { Session } from "./core/ports/session-store.js";
import { createInMemoryCache } from "./infrastructure/cache/in-memory-cache.js";
import { loadConfig } from "./infrastructure/config/config.js";
import { createInMemoryAuditLog } from "./infrastructure/database/in-memory-audit-log.js";
import { createInMemoryReadingRepository } from "./infrastructure/database/in-memory-reading.repository.js";
import { createInMemoryUserRepository } from "./infrastructure/database/in-memory-user.repository.js";
import { type MongoConnection, connectMongo } from "./infrastructure/database/mongo/client.js";
import { createMongoAuditLog } from "./infrastructure/database/mongo/mongo-audit-log.js";
import { createMongoReadingRepository } from "./infrastructure/database/mongo/mongo-reading.repository.js";
import { createMongoUserRepository } from "./infrastructure/database/mongo/mongo-user.repository.js";
import { createThingSpeakFeed } from "./infrastructure/feeds/thingspeak.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { createPasswordHasher } from "./infrastructure/security/password-hasher.js";
import { createQrRenderer } from "./infrastructure/security/qr-renderer.js";
import { createSessionStore } from "./infrastructure/security/session-store.js";
import { createTotpService } from "./infrastructure/security/totp-service.js";
import { createRouter } from "./presentation/routes/router.js";
import { createServer } from "./presentation/server.js";
import { printShutdown, printStartupBanner } from "./shared/cli.js";

const VERSION = "1.0.0";
const PRUNE_INTERVAL_MS = 10 * 60 * 1000;

/**
 * Bootstrap: compose the dependency graph, then start the server.
 * Single entry point, fail-fast on misconfiguration.
 */
const bootstrap = async () => {
  const bootStart = performance.now();

  // 1. Config (validated, fails fast)
  const config = loadConfig();

  // 2. Infrastructure
  const logger = createLogger({ level: config.log.level, format: config.log.format });
  const passwordHasher = createPasswordHasher();

  // 3. Storage: MongoDB when configured, in-memory otherwise
  let mongo: MongoConnection | null = null;
  if (config.mongo.uri !== undefined) {
    const connected = await connectMongo({
      uri: config.mongo.uri,
      database: config.mongo.database,
      logger,
    });
    if (!connected.ok) {
      logger.fatal("Could not connect to MongoDB", { message: connected.error.message });
      process.exit(1);
    }
    mongo = connected.value;
  } else {
    logger.warn("MONGODB_URI not set; using in-memory storage, data is lost on restart");
  }

  const userRepo = mongo ? createMongoUserRepository(mongo.db) : createInMemoryUserRepository();
  const readingRepo = mongo
    ? createMongoReadingRepository(mongo.db)
    : createInMemoryReadingRepository();
  const auditLog = mongo
    ? createMongoAuditLog({ db: mongo.db, logger: logger.child({ component: "audit" }) })
    : createInMemoryAuditLog();

  // 4. Ephemeral state: sessions and pending TOTP secrets
  const sessionCache = createInMemoryCache<Session>({ defaultTtlMs: config.session.ttlMs });
  const pendingSecrets = createInMemoryCache<string>({ defaultTtlMs: config.mfa.pendingTtlMs });
  const sessions = createSessionStore({ cache: sessionCache, ttlMs: config.session.ttlMs });

  // 5. Application services
  const audit = createAuditTrail(auditLog, logger);
  const mfaService = createMfaService({
    userRepo,
    totp: createTotpService(),
    qr: createQrRenderer(),
    pendingSecrets,
    pendingTtlMs: config.mfa.pendingTtlMs,
    issuer: config.mfa.issuer,
    audit,
    logger,
  });
  const authService = createAuthService({
    userRepo,
    passwordHasher,
    sessions,
    mfa: mfaService,
    audit,
    logger,
  });
  const readingService = createReadingService({ readingRepo, audit, logger });
  const analyticsService = createAnalyticsService({ readingRepo, audit, logger });
  const adminService = createAdminService({ userRepo, passwordHasher, auditLog, audit, logger });

  const probes: HealthProbe[] = [];
  if (mongo) {
    const conn = mongo;
    probes.push({ name: "mongodb", check: () => conn.ping() });
  }
  const healthService = createHealthService({
    logger: logger.child({ service: "health" }),
    version: VERSION,
    probes,
  });

  // 6. Bootstrap admin account
  if (config.admin.bootstrapPassword !== undefined) {
    const created = await adminService.bootstrapAdmin(config.admin.bootstrapPassword);
    if (!created.ok) {
      logger.error("Could not bootstrap admin account", { message: created.error.message });
    }
  }

  // 7. Presentation
  const router = createRouter({
    authService,
    mfaService,
    readingService,
    analyticsService,
    adminService,
    healthService,
    ingestApiKey: config.ingest.apiKey,
    logger,
  });
  const server = createServer({ config, logger, router });
  await server.listen();

  // 8. Feed poller
  let feedSync: FeedSyncService | null = null;
  if (config.feed.enabled && config.feed.channelId !== undefined) {
    feedSync = createFeedSyncService({
      source: createThingSpeakFeed({
        baseUrl: config.feed.baseUrl,
        channelId: config.feed.channelId,
        apiKey: config.feed.apiKey,
        timeoutMs: config.feed.timeoutMs,
        logger,
      }),
      readingRepo,
      audit,
      logger,
      sensorId: config.feed.sensorId,
      location: config.feed.location,
      intervalMs: config.feed.intervalMs,
    });
    feedSync.start();
  }

  printStartupBanner({
    config,
    bootTimeMs: performance.now() - bootStart,
    storage: mongo ? "mongodb" : "memory",
  });

  // 9. Periodic sweep of expired sessions and pending secrets
  const pruneInterval = setInterval(() => {
    Promise.all([sessionCache.prune(), pendingSecrets.prune()])
      .then(([s, p]) => {
        const count = (s.ok ? s.value : 0) + (p.ok ? p.value : 0);
        if (count > 0) logger.debug("Pruned expired cache entries", { count });
      })
      .catch((e: unknown) => logger.error("Cache prune failed", { error: e }));
  }, PRUNE_INTERVAL_MS);
  pruneInterval.unref();

  // 10. Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    printShutdown(signal);
    clearInterval(pruneInterval);
    feedSync?.stop();
    await server.close();
    await Promise.all([sessionCache.close(), pendingSecrets.close()]);
    if (mongo) await mongo.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((e: unknown) => {
      logger.fatal("Shutdown failed", { error: e });
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  // 11. Unhandled rejection safety net
  process.on("unhandledRejection", (reason) => {
    logger.fatal("Unhandled promise rejection", {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });
};

bootstrap().catch((e: unknown) => {
  process.stderr.write(`Fatal boot error: ${e instanceof Error ? e.message : String(e)}\n`);
  process.exit(1);
});
