import { z } from "zod";
import { printConfigError } from "../../shared/cli.js";

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

/**
 * Application config: validated at boot via Zod.
 * Fails fast with clear messages if env vars are missing or malformed.
 */
const configSchema = z.object({
  env: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().int().min(1).max(65535).default(5000),
  host: z.string().min(1).default("0.0.0.0"),

  cors: z.object({
    origins: z
      .string()
      .default("*")
      .transform((s) => s.split(",").map((o) => o.trim())),
  }),

  log: z.object({
    level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
    format: z.enum(["pretty", "json"]).default("pretty"),
  }),

  mongo: z.object({
    /** Absent → in-memory storage */
    uri: z
      .string()
      .regex(/^mongodb(\+srv)?:\/\//, "must be a mongodb:// or mongodb+srv:// URI")
      .optional(),
    database: z.string().min(1).default("lixeira_inteligente"),
  }),

  session: z.object({
    ttlMs: z.coerce.number().int().positive().default(8 * 60 * 60 * 1000),
  }),

  mfa: z.object({
    issuer: z.string().min(1).default("Lixeira Inteligente"),
    pendingTtlMs: z.coerce.number().int().positive().default(10 * 60 * 1000),
  }),

  ingest: z.object({
    apiKey: z.string().min(8).optional(),
  }),

  admin: z.object({
    bootstrapPassword: z.string().min(8).optional(),
  }),

  feed: z
    .object({
      enabled: flag("false"),
      baseUrl: z.string().url().default("https://api.thingspeak.com/channels"),
      channelId: z.string().min(1).optional(),
      apiKey: z.string().min(1).optional(),
      intervalMs: z.coerce.number().int().min(1000).default(60_000),
      timeoutMs: z.coerce.number().int().positive().default(10_000),
      sensorId: z.string().min(1).default("esp32-lixeira-001"),
      location: z.string().min(1).default("entrada"),
    })
    .refine((f) => !f.enabled || f.channelId !== undefined, {
      message: "FEED_CHANNEL_ID is required when FEED_ENABLED=true",
      path: ["channelId"],
    }),
});

export type AppConfig = z.infer<typeof configSchema>;

export type Env = Readonly<Record<string, string | undefined>>;

/** Map raw environment variables onto the schema shape and validate */
export const parseConfig = (env: Env) => {
  // Blank values (KEY= in an env file) count as unset
  const read = (key: string): string | undefined => {
    const value = env[key];
    return value === undefined || value.trim() === "" ? undefined : value;
  };

  return configSchema.safeParse({
    env: read("NODE_ENV"),
    port: read("PORT"),
    host: read("HOST"),
    cors: {
      origins: read("CORS_ORIGINS"),
    },
    log: {
      level: read("LOG_LEVEL"),
      format: read("LOG_FORMAT"),
    },
    mongo: {
      uri: read("MONGODB_URI"),
      database: read("MONGODB_DB"),
    },
    session: {
      ttlMs: read("SESSION_TTL_MS"),
    },
    mfa: {
      issuer: read("MFA_ISSUER"),
      pendingTtlMs: read("MFA_PENDING_TTL_MS"),
    },
    ingest: {
      apiKey: read("INGEST_API_KEY"),
    },
    admin: {
      bootstrapPassword: read("ADMIN_BOOTSTRAP_PASSWORD"),
    },
    feed: {
      enabled: read("FEED_ENABLED"),
      baseUrl: read("FEED_BASE_URL"),
      channelId: read("FEED_CHANNEL_ID"),
      apiKey: read("FEED_API_KEY"),
      intervalMs: read("FEED_INTERVAL_MS"),
      timeoutMs: read("FEED_TIMEOUT_MS"),
      sensorId: read("FEED_SENSOR_ID"),
      location: read("FEED_LOCATION"),
    },
  });
};

/** Group zod issues by dotted path, e.g. `feed.channelId` */
export const configIssues = (error: z.ZodError): Record<string, string[]> => {
  const issues: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const key = issue.path.join(".") || "(root)";
    (issues[key] ??= []).push(issue.message);
  }
  return issues;
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const result = parseConfig(env);

  if (!result.success) {
    printConfigError(configIssues(result.error));
    process.exit(1);
  }

  return result.data;
};
