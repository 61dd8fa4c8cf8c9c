import type { LogLevel, Logger } from "../../core/ports/logger.js";
import { formatLogEntry } from "../../shared/log-format.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export type LogFormat = "pretty" | "json";

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly format?: LogFormat;
  readonly bindings?: Record<string, unknown>;
}

/** Error instances don't survive JSON.stringify; flatten them to name/message */
const serialiseValue = (value: unknown): unknown =>
  value instanceof Error ? { name: value.name, message: value.message } : value;

const serialiseMeta = (meta: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(meta).map(([k, v]) => [k, serialiseValue(v)]));

/**
 * Format a log entry as one JSON line for log aggregators.
 */
const formatJsonEntry = (level: LogLevel, msg: string, meta: Record<string, unknown>): string => {
  const entry: Record<string, unknown> = {
    level,
    msg,
    time: new Date().toISOString(),
    ...serialiseMeta(meta),
  };
  return `${JSON.stringify(entry)}\n`;
};

const formatPrettyEntry = (level: LogLevel, msg: string, meta: Record<string, unknown>): string =>
  formatLogEntry(level, msg, serialiseMeta(meta));

/**
 * Logger: zero dependencies.
 * - "pretty": ANSI-coloured human-readable output (development)
 * - "json": structured JSON lines (production)
 * warn and above go to stderr, the rest to stdout.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const level = options.level ?? "info";
  const format = options.format ?? "pretty";
  const bindings = options.bindings ?? {};
  const minPriority = LEVEL_PRIORITY[level];

  const formatter = format === "json" ? formatJsonEntry : formatPrettyEntry;

  const write = (entryLevel: LogLevel, msg: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[entryLevel] < minPriority) return;

    const line = formatter(entryLevel, msg, { ...bindings, ...meta });

    if (LEVEL_PRIORITY[entryLevel] >= LEVEL_PRIORITY.warn) {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    fatal: (msg, meta) => write("fatal", msg, meta),
    child: (extra) => createLogger({ level, format, bindings: { ...bindings, ...extra } }),
  };
};

/** Discards everything; for tests and tooling */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => noopLogger,
};
