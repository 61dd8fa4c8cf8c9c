import type { LogLevel } from "../core/ports/logger.js";

// ── ANSI escape sequences ──────────────────────────────────────────────

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc("0");

const bold = (s: string) => `${esc("1")}${s}${reset}`;
const dim = (s: string) => `${esc("2")}${s}${reset}`;

const cyan = (s: string) => `${esc("36")}${s}${reset}`;
const green = (s: string) => `${esc("32")}${s}${reset}`;
const yellow = (s: string) => `${esc("33")}${s}${reset}`;
const red = (s: string) => `${esc("31")}${s}${reset}`;
const gray = (s: string) => `${esc("90")}${s}${reset}`;
const white = (s: string) => `${esc("97")}${s}${reset}`;

const bgGreen = (s: string) => `${esc("42")}${esc("30")} ${s} ${reset}`;
const bgCyan = (s: string) => `${esc("46")}${esc("30")} ${s} ${reset}`;
const bgYellow = (s: string) => `${esc("43")}${esc("30")} ${s} ${reset}`;
const bgRed = (s: string) => `${esc("41")}${esc("97")} ${s} ${reset}`;

// ── Helpers ─────────────────────────────────────────────────────────────

/** HH:MM:SS.mmm in UTC, matching stored timestamps */
const clockTime = (): string => new Date().toISOString().slice(11, 23);

const levelBadge = (level: LogLevel): string => {
  switch (level) {
    case "debug":
      return gray("DBG");
    case "info":
      return green("INF");
    case "warn":
      return yellow("WRN");
    case "error":
      return red("ERR");
    case "fatal":
      return bgRed("FTL");
  }
};

const methodBadge = (method: string): string => {
  switch (method) {
    case "GET":
      return bgGreen("GET");
    case "POST":
      return bgCyan("POST");
    case "PATCH":
    case "PUT":
      return bgYellow(method);
    case "DELETE":
      return bgRed("DEL");
    case "OPTIONS":
      return gray("OPT");
    default:
      return white(method);
  }
};

const statusColor = (status: number): string => {
  if (status < 300) return bold(green(String(status)));
  if (status < 400) return bold(cyan(String(status)));
  if (status < 500) return bold(yellow(String(status)));
  return bold(red(String(status)));
};

const durationColor = (ms: number): string => {
  if (ms < 50) return green(`${ms}ms`);
  if (ms < 200) return yellow(`${ms}ms`);
  return red(`${ms}ms`);
};

const renderValue = (v: unknown): string =>
  typeof v === "object" && v !== null ? JSON.stringify(v) : String(v);

const formatMeta = (meta: Record<string, unknown>): string => {
  const entries = Object.entries(meta).filter(([, v]) => v !== undefined);
  if (entries.length === 0) return "";
  const parts = entries.map(([k, v]) => `${dim(k)}${dim("=")}${white(renderValue(v))}`);
  return ` ${parts.join(" ")}`;
};

// ── Public formatters ───────────────────────────────────────────────────

/**
 * Format a structured log entry (used by the Logger port).
 *
 *   INF 12:34:56.789 Reading stored  sensorId=esp32-lixeira-001
 */
export const formatLogEntry = (
  level: LogLevel,
  msg: string,
  meta: Record<string, unknown>,
): string => {
  const ts = dim(gray(clockTime()));
  return `  ${levelBadge(level)} ${ts} ${white(msg)}${formatMeta(meta)}\n`;
};

/**
 * Format an HTTP access log line.
 *
 *   ← GET 200 /health 0.34ms  ip=127.0.0.1 rid=abc12345
 */
export const formatAccessLog = (
  method: string,
  path: string,
  status: number,
  durationMs: number,
  ip: string,
  requestId: string,
): string => {
  const ts = dim(gray(clockTime()));
  const meta = dim(gray(`ip=${ip} rid=${requestId.slice(0, 8)}`));
  return `  ${dim("←")} ${ts} ${methodBadge(method)} ${statusColor(status)} ${white(path)} ${durationColor(durationMs)}  ${meta}\n`;
};
