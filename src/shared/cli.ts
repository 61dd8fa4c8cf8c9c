import type { AppConfig } from "../infrastructure/config/config.js";
import { networkInterfaces } from "node:os";

// ── ANSI escape sequences (zero dependencies) ──────────────────────────

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc("0");

const bold = (s: string) => `${esc("1")}${s}${reset}`;
const dim = (s: string) => `${esc("2")}${s}${reset}`;

const cyan = (s: string) => `${esc("36")}${s}${reset}`;
const green = (s: string) => `${esc("32")}${s}${reset}`;
const yellow = (s: string) => `${esc("33")}${s}${reset}`;
const magenta = (s: string) => `${esc("35")}${s}${reset}`;
const red = (s: string) => `${esc("31")}${s}${reset}`;
const gray = (s: string) => `${esc("90")}${s}${reset}`;
const white = (s: string) => `${esc("97")}${s}${reset}`;

const bgCyan = (s: string) => `${esc("46")}${esc("30")} ${s} ${reset}`;
const bgGreen = (s: string) => `${esc("42")}${esc("30")} ${s} ${reset}`;
const bgYellow = (s: string) => `${esc("43")}${esc("30")} ${s} ${reset}`;
const bgMagenta = (s: string) => `${esc("45")}${esc("97")} ${s} ${reset}`;

// ── Helpers ─────────────────────────────────────────────────────────────

const pad = (s: string, len: number): string => s.padEnd(len);

const formatUptime = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
};

const envBadge = (env: string): string => {
  switch (env) {
    case "production":
      return bgGreen("PRODUCTION");
    case "development":
      return bgCyan("DEVELOPMENT");
    case "test":
      return bgYellow("TEST");
    default:
      return bgMagenta(env.toUpperCase());
  }
};

const methodColor = (method: string): string => {
  switch (method) {
    case "GET":
      return green(bold(pad(method, 7)));
    case "POST":
      return cyan(bold(pad(method, 7)));
    case "PATCH":
      return yellow(bold(pad(method, 7)));
    case "PUT":
      return yellow(bold(pad(method, 7)));
    case "DELETE":
      return red(bold(pad(method, 7)));
    default:
      return white(bold(pad(method, 7)));
  }
};

// ── Route table ─────────────────────────────────────────────────────────

interface RouteInfo {
  readonly method: string;
  readonly path: string;
  readonly guard: string;
}

const routes: readonly RouteInfo[] = [
  { method: "GET", path: "/health", guard: "public" },
  { method: "GET", path: "/readiness", guard: "public" },
  { method: "POST", path: "/api/v1/auth/login", guard: "public" },
  { method: "POST", path: "/api/v1/auth/mfa/verify", guard: "session" },
  { method: "POST", path: "/api/v1/auth/logout", guard: "session" },
  { method: "GET", path: "/api/v1/auth/me", guard: "session" },
  { method: "POST", path: "/api/v1/mfa/setup", guard: "session" },
  { method: "POST", path: "/api/v1/mfa/activate", guard: "session" },
  { method: "POST", path: "/api/v1/mfa/disable", guard: "session" },
  { method: "POST", path: "/api/v1/readings", guard: "device" },
  { method: "GET", path: "/api/v1/readings", guard: "read" },
  { method: "GET", path: "/api/v1/readings/stats", guard: "read" },
  { method: "GET", path: "/api/v1/sensors", guard: "read" },
  { method: "GET", path: "/api/v1/analytics/summary", guard: "analyze" },
  { method: "GET", path: "/api/v1/analytics/patterns", guard: "analyze" },
  { method: "GET", path: "/api/v1/analytics/forecast", guard: "analyze" },
  { method: "GET", path: "/api/v1/analytics/anomalies", guard: "analyze" },
  { method: "GET", path: "/api/v1/analytics/comparison", guard: "analyze" },
  { method: "GET", path: "/api/v1/reports/executive", guard: "analyze" },
  { method: "GET", path: "/api/v1/reports/csv", guard: "export" },
  { method: "POST", path: "/api/v1/admin/users", guard: "create" },
  { method: "GET", path: "/api/v1/admin/users", guard: "update" },
  { method: "PATCH", path: "/api/v1/admin/users/:username", guard: "update" },
  { method: "PUT", path: "/api/v1/admin/users/:username/password", guard: "update" },
  { method: "DELETE", path: "/api/v1/admin/users/:username", guard: "delete" },
  { method: "GET", path: "/api/v1/audit/logs", guard: "admin" },
];

// ── ASCII Logo ──────────────────────────────────────────────────────────

const logo = (): string => {
  const lines = [
    `${bold(cyan("  ┌─────────────────────────────────────────┐"))}`,
    `${bold(cyan("  │"))}                                         ${bold(cyan("│"))}`,
    `${bold(cyan("  │"))}   ${bold(white("♻ smart-bin-api"))}  ${dim(gray("v1.0.0"))}               ${bold(cyan("│"))}`,
    `${bold(cyan("  │"))}   ${dim(gray("Waste-bin telemetry and analytics"))}     ${bold(cyan("│"))}`,
    `${bold(cyan("  │"))}                                         ${bold(cyan("│"))}`,
    `${bold(cyan("  └─────────────────────────────────────────┘"))}`,
  ];
  return lines.join("\n");
};

// ── Public API ──────────────────────────────────────────────────────────

interface StartupInfo {
  readonly config: AppConfig;
  readonly bootTimeMs: number;
  readonly storage: "mongodb" | "memory";
}

/**
 * Prints the startup banner to stdout.
 * Called once after the server is listening.
 */
export const printStartupBanner = (info: StartupInfo): void => {
  const { config, bootTimeMs } = info;

  const localUrl = `http://localhost:${config.port}`;
  const networkUrl = `http://${config.host === "0.0.0.0" ? getLocalIp() : config.host}:${config.port}`;

  const lines: string[] = [];

  lines.push("");
  lines.push(logo());
  lines.push("");

  lines.push(`  ${envBadge(config.env)}  ${dim("booted in")} ${bold(green(formatUptime(bootTimeMs)))}`);
  lines.push("");

  lines.push(`  ${bold(white("→"))} ${dim("Local:")}    ${bold(cyan(localUrl))}`);
  if (config.host === "0.0.0.0") {
    lines.push(`  ${bold(white("→"))} ${dim("Network:")}  ${bold(cyan(networkUrl))}`);
  }
  lines.push("");

  const storage = info.storage === "mongodb" ? green(`mongodb/${config.mongo.database}`) : yellow("in-memory");
  const feed = config.feed.enabled
    ? green(`channel ${config.feed.channelId ?? "?"} every ${config.feed.intervalMs / 1000}s`)
    : dim("disabled");

  lines.push(`  ${gray("├─")} ${dim("PID")}           ${white(String(process.pid))}`);
  lines.push(`  ${gray("├─")} ${dim("Runtime")}       ${magenta(`Node ${process.version}`)}`);
  lines.push(`  ${gray("├─")} ${dim("Storage")}       ${storage}`);
  lines.push(`  ${gray("├─")} ${dim("Feed sync")}     ${feed}`);
  lines.push(`  ${gray("├─")} ${dim("Device key")}    ${config.ingest.apiKey ? green("required") : yellow("open")}`);
  lines.push(`  ${gray("└─")} ${dim("Log level")}     ${white(config.log.level)}`);
  lines.push("");

  lines.push(`  ${bold(white("Routes"))} ${dim(`(${routes.length})`)}`);
  lines.push(`  ${gray("─".repeat(72))}`);

  for (const route of routes) {
    const lock = route.guard === "public" ? green("  ") : yellow("🔒");
    lines.push(`  ${lock} ${methodColor(route.method)} ${pad(route.path, 42)} ${dim(gray(route.guard))}`);
  }

  lines.push(`  ${gray("─".repeat(72))}`);
  lines.push("");
  lines.push(`  ${dim("press")} ${bold(white("Ctrl+C"))} ${dim("to stop")}`);
  lines.push("");

  process.stdout.write(lines.join("\n") + "\n");
};

/**
 * Prints a clean shutdown message.
 */
export const printShutdown = (signal: string): void => {
  process.stdout.write(
    `\n  ${yellow("⏻")} ${dim("Received")} ${bold(white(signal))}${dim(", shutting down gracefully…")}\n\n`
  );
};

/**
 * Prints config validation errors, one line per field message.
 */
export const printConfigError = (errors: Record<string, string[]>): void => {
  const lines: string[] = [];

  lines.push("");
  lines.push(`  ${bgMagenta("CONFIG ERROR")}  ${dim("Invalid configuration detected")}`);
  lines.push("");

  for (const [field, messages] of Object.entries(errors)) {
    for (const msg of messages) {
      lines.push(`  ${red("✗")} ${bold(white(field))} ${dim("→")} ${red(msg)}`);
    }
  }

  lines.push("");
  lines.push(`  ${dim("Hint: see .env.example for every supported variable")}`);
  lines.push("");

  process.stderr.write(lines.join("\n") + "\n");
};

// ── Utilities ───────────────────────────────────────────────────────────

const getLocalIp = (): string => {
  const nets = networkInterfaces();
  for (const addresses of Object.values(nets)) {
    for (const net of addresses ?? []) {
      if (net.family === "IPv4" && !net.internal) return net.address;
    }
  }
  return "0.0.0.0";
};
