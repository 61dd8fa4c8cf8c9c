import type { AppConfig } from "../../infrastructure/config/config.js";

const ALLOWED_METHODS = "GET, POST, PUT, PATCH, DELETE, OPTIONS";
const ALLOWED_HEADERS = "Content-Type, Authorization, X-Request-Id, X-Api-Key";

type CorsConfig = Pick<AppConfig, "cors">;

export const isOriginAllowed = (config: CorsConfig, origin: string): boolean =>
  config.cors.origins.includes("*") || config.cors.origins.includes(origin);

/**
 * CORS headers for a request origin.
 * Empty when there is no Origin header; null when the origin is rejected.
 */
export const corsHeaders = (
  config: CorsConfig,
  requestOrigin: string | null,
): Record<string, string> | null => {
  if (requestOrigin === null) return {};
  if (!isOriginAllowed(config, requestOrigin)) return null;

  return {
    "Access-Control-Allow-Origin": requestOrigin,
    "Access-Control-Allow-Credentials": "true",
    "Access-Control-Allow-Methods": ALLOWED_METHODS,
    "Access-Control-Allow-Headers": ALLOWED_HEADERS,
    "Access-Control-Max-Age": "86400",
    Vary: "Origin",
  };
};

/** Returns a 204 preflight response or null if not a preflight */
export const handlePreflight = (config: CorsConfig, req: Request): Response | null => {
  if (req.method !== "OPTIONS") return null;

  const headers = corsHeaders(config, req.headers.get("origin"));
  if (!headers) return new Response(null, { status: 403 });
  return new Response(null, { status: 204, headers });
};
