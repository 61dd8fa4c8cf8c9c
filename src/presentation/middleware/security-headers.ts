import type { AppConfig } from "../../infrastructure/config/config.js";

/**
 * Security headers: equivalent to helmet but zero deps.
 * Applied to every response; HSTS only outside development.
 */
export const securityHeaders = (config: Pick<AppConfig, "env">): Record<string, string> => ({
  "X-Content-Type-Options": "nosniff",
  "X-Frame-Options": "DENY",
  "X-XSS-Protection": "0",
  ...(config.env === "production"
    ? { "Strict-Transport-Security": "max-age=63072000; includeSubDomains" }
    : {}),
  "Content-Security-Policy": "default-src 'none'; frame-ancestors 'none'",
  "Referrer-Policy": "strict-origin-when-cross-origin",
  "Cache-Control": "no-store",
  "X-Permitted-Cross-Domain-Policies": "none",
});
