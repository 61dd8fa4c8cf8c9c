import {
  anomaliesQuery,
  comparisonQuery,
  forecastQuery,
  windowQuery,
} from "../../application/dtos/analytics.dto.js";
import type { AnalyticsService } from "../../application/services/analytics.service.js";
import type { AuthService } from "../../application/services/auth.service.js";
import { Permission } from "../../core/entities/user.entity.js";
import type { RequestContext } from "../context.js";
import { authorize } from "../middleware/auth.js";
import { validateQuery } from "../middleware/validate.js";
import { failure, jsonResponse } from "./response.js";

/**
 * Analytics endpoints. Outcomes are returned as-is, so an empty window
 * answers 200 with `{ kind: "no_data" }` rather than an error.
 */
export const analyticsHandlers = (analyticsService: AnalyticsService, authService: AuthService) => ({
  summary: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.ANALYZE);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const query = validateQuery(windowQuery, ctx.url);
    if (!query.ok) return failure(ctx, "Query validation", query.error);

    const result = await analyticsService.summary(query.value.days, auth.value.username);
    if (!result.ok) return failure(ctx, "Summary", result.error);

    return jsonResponse(result.value);
  },

  patterns: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.ANALYZE);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const query = validateQuery(windowQuery, ctx.url);
    if (!query.ok) return failure(ctx, "Query validation", query.error);

    const result = await analyticsService.patterns(query.value.days, auth.value.username);
    if (!result.ok) return failure(ctx, "Pattern analysis", result.error);

    return jsonResponse(result.value);
  },

  forecast: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.ANALYZE);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const query = validateQuery(forecastQuery, ctx.url);
    if (!query.ok) return failure(ctx, "Query validation", query.error);

    const result = await analyticsService.forecast(query.value.days, auth.value.username);
    if (!result.ok) return failure(ctx, "Forecast", result.error);

    return jsonResponse(result.value);
  },

  anomalies: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.ANALYZE);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const query = validateQuery(anomaliesQuery, ctx.url);
    if (!query.ok) return failure(ctx, "Query validation", query.error);

    const result = await analyticsService.anomalies(query.value.sensitivity, auth.value.username);
    if (!result.ok) return failure(ctx, "Anomaly detection", result.error);

    return jsonResponse(result.value);
  },

  comparison: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.ANALYZE);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const query = validateQuery(comparisonQuery, ctx.url);
    if (!query.ok) return failure(ctx, "Query validation", query.error);

    const { current, baseline } = query.value;
    const result = await analyticsService.comparison(current, baseline, auth.value.username);
    if (!result.ok) return failure(ctx, "Period comparison", result.error);

    return jsonResponse(result.value);
  },
});
