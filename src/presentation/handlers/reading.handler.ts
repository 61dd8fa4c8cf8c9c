import {
  createReadingDto,
  listReadingsQuery,
  readingStatsQuery,
} from "../../application/dtos/reading.dto.js";
import type { AuthService } from "../../application/services/auth.service.js";
import type { ReadingService } from "../../application/services/reading.service.js";
import { Permission } from "../../core/entities/user.entity.js";
import type { RequestContext } from "../context.js";
import { authorize } from "../middleware/auth.js";
import { verifyDeviceKey } from "../middleware/device-key.js";
import { validateJson, validateQuery } from "../middleware/validate.js";
import { createdResponse, failure, jsonResponse } from "./response.js";

export const readingHandlers = (
  readingService: ReadingService,
  authService: AuthService,
  ingestApiKey: string | undefined,
) => ({
  /** Sensor push; guarded by the device key when one is configured */
  ingest: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const key = verifyDeviceKey(req, ingestApiKey);
    if (!key.ok) return failure(ctx, "Device authentication", key.error);

    const validated = await validateJson(createReadingDto, req);
    if (!validated.ok) return failure(ctx, "Reading validation", validated.error);

    const result = await readingService.ingest(validated.value);
    if (!result.ok) return failure(ctx, "Reading ingestion", result.error);

    return createdResponse({ id: result.value.id, timestamp: result.value.timestamp });
  },

  list: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.READ);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const query = validateQuery(listReadingsQuery, ctx.url);
    if (!query.ok) return failure(ctx, "Query validation", query.error);

    const result = await readingService.list(query.value, auth.value.username);
    if (!result.ok) return failure(ctx, "Reading listing", result.error);

    return jsonResponse(result.value);
  },

  stats: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.READ);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const query = validateQuery(readingStatsQuery, ctx.url);
    if (!query.ok) return failure(ctx, "Query validation", query.error);

    const result = await readingService.stats(query.value);
    if (!result.ok) return failure(ctx, "Reading stats", result.error);

    return jsonResponse(result.value);
  },

  sensors: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.READ);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const result = await readingService.sensors();
    if (!result.ok) return failure(ctx, "Sensor listing", result.error);

    return jsonResponse(result.value);
  },
});
