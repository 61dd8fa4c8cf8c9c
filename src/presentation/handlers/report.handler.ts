import type { AnalyticsService } from "../../application/services/analytics.service.js";
import type { AuthService } from "../../application/services/auth.service.js";
import type { ReadingService } from "../../application/services/reading.service.js";
import { Permission } from "../../core/entities/user.entity.js";
import type { RequestContext } from "../context.js";
import { authorize } from "../middleware/auth.js";
import { csvResponse, failure, jsonResponse } from "./response.js";

export const reportHandlers = (
  analyticsService: AnalyticsService,
  readingService: ReadingService,
  authService: AuthService,
) => ({
  executive: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.ANALYZE);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const result = await analyticsService.executiveReport(auth.value.username);
    if (!result.ok) return failure(ctx, "Executive report", result.error);

    return jsonResponse(result.value);
  },

  csv: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.EXPORT);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const result = await readingService.exportCsv(auth.value.username);
    if (!result.ok) return failure(ctx, "CSV export", result.error);

    return csvResponse(result.value, "leituras.csv");
  },
});
