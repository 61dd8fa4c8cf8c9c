import { mfaCodeDto } from "../../application/dtos/auth.dto.js";
import type { AuthService } from "../../application/services/auth.service.js";
import type { MfaService } from "../../application/services/mfa.service.js";
import type { RequestContext } from "../context.js";
import { authenticate } from "../middleware/auth.js";
import { validateJson } from "../middleware/validate.js";
import { failure, jsonResponse } from "./response.js";

export const mfaHandlers = (authService: AuthService, mfaService: MfaService) => ({
  setup: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authenticate(req, authService);
    if (!auth.ok) return failure(ctx, "Authentication", auth.error);

    const result = await mfaService.provision(auth.value.username);
    if (!result.ok) return failure(ctx, "MFA setup", result.error);

    return jsonResponse(result.value);
  },

  activate: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authenticate(req, authService);
    if (!auth.ok) return failure(ctx, "Authentication", auth.error);

    const validated = await validateJson(mfaCodeDto, req);
    if (!validated.ok) return failure(ctx, "MFA code validation", validated.error);

    const result = await mfaService.activate(auth.value.username, validated.value.code);
    if (!result.ok) return failure(ctx, "MFA activation", result.error);

    return jsonResponse({ message: "Two-factor authentication enabled" });
  },

  disable: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authenticate(req, authService);
    if (!auth.ok) return failure(ctx, "Authentication", auth.error);

    const validated = await validateJson(mfaCodeDto, req);
    if (!validated.ok) return failure(ctx, "MFA code validation", validated.error);

    const result = await mfaService.disable(auth.value.username, validated.value.code);
    if (!result.ok) return failure(ctx, "MFA disable", result.error);

    return jsonResponse({ message: "Two-factor authentication disabled" });
  },
});
