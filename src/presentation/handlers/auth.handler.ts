import { loginDto, mfaCodeDto } from "../../application/dtos/auth.dto.js";
import type { AuthService } from "../../application/services/auth.service.js";
import type { RequestContext } from "../context.js";
import { authenticate } from "../middleware/auth.js";
import { validateJson } from "../middleware/validate.js";
import { failure, jsonResponse, noContentResponse } from "./response.js";

export const authHandlers = (authService: AuthService) => ({
  login: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const validated = await validateJson(loginDto, req);
    if (!validated.ok) return failure(ctx, "Login validation", validated.error);

    const result = await authService.authenticate(validated.value);
    if (!result.ok) return failure(ctx, "Login", result.error);

    return jsonResponse(result.value);
  },

  /** Second login step: promote an MFA-pending session */
  verifyMfa: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authenticate(req, authService, { allowMfaPending: true });
    if (!auth.ok) return failure(ctx, "Authentication", auth.error);

    const validated = await validateJson(mfaCodeDto, req);
    if (!validated.ok) return failure(ctx, "MFA code validation", validated.error);

    const result = await authService.completeMfa(auth.value, validated.value.code);
    if (!result.ok) return failure(ctx, "MFA login", result.error);

    return jsonResponse({ user: result.value });
  },

  logout: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authenticate(req, authService, { allowMfaPending: true });
    if (!auth.ok) return failure(ctx, "Authentication", auth.error);

    const result = await authService.logout(auth.value);
    if (!result.ok) return failure(ctx, "Logout", result.error);

    return noContentResponse();
  },

  me: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authenticate(req, authService);
    if (!auth.ok) return failure(ctx, "Authentication", auth.error);

    const result = await authService.profile(auth.value.username);
    if (!result.ok) return failure(ctx, "Profile lookup", result.error);

    return jsonResponse(result.value);
  },
});
