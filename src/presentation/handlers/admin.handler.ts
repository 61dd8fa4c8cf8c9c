import {
  auditLogQuery,
  changePasswordDto,
  createUserDto,
  updateUserDto,
} from "../../application/dtos/admin.dto.js";
import type { AdminService } from "../../application/services/admin.service.js";
import type { AuthService } from "../../application/services/auth.service.js";
import { Permission, UserRole } from "../../core/entities/user.entity.js";
import type { RequestContext } from "../context.js";
import { authenticate, authorize, requireRole } from "../middleware/auth.js";
import { validateJson, validateQuery } from "../middleware/validate.js";
import { createdResponse, failure, jsonResponse, noContentResponse } from "./response.js";

export const adminHandlers = (adminService: AdminService, authService: AuthService) => ({
  createUser: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.CREATE);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const validated = await validateJson(createUserDto, req);
    if (!validated.ok) return failure(ctx, "User validation", validated.error);

    const result = await adminService.createUser(validated.value, auth.value.username);
    if (!result.ok) return failure(ctx, "User creation", result.error);

    return createdResponse(result.value);
  },

  listUsers: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.UPDATE);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const result = await adminService.listUsers(auth.value.username);
    if (!result.ok) return failure(ctx, "User listing", result.error);

    return jsonResponse(result.value);
  },

  updateUser: async (req: Request, ctx: RequestContext, username: string): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.UPDATE);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const validated = await validateJson(updateUserDto, req);
    if (!validated.ok) return failure(ctx, "User validation", validated.error);

    const result = await adminService.updateUser(username, validated.value, auth.value.username);
    if (!result.ok) return failure(ctx, "User update", result.error);

    return jsonResponse(result.value);
  },

  changePassword: async (
    req: Request,
    ctx: RequestContext,
    username: string,
  ): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.UPDATE);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const validated = await validateJson(changePasswordDto, req);
    if (!validated.ok) return failure(ctx, "Password validation", validated.error);

    const result = await adminService.changePassword(
      username,
      validated.value.password,
      auth.value.username,
    );
    if (!result.ok) return failure(ctx, "Password change", result.error);

    return noContentResponse();
  },

  deleteUser: async (req: Request, ctx: RequestContext, username: string): Promise<Response> => {
    const auth = await authorize(req, authService, Permission.DELETE);
    if (!auth.ok) return failure(ctx, "Authorization", auth.error);

    const result = await adminService.deleteUser(username, auth.value.username);
    if (!result.ok) return failure(ctx, "User deletion", result.error);

    return noContentResponse();
  },

  auditLogs: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const session = await authenticate(req, authService);
    if (!session.ok) return failure(ctx, "Authentication", session.error);

    const admin = requireRole(session.value, [UserRole.ADMIN]);
    if (!admin.ok) return failure(ctx, "Authorization", admin.error);

    const query = validateQuery(auditLogQuery, ctx.url);
    if (!query.ok) return failure(ctx, "Query validation", query.error);

    const result = await adminService.auditLogs(query.value);
    if (!result.ok) return failure(ctx, "Audit log query", result.error);

    return jsonResponse(result.value);
  },
});
