import type { AuthContext, AuthService } from "../../application/services/auth.service.js";
import { type Permission, type UserRole, hasPermission } from "../../core/entities/user.entity.js";
import type { AppError } from "../../core/errors/app-error.js";
import { ErrorReason, forbidden, unauthorized } from "../../core/errors/app-error.js";
import { type SessionToken, brand } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";

interface AuthenticateOptions {
  /** Accept a session whose two-factor step is still outstanding */
  readonly allowMfaPending?: boolean;
}

/**
 * Extracts the Bearer token from the Authorization header.
 */
export const bearerToken = (req: Request): Result<SessionToken, AppError> => {
  const header = req.headers.get("authorization");
  if (!header) return err(unauthorized("Missing Authorization header"));

  const parts = header.split(" ");
  if (parts.length !== 2 || parts[0] !== "Bearer") {
    return err(unauthorized("Invalid Authorization header format"));
  }

  const token = parts[1];
  if (!token) return err(unauthorized("Missing token"));

  return ok(brand<string, "SessionToken">(token));
};

/**
 * Resolves the caller's session. A session still waiting for its TOTP code
 * only passes where the route opts in.
 */
export const authenticate = async (
  req: Request,
  authService: AuthService,
  options: AuthenticateOptions = {},
): Promise<Result<AuthContext, AppError>> => {
  const token = bearerToken(req);
  if (!token.ok) return token;

  const resolved = await authService.resolveSession(token.value);
  if (!resolved.ok) return resolved;

  if (resolved.value.mfaPending && options.allowMfaPending !== true) {
    return err(unauthorized("Two-factor verification required", ErrorReason.MFA_PENDING));
  }
  return resolved;
};

/**
 * Permission guard: call after authentication.
 */
export const requirePermission = (
  auth: AuthContext,
  permission: Permission,
): Result<AuthContext, AppError> => {
  if (!hasPermission(auth.role, permission)) {
    return err(forbidden(`Missing permission: ${permission}`, ErrorReason.INSUFFICIENT_ROLE));
  }
  return ok(auth);
};

/**
 * Role guard: call after authentication.
 */
export const requireRole = (
  auth: AuthContext,
  allowedRoles: readonly UserRole[],
): Result<AuthContext, AppError> => {
  if (!allowedRoles.includes(auth.role)) {
    return err(forbidden("Insufficient permissions", ErrorReason.INSUFFICIENT_ROLE));
  }
  return ok(auth);
};

/**
 * Authenticate, then check a permission. The common guard for data routes.
 */
export const authorize = async (
  req: Request,
  authService: AuthService,
  permission: Permission,
): Promise<Result<AuthContext, AppError>> => {
  const auth = await authenticate(req, authService);
  if (!auth.ok) return auth;
  return requirePermission(auth.value, permission);
};
