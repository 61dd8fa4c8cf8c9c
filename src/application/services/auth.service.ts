import { type UserProfile, type UserRole, toProfile } from "../../core/entities/user.entity.js";
import {
  type AppError,
  ErrorReason,
  mfaError,
  notFound,
  unauthorized,
} from "../../core/errors/app-error.js";
import { AuditAction } from "../../core/ports/audit-log.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import type { Session, SessionStore } from "../../core/ports/session-store.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { type SessionToken, brand } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateToken } from "../../shared/utils/id.js";
import type { LoginDto } from "../dtos/auth.dto.js";
import type { AuditTrail } from "./audit-trail.js";
import type { MfaService } from "./mfa.service.js";

export interface LoginResponse {
  readonly token: SessionToken;
  readonly user: UserProfile;
  /** Session stays limited to the two-factor step until a code is verified */
  readonly mfaRequired: boolean;
}

/** Who is calling, resolved from a bearer token against the current user record */
export interface AuthContext {
  readonly token: SessionToken;
  readonly username: string;
  readonly role: UserRole;
  readonly mfaPending: boolean;
}

export interface AuthService {
  authenticate(dto: LoginDto): Promise<Result<LoginResponse, AppError>>;
  resolveSession(token: SessionToken): Promise<Result<AuthContext, AppError>>;
  completeMfa(auth: AuthContext, code: string): Promise<Result<UserProfile, AppError>>;
  logout(auth: AuthContext): Promise<Result<void, AppError>>;
  profile(username: string): Promise<Result<UserProfile, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly passwordHasher: PasswordHasher;
  readonly sessions: SessionStore;
  readonly mfa: MfaService;
  readonly audit: AuditTrail;
  readonly logger: Logger;
  readonly clock?: () => number;
}

const invalidSession = (): AppError =>
  unauthorized("Invalid or expired session", ErrorReason.INVALID_SESSION);

export const createAuthService = (deps: Deps): AuthService => {
  const { userRepo, passwordHasher, sessions, mfa, audit } = deps;
  const clock = deps.clock ?? Date.now;
  const log = deps.logger.child({ service: "auth" });

  const nowIso = (): string => new Date(clock()).toISOString();

  const profile = async (username: string): Promise<Result<UserProfile, AppError>> => {
    const found = await userRepo.findByUsername(username);
    if (!found.ok) return found;
    return found.value ? ok(toProfile(found.value)) : err(notFound("User"));
  };

  return {
    async authenticate(dto) {
      const { username } = dto;

      const found = await userRepo.findByUsername(username);
      if (!found.ok) return found;

      const user = found.value;
      if (user === null) {
        await audit.failure(username, AuditAction.LOGIN, "Login failed: unknown user");
        return err(unauthorized("User not found", ErrorReason.USER_NOT_FOUND));
      }

      if (!user.active) {
        await audit.failure(username, AuditAction.LOGIN, "Login failed: account disabled");
        return err(unauthorized("Account is disabled", ErrorReason.USER_DISABLED));
      }

      const verified = await passwordHasher.verify(dto.password, {
        hash: user.passwordHash,
        salt: user.passwordSalt,
      });
      if (!verified.ok) return verified;
      if (!verified.value) {
        log.warn("Login failed: wrong password", { username });
        await audit.failure(username, AuditAction.LOGIN, "Login failed: wrong password");
        return err(unauthorized("Incorrect password", ErrorReason.WRONG_PASSWORD));
      }

      const loginAt = nowIso();
      const updated = await userRepo.update(username, { lastLoginAt: loginAt });
      if (!updated.ok) return updated;

      const token = brand<string, "SessionToken">(generateToken());
      const session: Session = {
        username,
        role: user.role,
        mfaPending: user.mfaEnabled,
        createdAt: loginAt,
      };
      const stored = await sessions.put(token, session);
      if (!stored.ok) return stored;

      log.info("User logged in", { username, mfaRequired: user.mfaEnabled });
      await audit.success(
        username,
        AuditAction.LOGIN,
        user.mfaEnabled ? "Password accepted, awaiting two-factor code" : "User logged in",
      );

      return ok({ token, user: toProfile(updated.value), mfaRequired: user.mfaEnabled });
    },

    async resolveSession(token) {
      const found = await sessions.get(token);
      if (!found.ok) return found;
      if (found.value === null) return err(invalidSession());

      const session = found.value;
      const user = await userRepo.findByUsername(session.username);
      if (!user.ok) return user;

      // Deleted or deactivated accounts lose their sessions on next use
      if (user.value === null || !user.value.active) {
        const dropped = await sessions.delete(token);
        if (!dropped.ok) log.warn("Could not drop stale session", { username: session.username });
        return err(invalidSession());
      }

      return ok({
        token,
        username: session.username,
        role: user.value.role,
        mfaPending: session.mfaPending,
      });
    },

    async completeMfa(auth, code) {
      if (!auth.mfaPending) {
        return err(mfaError("Session has no pending two-factor step", ErrorReason.MFA_NOT_REQUIRED));
      }

      const found = await sessions.get(auth.token);
      if (!found.ok) return found;
      if (found.value === null) return err(invalidSession());

      const verified = await mfa.verifyLogin(auth.username, code);
      if (!verified.ok) return verified;

      const promoted = await sessions.put(auth.token, { ...found.value, mfaPending: false });
      if (!promoted.ok) return promoted;

      return profile(auth.username);
    },

    async logout(auth) {
      const removed = await sessions.delete(auth.token);
      if (!removed.ok) return removed;

      await audit.success(auth.username, AuditAction.LOGOUT, "User logged out");
      return ok(undefined);
    },

    profile,
  };
};
