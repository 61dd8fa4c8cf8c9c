import type { User } from "../../core/entities/user.entity.js";
import {
  type AppError,
  ErrorReason,
  mfaError,
  notFound,
} from "../../core/errors/app-error.js";
import { AuditAction } from "../../core/ports/audit-log.js";
import type { Cache } from "../../core/ports/cache.js";
import type { Logger } from "../../core/ports/logger.js";
import type { QrRenderer, TotpService } from "../../core/ports/totp-service.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { type Result, err, ok } from "../../core/types/result.js";
import type { AuditTrail } from "./audit-trail.js";

/** Steps of 30 s accepted either side of now (±5 minutes) */
export const MFA_WINDOW = 10;

export interface MfaProvisioning {
  readonly secret: string;
  readonly uri: string;
  /** PNG data URI of `uri` */
  readonly qrCode: string;
}

export interface MfaService {
  provision(username: string): Promise<Result<MfaProvisioning, AppError>>;
  activate(username: string, code: string): Promise<Result<void, AppError>>;
  verifyLogin(username: string, code: string): Promise<Result<void, AppError>>;
  disable(username: string, code: string): Promise<Result<void, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly totp: TotpService;
  readonly qr: QrRenderer;
  /** username → base32 secret awaiting its first valid code */
  readonly pendingSecrets: Cache<string>;
  readonly pendingTtlMs: number;
  readonly issuer: string;
  readonly audit: AuditTrail;
  readonly logger: Logger;
  readonly clock?: () => number;
}

const pendingKey = (username: string): string => `mfa:pending:${username}`;

export const createMfaService = (deps: Deps): MfaService => {
  const { userRepo, totp, qr, pendingSecrets, audit } = deps;
  const clock = deps.clock ?? Date.now;
  const log = deps.logger.child({ service: "mfa" });

  const nowSeconds = (): number => Math.floor(clock() / 1000);

  const loadUser = async (username: string): Promise<Result<User, AppError>> => {
    const found = await userRepo.findByUsername(username);
    if (!found.ok) return found;
    return found.value ? ok(found.value) : err(notFound("User", ErrorReason.USER_NOT_FOUND));
  };

  /** Enabled user with a stored secret, or MFA_NOT_REQUIRED */
  const enrolledSecret = (user: User): Result<string, AppError> =>
    user.mfaEnabled && user.mfaSecret !== null
      ? ok(user.mfaSecret)
      : err(mfaError("Two-factor authentication is not enabled", ErrorReason.MFA_NOT_REQUIRED));

  const checkCode = (secret: string, code: string): Result<boolean, AppError> =>
    totp.verify(secret, code, nowSeconds(), MFA_WINDOW);

  const invalidCode = (): AppError => mfaError("Invalid two-factor code", ErrorReason.INVALID_CODE);

  return {
    async provision(username) {
      const user = await loadUser(username);
      if (!user.ok) return user;

      const secret = totp.generateSecret();
      const uri = totp.generateUri(secret, username, deps.issuer);

      const qrCode = await qr.toDataUri(uri);
      if (!qrCode.ok) return qrCode;

      const stored = await pendingSecrets.set(pendingKey(username), secret, deps.pendingTtlMs);
      if (!stored.ok) return stored;

      log.info("Two-factor provisioning started", { username });
      await audit.success(username, AuditAction.MFA_SETUP, "Started two-factor setup", {
        sensitive: true,
      });
      return ok({ secret, uri, qrCode: qrCode.value });
    },

    async activate(username, code) {
      const pending = await pendingSecrets.get(pendingKey(username));
      if (!pending.ok) return pending;
      if (pending.value === null) {
        return err(mfaError("No two-factor setup in progress", ErrorReason.NO_SECRET_PENDING));
      }

      const matched = checkCode(pending.value, code);
      if (!matched.ok) return matched;
      if (!matched.value) {
        await audit.failure(username, AuditAction.MFA_ACTIVATION_FAILED, "Invalid code during activation");
        return err(invalidCode());
      }

      const updated = await userRepo.update(username, {
        mfaEnabled: true,
        mfaSecret: pending.value,
      });
      if (!updated.ok) return updated;

      const removed = await pendingSecrets.del(pendingKey(username));
      if (!removed.ok) log.warn("Could not clear pending secret", { username });

      log.info("Two-factor enabled", { username });
      await audit.success(username, AuditAction.MFA_ACTIVATED, "Two-factor enabled", {
        sensitive: true,
      });
      return ok(undefined);
    },

    async verifyLogin(username, code) {
      const user = await loadUser(username);
      if (!user.ok) return user;

      const secret = enrolledSecret(user.value);
      if (!secret.ok) return secret;

      const matched = checkCode(secret.value, code);
      if (!matched.ok) return matched;
      if (!matched.value) {
        await audit.failure(username, AuditAction.MFA_VERIFY, "Invalid code at login");
        return err(invalidCode());
      }

      await audit.success(username, AuditAction.MFA_VERIFY, "Two-factor code accepted");
      return ok(undefined);
    },

    async disable(username, code) {
      const user = await loadUser(username);
      if (!user.ok) return user;

      const secret = enrolledSecret(user.value);
      if (!secret.ok) return secret;

      const matched = checkCode(secret.value, code);
      if (!matched.ok) return matched;
      if (!matched.value) {
        await audit.failure(username, AuditAction.MFA_DISABLED, "Invalid code when disabling");
        return err(invalidCode());
      }

      const updated = await userRepo.update(username, { mfaEnabled: false, mfaSecret: null });
      if (!updated.ok) return updated;

      log.info("Two-factor disabled", { username });
      await audit.success(username, AuditAction.MFA_DISABLED, "Two-factor disabled", {
        sensitive: true,
      });
      return ok(undefined);
    },
  };
};
