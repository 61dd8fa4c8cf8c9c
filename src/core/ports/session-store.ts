import type { UserRole } from "../entities/user.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { SessionToken } from "../types/brand.js";
import type { Result } from "../types/result.js";

export interface Session {
  readonly username: string;
  readonly role: UserRole;
  /** Password accepted but the TOTP step is still outstanding */
  readonly mfaPending: boolean;
  /** Expiry counts from here */
  readonly createdAt: string;
}

/**
 * Port: Session Store
 * Opaque token → session.
 * Backing stores may expire entries; a missing token and an expired one look the same.
 */
export interface SessionStore {
  get(token: SessionToken): Promise<Result<Session | null, AppError>>;
  put(token: SessionToken, session: Session): Promise<Result<void, AppError>>;
  delete(token: SessionToken): Promise<Result<void, AppError>>;
}
