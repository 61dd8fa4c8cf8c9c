import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: Audit Log
 * Append-only ledger of sensitive actions.
 * Records who did what, when, and whether it succeeded.
 */

export interface AuditEntry {
  readonly id: string;
  readonly timestamp: string;
  readonly username: string;
  readonly action: AuditAction;
  readonly description: string;
  readonly status: AuditStatus;
  /** Entry relates to sensitive data; description must not contain it */
  readonly sensitiveData: boolean;
}

export const AuditAction = {
  LOGIN: "LOGIN",
  LOGOUT: "LOGOUT",
  CREATE_USER: "CREATE_USER",
  UPDATE_USER: "UPDATE_USER",
  DELETE_USER: "DELETE_USER",
  CHANGE_PASSWORD: "CHANGE_PASSWORD",
  CREATE: "CREATE",
  READ: "READ",
  ANALYZE: "ANALYZE",
  EXPORT: "EXPORT",
  MFA_SETUP: "MFA_SETUP",
  MFA_ACTIVATED: "MFA_ACTIVATED",
  MFA_ACTIVATION_FAILED: "MFA_ACTIVATION_FAILED",
  MFA_VERIFY: "MFA_VERIFY",
  MFA_DISABLED: "MFA_DISABLED",
} as const;

export type AuditAction = (typeof AuditAction)[keyof typeof AuditAction];

export const AuditStatus = {
  SUCCESS: "success",
  ERROR: "error",
} as const;

export type AuditStatus = (typeof AuditStatus)[keyof typeof AuditStatus];

export type NewAuditEntry = Omit<AuditEntry, "id" | "timestamp">;

export interface AuditLog {
  append(entry: NewAuditEntry): Promise<Result<void, AppError>>;
  /** Newest first */
  query(options: AuditQueryOptions): Promise<Result<readonly AuditEntry[], AppError>>;
}

export interface AuditQueryOptions {
  readonly username?: string | undefined;
  readonly limit?: number | undefined;
}
