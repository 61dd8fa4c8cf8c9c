/**
 * Canonical application error: every failure in the system is expressed
 * as an AppError so HTTP, logging and audit layers have a single shape.
 */

export const ErrorCode = {
  // Client errors
  PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",
  UNAUTHORIZED: "UNAUTHORIZED",
  FORBIDDEN: "FORBIDDEN",
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",
  VALIDATION: "VALIDATION",
  MFA: "MFA",
  INSUFFICIENT_DATA: "INSUFFICIENT_DATA",
  // Server errors
  STORAGE: "STORAGE",
  INTERNAL: "INTERNAL",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Finer-grained failure kind within a code. Callers that need to tell
 * "wrong password" from "unknown user" switch on this, not on the message.
 */
export const ErrorReason = {
  USER_NOT_FOUND: "USER_NOT_FOUND",
  USER_DISABLED: "USER_DISABLED",
  WRONG_PASSWORD: "WRONG_PASSWORD",
  INVALID_SESSION: "INVALID_SESSION",
  MFA_PENDING: "MFA_PENDING",
  INSUFFICIENT_ROLE: "INSUFFICIENT_ROLE",
  NO_SECRET_PENDING: "NO_SECRET_PENDING",
  INVALID_CODE: "INVALID_CODE",
  MFA_NOT_REQUIRED: "MFA_NOT_REQUIRED",
} as const;

export type ErrorReason = (typeof ErrorReason)[keyof typeof ErrorReason];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly reason?: ErrorReason | undefined;
  readonly details?: Record<string, unknown> | undefined;
  readonly cause?: unknown;
}

const STATUS_MAP: Record<ErrorCode, number> = {
  PAYLOAD_TOO_LARGE: 413,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  VALIDATION: 422,
  MFA: 400,
  INSUFFICIENT_DATA: 422,
  STORAGE: 503,
  INTERNAL: 500,
};

export const httpStatus = (code: ErrorCode): number => STATUS_MAP[code];

/** Server-side codes never expose their message or cause to clients */
export const isServerError = (code: ErrorCode): boolean => httpStatus(code) >= 500;

interface ErrorExtras {
  readonly reason?: ErrorReason | undefined;
  readonly details?: Record<string, unknown> | undefined;
  readonly cause?: unknown;
}

export const appError = (code: ErrorCode, message: string, extras: ErrorExtras = {}): AppError => {
  const error: AppError = { code, message };
  return {
    ...error,
    ...(extras.reason !== undefined ? { reason: extras.reason } : {}),
    ...(extras.details !== undefined ? { details: extras.details } : {}),
    ...(extras.cause !== undefined ? { cause: extras.cause } : {}),
  };
};

/** Factory helpers */
export const payloadTooLarge = (limitBytes: number): AppError =>
  appError(ErrorCode.PAYLOAD_TOO_LARGE, "Request body too large", { details: { limitBytes } });

export const unauthorized = (msg = "Unauthorized", reason?: ErrorReason): AppError =>
  appError(ErrorCode.UNAUTHORIZED, msg, { reason });

export const forbidden = (msg = "Forbidden", reason?: ErrorReason): AppError =>
  appError(ErrorCode.FORBIDDEN, msg, { reason });

export const notFound = (resource: string, reason?: ErrorReason): AppError =>
  appError(ErrorCode.NOT_FOUND, `${resource} not found`, { reason });

export const conflict = (msg: string): AppError => appError(ErrorCode.CONFLICT, msg);

export const validation = (details: Record<string, unknown>): AppError =>
  appError(ErrorCode.VALIDATION, "Validation failed", { details });

export const mfaError = (msg: string, reason: ErrorReason): AppError =>
  appError(ErrorCode.MFA, msg, { reason });

export const insufficientData = (required: number, available: number): AppError =>
  appError(ErrorCode.INSUFFICIENT_DATA, "Not enough readings for this analysis", {
    details: { required, available },
  });

export const storage = (msg: string, cause?: unknown): AppError =>
  appError(ErrorCode.STORAGE, msg, { cause });

export const internal = (msg = "Internal server error", cause?: unknown): AppError =>
  appError(ErrorCode.INTERNAL, msg, { cause });
