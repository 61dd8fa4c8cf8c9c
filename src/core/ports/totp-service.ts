import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: TOTP Service
 * Time-based One-Time Password (RFC 6238) for two-factor login.
 * Compatible with Google Authenticator, Authy, etc.
 */
export interface TotpService {
  /** Generate a random TOTP secret (base32-encoded) */
  generateSecret(): string;
  /** otpauth:// URI for QR code display */
  generateUri(secret: string, account: string, issuer: string): string;
  /** The code valid for the step containing `epochSeconds` */
  codeAt(secret: string, epochSeconds: number): Result<string, AppError>;
  /**
   * Check a code against every step in `[-window, +window]` around `epochSeconds`.
   * Malformed codes verify as false, not as errors.
   */
  verify(
    secret: string,
    code: string,
    epochSeconds: number,
    window: number,
  ): Result<boolean, AppError>;
}

/** Port: render a provisioning URI as a scannable image data URI */
export interface QrRenderer {
  toDataUri(text: string): Promise<Result<string, AppError>>;
}
