import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export interface PasswordDigest {
  readonly hash: string;
  readonly salt: string;
}

/**
 * Port: Password Hasher
 * Salted one-way hashing, salt stored beside the hash.
 */
export interface PasswordHasher {
  hash(plain: string): Promise<Result<PasswordDigest, AppError>>;
  verify(plain: string, digest: PasswordDigest): Promise<Result<boolean, AppError>>;
}
