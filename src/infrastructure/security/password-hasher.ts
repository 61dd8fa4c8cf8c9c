import { pbkdf2, randomBytes } from "node:crypto";
import { promisify } from "node:util";
import { type AppError, internal } from "../../core/errors/app-error.js";
import type { PasswordDigest, PasswordHasher } from "../../core/ports/password-hasher.js";
import { type Result, attempt } from "../../core/types/result.js";
import { timingSafeEqual } from "../../shared/utils/timing-safe.js";

const pbkdf2Async = promisify(pbkdf2);

export const DEFAULT_ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const SALT_BYTES = 16;
const DIGEST = "sha256";

export interface PasswordHasherOptions {
  /** Lower only in tests; stored hashes are tied to the count they were made with */
  readonly iterations?: number;
}

/**
 * PBKDF2-HMAC-SHA256 hasher.
 * The salt is 16 random bytes rendered as hex, and that hex text is what
 * PBKDF2 receives, so digests stay verifiable by any client of the same table.
 */
export const createPasswordHasher = (options: PasswordHasherOptions = {}): PasswordHasher => {
  const iterations = options.iterations ?? DEFAULT_ITERATIONS;

  const derive = async (plain: string, salt: string): Promise<string> => {
    const key = await pbkdf2Async(plain, salt, iterations, KEY_LENGTH, DIGEST);
    return key.toString("hex");
  };

  return {
    hash(plain: string): Promise<Result<PasswordDigest, AppError>> {
      return attempt(
        async () => {
          const salt = randomBytes(SALT_BYTES).toString("hex");
          return { hash: await derive(plain, salt), salt };
        },
        (e) => internal("Failed to hash password", e),
      );
    },

    verify(plain: string, digest: PasswordDigest): Promise<Result<boolean, AppError>> {
      return attempt(
        async () => timingSafeEqual(await derive(plain, digest.salt), digest.hash),
        (e) => internal("Failed to verify password", e),
      );
    },
  };
};
