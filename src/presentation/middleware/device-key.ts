import type { AppError } from "../../core/errors/app-error.js";
import { unauthorized } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { timingSafeEqual } from "../../shared/utils/timing-safe.js";

export const DEVICE_KEY_HEADER = "x-api-key";

/**
 * Sensor ingestion guard. With no key configured every push is accepted.
 */
export const verifyDeviceKey = (
  req: Request,
  expected: string | undefined,
): Result<void, AppError> => {
  if (expected === undefined) return ok(undefined);

  const presented = req.headers.get(DEVICE_KEY_HEADER);
  if (presented === null) return err(unauthorized("Missing device key"));
  if (!timingSafeEqual(presented, expected)) return err(unauthorized("Invalid device key"));
  return ok(undefined);
};
