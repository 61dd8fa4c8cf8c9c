import { timingSafeEqual as bufferEqual } from "node:crypto";

/**
 * Constant-time string comparison for secrets, codes and hashes.
 * Length mismatch returns early; only the length leaks.
 */
export const timingSafeEqual = (a: string, b: string): boolean => {
  const bufA = Buffer.from(a, "utf8");
  const bufB = Buffer.from(b, "utf8");
  if (bufA.byteLength !== bufB.byteLength) return false;
  return bufferEqual(bufA, bufB);
};
