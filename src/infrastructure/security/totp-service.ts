import { createHmac, randomBytes } from "node:crypto";
import { type AppError, internal } from "../../core/errors/app-error.js";
import type { TotpService } from "../../core/ports/totp-service.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { timingSafeEqual } from "../../shared/utils/timing-safe.js";

/**
 * TOTP implementation (RFC 6238) over HMAC-SHA1, 6 digits, 30 s steps.
 * Compatible with Google Authenticator, Authy, Microsoft Authenticator, etc.
 */

/** Base32 alphabet (RFC 4648) */
const BASE32_CHARS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

/** TOTP period in seconds */
export const PERIOD = 30;
const DIGITS = 6;
const SECRET_BYTES = 20; // 160 bits

export const base32Encode = (data: Uint8Array): string => {
  let result = "";
  let bits = 0;
  let value = 0;
  for (const byte of data) {
    value = ((value << 8) | byte) & 0xffff;
    bits += 8;
    while (bits >= 5) {
      bits -= 5;
      result += BASE32_CHARS[(value >>> bits) & 0x1f];
    }
  }
  if (bits > 0) {
    result += BASE32_CHARS[(value << (5 - bits)) & 0x1f];
  }
  return result;
};

/** Null when the text holds a character outside the alphabet */
export const base32Decode = (encoded: string): Buffer | null => {
  const cleaned = encoded.replace(/=+$/, "").replace(/\s+/g, "").toUpperCase();
  const bytes: number[] = [];
  let bits = 0;
  let value = 0;
  for (const char of cleaned) {
    const idx = BASE32_CHARS.indexOf(char);
    if (idx === -1) return null;
    value = ((value << 5) | idx) & 0xffff;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      bytes.push((value >>> bits) & 0xff);
    }
  }
  return Buffer.from(bytes);
};

/** 8-byte big-endian moving factor */
const counterBytes = (counter: number): Buffer => {
  const buf = Buffer.alloc(8);
  buf.writeBigUInt64BE(BigInt(counter));
  return buf;
};

/** Dynamic truncation (RFC 4226 §5.4) */
const dynamicTruncate = (hmac: Buffer): number => {
  const offset = hmac.readUInt8(hmac.length - 1) & 0x0f;
  return hmac.readUInt32BE(offset) & 0x7fffffff;
};

const hotp = (key: Buffer, counter: number): string => {
  const hmac = createHmac("sha1", key).update(counterBytes(counter)).digest();
  return (dynamicTruncate(hmac) % 10 ** DIGITS).toString().padStart(DIGITS, "0");
};

const CODE_PATTERN = /^\d{6}$/;

export const createTotpService = (): TotpService => {
  const keyFor = (secret: string): Result<Buffer, AppError> => {
    const key = base32Decode(secret);
    if (key === null || key.length === 0) return err(internal("Stored TOTP secret is not valid base32"));
    return ok(key);
  };

  return {
    generateSecret(): string {
      return base32Encode(randomBytes(SECRET_BYTES));
    },

    generateUri(secret: string, account: string, issuer: string): string {
      const encodedIssuer = encodeURIComponent(issuer);
      const encodedAccount = encodeURIComponent(account);
      return `otpauth://totp/${encodedIssuer}:${encodedAccount}?secret=${secret}&issuer=${encodedIssuer}`;
    },

    codeAt(secret: string, epochSeconds: number): Result<string, AppError> {
      const key = keyFor(secret);
      if (!key.ok) return key;
      return ok(hotp(key.value, Math.floor(epochSeconds / PERIOD)));
    },

    verify(
      secret: string,
      code: string,
      epochSeconds: number,
      window: number,
    ): Result<boolean, AppError> {
      if (!CODE_PATTERN.test(code)) return ok(false);

      const key = keyFor(secret);
      if (!key.ok) return key;

      // No early exit on a match
      let matched = false;
      for (let i = -window; i <= window; i++) {
        const counter = Math.floor((epochSeconds + i * PERIOD) / PERIOD);
        if (counter < 0) continue;
        if (timingSafeEqual(hotp(key.value, counter), code)) matched = true;
      }
      return ok(matched);
    },
  };
};
