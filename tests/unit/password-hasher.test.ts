import { describe, expect, it } from "vitest";
import { createPasswordHasher } from "../../src/infrastructure/security/password-hasher.js";

describe("PasswordHasher", () => {
  const hasher = createPasswordHasher({ iterations: 1_000 });

  it("produces a hex salt and a 32-byte hex hash", async () => {
    const result = await hasher.hash("test-password");
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.salt).toMatch(/^[0-9a-f]{32}$/);
    expect(result.value.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("salts every hash differently", async () => {
    const a = await hasher.hash("test-password");
    const b = await hasher.hash("test-password");
    expect(a.ok && b.ok && a.value.hash !== b.value.hash).toBe(true);
  });

  it("verifies the right password only", async () => {
    const digest = await hasher.hash("test-password");
    if (!digest.ok) throw new Error("hash failed");

    expect(await hasher.verify("test-password", digest.value)).toEqual({ ok: true, value: true });
    expect(await hasher.verify("wrong-password", digest.value)).toEqual({ ok: true, value: false });
  });

  it("feeds the salt text to PBKDF2-HMAC-SHA256", async () => {
    // RFC 7914 §11 vector, first 32 bytes
    const single = createPasswordHasher({ iterations: 1 });
    const result = await single.verify("passwd", {
      salt: "salt",
      hash: "55ac046e56e3089fec1691c22544b605f94185216dde0465e68b9d57c20dacbc",
    });
    expect(result).toEqual({ ok: true, value: true });
  });

  it("does not verify against a digest made with another iteration count", async () => {
    const digest = await hasher.hash("test-password");
    if (!digest.ok) throw new Error("hash failed");

    const other = createPasswordHasher({ iterations: 2_000 });
    expect(await other.verify("test-password", digest.value)).toEqual({ ok: true, value: false });
  });
});
