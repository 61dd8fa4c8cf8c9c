import { describe, expect, it } from "vitest";
import { Permission, UserRole, hasPermission } from "../../src/core/entities/user.entity.js";
import { ErrorCode, httpStatus, isServerError, storage } from "../../src/core/errors/app-error.js";
import { attempt, err, map, ok, unwrapOr } from "../../src/core/types/result.js";

describe("Result", () => {
  it("maps only the success branch", () => {
    expect(map(ok(2), (n) => n * 3)).toEqual({ ok: true, value: 6 });
    expect(map(err("nope"), (n: number) => n * 3)).toEqual({ ok: false, error: "nope" });
  });

  it("unwraps with a fallback", () => {
    expect(unwrapOr(ok(1), 0)).toBe(1);
    expect(unwrapOr(err("nope"), 0)).toBe(0);
  });

  it("turns a rejection into an error value", async () => {
    const cause = new Error("connection reset");
    const result = await attempt(
      () => Promise.reject(cause),
      (e) => storage("Query failed", e),
    );
    expect(result).toEqual({ ok: false, error: { code: "STORAGE", message: "Query failed", cause } });
    expect(await attempt(async () => 42, () => "unused")).toEqual({ ok: true, value: 42 });
  });
});

describe("AppError", () => {
  it("maps codes to HTTP statuses", () => {
    expect(httpStatus(ErrorCode.UNAUTHORIZED)).toBe(401);
    expect(httpStatus(ErrorCode.MFA)).toBe(400);
    expect(httpStatus(ErrorCode.VALIDATION)).toBe(422);
    expect(httpStatus(ErrorCode.STORAGE)).toBe(503);
  });

  it("classifies server errors", () => {
    expect(isServerError(ErrorCode.INTERNAL)).toBe(true);
    expect(isServerError(ErrorCode.STORAGE)).toBe(true);
    expect(isServerError(ErrorCode.CONFLICT)).toBe(false);
  });
});

describe("hasPermission", () => {
  const table = (role: UserRole) => Object.values(Permission).filter((p) => hasPermission(role, p));

  it("grants admins everything", () => {
    expect(table(UserRole.ADMIN)).toEqual(["create", "read", "update", "delete", "export", "analyze"]);
  });

  it("lets managers do all but create and delete", () => {
    expect(table(UserRole.MANAGER)).toEqual(["read", "update", "export", "analyze"]);
  });

  it("limits users to reading", () => {
    expect(table(UserRole.USER)).toEqual(["read"]);
  });
});
