/**
 * Branded / opaque type utility.
 * Keeps structurally identical strings (request ids, session tokens) apart.
 *
 * @example
 * type SessionToken = Brand<string, "SessionToken">;
 */
declare const __brand: unique symbol;

export type Brand<T, B extends string> = T & { readonly [__brand]: B };

export type RequestId = Brand<string, "RequestId">;
export type SessionToken = Brand<string, "SessionToken">;

/** Runtime no-op, compile-time tag */
export const brand = <T, B extends string>(value: T): Brand<T, B> => value as Brand<T, B>;
