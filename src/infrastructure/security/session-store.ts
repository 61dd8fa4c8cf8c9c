import type { AppError } from "../../core/errors/app-error.js";
import type { Cache } from "../../core/ports/cache.js";
import type { Session, SessionStore } from "../../core/ports/session-store.js";
import type { SessionToken } from "../../core/types/brand.js";
import { type Result, map } from "../../core/types/result.js";

interface SessionStoreDeps {
  readonly cache: Cache<Session>;
  readonly ttlMs: number;
  readonly clock?: () => number;
}

const key = (token: SessionToken): string => `session:${token}`;

/**
 * Sessions live in a TTL cache: they lapse `ttlMs` after `createdAt`
 * and are dropped immediately on logout. Rewriting a session (the
 * two-factor promotion) keeps its original expiry.
 */
export const createSessionStore = ({
  cache,
  ttlMs,
  clock = Date.now,
}: SessionStoreDeps): SessionStore => ({
  get(token: SessionToken): Promise<Result<Session | null, AppError>> {
    return cache.get(key(token));
  },

  async put(token: SessionToken, session: Session): Promise<Result<void, AppError>> {
    const remaining = Date.parse(session.createdAt) + ttlMs - clock();
    if (!(remaining > 0)) {
      return map(await cache.del(key(token)), () => undefined);
    }
    return cache.set(key(token), session, remaining);
  },

  async delete(token: SessionToken): Promise<Result<void, AppError>> {
    return map(await cache.del(key(token)), () => undefined);
  },
});
