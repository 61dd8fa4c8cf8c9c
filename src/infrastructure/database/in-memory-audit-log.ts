import type { AppError } from "../../core/errors/app-error.js";
import type {
  AuditEntry,
  AuditLog,
  AuditQueryOptions,
  NewAuditEntry,
} from "../../core/ports/audit-log.js";
import { type Result, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";

const DEFAULT_LIMIT = 100;

/**
 * In-memory audit log: append-only array, queried newest first.
 */
export const createInMemoryAuditLog = (clock: () => number = Date.now): AuditLog => {
  const entries: AuditEntry[] = [];

  return {
    async append(entry: NewAuditEntry): Promise<Result<void, AppError>> {
      entries.push({ id: generateId(), timestamp: new Date(clock()).toISOString(), ...entry });
      return ok(undefined);
    },

    async query(options: AuditQueryOptions): Promise<Result<readonly AuditEntry[], AppError>> {
      const matched = entries.filter(
        (e) => options.username === undefined || e.username === options.username,
      );
      return ok(matched.reverse().slice(0, options.limit ?? DEFAULT_LIMIT));
    },
  };
};
