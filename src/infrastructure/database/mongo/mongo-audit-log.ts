import type { Db } from "mongodb";
import { type AppError, storage } from "../../../core/errors/app-error.js";
import type {
  AuditEntry,
  AuditLog,
  AuditQueryOptions,
  NewAuditEntry,
} from "../../../core/ports/audit-log.js";
import type { Logger } from "../../../core/ports/logger.js";
import { type Result, attempt, ok } from "../../../core/types/result.js";
import { type AuditDocument, Collections, auditToDocument, documentToAudit } from "./documents.js";

const DEFAULT_LIMIT = 100;

interface MongoAuditLogDeps {
  readonly db: Db;
  readonly logger: Logger;
  readonly clock?: () => number;
}

/**
 * Audit ledger in the `auditoria` collection. Append-only: nothing here
 * updates or deletes an entry.
 */
export const createMongoAuditLog = ({ db, logger, clock = Date.now }: MongoAuditLogDeps): AuditLog => {
  const audit = db.collection<AuditDocument>(Collections.AUDIT);

  return {
    async append(entry: NewAuditEntry): Promise<Result<void, AppError>> {
      const written = await attempt(
        () => audit.insertOne(auditToDocument(entry, new Date(clock()).toISOString())),
        (e) => storage("Failed to append audit entry", e),
      );
      return written.ok ? ok(undefined) : written;
    },

    query(options: AuditQueryOptions): Promise<Result<readonly AuditEntry[], AppError>> {
      const filter = options.username !== undefined ? { usuario: options.username } : {};

      return attempt(
        async () => {
          const docs = await audit
            .find(filter)
            .sort({ timestamp: -1, _id: -1 })
            .limit(options.limit ?? DEFAULT_LIMIT)
            .toArray();

          const entries: AuditEntry[] = [];
          for (const doc of docs) {
            const entry = documentToAudit(doc);
            if (entry) entries.push(entry);
            else logger.warn("Skipping audit entry with unknown action", { action: doc.acao });
          }
          return entries;
        },
        (e) => storage("Failed to query audit log", e),
      );
    },
  };
};
