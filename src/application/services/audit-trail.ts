import {
  type AuditAction,
  type AuditLog,
  AuditStatus,
} from "../../core/ports/audit-log.js";
import type { Logger } from "../../core/ports/logger.js";

interface RecordOptions {
  /** Entry concerns sensitive data (credentials, secrets) */
  readonly sensitive?: boolean;
}

/**
 * Best-effort wrapper over the audit log. A failed write is logged and
 * swallowed here, so the action being audited keeps its own outcome.
 */
export interface AuditTrail {
  success(actor: string, action: AuditAction, description: string, options?: RecordOptions): Promise<void>;
  failure(actor: string, action: AuditAction, description: string, options?: RecordOptions): Promise<void>;
}

export const createAuditTrail = (auditLog: AuditLog, logger: Logger): AuditTrail => {
  const log = logger.child({ component: "audit" });

  const record = async (
    actor: string,
    action: AuditAction,
    description: string,
    status: AuditStatus,
    options: RecordOptions,
  ): Promise<void> => {
    const result = await auditLog.append({
      username: actor,
      action,
      description,
      status,
      sensitiveData: options.sensitive ?? false,
    });
    if (!result.ok) {
      log.error("Audit write failed", { action, actor, error: result.error.message });
    }
  };

  return {
    success: (actor, action, description, options = {}) =>
      record(actor, action, description, AuditStatus.SUCCESS, options),
    failure: (actor, action, description, options = {}) =>
      record(actor, action, description, AuditStatus.ERROR, options),
  };
};
