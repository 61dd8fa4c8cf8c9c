import type { Filter, ObjectId, WithId } from "mongodb";
import { type Reading, ReadingSource } from "../../../core/entities/reading.entity.js";
import { USER_ROLES, type User, UserRole } from "../../../core/entities/user.entity.js";
import type { UpdateUserData } from "../../../core/ports/user.repository.js";
import {
  AuditAction,
  type AuditEntry,
  AuditStatus,
  type NewAuditEntry,
} from "../../../core/ports/audit-log.js";
import type { NewReading } from "../../../core/ports/reading.repository.js";

/**
 * Stored document shapes. Field names are shared with the dashboard and the
 * firmware tooling that read the same collections, so they stay as they are.
 */

export const Collections = {
  READINGS: "leituras",
  USERS: "usuarios",
  AUDIT: "auditoria",
} as const;

export interface ReadingDocument {
  _id?: ObjectId;
  /** ISO string; older documents may hold a BSON date or an offset-less string */
  timestamp: Date | string;
  peso_kg: number;
  sensor_id: string;
  temperatura: number;
  umidade: number;
  localizacao: string;
  fonte: string;
  timestamp_thingspeak?: string | null;
}

export interface UserDocument {
  username: string;
  hash_senha: string;
  salt: string;
  nome: string;
  role: string;
  email: string | null;
  criado_em: string;
  ultimo_login: string | null;
  ativo: boolean;
  /** Absent on accounts created before two-factor support */
  mfa_ativado?: boolean;
  mfa_secret?: string | null;
}

export interface AuditDocument {
  _id?: ObjectId;
  timestamp: string;
  usuario: string;
  acao: string;
  descricao: string;
  status: "sucesso" | "erro";
  dados_senseis: boolean;
}

// ── Readings ────────────────────────────────────────────────────────────

const SOURCES: readonly ReadingSource[] = [ReadingSource.DEVICE, ReadingSource.FEED];

export const parseSource = (value: string): ReadingSource =>
  SOURCES.find((s) => s === value) ?? ReadingSource.DEVICE;

const HAS_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i;

/** Offset-less legacy strings are UTC wall-clock times */
export const storedTimestampToIso = (value: Date | string): string => {
  if (value instanceof Date) return value.toISOString();
  return new Date(HAS_OFFSET.test(value) ? value : `${value}Z`).toISOString();
};

/**
 * `$gte` filter matching both date-typed and string-typed timestamps.
 * Legacy strings carry no offset, so the bound drops the trailing `Z`.
 */
export const timestampSinceFilter = (since: string): Filter<ReadingDocument> => {
  const bound = new Date(since);
  return {
    $or: [
      { timestamp: { $gte: bound } },
      { timestamp: { $type: "string", $gte: bound.toISOString().replace(/Z$/, "") } },
    ],
  };
};

export const readingToDocument = (r: NewReading): ReadingDocument => ({
  timestamp: r.timestamp,
  peso_kg: r.weightKg,
  sensor_id: r.sensorId,
  temperatura: r.temperature,
  umidade: r.humidity,
  localizacao: r.location,
  fonte: r.source,
  timestamp_thingspeak: r.externalTimestamp,
});

export const documentToReading = (doc: WithId<ReadingDocument>): Reading => ({
  id: doc._id.toHexString(),
  timestamp: storedTimestampToIso(doc.timestamp),
  weightKg: doc.peso_kg,
  sensorId: doc.sensor_id,
  temperature: doc.temperatura,
  humidity: doc.umidade,
  location: doc.localizacao,
  source: parseSource(doc.fonte),
  externalTimestamp: doc.timestamp_thingspeak ?? null,
});

// ── Users ───────────────────────────────────────────────────────────────

export const parseRole = (value: string): UserRole =>
  USER_ROLES.find((r) => r === value) ?? UserRole.USER;

export const userToDocument = (u: User): UserDocument => ({
  username: u.username,
  hash_senha: u.passwordHash,
  salt: u.passwordSalt,
  nome: u.name,
  role: u.role,
  email: u.email,
  criado_em: u.createdAt,
  ultimo_login: u.lastLoginAt,
  ativo: u.active,
  mfa_ativado: u.mfaEnabled,
  mfa_secret: u.mfaSecret,
});

export const documentToUser = (doc: UserDocument): User => ({
  username: doc.username,
  passwordHash: doc.hash_senha,
  passwordSalt: doc.salt,
  name: doc.nome,
  role: parseRole(doc.role),
  email: doc.email ?? null,
  createdAt: doc.criado_em,
  lastLoginAt: doc.ultimo_login ?? null,
  active: doc.ativo,
  mfaEnabled: doc.mfa_ativado ?? false,
  mfaSecret: doc.mfa_secret ?? null,
});

/** `$set` body for a partial update; undefined fields are left out */
export const userUpdateToSet = (data: UpdateUserData): Partial<UserDocument> => ({
  ...(data.passwordHash !== undefined ? { hash_senha: data.passwordHash } : {}),
  ...(data.passwordSalt !== undefined ? { salt: data.passwordSalt } : {}),
  ...(data.name !== undefined ? { nome: data.name } : {}),
  ...(data.role !== undefined ? { role: data.role } : {}),
  ...(data.email !== undefined ? { email: data.email } : {}),
  ...(data.active !== undefined ? { ativo: data.active } : {}),
  ...(data.lastLoginAt !== undefined ? { ultimo_login: data.lastLoginAt } : {}),
  ...(data.mfaEnabled !== undefined ? { mfa_ativado: data.mfaEnabled } : {}),
  ...(data.mfaSecret !== undefined ? { mfa_secret: data.mfaSecret } : {}),
});

// ── Audit ───────────────────────────────────────────────────────────────

export const auditToDocument = (entry: NewAuditEntry, timestamp: string): AuditDocument => ({
  timestamp,
  usuario: entry.username,
  acao: entry.action,
  descricao: entry.description,
  status: entry.status === AuditStatus.SUCCESS ? "sucesso" : "erro",
  dados_senseis: entry.sensitiveData,
});

const AUDIT_ACTIONS = Object.values(AuditAction);

/** Action names written by earlier releases */
const LEGACY_ACTIONS: Readonly<Record<string, AuditAction>> = {
  MFA_ATIVADO: AuditAction.MFA_ACTIVATED,
  MFA_ATIVACAO: AuditAction.MFA_ACTIVATION_FAILED,
};

export const parseAuditAction = (value: string): AuditAction | null =>
  AUDIT_ACTIONS.find((a) => a === value) ?? LEGACY_ACTIONS[value] ?? null;

/** Null for documents whose action this release does not know */
export const documentToAudit = (doc: WithId<AuditDocument>): AuditEntry | null => {
  const action = parseAuditAction(doc.acao);
  if (action === null) return null;
  return {
    id: doc._id.toHexString(),
    timestamp: doc.timestamp,
    username: doc.usuario,
    action,
    description: doc.descricao,
    status: doc.status === "sucesso" ? AuditStatus.SUCCESS : AuditStatus.ERROR,
    sensitiveData: doc.dados_senseis,
  };
};
