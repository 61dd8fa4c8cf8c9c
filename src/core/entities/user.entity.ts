/**
 * User entity: pure data, no behaviour, no framework deps.
 * Timestamps are ISO-8601 strings, matching the stored documents.
 */
export interface User {
  readonly username: string;
  readonly passwordHash: string;
  readonly passwordSalt: string;
  readonly name: string;
  readonly role: UserRole;
  readonly email: string | null;
  readonly createdAt: string;
  readonly lastLoginAt: string | null;
  readonly active: boolean;
  readonly mfaEnabled: boolean;
  readonly mfaSecret: string | null;
}

/** Role names are persisted as-is and must stay stable */
export const UserRole = {
  ADMIN: "admin",
  MANAGER: "gestor",
  USER: "usuario",
} as const;

export type UserRole = (typeof UserRole)[keyof typeof UserRole];

export const USER_ROLES = [UserRole.ADMIN, UserRole.MANAGER, UserRole.USER] as const;

export const Permission = {
  CREATE: "create",
  READ: "read",
  UPDATE: "update",
  DELETE: "delete",
  EXPORT: "export",
  ANALYZE: "analyze",
} as const;

export type Permission = (typeof Permission)[keyof typeof Permission];

/**
 * Role → permission table. Keyed by the full UserRole union, so adding a
 * role without granting it anything fails to compile.
 */
export const ROLE_PERMISSIONS: Readonly<Record<UserRole, ReadonlySet<Permission>>> = {
  admin: new Set<Permission>([
    Permission.CREATE,
    Permission.READ,
    Permission.UPDATE,
    Permission.DELETE,
    Permission.EXPORT,
    Permission.ANALYZE,
  ]),
  gestor: new Set<Permission>([
    Permission.READ,
    Permission.UPDATE,
    Permission.EXPORT,
    Permission.ANALYZE,
  ]),
  usuario: new Set<Permission>([Permission.READ]),
};

export const hasPermission = (role: UserRole, permission: Permission): boolean =>
  ROLE_PERMISSIONS[role].has(permission);

/** Public projection of a user: never carries hash, salt or TOTP secret */
export interface UserProfile {
  readonly username: string;
  readonly name: string;
  readonly role: UserRole;
  readonly email: string | null;
  readonly active: boolean;
  readonly mfaEnabled: boolean;
  readonly createdAt: string;
  readonly lastLoginAt: string | null;
}

export const toProfile = (u: User): UserProfile => ({
  username: u.username,
  name: u.name,
  role: u.role,
  email: u.email,
  active: u.active,
  mfaEnabled: u.mfaEnabled,
  createdAt: u.createdAt,
  lastLoginAt: u.lastLoginAt,
});
