import type { User, UserRole } from "../entities/user.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: User Repository
 * Users are keyed by their unique username.
 */
export interface UserRepository {
  /** Resolves to null when no such user exists */
  findByUsername(username: string): Promise<Result<User | null, AppError>>;
  create(data: CreateUserData): Promise<Result<User, AppError>>;
  update(username: string, data: UpdateUserData): Promise<Result<User, AppError>>;
  delete(username: string): Promise<Result<void, AppError>>;
  list(): Promise<Result<readonly User[], AppError>>;
}

export interface CreateUserData {
  readonly username: string;
  readonly passwordHash: string;
  readonly passwordSalt: string;
  readonly name: string;
  readonly role: UserRole;
  readonly email: string | null;
}

export interface UpdateUserData {
  readonly passwordHash?: string | undefined;
  readonly passwordSalt?: string | undefined;
  readonly name?: string | undefined;
  readonly role?: UserRole | undefined;
  readonly email?: string | null | undefined;
  readonly active?: boolean | undefined;
  readonly lastLoginAt?: string | undefined;
  readonly mfaEnabled?: boolean | undefined;
  readonly mfaSecret?: string | null | undefined;
}

/** Apply a partial update to an immutable user value */
export const applyUserUpdate = (user: User, data: UpdateUserData): User => ({
  ...user,
  ...(data.passwordHash !== undefined ? { passwordHash: data.passwordHash } : {}),
  ...(data.passwordSalt !== undefined ? { passwordSalt: data.passwordSalt } : {}),
  ...(data.name !== undefined ? { name: data.name } : {}),
  ...(data.role !== undefined ? { role: data.role } : {}),
  ...(data.email !== undefined ? { email: data.email } : {}),
  ...(data.active !== undefined ? { active: data.active } : {}),
  ...(data.lastLoginAt !== undefined ? { lastLoginAt: data.lastLoginAt } : {}),
  ...(data.mfaEnabled !== undefined ? { mfaEnabled: data.mfaEnabled } : {}),
  ...(data.mfaSecret !== undefined ? { mfaSecret: data.mfaSecret } : {}),
});
