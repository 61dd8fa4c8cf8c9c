import type { User } from "../../core/entities/user.entity.js";
import { type AppError, conflict, notFound } from "../../core/errors/app-error.js";
import {
  type CreateUserData,
  type UpdateUserData,
  type UserRepository,
  applyUserUpdate,
} from "../../core/ports/user.repository.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * In-memory user repository: development without MONGODB_URI, and tests.
 */
export const createInMemoryUserRepository = (clock: () => number = Date.now): UserRepository => {
  const store = new Map<string, User>();

  return {
    async findByUsername(username: string): Promise<Result<User | null, AppError>> {
      return ok(store.get(username) ?? null);
    },

    async create(data: CreateUserData): Promise<Result<User, AppError>> {
      if (store.has(data.username)) return err(conflict("Username already exists"));

      const user: User = {
        ...data,
        createdAt: new Date(clock()).toISOString(),
        lastLoginAt: null,
        active: true,
        mfaEnabled: false,
        mfaSecret: null,
      };

      store.set(user.username, user);
      return ok(user);
    },

    async update(username: string, data: UpdateUserData): Promise<Result<User, AppError>> {
      const existing = store.get(username);
      if (!existing) return err(notFound("User"));

      const updated = applyUserUpdate(existing, data);
      store.set(username, updated);
      return ok(updated);
    },

    async delete(username: string): Promise<Result<void, AppError>> {
      if (!store.delete(username)) return err(notFound("User"));
      return ok(undefined);
    },

    async list(): Promise<Result<readonly User[], AppError>> {
      return ok([...store.values()].sort((a, b) => a.username.localeCompare(b.username)));
    },
  };
};
