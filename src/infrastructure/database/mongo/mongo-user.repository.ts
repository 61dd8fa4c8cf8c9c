import { type Db, MongoServerError } from "mongodb";
import type { User } from "../../../core/entities/user.entity.js";
import { type AppError, conflict, notFound, storage } from "../../../core/errors/app-error.js";
import type {
  CreateUserData,
  UpdateUserData,
  UserRepository,
} from "../../../core/ports/user.repository.js";
import { type Result, attempt, err, ok } from "../../../core/types/result.js";
import {
  Collections,
  type UserDocument,
  documentToUser,
  userToDocument,
  userUpdateToSet,
} from "./documents.js";

const DUPLICATE_KEY = 11000;

const isDuplicateKey = (e: unknown): boolean =>
  e instanceof MongoServerError && e.code === DUPLICATE_KEY;

export const createMongoUserRepository = (db: Db, clock: () => number = Date.now): UserRepository => {
  const users = db.collection<UserDocument>(Collections.USERS);

  return {
    findByUsername(username: string): Promise<Result<User | null, AppError>> {
      return attempt(
        async () => {
          const doc = await users.findOne({ username });
          return doc ? documentToUser(doc) : null;
        },
        (e) => storage("Failed to load user", e),
      );
    },

    async create(data: CreateUserData): Promise<Result<User, AppError>> {
      const user: User = {
        ...data,
        createdAt: new Date(clock()).toISOString(),
        lastLoginAt: null,
        active: true,
        mfaEnabled: false,
        mfaSecret: null,
      };

      const inserted = await attempt(
        () => users.insertOne(userToDocument(user)),
        (e) =>
          isDuplicateKey(e) ? conflict("Username already exists") : storage("Failed to create user", e),
      );
      return inserted.ok ? ok(user) : inserted;
    },

    async update(username: string, data: UpdateUserData): Promise<Result<User, AppError>> {
      const updated = await attempt(
        () =>
          users.findOneAndUpdate(
            { username },
            { $set: userUpdateToSet(data) },
            { returnDocument: "after" },
          ),
        (e) => storage("Failed to update user", e),
      );
      if (!updated.ok) return updated;
      if (updated.value === null) return err(notFound("User"));
      return ok(documentToUser(updated.value));
    },

    async delete(username: string): Promise<Result<void, AppError>> {
      const deleted = await attempt(
        () => users.deleteOne({ username }),
        (e) => storage("Failed to delete user", e),
      );
      if (!deleted.ok) return deleted;
      return deleted.value.deletedCount === 0 ? err(notFound("User")) : ok(undefined);
    },

    list(): Promise<Result<readonly User[], AppError>> {
      return attempt(
        async () => (await users.find({}).sort({ username: 1 }).toArray()).map(documentToUser),
        (e) => storage("Failed to list users", e),
      );
    },
  };
};
