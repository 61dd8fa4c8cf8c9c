import { type UserProfile, UserRole, toProfile } from "../../core/entities/user.entity.js";
import { type AppError, forbidden } from "../../core/errors/app-error.js";
import { AuditAction, type AuditEntry, type AuditLog } from "../../core/ports/audit-log.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { type Result, err, map, ok } from "../../core/types/result.js";
import type { AuditLogQuery, CreateUserDto, UpdateUserDto } from "../dtos/admin.dto.js";
import type { AuditTrail } from "./audit-trail.js";

export const BOOTSTRAP_ADMIN = "admin";

export interface AdminService {
  createUser(dto: CreateUserDto, actor: string): Promise<Result<UserProfile, AppError>>;
  listUsers(actor: string): Promise<Result<readonly UserProfile[], AppError>>;
  updateUser(
    username: string,
    dto: UpdateUserDto,
    actor: string,
  ): Promise<Result<UserProfile, AppError>>;
  changePassword(username: string, password: string, actor: string): Promise<Result<void, AppError>>;
  deleteUser(username: string, actor: string): Promise<Result<void, AppError>>;
  auditLogs(query: AuditLogQuery): Promise<Result<readonly AuditEntry[], AppError>>;
  /** Create the `admin` account when it does not exist yet; true when created */
  bootstrapAdmin(password: string): Promise<Result<boolean, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly passwordHasher: PasswordHasher;
  readonly auditLog: AuditLog;
  readonly audit: AuditTrail;
  readonly logger: Logger;
}

export const createAdminService = (deps: Deps): AdminService => {
  const { userRepo, passwordHasher, auditLog, audit } = deps;
  const log = deps.logger.child({ service: "admin" });

  const create = async (dto: CreateUserDto): Promise<Result<UserProfile, AppError>> => {
    const digest = await passwordHasher.hash(dto.password);
    if (!digest.ok) return digest;

    const created = await userRepo.create({
      username: dto.username,
      passwordHash: digest.value.hash,
      passwordSalt: digest.value.salt,
      name: dto.name,
      role: dto.role,
      email: dto.email,
    });
    return map(created, toProfile);
  };

  return {
    async createUser(dto, actor) {
      const created = await create(dto);
      if (!created.ok) {
        await audit.failure(actor, AuditAction.CREATE_USER, `Could not create user ${dto.username}`);
        return created;
      }

      log.info("User created", { username: dto.username, role: dto.role, actor });
      await audit.success(actor, AuditAction.CREATE_USER, `Created user ${dto.username}`);
      return created;
    },

    async listUsers(actor) {
      const users = await userRepo.list();
      if (!users.ok) return users;

      await audit.success(actor, AuditAction.READ, "Listed users");
      return ok(users.value.map(toProfile));
    },

    async updateUser(username, dto, actor) {
      if (username === actor && dto.active === false) {
        return err(forbidden("You cannot deactivate your own account"));
      }

      const updated = await userRepo.update(username, dto);
      if (!updated.ok) return updated;

      log.info("User updated", { username, actor });
      await audit.success(actor, AuditAction.UPDATE_USER, `Updated user ${username}`);
      return ok(toProfile(updated.value));
    },

    async changePassword(username, password, actor) {
      const digest = await passwordHasher.hash(password);
      if (!digest.ok) return digest;

      const updated = await userRepo.update(username, {
        passwordHash: digest.value.hash,
        passwordSalt: digest.value.salt,
      });
      if (!updated.ok) return updated;

      await audit.success(actor, AuditAction.CHANGE_PASSWORD, `Password changed for ${username}`, {
        sensitive: true,
      });
      return ok(undefined);
    },

    async deleteUser(username, actor) {
      if (username === actor) {
        return err(forbidden("You cannot delete your own account"));
      }

      const deleted = await userRepo.delete(username);
      if (!deleted.ok) return deleted;

      log.info("User deleted", { username, actor });
      await audit.success(actor, AuditAction.DELETE_USER, `Deleted user ${username}`);
      return ok(undefined);
    },

    auditLogs(query) {
      return auditLog.query({ username: query.username, limit: query.limit });
    },

    async bootstrapAdmin(password) {
      const existing = await userRepo.findByUsername(BOOTSTRAP_ADMIN);
      if (!existing.ok) return existing;
      if (existing.value !== null) return ok(false);

      const created = await create({
        username: BOOTSTRAP_ADMIN,
        password,
        name: "Administrator",
        role: UserRole.ADMIN,
        email: null,
      });
      if (!created.ok) return created;

      log.warn("Bootstrap admin account created; change its password");
      await audit.success("system", AuditAction.CREATE_USER, `Created user ${BOOTSTRAP_ADMIN}`);
      return ok(true);
    },
  };
};
