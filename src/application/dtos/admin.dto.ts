import { z } from "zod";
import { USER_ROLES } from "../../core/entities/user.entity.js";

/**
 * Admin DTOs: validated at the edge via Zod.
 */

const password = z.string().min(8).max(128);

export const createUserDto = z.object({
  username: z
    .string()
    .trim()
    .min(3)
    .max(64)
    .regex(/^[a-zA-Z0-9._-]+$/, "Letters, digits, dot, underscore and hyphen only"),
  password,
  name: z.string().trim().min(1).max(120),
  role: z.enum(USER_ROLES).default("usuario"),
  email: z.string().trim().toLowerCase().email().max(255).nullable().default(null),
});

export const updateUserDto = z
  .object({
    name: z.string().trim().min(1).max(120).optional(),
    email: z.string().trim().toLowerCase().email().max(255).nullable().optional(),
    role: z.enum(USER_ROLES).optional(),
    active: z.boolean().optional(),
  })
  .refine((d) => Object.values(d).some((v) => v !== undefined), {
    message: "At least one field must be provided",
  });

export const changePasswordDto = z.object({
  password,
});

export const auditLogQuery = z.object({
  username: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type CreateUserDto = z.infer<typeof createUserDto>;
export type UpdateUserDto = z.infer<typeof updateUserDto>;
export type ChangePasswordDto = z.infer<typeof changePasswordDto>;
export type AuditLogQuery = z.infer<typeof auditLogQuery>;
