import { z } from "zod";

/** DTOs validated at the edge via Zod: never trust input */

export const loginDto = z.object({
  username: z.string().trim().min(1).max(64),
  password: z.string().min(1).max(128),
});

export const mfaCodeDto = z.object({
  code: z
    .string()
    .trim()
    .regex(/^\d{6}$/, "Code must be 6 digits"),
});

export type LoginDto = z.infer<typeof loginDto>;
export type MfaCodeDto = z.infer<typeof mfaCodeDto>;
