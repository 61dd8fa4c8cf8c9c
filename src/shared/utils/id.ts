import { randomBytes, randomUUID } from "node:crypto";

/** Random UUIDv4 for request ids and stored documents */
export const generateId = (): string => randomUUID();

/** Opaque bearer token: 32 random bytes, base64url */
export const generateToken = (): string => randomBytes(32).toString("base64url");
