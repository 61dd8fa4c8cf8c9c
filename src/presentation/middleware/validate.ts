import type { ZodTypeAny, output } from "zod";
import { type AppError, validation } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Validate an unknown value against a Zod schema.
 * Returns a typed Result: never throws.
 */
export const validateBody = <S extends ZodTypeAny>(
  schema: S,
  body: unknown,
): Result<output<S>, AppError> => {
  const result = schema.safeParse(body);
  if (!result.success) {
    const { formErrors, fieldErrors } = result.error.flatten();
    return err(validation({ formErrors, fieldErrors }));
  }
  return ok(result.data);
};

/** Query strings arrive as a flat record; repeated keys keep the last value */
export const validateQuery = <S extends ZodTypeAny>(
  schema: S,
  url: URL,
): Result<output<S>, AppError> => validateBody(schema, Object.fromEntries(url.searchParams));

/** Parse a JSON request body, then validate it */
export const validateJson = async <S extends ZodTypeAny>(
  schema: S,
  req: Request,
): Promise<Result<output<S>, AppError>> => {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return err(validation({ formErrors: ["Request body must be valid JSON"], fieldErrors: {} }));
  }
  return validateBody(schema, body);
};
