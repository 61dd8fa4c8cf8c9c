import type { AppError } from "../../core/errors/app-error.js";
import { httpStatus, isServerError } from "../../core/errors/app-error.js";
import type { RequestContext } from "../context.js";

/**
 * Serialise an AppError into a JSON response. Never leaks internals:
 * server-side failures go out with a generic message and no details.
 */
export const errorResponse = (error: AppError, requestId: string): Response => {
  const status = httpStatus(error.code);
  const hidden = isServerError(error.code);
  const body = {
    error: {
      code: error.code,
      message: hidden ? "Internal server error" : error.message,
      ...(error.reason !== undefined && !hidden ? { reason: error.reason } : {}),
      ...(error.details !== undefined && !hidden ? { details: error.details } : {}),
    },
    requestId,
  };

  return Response.json(body, { status });
};

/** Success response helper */
export const jsonResponse = <T>(data: T, status = 200): Response =>
  Response.json({ data }, { status });

/** 201 Created */
export const createdResponse = <T>(data: T): Response => Response.json({ data }, { status: 201 });

/** 204 No Content */
export const noContentResponse = (): Response => new Response(null, { status: 204 });

/** CSV attachment download */
export const csvResponse = (csv: string, filename: string): Response =>
  new Response(csv, {
    status: 200,
    headers: {
      "Content-Type": "text/csv; charset=utf-8",
      "Content-Disposition": `attachment; filename="${filename}"`,
    },
  });

/**
 * Log a failed operation on the request logger, then serialise it.
 * Server-side failures log at error level with their cause.
 */
export const failure = (ctx: RequestContext, action: string, error: AppError): Response => {
  const meta = { code: error.code, reason: error.reason, path: ctx.path };
  if (isServerError(error.code)) {
    ctx.logger.error(`${action} failed`, { ...meta, message: error.message, cause: error.cause });
  } else {
    ctx.logger.warn(`${action} failed`, meta);
  }
  return errorResponse(error, ctx.requestId);
};
