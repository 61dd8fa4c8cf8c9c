import {
  type IncomingMessage,
  type Server,
  type ServerResponse,
  createServer as createHttpServer,
} from "node:http";
import { internal, payloadTooLarge } from "../core/errors/app-error.js";
import type { Logger } from "../core/ports/logger.js";
import { brand } from "../core/types/brand.js";
import type { AppConfig } from "../infrastructure/config/config.js";
import { formatAccessLog } from "../shared/log-format.js";
import { generateId } from "../shared/utils/id.js";
import type { RequestContext } from "./context.js";
import { errorResponse } from "./handlers/response.js";
import { corsHeaders } from "./middleware/cors.js";
import { securityHeaders } from "./middleware/security-headers.js";
import type { Router } from "./routes/router.js";

export const MAX_BODY_BYTES = 1_048_576; // 1 MiB

type ServerConfig = Pick<AppConfig, "env" | "port" | "host" | "cors" | "log">;

interface ServerDeps {
  readonly config: ServerConfig;
  readonly logger: Logger;
  readonly router: Router;
}

export class BodyTooLargeError extends Error {
  constructor() {
    super("Request body too large");
    this.name = "BodyTooLargeError";
  }
}

const readBody = async (req: IncomingMessage): Promise<string> => {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new BodyTooLargeError();
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString("utf8");
};

/** Node's incoming message → Fetch API Request */
const toRequest = async (req: IncomingMessage): Promise<Request> => {
  const method = req.method ?? "GET";
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(key, v);
    } else {
      headers.set(key, value);
    }
  }

  const hasBody = method !== "GET" && method !== "HEAD";
  const body = hasBody ? await readBody(req) : "";
  return new Request(url, { method, headers, body: body === "" ? null : body });
};

/** Response for a request that failed before reaching the pipeline */
export const bridgeErrorResponse = (e: unknown, logger: Logger): Response => {
  const requestId = generateId();
  if (e instanceof BodyTooLargeError) {
    return errorResponse(payloadTooLarge(MAX_BODY_BYTES), requestId);
  }
  logger.error("Request bridge failed", { requestId, error: e });
  return errorResponse(internal("Request bridge failed", e), requestId);
};

const writeResponse = async (response: Response, res: ServerResponse): Promise<void> => {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  const payload = Buffer.from(await response.arrayBuffer());
  res.end(payload);
};

export const createServer = (deps: ServerDeps) => {
  const { config, logger, router } = deps;

  const secHeaderEntries: ReadonlyArray<readonly [string, string]> = Object.freeze(
    Object.entries(securityHeaders(config)),
  );

  const internalErrorBody = (requestId: string): string =>
    JSON.stringify({ error: { code: "INTERNAL", message: "Internal server error" }, requestId });

  const shouldLog = config.log.level === "debug" || config.log.level === "info";

  const accessLog = (
    method: string,
    path: string,
    status: number,
    startTime: number,
    ip: string,
    requestId: string,
  ): void => {
    if (!shouldLog) return;
    const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
    if (config.log.format === "pretty") {
      process.stdout.write(formatAccessLog(method, path, status, durationMs, ip, requestId));
    } else {
      logger.info("HTTP request", { method, path, status, durationMs, ip, requestId });
    }
  };

  /** Apply cross-cutting headers; rejected origins get no CORS headers */
  const decorate = (response: Response, req: Request, requestId: string): Response => {
    const headers = new Headers(response.headers);
    headers.set("X-Request-Id", requestId);
    for (const [k, v] of secHeaderEntries) headers.set(k, v);

    const cors = corsHeaders(config, req.headers.get("origin"));
    if (cors) {
      for (const [k, v] of Object.entries(cors)) headers.set(k, v);
    }

    return new Response(response.body, { status: response.status, headers });
  };

  /**
   * Route one Fetch API request through the pipeline. Never rejects.
   */
  const handle = async (req: Request, ip = "0"): Promise<Response> => {
    const startTime = performance.now();
    const method = req.method;
    const url = new URL(req.url);
    const path = url.pathname;
    const requestId = req.headers.get("x-request-id") ?? generateId();

    if (method === "OPTIONS") {
      const cors = corsHeaders(config, req.headers.get("origin"));
      const status = cors ? 204 : 403;
      if (!cors) logger.warn("CORS preflight rejected", { origin: req.headers.get("origin") });
      accessLog(method, path, status, startTime, ip, requestId);
      return decorate(new Response(null, { status }), req, requestId);
    }

    const ctx: RequestContext = {
      requestId: brand<string, "RequestId">(requestId),
      startTime,
      ip,
      method,
      path,
      url,
      logger: logger.child({ requestId }),
    };

    let response: Response;
    try {
      response = await router.handle(req, ctx);
    } catch (e: unknown) {
      logger.error("Unhandled error", { requestId, path, error: e });
      response = new Response(internalErrorBody(requestId), {
        status: 500,
        headers: { "Content-Type": "application/json; charset=utf-8" },
      });
    }

    accessLog(method, path, response.status, startTime, ip, requestId);
    return decorate(response, req, requestId);
  };

  const onRequest = async (incoming: IncomingMessage, res: ServerResponse): Promise<void> => {
    const ip = incoming.socket.remoteAddress ?? "0";
    let response: Response;
    try {
      response = await handle(await toRequest(incoming), ip);
    } catch (e: unknown) {
      response = bridgeErrorResponse(e, logger);
    }
    await writeResponse(response, res);
  };

  let server: Server | null = null;

  return {
    handle,

    listen(): Promise<Server> {
      const http = createHttpServer((incoming, res) => {
        onRequest(incoming, res).catch((e: unknown) => {
          logger.error("Response write failed", { error: e });
          res.destroy();
        });
      });
      http.requestTimeout = 30_000;
      server = http;
      return new Promise((resolve, reject) => {
        http.once("error", reject);
        http.listen(config.port, config.host, () => {
          http.off("error", reject);
          resolve(http);
        });
      });
    },

    close(): Promise<void> {
      const http = server;
      if (http === null) return Promise.resolve();
      server = null;
      return new Promise((resolve, reject) => {
        http.close((e) => (e ? reject(e) : resolve()));
        http.closeAllConnections();
      });
    },
  };
};

export type AppServer = ReturnType<typeof createServer>;
