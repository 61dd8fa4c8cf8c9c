import type { Logger } from "../core/ports/logger.js";
import type { RequestId } from "../core/types/brand.js";

/**
 * Typed request context threaded through routing and handlers.
 * Built once per request by the server; handlers never mutate it.
 */
export interface RequestContext {
  readonly requestId: RequestId;
  readonly startTime: number;
  readonly ip: string;
  readonly method: string;
  readonly path: string;
  /** Parsed request URL, for query validation */
  readonly url: URL;
  /** Request-scoped logger with requestId pre-bound */
  readonly logger: Logger;
}
