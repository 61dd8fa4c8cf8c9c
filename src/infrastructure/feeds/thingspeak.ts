import { z } from "zod";
import { type AppError, appError, ErrorCode } from "../../core/errors/app-error.js";
import type { FeedSample, FeedSource } from "../../core/ports/feed-source.js";
import type { Logger } from "../../core/ports/logger.js";
import { type Result, err, ok } from "../../core/types/result.js";

const feedResponseSchema = z.object({
  feeds: z.array(
    z.object({
      created_at: z.string().min(1),
      field1: z.string().nullable().optional(),
    }),
  ),
});

interface ThingSpeakOptions {
  readonly baseUrl: string;
  readonly channelId: string;
  readonly apiKey?: string | undefined;
  readonly timeoutMs: number;
  readonly logger: Logger;
  readonly fetch?: typeof fetch;
}

const upstream = (message: string, cause?: unknown): AppError =>
  appError(ErrorCode.INTERNAL, message, { cause });

/**
 * ThingSpeak channel feed. `field1` carries the weight in kg and
 * `created_at` is the upstream timestamp used for de-duplication.
 */
export const createThingSpeakFeed = (options: ThingSpeakOptions): FeedSource => {
  const doFetch = options.fetch ?? fetch;
  const log = options.logger.child({ feed: "thingspeak", channel: options.channelId });

  const url = (): string => {
    const u = new URL(`${options.baseUrl.replace(/\/+$/, "")}/${options.channelId}/feeds.json`);
    u.searchParams.set("results", "1");
    if (options.apiKey !== undefined) u.searchParams.set("api_key", options.apiKey);
    return u.toString();
  };

  return {
    name: "thingspeak",

    async latest(): Promise<Result<FeedSample | null, AppError>> {
      let body: unknown;
      try {
        const res = await doFetch(url(), { signal: AbortSignal.timeout(options.timeoutMs) });
        if (!res.ok) return err(upstream(`Feed responded with HTTP ${res.status}`));
        body = await res.json();
      } catch (e: unknown) {
        return err(upstream("Feed request failed", e));
      }

      const parsed = feedResponseSchema.safeParse(body);
      if (!parsed.success) return err(upstream("Feed response has an unexpected shape"));

      const entry = parsed.data.feeds[0];
      if (entry === undefined) {
        log.debug("Feed is empty");
        return ok(null);
      }

      const raw = entry.field1?.trim();
      const weightKg = raw ? Number(raw) : Number.NaN;
      if (!Number.isFinite(weightKg) || weightKg < 0) {
        return err(upstream("Feed sample has no usable weight", { field1: entry.field1 }));
      }

      return ok({ weightKg, externalTimestamp: entry.created_at });
    },
  };
};
