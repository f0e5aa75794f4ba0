/**
 * Bot-list Services
 *
 * Each service posts the current guild count to one bot list. Counts
 * for a subset of shards are posted per shard where the list supports it.
 */

import {
  type BackoffConfig,
  DEFAULT_MAX_RETRIES,
  type RetryDecision,
  createBackoff,
  retryWithBackoff,
} from "@latch/discord";
import { CountUnknownError, ServiceRequestError } from "./errors";
import type { ListService, ServiceContext } from "./types";

const TOP_GG_API = "https://top.gg/api";
const BOTS_GG_API = "https://discord.bots.gg/api/v1";
const DISCORD_BOT_LIST_API = "https://discordbotlist.com/api/v1";

/** Statuses worth retrying a per-shard post for */
const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);

type JsonBody = Record<string, unknown>;

/**
 * Parse a Retry-After header given in seconds.
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (value === null || value.trim() === "") {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

async function ensureOk(service: string, response: Response): Promise<void> {
  if (response.ok) {
    return;
  }
  const body = await response.text().catch(() => "<unreadable body>");
  throw new ServiceRequestError(
    service,
    response.status,
    body,
    parseRetryAfter(response.headers.get("retry-after")),
  );
}

function headers(ctx: ServiceContext, token: string): Record<string, string> {
  return {
    Authorization: token,
    "User-Agent": ctx.userAgent,
    "Content-Type": "application/json",
  };
}

async function postJson(
  ctx: ServiceContext,
  service: string,
  url: string,
  token: string,
  body: JsonBody,
): Promise<void> {
  const response = await ctx.fetch(url, {
    method: "POST",
    headers: headers(ctx, token),
    body: JSON.stringify(body),
    signal: ctx.signal,
  });
  await ensureOk(service, response);
}

// ============================================================================
// top.gg
// ============================================================================

const TOP_GG = "Top.GG";

async function fetchTopGGShards(
  ctx: ServiceContext,
  url: string,
  token: string,
): Promise<number[]> {
  const response = await ctx.fetch(url, {
    method: "GET",
    headers: headers(ctx, token),
    signal: ctx.signal,
  });
  await ensureOk(TOP_GG, response);

  const data: unknown = await response.json();
  if (typeof data !== "object" || data === null || !("shards" in data)) {
    return [];
  }
  const shards = data.shards;
  if (!Array.isArray(shards)) {
    return [];
  }
  return shards.map((value: unknown) => {
    const count = Number(value);
    return Number.isFinite(count) ? count : 0;
  });
}

/**
 * https://top.gg. Shard-bound counts are merged into the shard counts
 * top.gg already has, which needs the total shard count.
 */
export function createTopGGService(token: string): ListService {
  return {
    name: TOP_GG,

    async post(ctx) {
      const counts = await ctx.counter.count();
      const shardCount = ctx.counter.shardCount();
      const url = `${TOP_GG_API}/bots/${ctx.userId}/stats`;

      const body: JsonBody = {};
      if (typeof counts === "number") {
        body.server_count = counts;
      } else {
        if (shardCount === undefined) {
          throw new CountUnknownError("Shard count unknown");
        }
        const existing = await fetchTopGGShards(ctx, url, token);
        body.shards = Array.from(
          { length: shardCount },
          (_, shardId) => counts.get(shardId) ?? existing[shardId] ?? 0,
        );
      }
      if (shardCount !== undefined) {
        body.shard_count = shardCount;
      }

      await postJson(ctx, TOP_GG, url, token, body);
    },
  };
}

// ============================================================================
// discord.bots.gg
// ============================================================================

const BOTS_GG = "Bots.GG";

/**
 * https://discord.bots.gg
 */
export function createBotsGGService(token: string): ListService {
  return {
    name: BOTS_GG,

    async post(ctx) {
      const counts = await ctx.counter.count();
      const shardCount = ctx.counter.shardCount();

      const body: JsonBody =
        typeof counts === "number"
          ? { guildCount: counts }
          : {
              shards: [...counts].map(([shardId, guildCount]) => ({ shardId, guildCount })),
            };
      if (shardCount !== undefined) {
        body.shardCount = shardCount;
      }

      await postJson(ctx, BOTS_GG, `${BOTS_GG_API}/bots/${ctx.userId}/stats`, token, body);
    },
  };
}

// ============================================================================
// discordbotlist.com
// ============================================================================

const DISCORD_BOT_LIST = "DiscordBotList";

export interface DiscordBotListOptions {
  /** Backoff for per-shard retries (default: DEFAULT_MAX_RETRIES retries) */
  backoff?: BackoffConfig;
}

function classifyShardError(error: Error): RetryDecision {
  if (error instanceof ServiceRequestError && RETRY_STATUSES.has(error.status)) {
    return { retry: true, afterMs: error.retryAfterMs };
  }
  return { retry: false };
}

/**
 * https://discordbotlist.com. Shard counts are posted one shard at a
 * time, retrying rate limits and server errors.
 */
export function createDiscordBotListService(
  token: string,
  options: DiscordBotListOptions = {},
): ListService {
  return {
    name: DISCORD_BOT_LIST,

    async post(ctx) {
      const counts = await ctx.counter.count();
      const url = `${DISCORD_BOT_LIST_API}/bots/${ctx.userId}/stats`;

      if (typeof counts === "number") {
        await postJson(ctx, DISCORD_BOT_LIST, url, token, { guilds: counts });
        return;
      }

      for (const [shardId, guilds] of counts) {
        await retryWithBackoff(
          () => postJson(ctx, DISCORD_BOT_LIST, url, token, { guilds, shard_id: shardId }),
          {
            backoff: createBackoff({
              maxRetries: DEFAULT_MAX_RETRIES,
              ...options.backoff,
              signal: ctx.signal,
            }),
            classify: classifyShardError,
          },
        );
      }
    },
  };
}
