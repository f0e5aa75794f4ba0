/**
 * Guild count strategies.
 */

import type { Client } from "discord.js";
import { CountUnknownError } from "./errors";
import type { CountStrategy, GuildCount } from "./types";

/**
 * Count the guilds cached by a discord.js client, per shard.
 *
 * Needs the Guilds intent. Shards this process runs with no guilds are
 * reported as zero when the client was given explicit shard ids.
 */
export function createClientStrategy(client: Client): CountStrategy {
  return {
    isShardBound: true,

    shardCount() {
      return client.options.shardCount;
    },

    async count() {
      if (!client.isReady()) {
        throw new CountUnknownError("Client is not ready");
      }

      const counts = new Map<number, number>();
      const shards = client.options.shards;
      if (shards !== undefined && shards !== "auto" && typeof shards !== "number") {
        for (const shardId of shards) {
          counts.set(shardId, 0);
        }
      }
      for (const guild of client.guilds.cache.values()) {
        counts.set(guild.shardId, (counts.get(guild.shardId) ?? 0) + 1);
      }
      return counts;
    },
  };
}

/**
 * Report a fixed count.
 */
export function createStaticStrategy(
  count: GuildCount,
  options: { shardCount?: number } = {},
): CountStrategy {
  return {
    isShardBound: typeof count !== "number",
    shardCount: () => options.shardCount,
    count: async () => count,
  };
}
