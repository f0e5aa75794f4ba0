/**
 * Bot-list Status CLI
 *
 * Logs in to the gateway and posts the guild count to every bot list
 * with a configured token.
 *
 * Usage:
 *   DISCORD_TOKEN=your-token TOPGG_TOKEN=... tsx packages/list-status/cli.ts
 *
 * Environment:
 *   TOPGG_TOKEN, BOTSGG_TOKEN, DBL_TOKEN  Bot-list tokens
 *   LIST_STATUS_INTERVAL_MS              Time between posts (default: 1 hour)
 *   BOT_USER_ID                          Defaults to the logged in user
 */

import { connectGateway, toError } from "@latch/discord";
import { Client, GatewayIntentBits } from "discord.js";
import {
  type ListService,
  createBotsGGService,
  createClientStrategy,
  createDiscordBotListService,
  createServiceManager,
  createTopGGService,
  loadServiceConfig,
} from "./src";

const token = process.env.DISCORD_TOKEN;
if (!token) {
  console.error("❌ DISCORD_TOKEN environment variable is required");
  process.exit(1);
}

let config: ReturnType<typeof loadServiceConfig>;
try {
  config = loadServiceConfig();
} catch (error) {
  console.error(`❌ ${toError(error).message}`);
  process.exit(1);
}

const services: ListService[] = [];
if (config.topGGToken) {
  services.push(createTopGGService(config.topGGToken));
}
if (config.botsGGToken) {
  services.push(createBotsGGService(config.botsGGToken));
}
if (config.discordBotListToken) {
  services.push(createDiscordBotListService(config.discordBotListToken));
}
if (services.length === 0) {
  console.error("❌ Set at least one of TOPGG_TOKEN, BOTSGG_TOKEN or DBL_TOKEN");
  process.exit(1);
}

const client = new Client({ intents: [GatewayIntentBits.Guilds] });

try {
  await connectGateway(client, token);
} catch (error) {
  console.error(`❌ Failed to connect: ${toError(error).message}`);
  await client.destroy();
  process.exit(1);
}

const userId = config.userId ?? client.user?.id;
if (!userId) {
  console.error("❌ Could not determine the bot's user id");
  await client.destroy();
  process.exit(1);
}

const manager = createServiceManager({
  counter: createClientStrategy(client),
  userId,
  events: {
    onPost: (name) => console.log(`📤 Posted stats to ${name}`),
  },
});
for (const service of services) {
  manager.addService(service, { intervalMs: config.intervalMs });
}

async function shutdown(): Promise<void> {
  await manager.close();
  await client.destroy();
}

process.on("SIGINT", () => {
  console.log("\n⏳ Shutting down...");
  void shutdown().then(() => process.exit(0));
});

process.on("SIGTERM", () => {
  void shutdown().then(() => process.exit(0));
});

await manager.open();
console.log(`✅ Reporting ${services.map((s) => s.name).join(", ")} every ${config.intervalMs}ms`);
