/**
 * Bot-list Status Reporting
 *
 * Posts the bot's guild count to bot-list services on a schedule.
 */

// Types
export type {
  ShardCounts,
  GuildCount,
  CountStrategy,
  FetchLike,
  ServiceContext,
  ListService,
  ServiceManager,
  ServiceManagerConfig,
  ServiceManagerEvents,
  AddServiceOptions,
} from "./types";

// Constants
export {
  DEFAULT_SERVICE_INTERVAL_MS,
  MIN_SERVICE_INTERVAL_MS,
  DEFAULT_USER_AGENT,
} from "./types";

// Errors
export { ServiceRequestError, CountUnknownError } from "./errors";

// Count strategies
export { createClientStrategy, createStaticStrategy } from "./strategies";

// Services
export {
  createTopGGService,
  createBotsGGService,
  createDiscordBotListService,
  parseRetryAfter,
  type DiscordBotListOptions,
} from "./services";

// Manager
export { createServiceManager } from "./manager";

// Configuration
export { loadServiceConfig, type ServiceEnvConfig } from "./config";
