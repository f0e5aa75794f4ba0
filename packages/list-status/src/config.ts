/**
 * Environment configuration for the list-status CLI.
 */

import { ValidationError } from "@latch/discord";
import { DEFAULT_SERVICE_INTERVAL_MS, MIN_SERVICE_INTERVAL_MS } from "./types";

export interface ServiceEnvConfig {
  topGGToken?: string;
  botsGGToken?: string;
  discordBotListToken?: string;
  intervalMs: number;
  /** Taken from the logged in client when omitted */
  userId?: string;
}

/**
 * Read service settings from the environment.
 *
 * @throws ValidationError if LIST_STATUS_INTERVAL_MS is malformed
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceEnvConfig {
  const rawInterval = env.LIST_STATUS_INTERVAL_MS;
  let intervalMs = DEFAULT_SERVICE_INTERVAL_MS;
  if (rawInterval) {
    intervalMs = Number(rawInterval);
    if (!Number.isInteger(intervalMs) || intervalMs < MIN_SERVICE_INTERVAL_MS) {
      throw new ValidationError(
        `LIST_STATUS_INTERVAL_MS must be an integer of at least ${MIN_SERVICE_INTERVAL_MS}: "${rawInterval}"`,
      );
    }
  }

  return {
    topGGToken: env.TOPGG_TOKEN || undefined,
    botsGGToken: env.BOTSGG_TOKEN || undefined,
    discordBotListToken: env.DBL_TOKEN || undefined,
    intervalMs,
    userId: env.BOT_USER_ID || undefined,
  };
}
