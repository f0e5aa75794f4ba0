/**
 * Gateway Client Management
 *
 * Creates and connects the discord.js client that feeds the interaction
 * listener.
 */

import { Client, Events, GatewayIntentBits, Partials } from "discord.js";

/** How long connectGateway waits for the ready event */
export const DEFAULT_CONNECTION_TIMEOUT_MS = 30_000;

/**
 * Configuration for gateway client creation
 */
export interface GatewayClientConfig {
  /** Gateway intents (default: guilds and message reactions) */
  intents?: GatewayIntentBits[];
  partials?: Partials[];
}

/**
 * Intents needed to receive reaction events. Interactions arrive without
 * any intent.
 */
const DEFAULT_INTENTS = [
  GatewayIntentBits.Guilds,
  GatewayIntentBits.GuildMessageReactions,
  GatewayIntentBits.DirectMessageReactions,
];

const DEFAULT_PARTIALS = [Partials.Channel, Partials.Message, Partials.Reaction];

export function createGatewayClient(config?: GatewayClientConfig): Client {
  return new Client({
    intents: config?.intents ?? DEFAULT_INTENTS,
    partials: config?.partials ?? DEFAULT_PARTIALS,
  });
}

/**
 * Log in and wait for the client to become ready.
 */
export function connectGateway(
  client: Client,
  token: string,
  options?: { timeoutMs?: number },
): Promise<void> {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS;

  return new Promise((resolve, reject) => {
    let settled = false;

    const settle = (error?: Error): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeoutId);
      client.off(Events.ClientReady, onReady);
      client.off(Events.Error, onError);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    const timeoutId = setTimeout(() => {
      settle(new Error("Connection timeout"));
    }, timeoutMs);
    const onReady = (): void => settle();
    const onError = (error: Error): void => settle(error);

    client.once(Events.ClientReady, onReady);
    client.once(Events.Error, onError);

    client.login(token).catch((error: unknown) => {
      settle(error instanceof Error ? error : new Error(String(error)));
    });
  });
}
