/**
 * Gateway Interaction Listener
 *
 * Feeds a discord.js client's raw dispatch packets into the component,
 * modal and reaction clients. Interactions are answered over REST with
 * the client's own REST instance.
 */

import { GatewayDispatchEvents } from "discord-api-types/v10";
import type { Client } from "discord.js";
import type { ComponentClient } from "./components";
import { toError } from "./errors";
import { parseInteraction, parseReaction } from "./interaction";
import type { ModalClient } from "./modals";
import type { ReactionClient } from "./reaction";
import { createRestResponder } from "./rest";
import { createTaskTracker } from "./tasks";

const RAW_EVENT = "raw";

/**
 * Configuration for the interaction listener
 */
export interface InteractionListenerConfig {
  components?: ComponentClient;
  modals?: ModalClient;
  reactions?: ReactionClient;
  /** Only route interactions for this application */
  applicationId?: string;
  /** Ignore reactions added by the bot itself (default: true) */
  ignoreOwnReactions?: boolean;
  /** How long shutdown() waits for in-flight dispatches (default: 30000) */
  shutdownTimeoutMs?: number;
  /** Called when a packet cannot be parsed or dispatched */
  onError?: (error: Error, packetType: string) => void;
}

/**
 * Listener cleanup with graceful shutdown
 */
export interface ListenerCleanup {
  /** Stop listening immediately */
  (): void;
  /** Stop listening and wait for in-flight dispatches */
  shutdown(): Promise<void>;
}

interface RawPacket {
  t: string;
  d: unknown;
}

function isRawPacket(packet: unknown): packet is RawPacket {
  return (
    typeof packet === "object" &&
    packet !== null &&
    "t" in packet &&
    typeof packet.t === "string" &&
    "d" in packet
  );
}

/**
 * Attach the interaction listener to a Discord client.
 *
 * @returns Cleanup function with graceful shutdown support
 */
export function attachInteractionListener(
  client: Client,
  config: InteractionListenerConfig,
): ListenerCleanup {
  const tasks = createTaskTracker({
    timeoutMs: config.shutdownTimeoutMs,
    onTimeout: (pending) => {
      console.error(`[Interactions] Shut down with ${pending} dispatches still running`);
    },
  });

  const report = (error: unknown, packetType: string): void => {
    const err = toError(error);
    if (config.onError) {
      config.onError(err, packetType);
    } else {
      console.error(`[Interactions] Failed to handle ${packetType}: ${err.message}`);
    }
  };

  const handleInteraction = async (payload: unknown): Promise<void> => {
    const parsed = parseInteraction(payload);
    if (parsed.type !== "event") {
      return;
    }
    const { event } = parsed;
    if (config.applicationId !== undefined && event.applicationId !== config.applicationId) {
      return;
    }

    const responder = createRestResponder(client.rest, event);
    if (event.kind === "component" && config.components) {
      await config.components.dispatch(event, responder);
    } else if (event.kind === "modal" && config.modals) {
      await config.modals.dispatch(event, responder);
    }
  };

  const handleReaction = async (
    kind: "add" | "remove",
    payload: unknown,
  ): Promise<void> => {
    const reactions = config.reactions;
    if (!reactions) {
      return;
    }
    const event = parseReaction(kind, payload);
    if ((config.ignoreOwnReactions ?? true) && event.userId === client.user?.id) {
      return;
    }
    await reactions.dispatch(event);
  };

  const handlePacket = async (packet: RawPacket): Promise<void> => {
    try {
      switch (packet.t) {
        case GatewayDispatchEvents.InteractionCreate:
          await handleInteraction(packet.d);
          break;
        case GatewayDispatchEvents.MessageReactionAdd:
          await handleReaction("add", packet.d);
          break;
        case GatewayDispatchEvents.MessageReactionRemove:
          await handleReaction("remove", packet.d);
          break;
      }
    } catch (error) {
      report(error, packet.t);
    }
  };

  const onRaw = (packet: unknown): void => {
    if (isRawPacket(packet)) {
      void tasks.track(handlePacket(packet));
    }
  };

  client.on(RAW_EVENT, onRaw);

  const detach = (): void => {
    client.off(RAW_EVENT, onRaw);
  };

  return Object.assign(detach, {
    shutdown: async (): Promise<void> => {
      detach();
      await tasks.drain();
    },
  });
}
