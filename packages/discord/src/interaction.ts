/**
 * Interaction Payload Parsing
 *
 * Normalises raw interaction payloads, from gateway INTERACTION_CREATE
 * packets or HTTP request bodies, into InteractionEvent. Reaction
 * dispatch packets are normalised into ReactionEvent.
 */

import { InteractionType } from "discord-api-types/v10";
import { ValidationError } from "./errors";
import type { InteractionEvent, ReactionEvent } from "./types";

/** Start of the platform's snowflake epoch (2015-01-01T00:00:00Z) */
export const DISCORD_EPOCH_MS = 1_420_070_400_000;

export type ParsedInteraction =
  | { type: "ping" }
  | { type: "event"; event: InteractionEvent }
  | { type: "unsupported"; interactionType: number };

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" ? value : undefined;
}

function requireString(source: JsonObject, key: string, where: string): string {
  const value = optionalString(source, key);
  if (value === undefined) {
    throw new ValidationError(`Malformed ${where}: missing ${key}`);
  }
  return value;
}

function requireObject(source: JsonObject, key: string, where: string): JsonObject {
  const value = source[key];
  if (!isObject(value)) {
    throw new ValidationError(`Malformed ${where}: missing ${key}`);
  }
  return value;
}

/**
 * Creation time of a snowflake in epoch milliseconds.
 *
 * @throws ValidationError if the id is not a snowflake
 */
export function snowflakeTime(id: string): number {
  if (!/^\d+$/.test(id)) {
    throw new ValidationError(`Invalid snowflake: "${id}"`);
  }
  return Number(BigInt(id) >> 22n) + DISCORD_EPOCH_MS;
}

function readUserId(payload: JsonObject): string {
  const member = payload.member;
  const user = isObject(member) && isObject(member.user) ? member.user : payload.user;
  if (!isObject(user)) {
    throw new ValidationError("Malformed interaction: missing user");
  }
  return requireString(user, "id", "interaction user");
}

function readChannelId(payload: JsonObject): string | undefined {
  const channelId = optionalString(payload, "channel_id");
  if (channelId !== undefined) {
    return channelId;
  }
  const channel = payload.channel;
  return isObject(channel) ? optionalString(channel, "id") : undefined;
}

/**
 * Text input values of a modal submission, keyed by input custom id.
 * Inputs sit in action rows, or in label components.
 */
function readModalFields(data: JsonObject): Record<string, string> {
  const fields: Record<string, string> = {};
  const rows = Array.isArray(data.components) ? data.components : [];

  for (const row of rows) {
    if (!isObject(row)) {
      continue;
    }
    const children = Array.isArray(row.components)
      ? row.components
      : [row.component];
    for (const child of children) {
      if (!isObject(child)) {
        continue;
      }
      const customId = optionalString(child, "custom_id");
      const value = optionalString(child, "value");
      if (customId !== undefined && value !== undefined) {
        fields[customId] = value;
      }
    }
  }
  return fields;
}

function readValues(data: JsonObject): string[] {
  const values = data.values;
  if (!Array.isArray(values)) {
    return [];
  }
  return values.filter((value): value is string => typeof value === "string");
}

/**
 * Parse a raw interaction payload.
 *
 * @throws ValidationError if a supported interaction is missing fields
 */
export function parseInteraction(payload: unknown): ParsedInteraction {
  if (!isObject(payload)) {
    throw new ValidationError("Malformed interaction: expected an object");
  }
  const type = payload.type;
  if (typeof type !== "number") {
    throw new ValidationError("Malformed interaction: missing type");
  }

  if (type === InteractionType.Ping) {
    return { type: "ping" };
  }
  if (type !== InteractionType.MessageComponent && type !== InteractionType.ModalSubmit) {
    return { type: "unsupported", interactionType: type };
  }

  const id = requireString(payload, "id", "interaction");
  const data = requireObject(payload, "data", "interaction");
  const message = payload.message;
  const kind = type === InteractionType.ModalSubmit ? "modal" : "component";
  const componentType = data.component_type;

  const event: InteractionEvent = {
    kind,
    id,
    token: requireString(payload, "token", "interaction"),
    applicationId: requireString(payload, "application_id", "interaction"),
    customId: requireString(data, "custom_id", "interaction data"),
    messageId: isObject(message) ? optionalString(message, "id") : undefined,
    channelId: readChannelId(payload),
    guildId: optionalString(payload, "guild_id"),
    userId: readUserId(payload),
    createdAt: snowflakeTime(id),
    values: kind === "component" ? readValues(data) : [],
    fields: kind === "modal" ? readModalFields(data) : {},
  };
  if (kind === "component" && typeof componentType === "number") {
    event.componentType = componentType;
  }
  return { type: "event", event };
}

/**
 * Parse a MESSAGE_REACTION_ADD / MESSAGE_REACTION_REMOVE packet body.
 *
 * @throws ValidationError if the packet is missing fields
 */
export function parseReaction(kind: ReactionEvent["kind"], payload: unknown): ReactionEvent {
  if (!isObject(payload)) {
    throw new ValidationError("Malformed reaction: expected an object");
  }
  const emoji = requireObject(payload, "emoji", "reaction");
  const name = optionalString(emoji, "name");
  const emojiId = optionalString(emoji, "id");
  if (name === undefined && emojiId === undefined) {
    throw new ValidationError("Malformed reaction: emoji has no name or id");
  }

  return {
    kind,
    messageId: requireString(payload, "message_id", "reaction"),
    channelId: optionalString(payload, "channel_id"),
    userId: requireString(payload, "user_id", "reaction"),
    emoji: emojiId === undefined ? (name ?? "") : `${name ?? ""}:${emojiId}`,
  };
}
