/**
 * Wire conversion for outgoing responses.
 */

import {
  type APIInteractionResponse,
  type APIInteractionResponseCallbackData,
  InteractionResponseType,
  MessageFlags,
} from "discord-api-types/v10";
import type { InitialResponse, MessagePayload } from "./types";

/**
 * Convert a message payload to callback / webhook body data.
 */
export function toMessageData(
  payload: MessagePayload,
  ephemeral = false,
): APIInteractionResponseCallbackData {
  const data: APIInteractionResponseCallbackData = {};
  if (payload.content !== undefined) data.content = payload.content;
  if (payload.embeds !== undefined) data.embeds = payload.embeds;
  if (payload.components !== undefined) data.components = payload.components;

  const flags = (payload.flags ?? 0) | (ephemeral ? MessageFlags.Ephemeral : 0);
  if (flags !== 0) data.flags = flags;

  return data;
}

/**
 * Convert an initial response to the interaction callback body.
 */
export function toApiResponse(response: InitialResponse): APIInteractionResponse {
  switch (response.type) {
    case "message":
      return {
        type: InteractionResponseType.ChannelMessageWithSource,
        data: toMessageData(response.payload, response.ephemeral),
      };
    case "update":
      return {
        type: InteractionResponseType.UpdateMessage,
        data: toMessageData(response.payload),
      };
    case "deferred-message":
      return response.ephemeral
        ? {
            type: InteractionResponseType.DeferredChannelMessageWithSource,
            data: { flags: MessageFlags.Ephemeral },
          }
        : { type: InteractionResponseType.DeferredChannelMessageWithSource };
    case "deferred-update":
      return { type: InteractionResponseType.DeferredMessageUpdate };
    case "modal":
      return { type: InteractionResponseType.Modal, data: response.modal };
  }
}
