/**
 * REST Responder
 *
 * InteractionResponder backed by the discord.js REST client. Interaction
 * callbacks and webhooks authenticate with the interaction token, so the
 * REST client does not need a bot token for these routes.
 */

import { type REST, Routes } from "discord.js";
import { toApiResponse, toMessageData } from "./response";
import type {
  InitialResponse,
  InteractionResponder,
  MessagePayload,
  SentMessage,
} from "./types";

/** The REST methods the responder needs */
export type InteractionRest = Pick<REST, "post" | "patch" | "delete">;

/** Identity of the interaction being answered */
export interface InteractionTarget {
  id: string;
  token: string;
  applicationId: string;
}

/**
 * Read the message id from a webhook response body.
 */
export function readSentMessage(body: unknown): SentMessage {
  if (
    typeof body === "object" &&
    body !== null &&
    "id" in body &&
    typeof body.id === "string"
  ) {
    return { id: body.id };
  }
  throw new Error("Webhook response did not include a message id");
}

/**
 * Create a responder for one interaction.
 */
export function createRestResponder(
  rest: InteractionRest,
  target: InteractionTarget,
): InteractionResponder {
  const { id, token, applicationId } = target;

  return {
    async createInitialResponse(response: InitialResponse): Promise<void> {
      await rest.post(Routes.interactionCallback(id, token), {
        body: toApiResponse(response),
        auth: false,
      });
    },

    async editInitialResponse(payload: MessagePayload): Promise<SentMessage> {
      const body = await rest.patch(
        Routes.webhookMessage(applicationId, token, "@original"),
        { body: toMessageData(payload), auth: false },
      );
      return readSentMessage(body);
    },

    async deleteInitialResponse(): Promise<void> {
      await rest.delete(
        Routes.webhookMessage(applicationId, token, "@original"),
        { auth: false },
      );
    },

    async createFollowup(payload: MessagePayload): Promise<SentMessage> {
      const body = await rest.post(Routes.webhook(applicationId, token), {
        body: toMessageData(payload),
        auth: false,
      });
      return readSentMessage(body);
    },

    async editFollowup(
      messageId: string,
      payload: MessagePayload,
    ): Promise<SentMessage> {
      const body = await rest.patch(
        Routes.webhookMessage(applicationId, token, messageId),
        { body: toMessageData(payload), auth: false },
      );
      return readSentMessage(body);
    },

    async deleteFollowup(messageId: string): Promise<void> {
      await rest.delete(Routes.webhookMessage(applicationId, token, messageId), {
        auth: false,
      });
    },
  };
}
