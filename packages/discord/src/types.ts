/**
 * Interaction Types and Interfaces
 *
 * Platform-neutral shapes shared by the clients, contexts and adapters.
 * Interactions enter as an InteractionEvent and leave through an
 * InteractionResponder, so nothing here depends on discord.js objects.
 */

import type {
  APIActionRowComponent,
  APIEmbed,
  APIComponentInMessageActionRow as APIMessageActionRowComponent,
  APIModalInteractionResponseCallbackData,
  ComponentType,
} from "discord-api-types/v10";

// ============================================================================
// Constants
// ============================================================================

/** Separator between the match and metadata parts of a custom id */
export const CUSTOM_ID_SEPARATOR = ":";

/** Platform limit on custom id length */
export const MAX_CUSTOM_ID_LENGTH = 100;

/** Interval between expiry sweeps */
export const DEFAULT_SWEEP_INTERVAL_MS = 5_000;

/** Default sliding timeout for component executors */
export const DEFAULT_EXECUTOR_TIMEOUT_MS = 30_000;

/** Default sliding timeout for modal registrations */
export const DEFAULT_MODAL_TIMEOUT_MS = 600_000;

/** How long an interaction token stays valid */
export const INTERACTION_LIFETIME_MS = 15 * 60_000;

/** Scheduled deletions must fire at least this long before the token expires */
export const DELETE_AFTER_MARGIN_MS = 10_000;

/** Window the platform gives for the initial response */
export const INITIAL_RESPONSE_WINDOW_MS = 3_000;

/** Sent when someone outside an executor's allow-list uses it */
export const NOT_PERMITTED_MESSAGE = "You are not allowed to use this component.";

/** Sent when a component interaction has no live executor */
export const COMPONENT_EXPIRED_MESSAGE = "This message has timed-out.";

/** Sent when a modal submission has no live registration */
export const MODAL_EXPIRED_MESSAGE = "This modal has timed-out.";

// ============================================================================
// Inbound
// ============================================================================

/**
 * A component press / select or a modal submission, normalised from a
 * gateway packet or an HTTP request body.
 */
export interface InteractionEvent {
  kind: "component" | "modal";
  /** Interaction snowflake */
  id: string;
  /** Interaction token used for callbacks and webhooks */
  token: string;
  applicationId: string;
  /** Full custom id, match and metadata */
  customId: string;
  /** Component type for component interactions */
  componentType?: ComponentType;
  /** Message the component is attached to */
  messageId?: string;
  channelId?: string;
  guildId?: string;
  /** Invoking user */
  userId: string;
  /** Creation time in epoch milliseconds */
  createdAt: number;
  /** Selected values for select menus, empty otherwise */
  values: string[];
  /** Submitted text input values keyed by input custom id */
  fields: Record<string, string>;
}

/**
 * A reaction added to or removed from a message.
 */
export interface ReactionEvent {
  kind: "add" | "remove";
  messageId: string;
  channelId?: string;
  userId: string;
  /** Unicode emoji, or `name:id` for custom emoji */
  emoji: string;
}

// ============================================================================
// Outbound
// ============================================================================

/** Action rows attached to a message */
export type MessageComponents = APIActionRowComponent<APIMessageActionRowComponent>[];

/**
 * Message content that can be sent as a response, edit or followup.
 */
export interface MessagePayload {
  content?: string;
  embeds?: APIEmbed[];
  components?: MessageComponents;
  /** Raw message flags; ephemeral handling is applied by the context */
  flags?: number;
}

/**
 * The first response to an interaction.
 */
export type InitialResponse =
  | { type: "message"; payload: MessagePayload; ephemeral: boolean }
  | { type: "update"; payload: MessagePayload }
  | { type: "deferred-message"; ephemeral: boolean }
  | { type: "deferred-update" }
  | { type: "modal"; modal: APIModalInteractionResponseCallbackData };

/** Identity of a message created through the responder */
export interface SentMessage {
  id: string;
}

/**
 * Transport used by contexts to talk back to the platform.
 */
export interface InteractionResponder {
  createInitialResponse(response: InitialResponse): Promise<void>;
  editInitialResponse(payload: MessagePayload): Promise<SentMessage>;
  deleteInitialResponse(): Promise<void>;
  createFollowup(payload: MessagePayload): Promise<SentMessage>;
  editFollowup(messageId: string, payload: MessagePayload): Promise<SentMessage>;
  deleteFollowup(messageId: string): Promise<void>;
}

/**
 * Receives the initial response instead of the responder. Set by the
 * HTTP endpoint, which returns it as the request's response body.
 */
export type InitialResponseSink = (response: InitialResponse) => void;

/** Opaque value lookup handed to executors */
export type ServiceLookup = ReadonlyMap<string, unknown>;

/** Millisecond clock */
export type Clock = () => number;

/** Result of dispatching an event to a client */
export type DispatchOutcome = "handled" | "not-found" | "closed";
