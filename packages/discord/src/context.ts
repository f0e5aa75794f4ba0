/**
 * Interaction Contexts
 *
 * Per-interaction handle passed to executors. Tracks which responses
 * have been made and routes each call to the right platform operation:
 *
 *   none ──create──▶ created ──followup──▶ ...
 *     │                 ▲
 *     └──defer──▶ deferred ──edit──┘
 *
 * Response calls on one context run one at a time.
 */

import type { APIModalInteractionResponseCallbackData } from "discord-api-types/v10";
import { MessageFlags } from "discord-api-types/v10";
import PQueue from "p-queue";
import { ResponseStateError, ValidationError } from "./errors";
import { splitCustomId } from "./identifier";
import type { TaskTracker } from "./tasks";
import {
  type Clock,
  DELETE_AFTER_MARGIN_MS,
  INTERACTION_LIFETIME_MS,
  type InitialResponse,
  type InitialResponseSink,
  type InteractionEvent,
  type InteractionResponder,
  type MessagePayload,
  type SentMessage,
  type ServiceLookup,
} from "./types";

export type ResponseState =
  | "none"
  | "deferred"
  | "deferred-update"
  | "created"
  | "message-updated"
  | "modal";

export interface ContextOptions {
  event: InteractionEvent;
  responder: InteractionResponder;
  /** Tracks scheduled deletions */
  tasks: TaskTracker;
  services?: ServiceLookup;
  /** Receives the initial response instead of the responder (HTTP mode) */
  onInitialResponse?: InitialResponseSink;
  now?: Clock;
}

export interface CreateOptions {
  /** Defaults to the context's ephemeral default */
  ephemeral?: boolean;
  /** Delete the created message after this many milliseconds */
  deleteAfterMs?: number;
}

export interface EditOptions {
  deleteAfterMs?: number;
}

export interface DeferOptions {
  /** Acknowledge by updating the source message later instead of sending one */
  update?: boolean;
  ephemeral?: boolean;
}

const EMPTY_SERVICES: ServiceLookup = new Map();

function withEphemeral(payload: MessagePayload, ephemeral: boolean): MessagePayload {
  if (!ephemeral) {
    return payload;
  }
  return { ...payload, flags: (payload.flags ?? 0) | MessageFlags.Ephemeral };
}

/**
 * Shared response protocol for component and modal interactions.
 */
export class InteractionContext {
  readonly event: InteractionEvent;
  /** Routing part of the custom id */
  readonly idMatch: string;
  /** Metadata part of the custom id, if any */
  readonly idMetadata: string | undefined;
  readonly services: ServiceLookup;

  protected readonly responder: InteractionResponder;
  private readonly tasks: TaskTracker;
  private readonly now: Clock;
  private readonly queue = new PQueue({ concurrency: 1 });
  private sink: InitialResponseSink | undefined;
  private responseState: ResponseState = "none";
  private deferredFinalised = false;
  private lastFollowupId: string | undefined;
  private ephemeralDefault = false;
  private readonly responded: Promise<void>;
  private markResponded: () => void = () => {};

  constructor(options: ContextOptions) {
    this.event = options.event;
    this.responder = options.responder;
    this.tasks = options.tasks;
    this.services = options.services ?? EMPTY_SERVICES;
    this.sink = options.onInitialResponse;
    this.now = options.now ?? Date.now;
    this.responded = new Promise<void>((resolve) => {
      this.markResponded = resolve;
    });

    const { match, metadata } = splitCustomId(options.event.customId);
    this.idMatch = match;
    this.idMetadata = metadata;
  }

  get state(): ResponseState {
    return this.responseState;
  }

  get userId(): string {
    return this.event.userId;
  }

  /** Whether an initial response is visible (deferrals count once edited) */
  get hasResponded(): boolean {
    switch (this.responseState) {
      case "none":
        return false;
      case "deferred":
      case "deferred-update":
        return this.deferredFinalised;
      default:
        return true;
    }
  }

  get hasBeenDeferred(): boolean {
    return (
      this.responseState === "deferred" ||
      this.responseState === "deferred-update"
    );
  }

  /** When the interaction token stops accepting responses */
  get expiresAt(): number {
    return this.event.createdAt + INTERACTION_LIFETIME_MS;
  }

  /** Resolves once an initial response (or deferral) has been sent */
  whenResponded(): Promise<void> {
    return this.responded;
  }

  /** Make responses ephemeral unless a call says otherwise */
  setEphemeralDefault(ephemeral: boolean): this {
    this.ephemeralDefault = ephemeral;
    return this;
  }

  /**
   * Send a message as the initial response.
   *
   * @throws ResponseStateError if already responded or deferred
   */
  createInitialResponse(
    payload: MessagePayload,
    options: CreateOptions = {},
  ): Promise<void> {
    return this.exclusive(() => this.createMessage(payload, options));
  }

  /**
   * Acknowledge now and respond later through editInitialResponse.
   */
  defer(options: DeferOptions = {}): Promise<void> {
    return this.exclusive(async () => {
      if (this.responseState !== "none") {
        throw new ResponseStateError("Context has already been responded to");
      }

      if (options.update) {
        await this.sendInitial({ type: "deferred-update" }, "deferred-update");
      } else {
        const ephemeral = options.ephemeral ?? this.ephemeralDefault;
        await this.sendInitial(
          { type: "deferred-message", ephemeral },
          "deferred",
        );
      }
    });
  }

  /**
   * Edit the initial response, finalising a deferral.
   */
  editInitialResponse(
    payload: MessagePayload,
    options: EditOptions = {},
  ): Promise<SentMessage> {
    return this.exclusive(() => this.editInitial(payload, options));
  }

  deleteInitialResponse(): Promise<void> {
    return this.exclusive(async () => {
      this.requireMessageResponse();
      await this.responder.deleteInitialResponse();
    });
  }

  /**
   * Send an additional message after the initial response.
   */
  createFollowup(
    payload: MessagePayload,
    options: CreateOptions = {},
  ): Promise<SentMessage> {
    return this.exclusive(() => this.followup(payload, options));
  }

  /** Edit the most recent followup, or the initial response if none */
  editLastResponse(
    payload: MessagePayload,
    options: EditOptions = {},
  ): Promise<SentMessage> {
    return this.exclusive(async () => {
      const followupId = this.lastFollowupId;
      if (followupId === undefined) {
        return this.editInitial(payload, options);
      }

      this.validateDeleteAfter(options.deleteAfterMs);
      const sent = await this.responder.editFollowup(followupId, payload);
      this.scheduleDelete(options.deleteAfterMs, followupId);
      return sent;
    });
  }

  /** Delete the most recent followup, or the initial response if none */
  deleteLastResponse(): Promise<void> {
    return this.exclusive(async () => {
      const followupId = this.lastFollowupId;
      if (followupId === undefined) {
        this.requireMessageResponse();
        await this.responder.deleteInitialResponse();
        return;
      }

      await this.responder.deleteFollowup(followupId);
      this.lastFollowupId = undefined;
    });
  }

  /**
   * Respond in whatever way the current state allows: followup if
   * already responded, edit if deferred, otherwise the initial response.
   */
  respond(payload: MessagePayload, options: CreateOptions = {}): Promise<void> {
    return this.exclusive(async () => {
      if (this.hasResponded) {
        await this.followup(payload, options);
      } else if (this.hasBeenDeferred) {
        await this.editInitial(payload, options);
      } else {
        await this.createMessage(payload, options);
      }
    });
  }

  protected exclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.add(task, { throwOnTimeout: true });
  }

  /**
   * Send an initial response and move to the given state. Callers hold
   * the queue.
   */
  protected async sendInitial(
    response: InitialResponse,
    nextState: ResponseState,
  ): Promise<void> {
    const sink = this.sink;
    if (sink) {
      this.sink = undefined;
      sink(response);
    } else {
      await this.responder.createInitialResponse(response);
    }
    this.responseState = nextState;
    this.markResponded();
  }

  protected requireInitialSlot(): void {
    if (this.hasResponded) {
      throw new ResponseStateError("Initial response has already been created");
    }
    if (this.hasBeenDeferred) {
      throw new ResponseStateError(
        "A deferred response must be finalised with editInitialResponse",
      );
    }
  }

  protected validateDeleteAfter(deleteAfterMs: number | undefined): void {
    if (deleteAfterMs === undefined) {
      return;
    }
    if (!Number.isFinite(deleteAfterMs) || deleteAfterMs < 0) {
      throw new ValidationError(`Invalid deleteAfterMs: ${deleteAfterMs}`);
    }

    const remaining = this.expiresAt - this.now();
    if (deleteAfterMs + DELETE_AFTER_MARGIN_MS > remaining) {
      throw new ValidationError(
        "This interaction will have expired before deleteAfterMs is reached",
      );
    }
  }

  /** Schedule deletion of a followup, or of the initial response */
  protected scheduleDelete(
    deleteAfterMs: number | undefined,
    followupId?: string,
  ): void {
    if (deleteAfterMs === undefined) {
      return;
    }
    this.tasks.schedule(deleteAfterMs, () =>
      followupId === undefined
        ? this.responder.deleteInitialResponse()
        : this.responder.deleteFollowup(followupId),
    );
  }

  private async createMessage(
    payload: MessagePayload,
    options: CreateOptions,
  ): Promise<void> {
    this.requireInitialSlot();
    this.validateDeleteAfter(options.deleteAfterMs);

    const ephemeral = options.ephemeral ?? this.ephemeralDefault;
    await this.sendInitial({ type: "message", payload, ephemeral }, "created");
    this.scheduleDelete(options.deleteAfterMs);
  }

  private async editInitial(
    payload: MessagePayload,
    options: EditOptions,
  ): Promise<SentMessage> {
    this.requireMessageResponse();
    this.validateDeleteAfter(options.deleteAfterMs);

    const sent = await this.responder.editInitialResponse(payload);
    if (this.hasBeenDeferred) {
      this.deferredFinalised = true;
    }
    this.scheduleDelete(options.deleteAfterMs);
    return sent;
  }

  private async followup(
    payload: MessagePayload,
    options: CreateOptions,
  ): Promise<SentMessage> {
    if (this.responseState === "none") {
      throw new ResponseStateError(
        "A followup requires an initial response first",
      );
    }
    this.validateDeleteAfter(options.deleteAfterMs);

    const ephemeral = options.ephemeral ?? this.ephemeralDefault;
    const sent = await this.responder.createFollowup(
      withEphemeral(payload, ephemeral),
    );
    this.lastFollowupId = sent.id;
    this.scheduleDelete(options.deleteAfterMs, sent.id);
    return sent;
  }

  private requireMessageResponse(): void {
    if (this.responseState === "none") {
      throw new ResponseStateError("There is no initial response yet");
    }
    if (this.responseState === "modal") {
      throw new ResponseStateError("A modal response has no message");
    }
  }
}

/**
 * Context for button and select menu interactions.
 */
export class ComponentContext extends InteractionContext {
  /** Values picked in a select menu, empty for buttons */
  get selectedValues(): readonly string[] {
    return this.event.values;
  }

  /**
   * Update the message the component is attached to as the initial
   * response.
   */
  createUpdate(payload: MessagePayload, options: EditOptions = {}): Promise<void> {
    return this.exclusive(async () => {
      this.requireInitialSlot();
      this.validateDeleteAfter(options.deleteAfterMs);
      await this.sendInitial({ type: "update", payload }, "message-updated");
      this.scheduleDelete(options.deleteAfterMs);
    });
  }

  /**
   * Answer with a modal dialog.
   */
  createModalResponse(modal: APIModalInteractionResponseCallbackData): Promise<void> {
    return this.exclusive(async () => {
      this.requireInitialSlot();
      await this.sendInitial({ type: "modal", modal }, "modal");
    });
  }
}

/**
 * Context for modal submissions.
 */
export class ModalContext extends InteractionContext {
  /** Submitted text input values keyed by input custom id */
  get fieldValues(): Readonly<Record<string, string>> {
    return this.event.fields;
  }
}
