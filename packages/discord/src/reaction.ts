/**
 * Reaction Routing
 *
 * Reaction events are routed by message id to a ReactionExecutor. The
 * ReactionPaginator turns reactions on its message into page moves.
 * Adding and removing a trigger reaction both count as a press, so users
 * never have to clear their own reactions.
 */

import { ExecutorClosed, ResponseStateError, toError } from "./errors";
import {
  type Page,
  type PageMove,
  type PageSource,
  Paginator,
  type PaginatorTrigger,
  TRIGGER_EMOJI,
  pagePayload,
  resolveTriggers,
} from "./pagination";
import { ExecutorRegistry, type Registration } from "./registry";
import { type TaskTracker, createTaskTracker } from "./tasks";
import { type ExpiryPolicy, recordUse, sliding } from "./timeout";
import {
  type Clock,
  DEFAULT_EXECUTOR_TIMEOUT_MS,
  type DispatchOutcome,
  type ReactionEvent,
} from "./types";

// ============================================================================
// Message surface
// ============================================================================

/**
 * The parts of a sent message the paginator needs. A discord.js
 * Message satisfies it.
 */
export interface ReactionMessage {
  readonly id: string;
  react(emoji: string): Promise<unknown>;
  edit(payload: Page): Promise<unknown>;
  delete(): Promise<unknown>;
}

export interface ReactionChannel {
  send(payload: Page): Promise<ReactionMessage>;
}

/** Compare emoji ignoring the variation selector clients may drop */
function normaliseEmoji(emoji: string): string {
  return emoji.replace(/\uFE0F/g, "");
}

// ============================================================================
// Executors
// ============================================================================

export interface ReactionExecutor {
  onReaction(event: ReactionEvent): Promise<void>;
}

export interface ReactionPaginatorOptions {
  /** Users whose reactions turn pages; anyone when omitted */
  authors?: Iterable<string>;
  /** Reactions to add, in order (default: previous, stop, next) */
  triggers?: readonly PaginatorTrigger[];
  infinite?: boolean;
}

export class ReactionPaginator implements ReactionExecutor {
  private readonly paginator: Paginator;
  private readonly triggers: PaginatorTrigger[];
  private readonly authors: ReadonlySet<string> | undefined;
  private sent: ReactionMessage | undefined;

  constructor(source: PageSource, options: ReactionPaginatorOptions = {}) {
    const infinite = options.infinite ?? false;
    this.triggers = resolveTriggers(options.triggers, infinite);
    this.paginator = new Paginator(source, { infinite });
    this.authors = options.authors ? new Set(options.authors) : undefined;
  }

  /** The paginated message, once opened */
  get message(): ReactionMessage | undefined {
    return this.sent;
  }

  get position(): number {
    return this.paginator.position;
  }

  /**
   * Send the first page and add the trigger reactions.
   *
   * @returns the sent message, undefined if the source is empty
   */
  async open(channel: ReactionChannel): Promise<ReactionMessage | undefined> {
    const move = await this.paginator.getFirstEntry();
    if (!move) {
      return undefined;
    }

    const message = await channel.send(pagePayload(move.page));
    this.sent = message;

    for (const trigger of this.triggers) {
      try {
        await message.react(TRIGGER_EMOJI[trigger]);
      } catch (error) {
        console.error(
          `[Reactions] Failed to add ${trigger} reaction: ${toError(error).message}`,
        );
        break;
      }
    }
    return message;
  }

  async onReaction(event: ReactionEvent): Promise<void> {
    if (this.authors && !this.authors.has(event.userId)) {
      return;
    }
    const trigger = this.triggerFor(event.emoji);
    if (trigger === undefined) {
      return;
    }

    const message = this.sent;
    if (!message) {
      throw new ResponseStateError("Paginator has not been opened");
    }

    if (trigger === "stop") {
      await message.delete();
      throw new ExecutorClosed();
    }

    const move = await this.move(trigger);
    if (move?.moved) {
      await message.edit(pagePayload(move.page));
    }
  }

  private triggerFor(emoji: string): PaginatorTrigger | undefined {
    const wanted = normaliseEmoji(emoji);
    return this.triggers.find(
      (trigger) => normaliseEmoji(TRIGGER_EMOJI[trigger]) === wanted,
    );
  }

  private move(
    trigger: Exclude<PaginatorTrigger, "stop">,
  ): Promise<PageMove | undefined> {
    switch (trigger) {
      case "first":
        return this.paginator.getFirstEntry();
      case "previous":
        return this.paginator.getPreviousEntry();
      case "next":
        return this.paginator.getNextEntry();
      case "last":
        return this.paginator.getLastEntry();
    }
  }
}

// ============================================================================
// Client
// ============================================================================

export type ReactionOutcome = DispatchOutcome | "ignored";

export interface ReactionClientConfig {
  /** Interval between expiry sweeps (default: 5000) */
  sweepIntervalMs?: number;
  /** Expiry applied when register() is given none (default: 30s sliding) */
  defaultExpiry?: ExpiryPolicy;
  /** Users whose reactions are never routed, usually the bot itself */
  ignoredUserIds?: Iterable<string>;
  now?: Clock;
  /** How long close() waits for in-flight dispatches (default: 30000) */
  drainTimeoutMs?: number;
  events?: {
    onEvict?: (registration: Registration<ReactionExecutor>) => void;
    /** An executor failed; the error is rethrown from dispatch */
    onError?: (error: Error, event: ReactionEvent) => void;
  };
}

/**
 * Routes reaction events to executors registered by message id.
 */
export class ReactionClient {
  private readonly registry: ExecutorRegistry<ReactionExecutor>;
  private readonly tasks: TaskTracker;
  private readonly ignored: Set<string>;
  private readonly defaultExpiry: ExpiryPolicy;
  private readonly now: Clock;
  private readonly config: ReactionClientConfig;

  constructor(config: ReactionClientConfig = {}) {
    this.config = config;
    this.now = config.now ?? Date.now;
    this.ignored = new Set(config.ignoredUserIds);
    this.defaultExpiry =
      config.defaultExpiry ?? sliding(DEFAULT_EXECUTOR_TIMEOUT_MS);
    this.tasks = createTaskTracker({
      timeoutMs: config.drainTimeoutMs,
      onTimeout: (pending) => {
        console.error(`[Reactions] Closed with ${pending} dispatches still running`);
      },
    });
    this.registry = new ExecutorRegistry<ReactionExecutor>({
      label: "Reactions",
      sweepIntervalMs: config.sweepIntervalMs,
      now: this.now,
      events: { onEvict: config.events?.onEvict },
    });
  }

  get isOpen(): boolean {
    return this.registry.isOpen;
  }

  get size(): number {
    return this.registry.size;
  }

  open(): this {
    this.registry.open();
    return this;
  }

  async close(options: { drain?: boolean } = {}): Promise<void> {
    await this.registry.close();
    if (options.drain ?? true) {
      await this.tasks.drain();
    }
  }

  /** Stop routing reactions from a user, e.g. the bot once logged in */
  ignoreUser(userId: string): void {
    this.ignored.add(userId);
  }

  /**
   * @throws ConflictError if the message already has an executor
   */
  register(
    executor: ReactionExecutor,
    messageId: string,
    options: { expiry?: ExpiryPolicy } = {},
  ): Registration<ReactionExecutor> {
    return this.registry.add(executor, {
      messageId,
      expiry: options.expiry ?? this.defaultExpiry,
    });
  }

  /**
   * @throws NotFoundError if nothing is registered for the message
   */
  deregister(messageId: string): void {
    this.registry.deregister(messageId);
  }

  getRegistration(messageId: string): Registration<ReactionExecutor> | undefined {
    return this.registry.get(messageId);
  }

  dispatch(event: ReactionEvent): Promise<ReactionOutcome> {
    return this.tasks.track(this.run(event));
  }

  private async run(event: ReactionEvent): Promise<ReactionOutcome> {
    if (this.ignored.has(event.userId)) {
      return "ignored";
    }

    const registration = this.registry.resolve(event.messageId, undefined);
    if (!registration) {
      return "not-found";
    }
    if (recordUse(registration.expiry, registration, this.now())) {
      this.registry.remove(registration);
    }

    try {
      await registration.executor.onReaction(event);
      return "handled";
    } catch (error) {
      if (error instanceof ExecutorClosed) {
        this.registry.remove(registration);
        return "closed";
      }
      const err = toError(error);
      this.config.events?.onError?.(err, event);
      throw err;
    }
  }
}
