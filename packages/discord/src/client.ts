/**
 * Interaction Client Base
 *
 * Lifecycle and dispatch shared by the component and modal clients:
 * look up the live registration, record the use, run the executor and
 * translate ExecutorClosed into a removal.
 */

import type { ContextOptions, InteractionContext } from "./context";
import { ExecutorClosed, toError } from "./errors";
import { ExecutorRegistry, type Registration } from "./registry";
import { type TaskTracker, createTaskTracker } from "./tasks";
import { type ExpiryPolicy, recordUse } from "./timeout";
import type {
  Clock,
  DispatchOutcome,
  InitialResponseSink,
  InteractionEvent,
  InteractionResponder,
  ServiceLookup,
} from "./types";

export interface ClientEvents<E> {
  /** An event arrived with no live registration */
  onMiss?: (event: InteractionEvent) => void;
  /** A registration expired and was dropped */
  onEvict?: (registration: Registration<E>) => void;
  /** An executor failed; the error is rethrown from dispatch */
  onError?: (error: Error, event: InteractionEvent) => void;
}

export interface ClientConfig<E> {
  /** Interval between expiry sweeps (default: 5000) */
  sweepIntervalMs?: number;
  /** Expiry applied when register() is given none */
  defaultExpiry?: ExpiryPolicy;
  /** Ephemeral reply for events with no live registration */
  expiredMessage?: string;
  /** Passed through to every context */
  services?: ServiceLookup;
  now?: Clock;
  /** How long close() waits for in-flight dispatches (default: 30000) */
  drainTimeoutMs?: number;
  events?: ClientEvents<E>;
}

export interface DispatchOptions {
  /** Receive the initial response instead of sending it (HTTP mode) */
  onInitialResponse?: InitialResponseSink;
}

export interface CloseOptions {
  /** Wait for in-flight dispatches (default: true) */
  drain?: boolean;
}

export abstract class InteractionClient<E, C extends InteractionContext> {
  protected readonly registry: ExecutorRegistry<E>;
  protected readonly defaultExpiry: ExpiryPolicy;
  private readonly tasks: TaskTracker;
  private readonly now: Clock;
  private readonly services: ServiceLookup | undefined;
  private readonly expiredMessage: string;
  private readonly events: ClientEvents<E>;

  constructor(
    label: string,
    defaults: { expiry: ExpiryPolicy; expiredMessage: string },
    config: ClientConfig<E>,
  ) {
    this.now = config.now ?? Date.now;
    this.events = config.events ?? {};
    this.services = config.services;
    this.defaultExpiry = config.defaultExpiry ?? defaults.expiry;
    this.expiredMessage = config.expiredMessage ?? defaults.expiredMessage;
    this.tasks = createTaskTracker({
      timeoutMs: config.drainTimeoutMs,
      onTimeout: (pending) => {
        console.error(`[${label}] Closed with ${pending} dispatches still running`);
      },
    });
    this.registry = new ExecutorRegistry<E>({
      label,
      sweepIntervalMs: config.sweepIntervalMs,
      now: this.now,
      events: { onEvict: this.events.onEvict },
    });
  }

  get isOpen(): boolean {
    return this.registry.isOpen;
  }

  /** Number of live registrations */
  get size(): number {
    return this.registry.size;
  }

  /** Start sweeping expired registrations */
  open(): this {
    this.registry.open();
    return this;
  }

  /**
   * Stop sweeping, cancel scheduled deletions and wait for in-flight
   * dispatches.
   */
  async close(options: CloseOptions = {}): Promise<void> {
    await this.registry.close();
    this.tasks.cancelScheduled();
    if (options.drain ?? true) {
      await this.tasks.drain();
    }
  }

  /**
   * Remove the registration behind a match or message id.
   *
   * @throws NotFoundError if nothing is registered for the key
   */
  deregister(key: string): void {
    this.registry.deregister(key);
  }

  getRegistration(key: string): Registration<E> | undefined {
    return this.registry.get(key);
  }

  /**
   * Route an event to its executor.
   *
   * Errors other than ExecutorClosed are reported through onError and
   * rethrown.
   */
  dispatch(
    event: InteractionEvent,
    responder: InteractionResponder,
    options: DispatchOptions = {},
  ): Promise<DispatchOutcome> {
    return this.tasks.track(this.run(event, responder, options));
  }

  protected abstract createContext(options: ContextOptions): C;

  protected abstract execute(executor: E, ctx: C): Promise<void>;

  /** Find the registration for an event */
  protected abstract lookup(event: InteractionEvent, ctx: C): Registration<E> | undefined;

  private async run(
    event: InteractionEvent,
    responder: InteractionResponder,
    options: DispatchOptions,
  ): Promise<DispatchOutcome> {
    const ctx = this.createContext({
      event,
      responder,
      tasks: this.tasks,
      services: this.services,
      onInitialResponse: options.onInitialResponse,
      now: this.now,
    });

    const registration = this.lookup(event, ctx);
    if (!registration) {
      this.events.onMiss?.(event);
      await this.respondExpired(ctx);
      return "not-found";
    }

    if (recordUse(registration.expiry, registration, this.now())) {
      this.registry.remove(registration);
    }

    try {
      await this.execute(registration.executor, ctx);
      return "handled";
    } catch (error) {
      if (error instanceof ExecutorClosed) {
        this.registry.remove(registration);
        if (error.alreadyClosed && ctx.state === "none") {
          await this.respondExpired(ctx);
        }
        return "closed";
      }

      const err = toError(error);
      this.events.onError?.(err, event);
      throw err;
    }
  }

  private async respondExpired(ctx: C): Promise<void> {
    await ctx.createInitialResponse(
      { content: this.expiredMessage },
      { ephemeral: true },
    );
  }
}
