/**
 * Component Client
 *
 * Routes button and select menu interactions to registered executors.
 */

import { type ClientConfig, InteractionClient } from "./client";
import { ComponentContext, type ContextOptions } from "./context";
import { validateMatch } from "./identifier";
import type { Registration } from "./registry";
import { type ExpiryPolicy, sliding } from "./timeout";
import {
  COMPONENT_EXPIRED_MESSAGE,
  DEFAULT_EXECUTOR_TIMEOUT_MS,
  type InteractionEvent,
} from "./types";

/**
 * Handles component interactions for one or more matches.
 */
export interface ComponentExecutor {
  /** Matches this executor answers to when registered globally */
  readonly idMatches: readonly string[];
  execute(ctx: ComponentContext): Promise<void>;
}

export type ComponentCallback = (ctx: ComponentContext) => Promise<void>;

export interface ComponentRegisterOptions {
  /** Register globally under this match instead of the executor's own */
  match?: string;
  /** Bind to a single message instead of global matches */
  messageId?: string;
  /** Defaults to a 30s sliding timeout */
  expiry?: ExpiryPolicy;
}

export type ComponentClientConfig = ClientConfig<ComponentExecutor>;

export class ComponentClient extends InteractionClient<
  ComponentExecutor,
  ComponentContext
> {
  constructor(config: ComponentClientConfig = {}) {
    super(
      "Components",
      {
        expiry: sliding(DEFAULT_EXECUTOR_TIMEOUT_MS),
        expiredMessage: COMPONENT_EXPIRED_MESSAGE,
      },
      config,
    );
  }

  /**
   * Register an executor.
   *
   * @throws ConflictError if a key is already taken in the same scope
   * @throws ValidationError if a global registration has no valid match
   */
  register(
    executor: ComponentExecutor,
    options: ComponentRegisterOptions = {},
  ): Registration<ComponentExecutor> {
    const expiry = options.expiry ?? this.defaultExpiry;
    if (options.messageId !== undefined) {
      return this.registry.add(executor, {
        messageId: options.messageId,
        expiry,
      });
    }

    const matches =
      options.match === undefined
        ? executor.idMatches
        : [validateMatch(options.match)];
    return this.registry.add(executor, { matches, expiry });
  }

  protected createContext(options: ContextOptions): ComponentContext {
    return new ComponentContext(options);
  }

  protected execute(
    executor: ComponentExecutor,
    ctx: ComponentContext,
  ): Promise<void> {
    return executor.execute(ctx);
  }

  protected lookup(
    event: InteractionEvent,
    ctx: ComponentContext,
  ): Registration<ComponentExecutor> | undefined {
    return this.registry.resolve(event.messageId, ctx.idMatch);
  }
}

/**
 * Executor that runs one callback for one match.
 */
export class CallbackExecutor implements ComponentExecutor {
  readonly idMatches: readonly string[];

  constructor(
    match: string,
    private readonly callback: ComponentCallback,
    private readonly options: { ephemeralDefault?: boolean } = {},
  ) {
    this.idMatches = [validateMatch(match)];
  }

  execute(ctx: ComponentContext): Promise<void> {
    if (this.options.ephemeralDefault) {
      ctx.setEphemeralDefault(true);
    }
    return this.callback(ctx);
  }
}
