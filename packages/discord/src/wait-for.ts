/**
 * Wait-For Executor
 *
 * Turns the next permitted component interaction into a promise, for
 * flows that want to `await` a button press inline:
 *
 *   const executor = new WaitForExecutor({ authors: [userId] });
 *   components.register(executor, { messageId });
 *   const ctx = await executor.wait();
 */

import type { ComponentExecutor } from "./components";
import type { ComponentContext } from "./context";
import { ExecutorClosed, WaitForTimeoutError } from "./errors";
import { sleep } from "./sleep";
import {
  DEFAULT_EXECUTOR_TIMEOUT_MS,
  INITIAL_RESPONSE_WINDOW_MS,
  NOT_PERMITTED_MESSAGE,
} from "./types";

export interface WaitForOptions {
  /** Users allowed to resolve the wait; anyone when omitted */
  authors?: Iterable<string>;
  /** How long wait() waits (default: 30000) */
  timeoutMs?: number;
  ephemeralDefault?: boolean;
}

export class WaitForExecutor implements ComponentExecutor {
  /** Registered by message id or an explicit match */
  readonly idMatches: readonly string[] = [];

  private readonly authors: ReadonlySet<string> | undefined;
  private readonly timeoutMs: number;
  private readonly ephemeralDefault: boolean;
  private readonly result: Promise<ComponentContext>;
  private resolveResult: (ctx: ComponentContext) => void = () => {};
  private rejectResult: (error: Error) => void = () => {};
  private timer: ReturnType<typeof setTimeout> | undefined;
  private waiting = false;
  private finished = false;

  constructor(options: WaitForOptions = {}) {
    this.authors = options.authors ? new Set(options.authors) : undefined;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXECUTOR_TIMEOUT_MS;
    this.ephemeralDefault = options.ephemeralDefault ?? false;
    this.result = new Promise<ComponentContext>((resolve, reject) => {
      this.resolveResult = resolve;
      this.rejectResult = reject;
    });
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Wait for the first permitted interaction.
   *
   * @throws WaitForTimeoutError if none arrives within the timeout
   */
  wait(): Promise<ComponentContext> {
    if (!this.waiting && !this.finished) {
      this.waiting = true;
      this.timer = setTimeout(() => {
        this.finish();
        this.rejectResult(new WaitForTimeoutError(this.timeoutMs));
      }, this.timeoutMs);
    }
    return this.result;
  }

  async execute(ctx: ComponentContext): Promise<void> {
    if (this.finished) {
      throw new ExecutorClosed({ alreadyClosed: true });
    }
    if (this.ephemeralDefault) {
      ctx.setEphemeralDefault(true);
    }

    if (this.authors && !this.authors.has(ctx.userId)) {
      await ctx.createInitialResponse(
        { content: NOT_PERMITTED_MESSAGE },
        { ephemeral: true },
      );
      return;
    }

    this.finish();
    this.resolveResult(ctx);

    // Hold the dispatch open until the waiter answers, so endpoints that
    // return the initial response in the request body can pick it up.
    const controller = new AbortController();
    await Promise.race([
      ctx.whenResponded(),
      sleep(INITIAL_RESPONSE_WINDOW_MS, controller.signal),
    ]);
    controller.abort();

    throw new ExecutorClosed();
  }

  private finish(): void {
    this.finished = true;
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
