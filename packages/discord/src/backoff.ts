/**
 * Backoff
 *
 * Exponential backoff with jitter, usable as an async iterator of attempt
 * numbers. The first attempt runs immediately; each later one waits:
 *
 *   const backoff = createBackoff({ maxRetries: 5 });
 *   for await (const attempt of backoff) {
 *     const response = await fetch(url);
 *     if (response.status === 429) {
 *       backoff.setNextBackoff(retryAfterMs);
 *       continue;
 *     }
 *     break;
 *   }
 */

import { ValidationError, toError } from "./errors";
import { sleep } from "./sleep";

/**
 * Backoff configuration
 */
export interface BackoffConfig {
  /** Retries allowed between resets; unlimited when omitted */
  maxRetries?: number;
  /** Delay before the first retry in milliseconds (default: 1000) */
  baseMs?: number;
  /** Cap on the exponential delay in milliseconds (default: 64000) */
  maximumMs?: number;
  /** Upper bound of the random delay added to each wait (default: 1000) */
  jitterMs?: number;
  /** Random source in [0, 1) */
  random?: () => number;
  /** Ends the current wait and any further iteration when aborted */
  signal?: AbortSignal;
}

/**
 * Default backoff configuration
 */
export const DEFAULT_BACKOFF_CONFIG = {
  baseMs: 1_000,
  maximumMs: 64_000,
  jitterMs: 1_000,
};

/** Retries used by retryWithBackoff when it is given no backoff */
export const DEFAULT_MAX_RETRIES = 5;

export interface Backoff extends AsyncIterable<number> {
  /**
   * Wait before the next retry.
   *
   * @returns the retry count, undefined once finished, depleted or aborted
   */
  backoff(): Promise<number | undefined>;
  /** Use this delay for the next wait instead of the exponential one */
  setNextBackoff(delayMs: number | undefined): void;
  /** End iteration at the next step */
  finish(): void;
  /** Return to the initial state for reuse */
  reset(): void;
  /** Whether maxRetries has been reached */
  readonly isDepleted: boolean;
  /** Retries performed since the last reset */
  readonly retries: number;
}

/**
 * Create a backoff.
 *
 * @throws ValidationError if maxRetries is below 1 or a delay is negative
 */
export function createBackoff(config?: BackoffConfig): Backoff {
  const maxRetries = config?.maxRetries;
  const baseMs = config?.baseMs ?? DEFAULT_BACKOFF_CONFIG.baseMs;
  const maximumMs = config?.maximumMs ?? DEFAULT_BACKOFF_CONFIG.maximumMs;
  const jitterMs = config?.jitterMs ?? DEFAULT_BACKOFF_CONFIG.jitterMs;
  const random = config?.random ?? Math.random;
  const signal = config?.signal;

  if (maxRetries !== undefined && (!Number.isInteger(maxRetries) || maxRetries < 1)) {
    throw new ValidationError("maxRetries must be an integer of at least 1");
  }
  for (const [name, value] of [
    ["baseMs", baseMs],
    ["maximumMs", maximumMs],
    ["jitterMs", jitterMs],
  ] as const) {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(`${name} must be a non-negative number`);
    }
  }

  let started = false;
  let finished = false;
  let retries = 0;
  let increment = 0;
  let nextDelayMs: number | undefined;

  function isDepleted(): boolean {
    return maxRetries !== undefined && retries >= maxRetries;
  }

  /**
   * Calculate the next delay. An explicit delay leaves the exponent where
   * it is.
   */
  function nextDelay(): number {
    const jitter = random() * jitterMs;
    if (nextDelayMs !== undefined) {
      const delay = nextDelayMs;
      nextDelayMs = undefined;
      return delay + jitter;
    }

    const exponential = Math.min(baseMs * 2 ** increment, maximumMs);
    increment++;
    return exponential + jitter;
  }

  async function backoff(): Promise<number | undefined> {
    if (finished || isDepleted() || signal?.aborted) {
      return undefined;
    }
    started = true;
    const delay = nextDelay();
    retries++;
    await sleep(delay, signal);
    return signal?.aborted ? undefined : retries;
  }

  async function* iterate(): AsyncGenerator<number, void, undefined> {
    if (!started) {
      started = true;
      yield 0;
    }
    while (true) {
      const retry = await backoff();
      if (retry === undefined) {
        return;
      }
      yield retry;
    }
  }

  return {
    [Symbol.asyncIterator]: iterate,
    backoff,

    setNextBackoff(delayMs: number | undefined): void {
      if (delayMs !== undefined && (!Number.isFinite(delayMs) || delayMs < 0)) {
        throw new ValidationError(`Invalid backoff delay: ${delayMs}`);
      }
      nextDelayMs = delayMs;
    },

    finish(): void {
      finished = true;
    },

    reset(): void {
      started = false;
      finished = false;
      retries = 0;
      increment = 0;
      nextDelayMs = undefined;
    },

    get isDepleted(): boolean {
      return isDepleted();
    },

    get retries(): number {
      return retries;
    },
  };
}

// ============================================================================
// Retry helper
// ============================================================================

export type RetryDecision = { retry: true; afterMs?: number } | { retry: false };

export interface RetryOptions {
  /** Defaults to a fresh backoff with DEFAULT_MAX_RETRIES */
  backoff?: Backoff;
  /** Decide whether an error is worth another attempt (default: always) */
  classify?: (error: Error) => RetryDecision;
  /** Called after a failed attempt that will be retried */
  onRetry?: (error: Error, attempt: number) => void;
  /** Stops retrying when aborted; only used for the default backoff */
  signal?: AbortSignal;
}

/**
 * Run an operation until it succeeds, the classifier gives up or the
 * backoff is depleted or aborted. The last error is rethrown.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const backoff =
    options.backoff ??
    createBackoff({ maxRetries: DEFAULT_MAX_RETRIES, signal: options.signal });
  const classify: (error: Error) => RetryDecision =
    options.classify ?? (() => ({ retry: true }));
  let lastError: Error | undefined;

  for await (const attempt of backoff) {
    try {
      return await operation(attempt);
    } catch (error) {
      const err = toError(error);
      lastError = err;

      const decision = classify(err);
      if (!decision.retry) {
        throw err;
      }
      if (!backoff.isDepleted) {
        options.onRetry?.(err, attempt);
      }
      backoff.setNextBackoff(decision.afterMs);
    }
  }

  throw lastError ?? new Error("Backoff finished before the first attempt");
}
