/**
 * Executor Registry
 *
 * Routing table shared by the component, modal and reaction clients.
 * Registrations are keyed either by one or more global matches or by a
 * message id. Message-scoped registrations win over global ones when
 * both could answer an event.
 *
 * Expired registrations are dropped lazily on lookup and by a sweep loop
 * that runs while the registry is open.
 */

import { ConflictError, NotFoundError, ValidationError, toError } from "./errors";
import { validateMatch } from "./identifier";
import { sleep } from "./sleep";
import { type ExpiryPolicy, type UsageState, isExpired } from "./timeout";
import { type Clock, DEFAULT_SWEEP_INTERVAL_MS } from "./types";

/**
 * A live registration.
 */
export interface Registration<E> extends UsageState {
  readonly executor: E;
  readonly expiry: ExpiryPolicy;
  /** Global routing keys, empty for message-scoped registrations */
  readonly matches: readonly string[];
  /** Message the registration is bound to */
  readonly messageId: string | undefined;
}

export interface RegistrationKeys {
  matches?: readonly string[];
  messageId?: string;
  expiry: ExpiryPolicy;
}

export interface RegistryEvents<E> {
  /** Called when an expired registration is dropped */
  onEvict?: (registration: Registration<E>) => void;
  /** Called when a sweep fails */
  onError?: (error: Error) => void;
}

export interface RegistryConfig<E> {
  /** Log tag, e.g. "Components" */
  label: string;
  /** Interval between sweeps (default: 5000) */
  sweepIntervalMs?: number;
  now?: Clock;
  events?: RegistryEvents<E>;
}

export class ExecutorRegistry<E> {
  private readonly byMatch = new Map<string, Registration<E>>();
  private readonly byMessage = new Map<string, Registration<E>>();
  private readonly label: string;
  private readonly sweepIntervalMs: number;
  private readonly now: Clock;
  private readonly events: RegistryEvents<E>;
  private sweepAbort: AbortController | undefined;
  private sweepLoop: Promise<void> | undefined;

  constructor(config: RegistryConfig<E>) {
    this.label = config.label;
    this.sweepIntervalMs = config.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.now = config.now ?? Date.now;
    this.events = config.events ?? {};
  }

  /** Number of distinct registrations */
  get size(): number {
    return new Set([...this.byMatch.values(), ...this.byMessage.values()]).size;
  }

  get isOpen(): boolean {
    return this.sweepAbort !== undefined;
  }

  /**
   * Add a registration. Expired registrations holding a key are evicted
   * first.
   *
   * @throws ConflictError if a key is taken in the same scope
   * @throws ValidationError if no key is given or a match is malformed
   */
  add(executor: E, keys: RegistrationKeys): Registration<E> {
    const createdAt = this.now();
    const { messageId } = keys;
    const matches = messageId === undefined ? (keys.matches ?? []) : [];

    if (messageId === undefined) {
      if (matches.length === 0) {
        throw new ValidationError(
          "A global registration needs at least one match",
        );
      }
      for (const match of matches) {
        validateMatch(match);
        if (this.isLive(this.byMatch.get(match), createdAt)) {
          throw new ConflictError(match);
        }
      }
    } else if (this.isLive(this.byMessage.get(messageId), createdAt)) {
      throw new ConflictError(messageId);
    }

    const registration: Registration<E> = {
      executor,
      expiry: keys.expiry,
      matches: [...matches],
      messageId,
      createdAt,
      lastUsedAt: createdAt,
      useCount: 0,
    };

    if (messageId === undefined) {
      for (const match of matches) {
        this.byMatch.set(match, registration);
      }
    } else {
      this.byMessage.set(messageId, registration);
    }
    return registration;
  }

  /** Look up by message id, then by match, without expiry checks */
  get(key: string): Registration<E> | undefined {
    return this.byMessage.get(key) ?? this.byMatch.get(key);
  }

  /**
   * Find the live registration for an event. Expired registrations
   * found on the way are evicted.
   */
  resolve(messageId: string | undefined, match: string | undefined): Registration<E> | undefined {
    const now = this.now();

    for (const registration of [
      messageId === undefined ? undefined : this.byMessage.get(messageId),
      match === undefined ? undefined : this.byMatch.get(match),
    ]) {
      if (registration === undefined) {
        continue;
      }
      if (isExpired(registration.expiry, registration, now)) {
        this.evict(registration);
        continue;
      }
      return registration;
    }
    return undefined;
  }

  /**
   * Remove a registration under all of its keys.
   *
   * @returns false if it was already gone
   */
  remove(registration: Registration<E>): boolean {
    let removed = false;
    if (
      registration.messageId !== undefined &&
      this.byMessage.get(registration.messageId) === registration
    ) {
      this.byMessage.delete(registration.messageId);
      removed = true;
    }
    for (const match of registration.matches) {
      if (this.byMatch.get(match) === registration) {
        this.byMatch.delete(match);
        removed = true;
      }
    }
    return removed;
  }

  /**
   * Remove the registration behind a match or message id.
   *
   * @throws NotFoundError if nothing is registered for the key
   */
  deregister(key: string): Registration<E> {
    const registration = this.get(key);
    if (!registration) {
      throw new NotFoundError(key);
    }
    this.remove(registration);
    return registration;
  }

  /** Every distinct registration */
  entries(): Registration<E>[] {
    return [...new Set([...this.byMessage.values(), ...this.byMatch.values()])];
  }

  /**
   * Evict every expired registration.
   *
   * @returns number of registrations evicted
   */
  sweep(): number {
    const now = this.now();
    let evicted = 0;
    for (const registration of this.entries()) {
      if (isExpired(registration.expiry, registration, now)) {
        this.evict(registration);
        evicted++;
      }
    }
    return evicted;
  }

  /** Start the sweep loop. Calling it again while open does nothing. */
  open(): void {
    if (this.sweepAbort) {
      return;
    }
    const controller = new AbortController();
    this.sweepAbort = controller;
    this.sweepLoop = this.runSweeps(controller.signal);
  }

  /** Stop the sweep loop and wait for it to exit */
  async close(): Promise<void> {
    const controller = this.sweepAbort;
    if (!controller) {
      return;
    }
    this.sweepAbort = undefined;
    controller.abort();
    await this.sweepLoop;
    this.sweepLoop = undefined;
  }

  /** Evicts the registration if it has expired */
  private isLive(registration: Registration<E> | undefined, now: number): boolean {
    if (registration === undefined) {
      return false;
    }
    if (isExpired(registration.expiry, registration, now)) {
      this.evict(registration);
      return false;
    }
    return true;
  }

  private evict(registration: Registration<E>): void {
    if (this.remove(registration)) {
      this.events.onEvict?.(registration);
    }
  }

  private async runSweeps(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.sweepIntervalMs, signal);
      if (signal.aborted) {
        break;
      }

      try {
        this.sweep();
      } catch (error) {
        const err = toError(error);
        if (this.events.onError) {
          this.events.onError(err);
        } else {
          console.error(`[${this.label}] Sweep failed: ${err.message}`);
        }
      }
    }
  }
}
