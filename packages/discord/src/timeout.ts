/**
 * Expiry Policies
 *
 * Decide when a registration stops being routable. Policies are plain
 * data; the registry owns the usage state they are evaluated against.
 */

import { ValidationError } from "./errors";

export type ExpiryPolicy =
  | { kind: "never" }
  | { kind: "fixed"; durationMs: number; maxUses?: number }
  | { kind: "sliding"; durationMs: number; maxUses?: number };

/**
 * Usage counters tracked per registration.
 */
export interface UsageState {
  /** Registration time */
  createdAt: number;
  /** Last dispatch time, starts at createdAt */
  lastUsedAt: number;
  /** Number of dispatches so far */
  useCount: number;
}

export interface TimedPolicyOptions {
  /** Uses before the registration expires (default: unlimited) */
  maxUses?: number;
}

function validateTimed(durationMs: number, options: TimedPolicyOptions): void {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    throw new ValidationError(`Expiry duration must be positive: ${durationMs}`);
  }
  const { maxUses } = options;
  if (maxUses !== undefined && (!Number.isInteger(maxUses) || maxUses < 1)) {
    throw new ValidationError(`maxUses must be a positive integer: ${maxUses}`);
  }
}

/** Never expires on its own */
export function never(): ExpiryPolicy {
  return { kind: "never" };
}

/** Expires a fixed duration after registration */
export function fixed(
  durationMs: number,
  options: TimedPolicyOptions = {},
): ExpiryPolicy {
  validateTimed(durationMs, options);
  return { kind: "fixed", durationMs, maxUses: options.maxUses };
}

/** Expires a duration after the last use (or registration if unused) */
export function sliding(
  durationMs: number,
  options: TimedPolicyOptions = {},
): ExpiryPolicy {
  validateTimed(durationMs, options);
  return { kind: "sliding", durationMs, maxUses: options.maxUses };
}

/**
 * Time after which the policy no longer holds, ignoring use limits.
 * Undefined for policies without a time bound.
 */
export function expiresAt(
  policy: ExpiryPolicy,
  state: UsageState,
): number | undefined {
  switch (policy.kind) {
    case "never":
      return undefined;
    case "fixed":
      return state.createdAt + policy.durationMs;
    case "sliding":
      return state.lastUsedAt + policy.durationMs;
  }
}

function usesDepleted(policy: ExpiryPolicy, state: UsageState): boolean {
  if (policy.kind === "never" || policy.maxUses === undefined) {
    return false;
  }
  return state.useCount >= policy.maxUses;
}

/**
 * Whether the registration is expired at `now`. The bound itself is
 * still live: a 30s sliding policy used at t=25s holds through t=55s.
 */
export function isExpired(
  policy: ExpiryPolicy,
  state: UsageState,
  now: number,
): boolean {
  if (usesDepleted(policy, state)) {
    return true;
  }
  const deadline = expiresAt(policy, state);
  return deadline !== undefined && now > deadline;
}

/**
 * Record a dispatch against the registration.
 *
 * @returns true when this use exhausted the policy's use limit
 */
export function recordUse(
  policy: ExpiryPolicy,
  state: UsageState,
  now: number,
): boolean {
  state.useCount += 1;
  if (policy.kind === "sliding") {
    state.lastUsedAt = now;
  }
  return usesDepleted(policy, state);
}
