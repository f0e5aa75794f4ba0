/**
 * Error taxonomy shared by the clients and executors.
 */

/** Malformed input: custom ids, column layouts, modal fields, delays */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** A registration already exists for the same key and scope */
export class ConflictError extends Error {
  constructor(readonly key: string) {
    super(`An executor is already registered for "${key}"`);
    this.name = "ConflictError";
  }
}

/** No registration exists for the key */
export class NotFoundError extends Error {
  constructor(readonly key: string) {
    super(`No executor is registered for "${key}"`);
    this.name = "NotFoundError";
  }
}

export interface ExecutorClosedOptions {
  /**
   * The executor was already finished before this interaction arrived.
   * The client answers with the expired response if nothing was sent.
   */
  alreadyClosed?: boolean;
}

/**
 * Thrown by an executor to signal it is finished. The client removes its
 * registration; this is not reported as a failure.
 */
export class ExecutorClosed extends Error {
  readonly alreadyClosed: boolean;

  constructor(options: ExecutorClosedOptions = {}) {
    super("Executor closed");
    this.name = "ExecutorClosed";
    this.alreadyClosed = options.alreadyClosed ?? false;
  }
}

/** A response call does not fit the context's current response state */
export class ResponseStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseStateError";
  }
}

/** The operation is not available for this configuration */
export class UnsupportedOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedOperationError";
  }
}

/** A wait-for executor saw no matching interaction in time */
export class WaitForTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`No matching interaction within ${timeoutMs}ms`);
    this.name = "WaitForTimeoutError";
  }
}

/**
 * Normalise an unknown thrown value.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
