/**
 * Errors raised while posting guild counts.
 */

/** A bot-list service answered with a non-success status */
export class ServiceRequestError extends Error {
  constructor(
    readonly service: string,
    readonly status: number,
    readonly body: string,
    /** Milliseconds from the Retry-After header, when present */
    readonly retryAfterMs?: number,
  ) {
    super(`${service} returned ${status}: ${describeStatus(status)}`);
    this.name = "ServiceRequestError";
  }
}

function describeStatus(status: number): string {
  if (status >= 500) {
    return "server error";
  }
  if (status === 401) {
    return "unauthorized, check the token";
  }
  if (status === 429) {
    return "rate limited";
  }
  return "request rejected";
}

/**
 * The guild count is not available yet. Runs that hit this are skipped
 * without reporting an error.
 */
export class CountUnknownError extends Error {
  constructor(message = "Guild count is not known yet") {
    super(message);
    this.name = "CountUnknownError";
  }
}
