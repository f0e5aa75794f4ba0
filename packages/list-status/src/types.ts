/**
 * Bot-list Reporting Types
 *
 * A service manager periodically asks a count strategy for the bot's
 * guild count and posts it to each registered bot-list service.
 */

// ============================================================================
// Counting
// ============================================================================

/** Guild count per shard id */
export type ShardCounts = ReadonlyMap<number, number>;

/** A global guild count, or counts for the shards this process runs */
export type GuildCount = number | ShardCounts;

/**
 * Source of the bot's guild count
 */
export interface CountStrategy {
  /** Whether counts only cover this process's shards */
  readonly isShardBound: boolean;

  /** Total shard count of the bot, when known */
  shardCount(): number | undefined;

  /**
   * @throws CountUnknownError if the count is not available yet
   */
  count(): Promise<GuildCount>;

  open?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================================================
// Services
// ============================================================================

/** The subset of fetch services use */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * What a service is given when it runs
 */
export interface ServiceContext {
  counter: CountStrategy;
  /** The bot's user id */
  userId: string;
  userAgent: string;
  fetch: FetchLike;
  /** Aborted when the manager closes */
  signal: AbortSignal;
}

/**
 * A bot-list service
 */
export interface ListService {
  /** Display name used in logs */
  readonly name: string;
  post(ctx: ServiceContext): Promise<void>;
}

// ============================================================================
// Manager
// ============================================================================

/**
 * Service manager event callbacks
 */
export interface ServiceManagerEvents {
  /** Called after a service posted successfully */
  onPost?: (serviceName: string) => void;
  /** Called when a service run fails; the schedule continues */
  onError?: (error: Error, serviceName: string) => void;
}

/**
 * Service manager configuration
 */
export interface ServiceManagerConfig {
  counter: CountStrategy;
  /** The bot's user id */
  userId: string;
  /** Services to add with the default interval */
  services?: ListService[];
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  /** Default: DEFAULT_USER_AGENT */
  userAgent?: string;
  events?: ServiceManagerEvents;
}

export interface AddServiceOptions {
  /** Time between posts in milliseconds (default: 1 hour, minimum: 1000) */
  intervalMs?: number;
}

/**
 * Service manager instance
 */
export interface ServiceManager {
  /**
   * @throws ValidationError if the interval is under a second
   * @throws Error if the manager is running
   */
  addService(service: ListService, options?: AddServiceOptions): ServiceManager;

  /**
   * @throws Error if the service was never added
   * @throws Error if the manager is running
   */
  removeService(service: ListService): void;

  /**
   * Start posting. Each service first runs one interval after opening.
   *
   * @throws Error if no services are registered
   */
  open(): Promise<void>;

  /** Stop posting, cancelling requests and retries in flight */
  close(): Promise<void>;

  readonly isRunning: boolean;
  readonly services: readonly ListService[];
}

// ============================================================================
// Constants
// ============================================================================

/** Default time between posts (1 hour) */
export const DEFAULT_SERVICE_INTERVAL_MS = 60 * 60 * 1000;

/** Smallest allowed time between posts */
export const MIN_SERVICE_INTERVAL_MS = 1000;

/** User agent sent with every request */
export const DEFAULT_USER_AGENT = "latch-list-status/0.1.0";
