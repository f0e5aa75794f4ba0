/**
 * Task Tracker
 *
 * Tracks in-flight dispatches and scheduled follow-up work (delete-after
 * timers) so clients can wait for them, or cancel them, when closing.
 */

import { toError } from "./errors";

/**
 * Task tracker configuration
 */
export interface TaskTrackerConfig {
  /** Maximum time drain() waits for pending tasks in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Called when drain() gives up with the pending task count */
  onTimeout?: (pendingCount: number) => void;
  /** Called when a scheduled task fails */
  onError?: (error: Error) => void;
}

/**
 * Default configuration
 */
export const DEFAULT_TASK_TRACKER_CONFIG = {
  timeoutMs: 30_000,
};

export interface TaskTracker {
  /** Track a promise until it settles; returns the same result */
  track<T>(task: Promise<T>): Promise<T>;
  /** Run a task after a delay, tracked while it runs */
  schedule(delayMs: number, task: () => Promise<void>): void;
  /** Cancel scheduled tasks that have not started, returns how many */
  cancelScheduled(): number;
  /** Resolve once no tracked task is pending or the timeout passes */
  drain(): Promise<void>;
  /** Number of tracked tasks still running */
  readonly pendingCount: number;
  /** Number of scheduled tasks waiting for their timer */
  readonly scheduledCount: number;
}

/**
 * Create a task tracker.
 */
export function createTaskTracker(config?: TaskTrackerConfig): TaskTracker {
  const timeoutMs = config?.timeoutMs ?? DEFAULT_TASK_TRACKER_CONFIG.timeoutMs;
  const onTimeout = config?.onTimeout;
  const onError =
    config?.onError ??
    ((error: Error) => {
      console.error(`[Tasks] Scheduled task failed: ${error.message}`);
    });

  let pendingCount = 0;
  const timers = new Set<ReturnType<typeof setTimeout>>();
  const idleWaiters: Array<() => void> = [];

  function settle(): void {
    pendingCount--;
    if (pendingCount === 0) {
      for (const resolve of idleWaiters.splice(0)) {
        resolve();
      }
    }
  }

  function track<T>(task: Promise<T>): Promise<T> {
    pendingCount++;
    return task.finally(settle);
  }

  return {
    track,

    schedule(delayMs: number, task: () => Promise<void>): void {
      const timer = setTimeout(() => {
        timers.delete(timer);
        track(task()).catch((error: unknown) => onError(toError(error)));
      }, delayMs);
      timers.add(timer);
    },

    cancelScheduled(): number {
      const cancelled = timers.size;
      for (const timer of timers) {
        clearTimeout(timer);
      }
      timers.clear();
      return cancelled;
    },

    drain(): Promise<void> {
      if (pendingCount === 0) {
        return Promise.resolve();
      }

      return new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          const index = idleWaiters.indexOf(done);
          if (index !== -1) {
            idleWaiters.splice(index, 1);
          }
          onTimeout?.(pendingCount);
          resolve();
        }, timeoutMs);

        function done(): void {
          clearTimeout(timer);
          resolve();
        }

        idleWaiters.push(done);
      });
    },

    get pendingCount(): number {
      return pendingCount;
    },

    get scheduledCount(): number {
      return timers.size;
    },
  };
}
