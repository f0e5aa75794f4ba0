/**
 * Service Manager
 *
 * Runs every registered bot-list service on its own repeating schedule.
 * A failed run is reported and the schedule carries on.
 */

import { ValidationError, sleep, toError } from "@latch/discord";
import { CountUnknownError } from "./errors";
import {
  type AddServiceOptions,
  DEFAULT_SERVICE_INTERVAL_MS,
  DEFAULT_USER_AGENT,
  type FetchLike,
  type ListService,
  MIN_SERVICE_INTERVAL_MS,
  type ServiceContext,
  type ServiceManager,
  type ServiceManagerConfig,
} from "./types";

interface ServiceEntry {
  service: ListService;
  intervalMs: number;
}

/**
 * Create a service manager.
 */
export function createServiceManager(config: ServiceManagerConfig): ServiceManager {
  const { counter, events = {} } = config;
  const fetchImpl: FetchLike = config.fetch ?? ((url, init) => fetch(url, init));

  const baseContext: Omit<ServiceContext, "signal"> = {
    counter,
    userId: config.userId,
    userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    fetch: fetchImpl,
  };

  const entries: ServiceEntry[] = [];
  let abort: AbortController | null = null;
  let loops: Promise<void>[] = [];

  const report = (error: Error, serviceName: string): void => {
    if (events.onError) {
      events.onError(error, serviceName);
    } else {
      console.error(`[ListStatus] Failed to post stats to ${serviceName}: ${error.message}`);
    }
  };

  async function runOnce(entry: ServiceEntry, context: ServiceContext): Promise<void> {
    try {
      await entry.service.post(context);
      events.onPost?.(entry.service.name);
    } catch (error) {
      // Cancelled by close()
      if (error instanceof CountUnknownError || context.signal.aborted) {
        return;
      }
      report(toError(error), entry.service.name);
    }
  }

  async function runSchedule(entry: ServiceEntry, signal: AbortSignal): Promise<void> {
    const context: ServiceContext = { ...baseContext, signal };
    while (!signal.aborted) {
      await sleep(entry.intervalMs, signal);
      if (signal.aborted) {
        return;
      }
      await runOnce(entry, context);
    }
  }

  const manager: ServiceManager = {
    addService(service: ListService, options: AddServiceOptions = {}): ServiceManager {
      if (abort) {
        throw new Error("Cannot add a service to a running manager");
      }
      const intervalMs = options.intervalMs ?? DEFAULT_SERVICE_INTERVAL_MS;
      if (!Number.isFinite(intervalMs) || intervalMs < MIN_SERVICE_INTERVAL_MS) {
        throw new ValidationError(
          `Service interval must be at least ${MIN_SERVICE_INTERVAL_MS}ms, got ${intervalMs}`,
        );
      }
      entries.push({ service, intervalMs });
      return manager;
    },

    removeService(service: ListService): void {
      if (abort) {
        throw new Error("Cannot remove a service from a running manager");
      }
      const index = entries.findIndex((entry) => entry.service === service);
      if (index === -1) {
        throw new Error(`Service not found: ${service.name}`);
      }
      entries.splice(index, 1);
    },

    async open(): Promise<void> {
      if (abort) {
        return;
      }
      if (entries.length === 0) {
        throw new Error("Cannot run a manager with no registered services");
      }

      await counter.open?.();
      const controller = new AbortController();
      abort = controller;
      loops = entries.map((entry) => runSchedule(entry, controller.signal));
    },

    async close(): Promise<void> {
      const controller = abort;
      if (!controller) {
        return;
      }
      abort = null;
      controller.abort();
      await Promise.all(loops);
      loops = [];
      await counter.close?.();
    },

    get isRunning() {
      return abort !== null;
    },

    get services() {
      return entries.map((entry) => entry.service);
    },
  };

  for (const service of config.services ?? []) {
    manager.addService(service);
  }

  return manager;
}
