/**
 * Task Tracker Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createTaskTracker } from "./tasks";

describe("createTaskTracker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("track", () => {
    it("counts a task until it settles", async () => {
      const tracker = createTaskTracker();
      let resolveTask: (value: number) => void = () => {};
      const task = new Promise<number>((resolve) => {
        resolveTask = resolve;
      });

      const tracked = tracker.track(task);
      expect(tracker.pendingCount).toBe(1);

      resolveTask(7);
      await expect(tracked).resolves.toBe(7);
      expect(tracker.pendingCount).toBe(0);
    });

    it("passes rejections through and stops counting", async () => {
      const tracker = createTaskTracker();

      await expect(
        tracker.track(Promise.reject(new Error("boom"))),
      ).rejects.toThrow("boom");
      expect(tracker.pendingCount).toBe(0);
    });
  });

  describe("schedule", () => {
    it("runs the task after the delay", async () => {
      const tracker = createTaskTracker();
      const task = vi.fn(async () => {});

      tracker.schedule(1_000, task);
      expect(tracker.scheduledCount).toBe(1);

      await vi.advanceTimersByTimeAsync(999);
      expect(task).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(task).toHaveBeenCalledTimes(1);
      expect(tracker.scheduledCount).toBe(0);
    });

    it("reports failures through onError", async () => {
      const onError = vi.fn();
      const tracker = createTaskTracker({ onError });

      tracker.schedule(10, async () => {
        throw new Error("delete failed");
      });
      await vi.advanceTimersByTimeAsync(10);

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0].message).toBe("delete failed");
    });

    it("cancels tasks that have not started", async () => {
      const tracker = createTaskTracker();
      const task = vi.fn(async () => {});

      tracker.schedule(100, task);
      tracker.schedule(200, task);
      expect(tracker.cancelScheduled()).toBe(2);

      await vi.advanceTimersByTimeAsync(500);
      expect(task).not.toHaveBeenCalled();
    });
  });

  describe("drain", () => {
    it("resolves immediately with nothing pending", async () => {
      const tracker = createTaskTracker();
      await expect(tracker.drain()).resolves.toBeUndefined();
    });

    it("waits for pending tasks", async () => {
      const tracker = createTaskTracker();
      let finish: () => void = () => {};
      void tracker.track(
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
      );

      let drained = false;
      const draining = tracker.drain().then(() => {
        drained = true;
      });

      await vi.advanceTimersByTimeAsync(10);
      expect(drained).toBe(false);

      finish();
      await draining;
      expect(drained).toBe(true);
    });

    it("gives up after the timeout", async () => {
      const onTimeout = vi.fn();
      const tracker = createTaskTracker({ timeoutMs: 50, onTimeout });
      void tracker.track(new Promise<void>(() => {}));

      const draining = tracker.drain();
      await vi.advanceTimersByTimeAsync(50);
      await draining;

      expect(onTimeout).toHaveBeenCalledWith(1);
    });
  });
});
