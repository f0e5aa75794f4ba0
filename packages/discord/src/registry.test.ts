import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConflictError, NotFoundError, ValidationError } from "./errors";
import { ExecutorRegistry } from "./registry";
import { fixed, never, sliding } from "./timeout";

describe("ExecutorRegistry", () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 0;
  });

  function createRegistry(onEvict = vi.fn()) {
    return new ExecutorRegistry<string>({
      label: "Test",
      now,
      events: { onEvict },
    });
  }

  describe("add", () => {
    it("registers under every match", () => {
      const registry = createRegistry();
      const registration = registry.add("column", {
        matches: ["a", "b"],
        expiry: never(),
      });

      expect(registry.get("a")).toBe(registration);
      expect(registry.get("b")).toBe(registration);
      expect(registry.size).toBe(1);
    });

    it("rejects a taken match", () => {
      const registry = createRegistry();
      registry.add("first", { matches: ["a"], expiry: never() });

      expect(() =>
        registry.add("second", { matches: ["b", "a"], expiry: never() }),
      ).toThrow(ConflictError);
      expect(registry.get("b")).toBeUndefined();
    });

    it("rejects a taken message id", () => {
      const registry = createRegistry();
      registry.add("first", { messageId: "m1", expiry: never() });

      expect(() =>
        registry.add("second", { messageId: "m1", expiry: never() }),
      ).toThrow(ConflictError);
    });

    it("replaces an expired registration that was not swept yet", () => {
      const onEvict = vi.fn();
      const registry = createRegistry(onEvict);
      const first = registry.add("first", { matches: ["btn"], expiry: fixed(1_000) });
      registry.add("scoped", { messageId: "m1", expiry: fixed(1_000) });

      clock = 2_000;
      const second = registry.add("second", { matches: ["btn"], expiry: fixed(1_000) });
      registry.add("rescoped", { messageId: "m1", expiry: never() });

      expect(onEvict).toHaveBeenCalledWith(first);
      expect(onEvict).toHaveBeenCalledTimes(2);
      expect(registry.get("btn")).toBe(second);
      expect(registry.get("m1")?.executor).toBe("rescoped");
    });

    it("allows the same key in different scopes", () => {
      const registry = createRegistry();
      registry.add("global", { matches: ["123"], expiry: never() });
      registry.add("scoped", { messageId: "123", expiry: never() });

      expect(registry.size).toBe(2);
      expect(registry.get("123")?.executor).toBe("scoped");
    });

    it("requires a key", () => {
      const registry = createRegistry();
      expect(() => registry.add("x", { expiry: never() })).toThrow(
        ValidationError,
      );
    });
  });

  describe("resolve", () => {
    it("prefers the message-scoped registration", () => {
      const registry = createRegistry();
      registry.add("global", { matches: ["btn"], expiry: never() });
      registry.add("scoped", { messageId: "m1", expiry: never() });

      expect(registry.resolve("m1", "btn")?.executor).toBe("scoped");
      expect(registry.resolve("m2", "btn")?.executor).toBe("global");
      expect(registry.resolve(undefined, "other")).toBeUndefined();
    });

    it("evicts expired registrations and falls back", () => {
      const onEvict = vi.fn();
      const registry = createRegistry(onEvict);
      registry.add("global", { matches: ["btn"], expiry: never() });
      registry.add("scoped", { messageId: "m1", expiry: fixed(1_000) });

      clock = 1_001;

      expect(registry.resolve("m1", "btn")?.executor).toBe("global");
      expect(onEvict).toHaveBeenCalledTimes(1);
      expect(registry.get("m1")).toBeUndefined();
    });
  });

  describe("deregister", () => {
    it("removes every key of the registration", () => {
      const registry = createRegistry();
      registry.add("column", { matches: ["a", "b"], expiry: never() });

      registry.deregister("a");

      expect(registry.get("b")).toBeUndefined();
      expect(registry.size).toBe(0);
    });

    it("throws for an unknown key", () => {
      const registry = createRegistry();
      expect(() => registry.deregister("missing")).toThrow(NotFoundError);
    });
  });

  describe("sweep loop", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("evicts expired registrations every interval", async () => {
      const onEvict = vi.fn();
      const registry = createRegistry(onEvict);
      registry.add("short", { matches: ["a"], expiry: fixed(3_000) });
      registry.add("long", { matches: ["b"], expiry: sliding(60_000) });

      registry.open();
      clock = 4_000;
      await vi.advanceTimersByTimeAsync(5_000);

      expect(registry.get("a")).toBeUndefined();
      expect(registry.get("b")?.executor).toBe("long");
      expect(onEvict).toHaveBeenCalledTimes(1);

      await registry.close();
    });

    it("keeps running after a failing sweep", async () => {
      const onError = vi.fn();
      let calls = 0;
      const registry = new ExecutorRegistry<string>({
        label: "Test",
        now,
        events: {
          onEvict: () => {
            calls++;
            if (calls === 1) {
              throw new Error("hook failed");
            }
          },
          onError,
        },
      });
      registry.add("x", { matches: ["a"], expiry: fixed(1_000) });
      registry.add("y", { matches: ["b"], expiry: fixed(9_000) });

      registry.open();
      clock = 2_000;
      await vi.advanceTimersByTimeAsync(5_000);
      expect(onError).toHaveBeenCalledTimes(1);

      clock = 10_000;
      await vi.advanceTimersByTimeAsync(5_000);
      expect(calls).toBe(2);
      expect(registry.size).toBe(0);

      await registry.close();
    });

    it("opens and closes idempotently", async () => {
      const registry = createRegistry();
      registry.open();
      registry.open();
      expect(registry.isOpen).toBe(true);

      await registry.close();
      await registry.close();
      expect(registry.isOpen).toBe(false);
    });
  });
});
