import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ComponentContext, ModalContext } from "./context";
import { ResponseStateError, ValidationError } from "./errors";
import { createTaskTracker } from "./tasks";
import { createEvent, createMockResponder, type MockResponder } from "./test-helpers";
import type { InteractionEvent } from "./types";

function createContext(
  responder: MockResponder,
  event: InteractionEvent = createEvent(),
  now = () => 0,
) {
  return new ComponentContext({
    event,
    responder,
    tasks: createTaskTracker(),
    now,
  });
}

describe("ComponentContext", () => {
  let responder: MockResponder;

  beforeEach(() => {
    responder = createMockResponder();
  });

  describe("identity", () => {
    it("exposes the custom id parts", () => {
      const ctx = createContext(
        responder,
        createEvent({ customId: "btn:userid42" }),
      );
      expect(ctx.idMatch).toBe("btn");
      expect(ctx.idMetadata).toBe("userid42");
    });

    it("exposes selected values", () => {
      const ctx = createContext(
        responder,
        createEvent({ values: ["red", "blue"] }),
      );
      expect(ctx.selectedValues).toEqual(["red", "blue"]);
    });

    it("computes the token expiry from the creation time", () => {
      const ctx = createContext(responder, createEvent({ createdAt: 1_000 }));
      expect(ctx.expiresAt).toBe(901_000);
    });
  });

  describe("initial responses", () => {
    it("creates a message response", async () => {
      const ctx = createContext(responder);

      await ctx.createInitialResponse({ content: "hi" });

      expect(ctx.state).toBe("created");
      expect(ctx.hasResponded).toBe(true);
      expect(responder.createInitialResponse).toHaveBeenCalledWith({
        type: "message",
        payload: { content: "hi" },
        ephemeral: false,
      });
    });

    it("rejects a second initial response", async () => {
      const ctx = createContext(responder);
      await ctx.createInitialResponse({ content: "first" });

      await expect(ctx.createInitialResponse({ content: "again" })).rejects.toThrow(
        "Initial response has already been created",
      );
      await expect(ctx.createUpdate({ content: "again" })).rejects.toThrow(
        ResponseStateError,
      );
      expect(responder.createInitialResponse).toHaveBeenCalledTimes(1);
    });

    it("applies the ephemeral default", async () => {
      const ctx = createContext(responder).setEphemeralDefault(true);

      await ctx.createInitialResponse({ content: "secret" });

      expect(responder.createInitialResponse).toHaveBeenCalledWith({
        type: "message",
        payload: { content: "secret" },
        ephemeral: true,
      });
    });

    it("updates the source message", async () => {
      const ctx = createContext(responder);

      await ctx.createUpdate({ content: "page 2" });

      expect(ctx.state).toBe("message-updated");
      expect(responder.createInitialResponse).toHaveBeenCalledWith({
        type: "update",
        payload: { content: "page 2" },
      });
    });

    it("answers with a modal", async () => {
      const ctx = createContext(responder);
      const modal = { custom_id: "form", title: "Form", components: [] };

      await ctx.createModalResponse(modal);

      expect(ctx.state).toBe("modal");
      await expect(ctx.editInitialResponse({ content: "x" })).rejects.toThrow(
        "A modal response has no message",
      );
    });

    it("hands the initial response to a sink instead of the responder", async () => {
      const sink = vi.fn();
      const ctx = new ComponentContext({
        event: createEvent(),
        responder,
        tasks: createTaskTracker(),
        onInitialResponse: sink,
      });

      await ctx.defer({ update: true });

      expect(sink).toHaveBeenCalledWith({ type: "deferred-update" });
      expect(responder.createInitialResponse).not.toHaveBeenCalled();
    });
  });

  describe("deferral", () => {
    it("requires an edit to finalise a deferral", async () => {
      const ctx = createContext(responder);
      await ctx.defer();

      expect(ctx.state).toBe("deferred");
      expect(ctx.hasResponded).toBe(false);
      await expect(ctx.createInitialResponse({ content: "x" })).rejects.toThrow(
        "A deferred response must be finalised with editInitialResponse",
      );

      await ctx.editInitialResponse({ content: "done" });
      expect(ctx.hasResponded).toBe(true);
    });

    it("rejects deferring twice", async () => {
      const ctx = createContext(responder);
      await ctx.defer({ ephemeral: true });

      await expect(ctx.defer()).rejects.toThrow(
        "Context has already been responded to",
      );
      expect(responder.createInitialResponse).toHaveBeenCalledWith({
        type: "deferred-message",
        ephemeral: true,
      });
    });

    it("defers as a message update", async () => {
      const ctx = createContext(responder);
      await ctx.defer({ update: true });
      expect(ctx.state).toBe("deferred-update");
    });
  });

  describe("respond", () => {
    it("creates, then follows up", async () => {
      const ctx = createContext(responder);

      await ctx.respond({ content: "one" });
      await ctx.respond({ content: "two" });

      expect(responder.createInitialResponse).toHaveBeenCalledTimes(1);
      expect(responder.createFollowup).toHaveBeenCalledWith({ content: "two" });
    });

    it("edits a deferred response", async () => {
      const ctx = createContext(responder);
      await ctx.defer();

      await ctx.respond({ content: "ready" });

      expect(responder.editInitialResponse).toHaveBeenCalledWith({
        content: "ready",
      });
      expect(responder.createFollowup).not.toHaveBeenCalled();
    });

    it("serialises concurrent calls", async () => {
      const ctx = createContext(responder);

      await Promise.all([
        ctx.respond({ content: "a" }),
        ctx.respond({ content: "b" }),
      ]);

      expect(responder.createInitialResponse).toHaveBeenCalledTimes(1);
      expect(responder.createFollowup).toHaveBeenCalledTimes(1);
      expect(responder.createFollowup).toHaveBeenCalledWith({ content: "b" });
    });
  });

  describe("followups", () => {
    it("requires an initial response", async () => {
      const ctx = createContext(responder);
      await expect(ctx.createFollowup({ content: "x" })).rejects.toThrow(
        ResponseStateError,
      );
    });

    it("marks ephemeral followups with the message flag", async () => {
      const ctx = createContext(responder);
      await ctx.createInitialResponse({ content: "x" });

      await ctx.createFollowup({ content: "quiet" }, { ephemeral: true });

      expect(responder.createFollowup).toHaveBeenCalledWith({
        content: "quiet",
        flags: 64,
      });
    });

    it("edits and deletes the last followup", async () => {
      const ctx = createContext(responder);
      await ctx.createInitialResponse({ content: "x" });
      await ctx.createFollowup({ content: "y" });

      await ctx.editLastResponse({ content: "y2" });
      await ctx.deleteLastResponse();

      expect(responder.editFollowup).toHaveBeenCalledWith("followup-1", {
        content: "y2",
      });
      expect(responder.deleteFollowup).toHaveBeenCalledWith("followup-1");
    });

    it("falls back to the initial response without followups", async () => {
      const ctx = createContext(responder);
      await ctx.createInitialResponse({ content: "x" });

      await ctx.editLastResponse({ content: "x2" });
      await ctx.deleteLastResponse();

      expect(responder.editInitialResponse).toHaveBeenCalledWith({
        content: "x2",
      });
      expect(responder.deleteInitialResponse).toHaveBeenCalledTimes(1);
    });
  });

  describe("deleteAfterMs", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("schedules deletion of the initial response", async () => {
      const ctx = createContext(responder);

      await ctx.createInitialResponse({ content: "x" }, { deleteAfterMs: 5_000 });
      expect(responder.deleteInitialResponse).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(5_000);
      expect(responder.deleteInitialResponse).toHaveBeenCalledTimes(1);
    });

    it("schedules deletion of a followup", async () => {
      const ctx = createContext(responder);
      await ctx.createInitialResponse({ content: "x" });

      await ctx.createFollowup({ content: "y" }, { deleteAfterMs: 1_000 });
      await vi.advanceTimersByTimeAsync(1_000);

      expect(responder.deleteFollowup).toHaveBeenCalledWith("followup-1");
    });

    it("rejects delays past the interaction lifetime margin", async () => {
      // 14 minutes in, 60s left: 50s + 10s margin fits, 50.001s does not
      const ctx = createContext(responder, createEvent(), () => 840_000);

      await expect(
        ctx.createInitialResponse({ content: "x" }, { deleteAfterMs: 50_001 }),
      ).rejects.toThrow(ValidationError);
      expect(responder.createInitialResponse).not.toHaveBeenCalled();

      await ctx.createInitialResponse({ content: "x" }, { deleteAfterMs: 50_000 });
      expect(ctx.state).toBe("created");
    });
  });
});

describe("ModalContext", () => {
  it("exposes submitted field values", () => {
    const ctx = new ModalContext({
      event: createEvent({ kind: "modal", fields: { name: "Ada" } }),
      responder: createMockResponder(),
      tasks: createTaskTracker(),
    });
    expect(ctx.fieldValues).toEqual({ name: "Ada" });
  });
});
