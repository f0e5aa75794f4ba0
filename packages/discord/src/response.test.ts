import { describe, expect, it, vi } from "vitest";
import { createRestResponder, readSentMessage } from "./rest";
import { toApiResponse, toMessageData } from "./response";

function createMockRest() {
  return {
    post: vi.fn(async () => ({ id: "msg-1" })),
    patch: vi.fn(async () => ({ id: "msg-2" })),
    delete: vi.fn(async () => undefined),
  };
}

describe("toMessageData", () => {
  it("copies only the fields that are set", () => {
    expect(toMessageData({ content: "hi" })).toEqual({ content: "hi" });
  });

  it("adds the ephemeral flag to existing flags", () => {
    expect(toMessageData({ content: "hi", flags: 4 }, true)).toEqual({
      content: "hi",
      flags: 68,
    });
  });
});

describe("toApiResponse", () => {
  it("converts a message response", () => {
    expect(
      toApiResponse({
        type: "message",
        payload: { content: "hello" },
        ephemeral: true,
      }),
    ).toEqual({ type: 4, data: { content: "hello", flags: 64 } });
  });

  it("converts an update response", () => {
    expect(
      toApiResponse({ type: "update", payload: { content: "page 2" } }),
    ).toEqual({ type: 7, data: { content: "page 2" } });
  });

  it("converts deferred responses", () => {
    expect(toApiResponse({ type: "deferred-message", ephemeral: false })).toEqual(
      { type: 5 },
    );
    expect(toApiResponse({ type: "deferred-message", ephemeral: true })).toEqual(
      { type: 5, data: { flags: 64 } },
    );
    expect(toApiResponse({ type: "deferred-update" })).toEqual({ type: 6 });
  });

  it("converts a modal response", () => {
    const modal = { custom_id: "form", title: "Form", components: [] };
    expect(toApiResponse({ type: "modal", modal })).toEqual({
      type: 9,
      data: modal,
    });
  });
});

describe("readSentMessage", () => {
  it("reads the id from a message body", () => {
    expect(readSentMessage({ id: "123", content: "x" })).toEqual({ id: "123" });
  });

  it("rejects bodies without an id", () => {
    expect(() => readSentMessage(undefined)).toThrow(
      "Webhook response did not include a message id",
    );
  });
});

describe("createRestResponder", () => {
  const target = { id: "int-1", token: "test-token", applicationId: "app-1" };

  it("posts the initial response to the callback route", async () => {
    const rest = createMockRest();
    const responder = createRestResponder(rest, target);

    await responder.createInitialResponse({ type: "deferred-update" });

    expect(rest.post).toHaveBeenCalledWith(
      "/interactions/int-1/test-token/callback",
      { body: { type: 6 }, auth: false },
    );
  });

  it("edits the original response through the webhook", async () => {
    const rest = createMockRest();
    const responder = createRestResponder(rest, target);

    const sent = await responder.editInitialResponse({ content: "done" });

    expect(sent).toEqual({ id: "msg-2" });
    expect(rest.patch).toHaveBeenCalledWith(
      "/webhooks/app-1/test-token/messages/@original",
      { body: { content: "done" }, auth: false },
    );
  });

  it("creates and deletes followups", async () => {
    const rest = createMockRest();
    const responder = createRestResponder(rest, target);

    const sent = await responder.createFollowup({ content: "more" });
    await responder.deleteFollowup(sent.id);

    expect(rest.post).toHaveBeenCalledWith("/webhooks/app-1/test-token", {
      body: { content: "more" },
      auth: false,
    });
    expect(rest.delete).toHaveBeenCalledWith(
      "/webhooks/app-1/test-token/messages/msg-1",
      { auth: false },
    );
  });
});
