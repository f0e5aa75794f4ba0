import { describe, expect, it } from "vitest";
import { ValidationError } from "./errors";
import { parseInteraction, parseReaction, snowflakeTime } from "./interaction";

// 1000ms after the snowflake epoch
const INTERACTION_ID = String(1000 * 2 ** 22);

function componentPayload(overrides: Record<string, unknown> = {}) {
  return {
    id: INTERACTION_ID,
    application_id: "app-1",
    type: 3,
    token: "test-token",
    guild_id: "guild-1",
    channel_id: "channel-1",
    member: { user: { id: "user-1" } },
    message: { id: "message-1" },
    data: { custom_id: "vote:42", component_type: 3, values: ["a", "b"] },
    ...overrides,
  };
}

describe("snowflakeTime", () => {
  it("reads the timestamp bits", () => {
    expect(snowflakeTime(INTERACTION_ID)).toBe(1_420_070_401_000);
  });

  it("rejects non-numeric ids", () => {
    expect(() => snowflakeTime("abc")).toThrow(ValidationError);
  });
});

describe("parseInteraction", () => {
  it("recognises pings", () => {
    expect(parseInteraction({ type: 1 })).toEqual({ type: "ping" });
  });

  it("passes over other interaction types", () => {
    expect(parseInteraction({ type: 2, id: "1" })).toEqual({
      type: "unsupported",
      interactionType: 2,
    });
  });

  it("normalises a component interaction", () => {
    expect(parseInteraction(componentPayload())).toEqual({
      type: "event",
      event: {
        kind: "component",
        id: INTERACTION_ID,
        token: "test-token",
        applicationId: "app-1",
        customId: "vote:42",
        componentType: 3,
        messageId: "message-1",
        channelId: "channel-1",
        guildId: "guild-1",
        userId: "user-1",
        createdAt: 1_420_070_401_000,
        values: ["a", "b"],
        fields: {},
      },
    });
  });

  it("reads the user of a direct message interaction", () => {
    const parsed = parseInteraction(
      componentPayload({ member: undefined, user: { id: "user-2" } }),
    );

    expect(parsed.type === "event" && parsed.event.userId).toBe("user-2");
  });

  it("collects modal text inputs", () => {
    const parsed = parseInteraction({
      ...componentPayload({ type: 5, message: undefined }),
      data: {
        custom_id: "profile",
        components: [
          { type: 1, components: [{ type: 4, custom_id: "name", value: "Ada" }] },
          { type: 18, component: { type: 4, custom_id: "bio", value: "" } },
        ],
      },
    });

    expect(parsed.type).toBe("event");
    if (parsed.type === "event") {
      expect(parsed.event.kind).toBe("modal");
      expect(parsed.event.fields).toEqual({ name: "Ada", bio: "" });
      expect(parsed.event.messageId).toBeUndefined();
      expect(parsed.event.componentType).toBeUndefined();
    }
  });

  it("rejects payloads without the fields routing needs", () => {
    expect(() => parseInteraction("nope")).toThrow(ValidationError);
    expect(() => parseInteraction({ id: "1" })).toThrow("Malformed interaction: missing type");
    expect(() => parseInteraction(componentPayload({ token: undefined }))).toThrow(
      "Malformed interaction: missing token",
    );
    expect(() => parseInteraction(componentPayload({ member: undefined }))).toThrow(
      "Malformed interaction: missing user",
    );
  });
});

describe("parseReaction", () => {
  it("uses the unicode emoji as is", () => {
    expect(
      parseReaction("add", {
        user_id: "user-1",
        message_id: "message-1",
        channel_id: "channel-1",
        emoji: { id: null, name: "▶️" },
      }),
    ).toEqual({
      kind: "add",
      messageId: "message-1",
      channelId: "channel-1",
      userId: "user-1",
      emoji: "▶️",
    });
  });

  it("joins custom emoji name and id", () => {
    const event = parseReaction("remove", {
      user_id: "user-1",
      message_id: "message-1",
      emoji: { id: "99", name: "next" },
    });

    expect(event.emoji).toBe("next:99");
  });

  it("rejects packets without an emoji", () => {
    expect(() => parseReaction("add", { user_id: "u", message_id: "m" })).toThrow(
      "Malformed reaction: missing emoji",
    );
  });
});
