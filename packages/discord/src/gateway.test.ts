import { GatewayIntentBits } from "discord.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { connectGateway, createGatewayClient } from "./gateway";

describe("createGatewayClient", () => {
  it("requests the reaction intents by default", async () => {
    const client = createGatewayClient();

    expect(client.options.intents.has(GatewayIntentBits.GuildMessageReactions)).toBe(true);
    expect(client.options.intents.has(GatewayIntentBits.MessageContent)).toBe(false);
    await client.destroy();
  });
});

describe("connectGateway", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects when login fails", async () => {
    const client = createGatewayClient();
    vi.spyOn(client, "login").mockRejectedValue(new Error("An invalid token was provided."));

    await expect(connectGateway(client, "test-token")).rejects.toThrow(
      "An invalid token was provided.",
    );
    await client.destroy();
  });

  it("times out when the client never becomes ready", async () => {
    const client = createGatewayClient();
    vi.spyOn(client, "login").mockResolvedValue("test-token");

    const connecting = connectGateway(client, "test-token", { timeoutMs: 1_000 });
    const assertion = expect(connecting).rejects.toThrow("Connection timeout");
    await vi.advanceTimersByTimeAsync(1_000);

    await assertion;
    await client.destroy();
  });
});
