/**
 * Discord Gateway Demo
 *
 * Connects to the gateway and routes component, modal and reaction events
 * through the interaction clients. With DEMO_CHANNEL_ID set, posts a
 * button column and a reaction paginator to that channel on startup.
 *
 * Usage:
 *   DISCORD_TOKEN=your-token tsx packages/discord/cli.ts
 *   DISCORD_TOKEN=your-token DEMO_CHANNEL_ID=123 tsx packages/discord/cli.ts
 */

import { ButtonStyle, type Client } from "discord.js";
import {
  ColumnTemplate,
  ComponentClient,
  ComponentPaginator,
  Modal,
  ModalClient,
  ReactionClient,
  ReactionPaginator,
  attachInteractionListener,
  connectGateway,
  createGatewayClient,
  never,
  optionalTextInput,
  sliding,
  textInput,
  toError,
} from "./src";

const token = process.env.DISCORD_TOKEN;
const demoChannelId = process.env.DEMO_CHANNEL_ID;

if (!token) {
  console.error("❌ DISCORD_TOKEN environment variable is required");
  console.error("");
  console.error("Usage:");
  console.error("  DISCORD_TOKEN=your-token tsx packages/discord/cli.ts");
  console.error("");
  console.error("Environment:");
  console.error("  DEMO_CHANNEL_ID  Channel to post the demo messages in");
  process.exit(1);
}

const components = new ComponentClient({
  events: {
    onError: (error) => console.error(`❌ Component error: ${error.message}`),
  },
});
const modals = new ModalClient();
const reactions = new ReactionClient();

const FEEDBACK_MODAL = "feedback";
const PAGE_COUNT = 5;

const feedback = new Modal(
  {
    summary: textInput({ label: "Summary", maxLength: 100 }),
    details: optionalTextInput({ label: "Details", style: "paragraph" }),
  },
  async (ctx, values) => {
    const details = values.get("details");
    const suffix = details ? ` (${details.length} chars of detail)` : "";
    await ctx.createInitialResponse(
      { content: `Thanks! "${values.get("summary")}"${suffix}` },
      { ephemeral: true },
    );
  },
);
modals.register(feedback, { match: FEEDBACK_MODAL });

function numberedPages(prefix: string): string[] {
  return Array.from({ length: PAGE_COUNT }, (_, i) => `${prefix} ${i + 1}/${PAGE_COUNT}`);
}

let presses = 0;

const demoColumn = ColumnTemplate.create("demo")
  .button(
    async (ctx) => {
      presses += 1;
      await ctx.createInitialResponse({ content: `Pressed ${presses} time(s)` }, { ephemeral: true });
    },
    { label: "Count", style: ButtonStyle.Primary },
  )
  .button(
    async (ctx) => {
      await ctx.createModalResponse(
        feedback.build({ customId: FEEDBACK_MODAL, title: "Send feedback" }),
      );
    },
    { label: "Feedback", style: ButtonStyle.Secondary },
  )
  .button(
    async (ctx) => {
      const paginator = new ComponentPaginator(numberedPages("Button page"), {
        authors: [ctx.userId],
      });
      const first = await paginator.open();
      if (!first) {
        return;
      }
      components.register(paginator, { expiry: sliding(60_000) });
      await ctx.createInitialResponse(first, { ephemeral: true });
    },
    { label: "Pages", style: ButtonStyle.Success },
  )
  .build();
// Lives as long as the demo message
components.register(demoColumn, { expiry: never() });

async function postDemo(client: Client, channelId: string): Promise<void> {
  const channel = await client.channels.fetch(channelId);
  if (!channel?.isSendable()) {
    throw new Error(`Channel ${channelId} cannot receive messages`);
  }

  await channel.send({ content: "Interaction demo", components: demoColumn.rows });

  const paginator = new ReactionPaginator(numberedPages("Reaction page"));
  const message = await paginator.open({ send: (page) => channel.send(page) });
  if (message) {
    reactions.register(paginator, message.id);
  }
}

console.log("🤖 Starting interaction demo...");
console.log("");

components.open();
modals.open();
reactions.open();

const client = createGatewayClient();
const listener = attachInteractionListener(client, {
  components,
  modals,
  reactions,
  onError: (error, packetType) => {
    console.error(`❌ ${packetType}: ${error.message}`);
  },
});

async function shutdown(): Promise<void> {
  await listener.shutdown();
  await Promise.all([components.close(), modals.close(), reactions.close()]);
  await client.destroy();
}

process.on("SIGINT", () => {
  console.log("\n⏳ Shutting down gracefully...");
  void shutdown().then(() => {
    console.log("👋 Goodbye!");
    process.exit(0);
  });
});

process.on("SIGTERM", () => {
  console.log("\n⏳ Received SIGTERM, shutting down...");
  void shutdown().then(() => process.exit(0));
});

try {
  await connectGateway(client, token);
  console.log(`✅ Connected as ${client.user?.tag}`);
  if (demoChannelId) {
    await postDemo(client, demoChannelId);
    console.log(`💬 Demo posted in channel ${demoChannelId}`);
  }
  console.log("Press Ctrl+C to stop.\n");
} catch (error) {
  console.error(`❌ Failed to start: ${toError(error).message}`);
  await shutdown();
  process.exit(1);
}
