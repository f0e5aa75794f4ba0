/**
 * HTTP Interaction Server CLI
 *
 * Serves the interaction webhook with a demo button and modal.
 *
 * Usage:
 *   DISCORD_PUBLIC_KEY=hex tsx packages/http/cli.ts
 *   DISCORD_PUBLIC_KEY=hex PORT=8080 HOST=0.0.0.0 tsx packages/http/cli.ts
 */

import {
  CallbackExecutor,
  ComponentClient,
  Modal,
  ModalClient,
  textInput,
  toError,
} from "@latch/discord";
import { REST } from "discord.js";
import { createInteractionServer, loadServerConfig } from "./src";

let config: ReturnType<typeof loadServerConfig>;
try {
  config = loadServerConfig();
} catch (error) {
  console.error(`❌ ${toError(error).message}`);
  process.exit(1);
}

const components = new ComponentClient().open();
const modals = new ModalClient().open();

const echo = new Modal(
  { text: textInput({ label: "Text", style: "paragraph" }) },
  async (ctx, values) => {
    await ctx.createInitialResponse({ content: values.get("text") }, { ephemeral: true });
  },
);
modals.register(echo, { match: "echo" });

components.register(
  new CallbackExecutor("echo", async (ctx) => {
    await ctx.createModalResponse(echo.build({ customId: "echo", title: "Echo" }));
  }),
);

const rest = new REST();
if (config.token) {
  rest.setToken(config.token);
}

console.log("🌐 Starting interaction endpoint...\n");

const server = createInteractionServer({
  publicKey: config.publicKey,
  applicationId: config.applicationId,
  components,
  modals,
  rest,
  port: config.port,
  hostname: config.hostname,
  maxBodySize: config.maxBodySize,
  events: {
    onStart: ({ hostname, port }) => {
      console.log(`✅ Server listening on http://${hostname}:${port}`);
      console.log("");
      console.log("Endpoints:");
      console.log("  GET  /health  - Health check");
      console.log("  POST /        - Interaction webhook");
      console.log("");
      console.log("Press Ctrl+C to stop.\n");
    },
    onStop: () => {
      console.log("👋 Server stopped");
    },
    onRequest: (path, method) => {
      console.log(`📥 ${method} ${path}`);
    },
    onError: (error) => {
      console.error(`❌ Error: ${error.message}`);
    },
  },
});

async function shutdown(): Promise<void> {
  await server.stop();
  await Promise.all([components.close(), modals.close()]);
}

process.on("SIGINT", () => {
  console.log("\n⏳ Shutting down...");
  void shutdown().then(() => process.exit(0));
});

process.on("SIGTERM", () => {
  void shutdown().then(() => process.exit(0));
});

await server.start();
