/**
 * HTTP Interaction Server
 *
 * A Hono app answering Discord's interaction webhook. Component and modal
 * interactions are dispatched with an initial-response sink so the first
 * response travels back as the HTTP body; later edits and followups go
 * over REST.
 */

import { once } from "node:events";
import { type ServerType, serve } from "@hono/node-server";
import {
  type DispatchOutcome,
  type InitialResponse,
  type InitialResponseSink,
  type InteractionEvent,
  ValidationError,
  createRestResponder,
  parseInteraction,
  toApiResponse,
  toError,
} from "@latch/discord";
import { InteractionResponseType } from "discord-api-types/v10";
import { REST } from "discord.js";
import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { importPublicKey, verifySignature } from "./signature";
import {
  DEFAULT_HOSTNAME,
  DEFAULT_MAX_BODY_SIZE,
  DEFAULT_PORT,
  type InteractionServer,
  type InteractionServerConfig,
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER,
} from "./types";

const JSON_CONTENT_TYPE = "application/json";

/** Name of the error hono/body-limit raises while a streamed body is read */
const BODY_LIMIT_ERROR = "BodyLimitError";

function isJsonContentType(header: string | undefined): boolean {
  const mediaType = header?.split(";")[0]?.trim().toLowerCase();
  return mediaType === JSON_CONTENT_TYPE;
}

/**
 * Run a dispatch and resolve with its initial response, as soon as one is
 * created. Resolves undefined if the dispatch finishes without one.
 */
function awaitInitialResponse(
  dispatch: (sink: InitialResponseSink) => Promise<DispatchOutcome>,
  onLateError: (error: Error) => void,
): Promise<InitialResponse | undefined> {
  return new Promise((resolve, reject) => {
    let responded = false;
    const sink: InitialResponseSink = (response) => {
      responded = true;
      resolve(response);
    };

    dispatch(sink).then(
      () => resolve(undefined),
      (error: unknown) => {
        if (responded) {
          onLateError(toError(error));
        } else {
          reject(error);
        }
      },
    );
  });
}

/**
 * Create an interaction server instance
 *
 * @throws ValidationError if the public key is malformed
 */
export function createInteractionServer(
  config: InteractionServerConfig,
): InteractionServer {
  const {
    components,
    modals,
    port = DEFAULT_PORT,
    hostname = DEFAULT_HOSTNAME,
    maxBodySize = DEFAULT_MAX_BODY_SIZE,
    events = {},
  } = config;

  const publicKey = importPublicKey(config.publicKey);
  const rest = config.rest ?? new REST();

  let server: ServerType | null = null;
  let isRunning = false;
  let actualPort = port;

  const reportError = (error: Error): void => {
    if (events.onError) {
      events.onError(error);
    } else {
      console.error(`[Interactions] ${error.message}`);
    }
  };

  const dispatch = (event: InteractionEvent): Promise<InitialResponse | undefined> | null => {
    const responder = createRestResponder(rest, event);
    if (event.kind === "component" && components) {
      return awaitInitialResponse(
        (sink) => components.dispatch(event, responder, { onInitialResponse: sink }),
        reportError,
      );
    }
    if (event.kind === "modal" && modals) {
      return awaitInitialResponse(
        (sink) => modals.dispatch(event, responder, { onInitialResponse: sink }),
        reportError,
      );
    }
    return null;
  };

  const app = new Hono();

  app.get("/health", (c) => {
    events.onRequest?.("/health", "GET");
    return c.json({ ok: true });
  });

  app.post(
    "/",
    bodyLimit({
      maxSize: maxBodySize,
      onError: (c) => c.text("Content Too Large", 413),
    }),
    async (c) => {
      events.onRequest?.("/", "POST");

      if (!isJsonContentType(c.req.header("content-type"))) {
        return c.text("Content-Type must be application/json", 400);
      }

      const signature = c.req.header(SIGNATURE_HEADER);
      const timestamp = c.req.header(TIMESTAMP_HEADER);
      if (!signature || !timestamp) {
        return c.text("Missing required request signature header(s)", 400);
      }

      const body = new Uint8Array(await c.req.arrayBuffer());
      if (body.length === 0) {
        return c.text("POST request must have a body", 400);
      }

      let verified: boolean;
      try {
        verified = verifySignature(publicKey, signature, timestamp, body);
      } catch (error) {
        if (error instanceof ValidationError) {
          return c.text("Invalid request signature header(s)", 400);
        }
        throw error;
      }
      if (!verified) {
        return c.text("Invalid request signature", 401);
      }

      let payload: unknown;
      try {
        payload = JSON.parse(new TextDecoder().decode(body));
      } catch {
        return c.text("Invalid JSON body", 400);
      }

      let parsed: ReturnType<typeof parseInteraction>;
      try {
        parsed = parseInteraction(payload);
      } catch (error) {
        if (error instanceof ValidationError) {
          return c.text(error.message, 400);
        }
        throw error;
      }

      if (parsed.type === "ping") {
        return c.json({ type: InteractionResponseType.Pong });
      }
      if (parsed.type === "unsupported") {
        return c.text(`Unsupported interaction type ${parsed.interactionType}`, 501);
      }

      if (
        config.applicationId !== undefined &&
        parsed.event.applicationId !== config.applicationId
      ) {
        return c.text("Interaction is for another application", 400);
      }

      const pending = dispatch(parsed.event);
      if (!pending) {
        return c.text(`Unsupported interaction type ${parsed.event.kind}`, 501);
      }

      const response = await pending;
      if (!response) {
        return c.text("Handler finished without responding", 500);
      }
      return c.json(toApiResponse(response));
    },
  );

  app.notFound((c) => c.text("Not Found", 404));

  app.onError((error, c) => {
    // A streamed body over the limit surfaces here; bodyLimit answers 413
    if (error.name !== BODY_LIMIT_ERROR) {
      reportError(error);
    }
    return c.text("Internal Server Error", 500);
  });

  /**
   * Start the server
   */
  async function start(): Promise<void> {
    if (isRunning) {
      return;
    }

    const instance = serve({ fetch: app.fetch, port: actualPort, hostname });
    await once(instance, "listening");

    const address = instance.address();
    if (typeof address === "object" && address !== null) {
      actualPort = address.port;
    }
    server = instance;
    isRunning = true;

    events.onStart?.({ hostname, port: actualPort });
  }

  /**
   * Stop the server
   */
  async function stop(): Promise<void> {
    if (!isRunning || !server) {
      return;
    }

    const instance = server;
    server = null;
    isRunning = false;
    await new Promise<void>((resolve, reject) => {
      instance.close((error?: Error) => (error ? reject(error) : resolve()));
    });

    events.onStop?.();
  }

  return {
    start,
    stop,
    get isRunning() {
      return isRunning;
    },
    get port() {
      return actualPort;
    },
    get app() {
      return app;
    },
  };
}
