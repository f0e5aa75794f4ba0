/**
 * HTTP Interaction Endpoint
 *
 * Serves Discord's interaction webhook for @latch/discord component and
 * modal clients.
 */

// Types
export type {
  InteractionServer,
  InteractionServerConfig,
  InteractionServerEvents,
} from "./types";

// Constants
export {
  DEFAULT_PORT,
  DEFAULT_HOSTNAME,
  DEFAULT_MAX_BODY_SIZE,
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER,
} from "./types";

// Server
export { createInteractionServer } from "./server";

// Signatures
export { decodeHex, importPublicKey, verifySignature } from "./signature";

// Configuration
export { loadServerConfig, type ServerEnvConfig } from "./config";
