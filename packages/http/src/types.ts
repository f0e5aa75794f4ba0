/**
 * HTTP Interaction Endpoint Types
 *
 * The endpoint verifies Discord's request signature, dispatches
 * component and modal interactions to @latch/discord clients and returns
 * their initial response as the HTTP response body.
 */

import type { ComponentClient, InteractionRest, ModalClient } from "@latch/discord";
import type { Hono } from "hono";

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * Interaction server configuration
 */
export interface InteractionServerConfig {
  /** Application public key, hex encoded (required) */
  publicKey: string;

  /** Reject interactions addressed to any other application */
  applicationId?: string;

  /** Receives component interactions */
  components?: ComponentClient;

  /** Receives modal submissions */
  modals?: ModalClient;

  /** REST client for edits and followups after the initial response */
  rest?: InteractionRest;

  /** Port to listen on (default: 8080) */
  port?: number;

  /** Hostname to bind to (default: "127.0.0.1") */
  hostname?: string;

  /** Largest accepted request body in bytes (default: 1 MiB) */
  maxBodySize?: number;

  /** Event callbacks */
  events?: InteractionServerEvents;
}

/**
 * Interaction server event callbacks
 */
export interface InteractionServerEvents {
  /** Called when server starts */
  onStart?: (info: { hostname: string; port: number }) => void;
  /** Called when server stops */
  onStop?: () => void;
  /** Called when dispatching an interaction fails */
  onError?: (error: Error) => void;
  /** Called when request is received */
  onRequest?: (path: string, method: string) => void;
}

// ============================================================================
// Server Instance
// ============================================================================

/**
 * Interaction server instance
 */
export interface InteractionServer {
  /** Start the server */
  start(): Promise<void>;

  /** Stop the server */
  stop(): Promise<void>;

  /** Whether server is running */
  readonly isRunning: boolean;

  /** Bound port, or the configured port before start */
  readonly port: number;

  /** The Hono app, for in-process requests */
  readonly app: Hono;
}

// ============================================================================
// Constants
// ============================================================================

/** Default port */
export const DEFAULT_PORT = 8080;

/** Default hostname */
export const DEFAULT_HOSTNAME = "127.0.0.1";

/** Default request body ceiling (1 MiB) */
export const DEFAULT_MAX_BODY_SIZE = 1024 * 1024;

/** Signature header */
export const SIGNATURE_HEADER = "x-signature-ed25519";

/** Signed timestamp header */
export const TIMESTAMP_HEADER = "x-signature-timestamp";
