/**
 * Environment configuration for the interaction server CLI.
 */

import { ValidationError } from "@latch/discord";
import { DEFAULT_HOSTNAME, DEFAULT_MAX_BODY_SIZE, DEFAULT_PORT } from "./types";

export interface ServerEnvConfig {
  publicKey: string;
  applicationId?: string;
  /** Bot token, only needed for REST calls that are not interaction webhooks */
  token?: string;
  port: number;
  hostname: string;
  maxBodySize: number;
}

const MAX_PORT = 65_535;

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  { min, max }: { min: number; max: number },
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${name} must be an integer between ${min} and ${max}: "${raw}"`);
  }
  return value;
}

/**
 * Read server settings from the environment.
 *
 * @throws ValidationError if DISCORD_PUBLIC_KEY is missing or a number is malformed
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerEnvConfig {
  const publicKey = env.DISCORD_PUBLIC_KEY;
  if (!publicKey) {
    throw new ValidationError("DISCORD_PUBLIC_KEY environment variable is required");
  }

  return {
    publicKey,
    applicationId: env.DISCORD_APPLICATION_ID || undefined,
    token: env.DISCORD_TOKEN || undefined,
    port: readInteger(env, "PORT", DEFAULT_PORT, { min: 0, max: MAX_PORT }),
    hostname: env.HOST || DEFAULT_HOSTNAME,
    maxBodySize: readInteger(env, "MAX_BODY_SIZE", DEFAULT_MAX_BODY_SIZE, {
      min: 1,
      max: Number.MAX_SAFE_INTEGER,
    }),
  };
}
