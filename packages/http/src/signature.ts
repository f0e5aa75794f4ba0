/**
 * Ed25519 request signature verification.
 */

import { type KeyObject, createPublicKey, verify } from "node:crypto";
import { ValidationError } from "@latch/discord";

/** DER prefix of an SPKI-wrapped raw ed25519 public key */
const ED25519_SPKI_PREFIX = Buffer.from("302a300506032b6570032100", "hex");

const ED25519_KEY_LENGTH = 32;
const ED25519_SIGNATURE_LENGTH = 64;

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * Decode an even-length hex string.
 *
 * @throws ValidationError on anything else
 */
export function decodeHex(value: string): Buffer {
  if (!HEX_PATTERN.test(value)) {
    throw new ValidationError("Invalid hex string");
  }
  return Buffer.from(value, "hex");
}

/**
 * Import a raw 32-byte ed25519 public key given as hex.
 *
 * @throws ValidationError if the key is malformed
 */
export function importPublicKey(hex: string): KeyObject {
  const raw = decodeHex(hex);
  if (raw.length !== ED25519_KEY_LENGTH) {
    throw new ValidationError(
      `Public key must be ${ED25519_KEY_LENGTH} bytes, got ${raw.length}`,
    );
  }
  return createPublicKey({
    key: Buffer.concat([ED25519_SPKI_PREFIX, raw]),
    format: "der",
    type: "spki",
  });
}

/**
 * Check a request signature over timestamp + body.
 *
 * @throws ValidationError if the signature is not 64 bytes of hex
 */
export function verifySignature(
  publicKey: KeyObject,
  signatureHex: string,
  timestamp: string,
  body: Uint8Array,
): boolean {
  const signature = decodeHex(signatureHex);
  if (signature.length !== ED25519_SIGNATURE_LENGTH) {
    throw new ValidationError("Invalid signature length");
  }
  const message = Buffer.concat([Buffer.from(timestamp, "utf8"), body]);
  return verify(null, message, publicKey, signature);
}
