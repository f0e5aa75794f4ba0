/**
 * Custom ID Codec
 *
 * Custom ids carry a routing part and optional metadata:
 *   {match}            -> routes to the executor registered for "match"
 *   {match}:{metadata} -> same executor, metadata handed to the callback
 *
 * Only the first separator splits, so metadata may itself contain ":".
 */

import { ValidationError } from "./errors";
import { CUSTOM_ID_SEPARATOR, MAX_CUSTOM_ID_LENGTH } from "./types";

export interface CustomIdParts {
  match: string;
  metadata?: string;
}

/**
 * Split a custom id at its first separator.
 *
 * An id without a separator yields no metadata; "btn:" yields an empty
 * metadata string.
 */
export function splitCustomId(customId: string): CustomIdParts {
  const index = customId.indexOf(CUSTOM_ID_SEPARATOR);
  if (index === -1) {
    return { match: customId };
  }

  return {
    match: customId.slice(0, index),
    metadata: customId.slice(index + CUSTOM_ID_SEPARATOR.length),
  };
}

/**
 * Validate a routing key.
 *
 * @throws ValidationError for an empty key, a key containing the
 * separator, or one longer than the custom id limit
 */
export function validateMatch(match: string): string {
  if (match.length === 0) {
    throw new ValidationError("Custom id match must not be empty");
  }
  if (match.includes(CUSTOM_ID_SEPARATOR)) {
    throw new ValidationError(
      `Custom id match must not contain "${CUSTOM_ID_SEPARATOR}": ${match}`,
    );
  }
  if (match.length > MAX_CUSTOM_ID_LENGTH) {
    throw new ValidationError(
      `Custom id match exceeds ${MAX_CUSTOM_ID_LENGTH} characters`,
    );
  }
  return match;
}

/**
 * Join a match and optional metadata into a custom id.
 *
 * @throws ValidationError if the match is invalid or the result is too long
 */
export function joinCustomId(match: string, metadata?: string): string {
  validateMatch(match);

  const customId =
    metadata === undefined ? match : `${match}${CUSTOM_ID_SEPARATOR}${metadata}`;

  if (customId.length > MAX_CUSTOM_ID_LENGTH) {
    throw new ValidationError(
      `Custom id exceeds ${MAX_CUSTOM_ID_LENGTH} characters (${customId.length})`,
    );
  }
  return customId;
}

/**
 * Generate a unique match for controls that do not need to survive restarts.
 */
export function randomCustomId(): string {
  return crypto.randomUUID();
}
