/**
 * String Pages
 *
 * Lazily packs lines of text into pages that fit within Discord's
 * message limits. Lines are never reordered; a line too long for one
 * page is split at a newline or space where it can be.
 */

import { ValidationError } from "./errors";

/** Platform limit on message content length */
export const DISCORD_MAX_MESSAGE_LENGTH = 2000;

/** Default number of lines per page */
export const DEFAULT_LINE_LIMIT = 25;

/** Placeholder a wrapper must contain */
export const WRAPPER_PLACEHOLDER = "{}";

export interface StringPageOptions {
  /** Maximum characters per page, wrapper included (default: 2000) */
  charLimit?: number;
  /** Maximum lines per page (default: 25) */
  lineLimit?: number;
  /** Template for each page, e.g. "```\n{}\n```" */
  wrapper?: string;
}

/**
 * Find the best break point within the given limit.
 *
 * Breaking priority:
 * 1. Newlines (preserves paragraph structure)
 * 2. Spaces (preserves word boundaries)
 * 3. Hard break (last resort for very long words)
 */
function findBreakPoint(text: string, maxLength: number): number {
  const lastNewline = text.lastIndexOf("\n", maxLength - 1);
  if (lastNewline > 0) {
    return lastNewline + 1;
  }

  const lastSpace = text.lastIndexOf(" ", maxLength - 1);
  if (lastSpace > 0) {
    return lastSpace + 1;
  }

  return maxLength;
}

/**
 * Split a line into chunks no longer than maxLength. Whitespace is kept.
 */
export function splitLine(line: string, maxLength: number): string[] {
  const chunks: string[] = [];
  let remaining = line;
  while (remaining.length > maxLength) {
    const breakPoint = findBreakPoint(remaining, maxLength);
    chunks.push(remaining.slice(0, breakPoint));
    remaining = remaining.slice(breakPoint);
  }
  if (remaining.length > 0) {
    chunks.push(remaining);
  }
  return chunks;
}

/**
 * Accumulates lines and hands back pages as they fill up.
 */
class PageBuilder {
  private readonly charLimit: number;
  private readonly lineLimit: number;
  private readonly wrapper: string | undefined;
  private lines: string[] = [];
  private size = 0;

  constructor(options: StringPageOptions) {
    const charLimit = options.charLimit ?? DISCORD_MAX_MESSAGE_LENGTH;
    this.lineLimit = options.lineLimit ?? DEFAULT_LINE_LIMIT;
    this.wrapper = options.wrapper;

    if (this.lineLimit < 1) {
      throw new ValidationError("lineLimit must be at least 1");
    }
    if (this.wrapper !== undefined && !this.wrapper.includes(WRAPPER_PLACEHOLDER)) {
      throw new ValidationError(`wrapper must contain "${WRAPPER_PLACEHOLDER}"`);
    }

    const overhead =
      this.wrapper === undefined ? 0 : this.wrapper.length - WRAPPER_PLACEHOLDER.length;
    this.charLimit = charLimit - overhead;
    if (this.charLimit < 1) {
      throw new ValidationError("charLimit leaves no room for content");
    }
  }

  /** Add a line, returning any pages it completed */
  push(line: string): string[] {
    const ready: string[] = [];
    if (
      this.lines.length >= this.lineLimit ||
      (this.lines.length > 0 && this.size + 1 + line.length > this.charLimit)
    ) {
      ready.push(this.take());
    }

    if (line.length <= this.charLimit) {
      this.append(line);
      return ready;
    }

    const chunks = splitLine(line, this.charLimit);
    const tail = chunks[chunks.length - 1];
    // A short tail can share its page with the lines that follow
    if (tail.length < this.charLimit) {
      chunks.pop();
      this.append(tail);
    }
    ready.push(...chunks.map((chunk) => this.wrap(chunk)));
    return ready;
  }

  /** The last, partly filled page */
  flush(): string | undefined {
    return this.lines.length > 0 ? this.take() : undefined;
  }

  private append(line: string): void {
    this.size += (this.lines.length > 0 ? 1 : 0) + line.length;
    this.lines.push(line);
  }

  private take(): string {
    const page = this.wrap(this.lines.join("\n"));
    this.lines = [];
    this.size = 0;
    return page;
  }

  private wrap(content: string): string {
    return this.wrapper === undefined
      ? content
      : this.wrapper.replace(WRAPPER_PLACEHOLDER, () => content);
  }
}

/**
 * Paginate lines of text.
 *
 * @throws ValidationError for a wrapper without "{}" or limits that
 * leave no room for content
 */
export function* syncPaginateString(
  lines: Iterable<string>,
  options: StringPageOptions = {},
): Generator<string, void, undefined> {
  const builder = new PageBuilder(options);
  for (const line of lines) {
    yield* builder.push(line);
  }
  const last = builder.flush();
  if (last !== undefined) {
    yield last;
  }
}

export async function* asyncPaginateString(
  lines: AsyncIterable<string>,
  options: StringPageOptions = {},
): AsyncGenerator<string, void, undefined> {
  const builder = new PageBuilder(options);
  for await (const line of lines) {
    yield* builder.push(line);
  }
  const last = builder.flush();
  if (last !== undefined) {
    yield last;
  }
}

function isAsyncIterable(
  lines: Iterable<string> | AsyncIterable<string>,
): lines is AsyncIterable<string> {
  return Symbol.asyncIterator in lines;
}

/**
 * Paginate lines from a synchronous or asynchronous source, keeping the
 * source's kind.
 */
export function paginateString(
  lines: AsyncIterable<string>,
  options?: StringPageOptions,
): AsyncGenerator<string, void, undefined>;
export function paginateString(
  lines: Iterable<string>,
  options?: StringPageOptions,
): Generator<string, void, undefined>;
export function paginateString(
  lines: Iterable<string> | AsyncIterable<string>,
  options: StringPageOptions = {},
): Generator<string, void, undefined> | AsyncGenerator<string, void, undefined> {
  if (isAsyncIterable(lines)) {
    return asyncPaginateString(lines, options);
  }
  return syncPaginateString(lines, options);
}
