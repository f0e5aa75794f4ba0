/**
 * Pagination
 *
 * Cursor over a lazily consumed page source. Pages pulled from the
 * source are buffered so moving backwards never touches it again.
 * Every move runs through a per-instance queue, so concurrent presses
 * are applied one after another.
 */

import PQueue from "p-queue";
import type { APIEmbed } from "discord-api-types/v10";
import { UnsupportedOperationError } from "./errors";
import type { MessageComponents, MessagePayload } from "./types";

// ============================================================================
// Constants
// ============================================================================

export type PaginatorTrigger = "first" | "previous" | "stop" | "next" | "last";

/** Triggers enabled when none are configured */
export const DEFAULT_TRIGGERS: readonly PaginatorTrigger[] = [
  "previous",
  "stop",
  "next",
];

export const TRIGGER_EMOJI = {
  first: "⏮️",
  previous: "◀️",
  stop: "⏹️",
  next: "▶️",
  last: "⏭️",
} as const satisfies Record<PaginatorTrigger, string>;

/** Shown on the stop button of component paginators */
export const CLOSE_EMOJI = "✖️";

// ============================================================================
// Pages
// ============================================================================

/**
 * Content of one page.
 */
export interface Page {
  content?: string;
  embeds?: APIEmbed[];
}

/** A bare string is read as a page with that content */
export type PageLike = Page | string;

export type PageSource = Iterable<PageLike> | AsyncIterable<PageLike>;

/**
 * Result of a move. `moved` is false for a no-op, such as "next" on the
 * last page of an exhausted source.
 */
export interface PageMove {
  page: Page;
  moved: boolean;
}

export type CursorState = "at-start" | "mid" | "at-end";

export interface PaginatorOptions {
  /** The source never ends; jumping to the last page is refused */
  infinite?: boolean;
}

function toPage(item: PageLike): Page {
  return typeof item === "string" ? { content: item } : item;
}

function isAsyncSource(source: PageSource): source is AsyncIterable<PageLike> {
  return Symbol.asyncIterator in source;
}

/**
 * Message payload for a page. Unset parts are cleared so an update
 * replaces the previous page entirely.
 */
export function pagePayload(
  page: Page,
  components?: MessageComponents,
): MessagePayload {
  const payload: MessagePayload = {
    content: page.content ?? "",
    embeds: page.embeds ?? [],
  };
  if (components) {
    payload.components = components;
  }
  return payload;
}

/**
 * Check a trigger set against the paginator options.
 *
 * @throws UnsupportedOperationError if "last" is combined with an
 * infinite source
 */
export function resolveTriggers(
  triggers: readonly PaginatorTrigger[] | undefined,
  infinite: boolean,
): PaginatorTrigger[] {
  const resolved = [...new Set(triggers ?? DEFAULT_TRIGGERS)];
  if (infinite && resolved.includes("last")) {
    throw new UnsupportedOperationError(
      'The "last" trigger cannot be used with an infinite source',
    );
  }
  return resolved;
}

// ============================================================================
// Paginator
// ============================================================================

export class Paginator {
  readonly infinite: boolean;

  private readonly iterator: Iterator<PageLike> | AsyncIterator<PageLike>;
  private readonly buffer: Page[] = [];
  private readonly queue = new PQueue({ concurrency: 1 });
  private index = 0;
  private exhausted = false;

  constructor(source: PageSource, options: PaginatorOptions = {}) {
    this.infinite = options.infinite ?? false;
    this.iterator = isAsyncSource(source)
      ? source[Symbol.asyncIterator]()
      : source[Symbol.iterator]();
  }

  /** Index of the current page in the buffer */
  get position(): number {
    return this.index;
  }

  /** Pages pulled from the source so far */
  get bufferedCount(): number {
    return this.buffer.length;
  }

  get isExhausted(): boolean {
    return this.exhausted;
  }

  get state(): CursorState {
    if (this.exhausted && this.index === this.buffer.length - 1) {
      return "at-end";
    }
    return this.index === 0 ? "at-start" : "mid";
  }

  /** The page on display, undefined before the first move */
  getCurrentEntry(): Page | undefined {
    return this.buffer.length === 0 ? undefined : this.buffer[this.index];
  }

  /**
   * Advance one page, pulling from the source past the buffer's end.
   * Returns undefined only when the source yields nothing at all.
   */
  getNextEntry(): Promise<PageMove | undefined> {
    return this.exclusive(async () => {
      if (this.index + 1 < this.buffer.length) {
        this.index++;
        return { page: this.buffer[this.index], moved: true };
      }

      const page = await this.pull();
      if (page) {
        this.index = this.buffer.length - 1;
        return { page, moved: true };
      }
      return this.stay();
    });
  }

  /** Step back one page. A no-op on the first page. */
  getPreviousEntry(): Promise<PageMove | undefined> {
    return this.exclusive(async () => {
      if (this.index === 0) {
        return this.stay();
      }
      this.index--;
      return { page: this.buffer[this.index], moved: true };
    });
  }

  getFirstEntry(): Promise<PageMove | undefined> {
    return this.exclusive(async () => {
      if (this.buffer.length === 0) {
        const page = await this.pull();
        return page && { page, moved: true };
      }
      const moved = this.index !== 0;
      this.index = 0;
      return { page: this.buffer[0], moved };
    });
  }

  /**
   * Consume the rest of the source and jump to its last page.
   *
   * @throws UnsupportedOperationError for infinite sources
   */
  getLastEntry(): Promise<PageMove | undefined> {
    if (this.infinite) {
      return Promise.reject(
        new UnsupportedOperationError(
          "Cannot jump to the last page of an infinite source",
        ),
      );
    }

    return this.exclusive(async () => {
      while (await this.pull()) {
        // drain
      }
      if (this.buffer.length === 0) {
        return undefined;
      }
      const last = this.buffer.length - 1;
      const moved = this.index !== last;
      this.index = last;
      return { page: this.buffer[last], moved };
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.add(task, { throwOnTimeout: true });
  }

  /** Pull one page into the buffer, or mark the source exhausted */
  private async pull(): Promise<Page | undefined> {
    if (this.exhausted) {
      return undefined;
    }
    const result = await this.iterator.next();
    if (result.done) {
      this.exhausted = true;
      return undefined;
    }
    const page = toPage(result.value);
    this.buffer.push(page);
    return page;
  }

  private stay(): PageMove | undefined {
    const page = this.getCurrentEntry();
    return page && { page, moved: false };
  }
}
