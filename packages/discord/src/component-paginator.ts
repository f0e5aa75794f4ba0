/**
 * Component Paginator
 *
 * Pages through a source with a row of buttons. Register it by message
 * id once the first page has been sent, or globally by its trigger ids:
 *
 *   const paginator = new ComponentPaginator(pages, { authors: [userId] });
 *   const first = await paginator.open();
 *   await ctx.createInitialResponse(first);
 *   components.register(paginator);
 */

import { ButtonStyle } from "discord-api-types/v10";
import { ActionColumnExecutor } from "./column";
import type { ComponentExecutor } from "./components";
import type { ComponentContext } from "./context";
import { ExecutorClosed } from "./errors";
import { randomCustomId } from "./identifier";
import {
  CLOSE_EMOJI,
  type PageMove,
  type PageSource,
  Paginator,
  type PaginatorTrigger,
  TRIGGER_EMOJI,
  pagePayload,
  resolveTriggers,
} from "./pagination";
import { type MessagePayload, NOT_PERMITTED_MESSAGE } from "./types";

export interface ComponentPaginatorOptions {
  /** Users allowed to turn pages; anyone when omitted */
  authors?: Iterable<string>;
  /** Buttons to show, in order (default: previous, stop, next) */
  triggers?: readonly PaginatorTrigger[];
  infinite?: boolean;
  ephemeralDefault?: boolean;
}

export class ComponentPaginator implements ComponentExecutor {
  /** Custom id of each trigger's button */
  readonly triggerIds: Readonly<Partial<Record<PaginatorTrigger, string>>>;

  private readonly paginator: Paginator;
  private readonly column: ActionColumnExecutor;
  private readonly authors: ReadonlySet<string> | undefined;

  constructor(source: PageSource, options: ComponentPaginatorOptions = {}) {
    const infinite = options.infinite ?? false;
    const triggers = resolveTriggers(options.triggers, infinite);

    this.paginator = new Paginator(source, { infinite });
    this.authors = options.authors ? new Set(options.authors) : undefined;
    this.column = new ActionColumnExecutor({
      ephemeralDefault: options.ephemeralDefault,
    });

    const ids: Partial<Record<PaginatorTrigger, string>> = {};
    for (const trigger of triggers) {
      const match = randomCustomId();
      ids[trigger] = match;
      this.column.addButton((ctx) => this.onTrigger(ctx, trigger), {
        match,
        style: trigger === "stop" ? ButtonStyle.Danger : ButtonStyle.Secondary,
        emoji: trigger === "stop" ? CLOSE_EMOJI : TRIGGER_EMOJI[trigger],
      });
    }
    this.triggerIds = ids;
  }

  get idMatches(): readonly string[] {
    return this.column.idMatches;
  }

  get position(): number {
    return this.paginator.position;
  }

  /**
   * Load the first page.
   *
   * @returns the message to send, undefined if the source is empty
   */
  async open(): Promise<MessagePayload | undefined> {
    const move = await this.paginator.getFirstEntry();
    return move && pagePayload(move.page, this.column.rows);
  }

  async execute(ctx: ComponentContext): Promise<void> {
    if (this.authors && !this.authors.has(ctx.userId)) {
      await ctx.createInitialResponse(
        { content: NOT_PERMITTED_MESSAGE },
        { ephemeral: true },
      );
      return;
    }
    await this.column.execute(ctx);
  }

  private async onTrigger(
    ctx: ComponentContext,
    trigger: PaginatorTrigger,
  ): Promise<void> {
    if (trigger === "stop") {
      await ctx.defer({ update: true });
      await ctx.deleteInitialResponse();
      throw new ExecutorClosed();
    }

    const move = await this.move(trigger);
    if (!move || !move.moved) {
      await ctx.defer({ update: true });
      return;
    }
    await ctx.createUpdate(pagePayload(move.page, this.column.rows));
  }

  private move(
    trigger: Exclude<PaginatorTrigger, "stop">,
  ): Promise<PageMove | undefined> {
    switch (trigger) {
      case "first":
        return this.paginator.getFirstEntry();
      case "previous":
        return this.paginator.getPreviousEntry();
      case "next":
        return this.paginator.getNextEntry();
      case "last":
        return this.paginator.getLastEntry();
    }
  }
}
