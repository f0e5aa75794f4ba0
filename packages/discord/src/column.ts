/**
 * Action Column Executor
 *
 * A set of buttons and select menus laid out as action rows, each
 * interactive control bound to its own callback. Buttons share rows
 * (five per row); each select menu takes a row to itself; a message
 * holds at most five rows.
 */

import {
  type APIActionRowComponent,
  type APIComponentInMessageActionRow as APIMessageActionRowComponent,
  type APIMessageComponentEmoji,
  type APISelectMenuOption,
  ButtonStyle,
  type ChannelType,
  ComponentType,
} from "discord-api-types/v10";
import type { ComponentCallback, ComponentExecutor } from "./components";
import type { ComponentContext } from "./context";
import { ValidationError } from "./errors";
import { joinCustomId, randomCustomId, validateMatch } from "./identifier";
import type { MessageComponents } from "./types";

export const MAX_ROWS = 5;
export const MAX_BUTTONS_PER_ROW = 5;
export const MAX_MENU_OPTIONS = 25;

/** Reply for a custom id this column does not know */
export const UNKNOWN_CONTROL_MESSAGE = "This component is no longer available.";

export type InteractiveButtonStyle =
  | ButtonStyle.Primary
  | ButtonStyle.Secondary
  | ButtonStyle.Success
  | ButtonStyle.Danger;

export type ControlEmoji = string | APIMessageComponentEmoji;

interface InteractiveOptions {
  /** Routing key, random when omitted */
  match?: string;
  /** Metadata appended to the rendered custom id */
  metadata?: string;
  disabled?: boolean;
}

export interface ButtonOptions extends InteractiveOptions {
  style?: InteractiveButtonStyle;
  label?: string;
  emoji?: ControlEmoji;
}

export interface LinkButtonOptions {
  label?: string;
  emoji?: ControlEmoji;
  disabled?: boolean;
}

export interface MenuOptions extends InteractiveOptions {
  placeholder?: string;
  minValues?: number;
  maxValues?: number;
}

export interface TextMenuOptions extends MenuOptions {
  options: APISelectMenuOption[];
}

export interface ChannelMenuOptions extends MenuOptions {
  channelTypes?: ChannelType[];
}

interface InteractiveControl {
  match: string;
  callback: ComponentCallback;
  metadata?: string;
  disabled?: boolean;
}

interface MenuControl extends InteractiveControl {
  placeholder?: string;
  minValues?: number;
  maxValues?: number;
}

export type ColumnControl =
  | (InteractiveControl & {
      type: "button";
      style: InteractiveButtonStyle;
      label?: string;
      emoji?: ControlEmoji;
    })
  | {
      type: "link-button";
      url: string;
      label?: string;
      emoji?: ControlEmoji;
      disabled?: boolean;
    }
  | (MenuControl & { type: "text-menu"; options: APISelectMenuOption[] })
  | (MenuControl & { type: "user-menu" | "role-menu" | "mentionable-menu" })
  | (MenuControl & { type: "channel-menu"; channelTypes?: ChannelType[] });

type InteractiveColumnControl = Exclude<ColumnControl, { type: "link-button" }>;

function isButton(control: ColumnControl): boolean {
  return control.type === "button" || control.type === "link-button";
}

/**
 * Pack controls into rows.
 *
 * @throws ValidationError if the controls need more than five rows
 */
export function packRows(controls: readonly ColumnControl[]): ColumnControl[][] {
  const rows: ColumnControl[][] = [];
  for (const control of controls) {
    const last = rows[rows.length - 1];
    if (
      isButton(control) &&
      last !== undefined &&
      isButton(last[0]) &&
      last.length < MAX_BUTTONS_PER_ROW
    ) {
      last.push(control);
    } else {
      rows.push([control]);
    }
  }

  if (rows.length > MAX_ROWS) {
    throw new ValidationError(
      `Action column needs ${rows.length} rows, at most ${MAX_ROWS} fit`,
    );
  }
  return rows;
}

function toEmoji(emoji: ControlEmoji | undefined): APIMessageComponentEmoji | undefined {
  if (emoji === undefined) {
    return undefined;
  }
  return typeof emoji === "string" ? { name: emoji } : emoji;
}

function selectFields(control: MenuControl, customId: string) {
  return {
    custom_id: customId,
    placeholder: control.placeholder,
    min_values: control.minValues,
    max_values: control.maxValues,
    disabled: control.disabled,
  };
}

function renderControl(control: ColumnControl): APIMessageActionRowComponent {
  if (control.type === "link-button") {
    return {
      type: ComponentType.Button,
      style: ButtonStyle.Link,
      url: control.url,
      label: control.label,
      emoji: toEmoji(control.emoji),
      disabled: control.disabled,
    };
  }

  const customId = joinCustomId(control.match, control.metadata);
  switch (control.type) {
    case "button":
      return {
        type: ComponentType.Button,
        style: control.style,
        custom_id: customId,
        label: control.label,
        emoji: toEmoji(control.emoji),
        disabled: control.disabled,
      };
    case "text-menu":
      return {
        type: ComponentType.StringSelect,
        custom_id: customId,
        options: control.options,
        placeholder: control.placeholder,
        min_values: control.minValues,
        max_values: control.maxValues,
        disabled: control.disabled,
      };
    case "channel-menu":
      return {
        type: ComponentType.ChannelSelect,
        custom_id: customId,
        channel_types: control.channelTypes,
        placeholder: control.placeholder,
        min_values: control.minValues,
        max_values: control.maxValues,
        disabled: control.disabled,
      };
    case "user-menu":
      return { ...selectFields(control, customId), type: ComponentType.UserSelect };
    case "role-menu":
      return { ...selectFields(control, customId), type: ComponentType.RoleSelect };
    case "mentionable-menu":
      return {
        ...selectFields(control, customId),
        type: ComponentType.MentionableSelect,
      };
  }
}

/**
 * Render controls as message action rows.
 */
export function renderRows(controls: readonly ColumnControl[]): MessageComponents {
  return packRows(controls).map(
    (row): APIActionRowComponent<APIMessageActionRowComponent> => ({
      type: ComponentType.ActionRow,
      components: row.map(renderControl),
    }),
  );
}

function validateMenu(options: MenuOptions): void {
  const { minValues, maxValues } = options;
  if (minValues !== undefined && maxValues !== undefined && minValues > maxValues) {
    throw new ValidationError("minValues must not exceed maxValues");
  }
}

function validateTextMenu(options: TextMenuOptions): void {
  validateMenu(options);
  if (options.options.length === 0 || options.options.length > MAX_MENU_OPTIONS) {
    throw new ValidationError(
      `A text menu needs between 1 and ${MAX_MENU_OPTIONS} options`,
    );
  }
}

/**
 * Add a control to a list after checking its custom id and that it fits the
 * layout.
 */
function appendControl(
  controls: readonly ColumnControl[],
  control: ColumnControl,
): ColumnControl[] {
  if (control.type !== "link-button") {
    const match = validateMatch(control.match);
    joinCustomId(match, control.metadata);
    if (controls.some((c) => c.type !== "link-button" && c.match === match)) {
      throw new ValidationError(`Duplicate control match: ${match}`);
    }
  }
  const next = [...controls, control];
  packRows(next);
  return next;
}

export interface ColumnOptions {
  /** Respond ephemerally unless a callback says otherwise */
  ephemeralDefault?: boolean;
}

/**
 * Executor routing each control's match to its callback.
 */
export class ActionColumnExecutor implements ComponentExecutor {
  private controls: ColumnControl[] = [];
  private readonly ephemeralDefault: boolean;

  constructor(options: ColumnOptions = {}) {
    this.ephemeralDefault = options.ephemeralDefault ?? false;
  }

  get idMatches(): readonly string[] {
    return this.interactiveControls().map((control) => control.match);
  }

  /** Rendered action rows to attach to a message */
  get rows(): MessageComponents {
    return renderRows(this.controls);
  }

  addControl(control: ColumnControl): this {
    this.controls = appendControl(this.controls, control);
    return this;
  }

  addButton(callback: ComponentCallback, options: ButtonOptions = {}): this {
    return this.addControl({
      type: "button",
      callback,
      match: options.match ?? randomCustomId(),
      metadata: options.metadata,
      style: options.style ?? ButtonStyle.Primary,
      label: options.label,
      emoji: options.emoji,
      disabled: options.disabled,
    });
  }

  addLinkButton(url: string, options: LinkButtonOptions = {}): this {
    return this.addControl({ type: "link-button", url, ...options });
  }

  addTextMenu(callback: ComponentCallback, options: TextMenuOptions): this {
    validateTextMenu(options);
    return this.addControl({
      ...menuControl(callback, options),
      type: "text-menu",
      options: options.options,
    });
  }

  addUserMenu(callback: ComponentCallback, options: MenuOptions = {}): this {
    validateMenu(options);
    return this.addControl({ ...menuControl(callback, options), type: "user-menu" });
  }

  addRoleMenu(callback: ComponentCallback, options: MenuOptions = {}): this {
    validateMenu(options);
    return this.addControl({ ...menuControl(callback, options), type: "role-menu" });
  }

  addMentionableMenu(callback: ComponentCallback, options: MenuOptions = {}): this {
    validateMenu(options);
    return this.addControl({
      ...menuControl(callback, options),
      type: "mentionable-menu",
    });
  }

  addChannelMenu(callback: ComponentCallback, options: ChannelMenuOptions = {}): this {
    validateMenu(options);
    return this.addControl({
      ...menuControl(callback, options),
      type: "channel-menu",
      channelTypes: options.channelTypes,
    });
  }

  async execute(ctx: ComponentContext): Promise<void> {
    if (this.ephemeralDefault) {
      ctx.setEphemeralDefault(true);
    }

    const control = this.interactiveControls().find((c) => c.match === ctx.idMatch);
    if (!control) {
      await ctx.createInitialResponse(
        { content: UNKNOWN_CONTROL_MESSAGE },
        { ephemeral: true },
      );
      return;
    }
    await control.callback(ctx);
  }

  private interactiveControls(): InteractiveColumnControl[] {
    return this.controls.filter(
      (control): control is InteractiveColumnControl => control.type !== "link-button",
    );
  }
}

function menuControl(callback: ComponentCallback, options: MenuOptions): MenuControl {
  return {
    callback,
    match: options.match ?? randomCustomId(),
    metadata: options.metadata,
    placeholder: options.placeholder,
    minValues: options.minValues,
    maxValues: options.maxValues,
    disabled: options.disabled,
  };
}

// ============================================================================
// Templates
// ============================================================================

type TemplateButtonOptions = Omit<ButtonOptions, "match" | "metadata">;
type TemplateMenuOptions = Omit<MenuOptions, "match" | "metadata">;
type TemplateTextMenuOptions = Omit<TextMenuOptions, "match" | "metadata">;
type TemplateChannelMenuOptions = Omit<ChannelMenuOptions, "match" | "metadata">;

export interface BuildColumnOptions extends ColumnOptions {
  /** Metadata per control match, appended to the rendered custom ids */
  metadata?: Readonly<Record<string, string>>;
}

/**
 * Immutable column declaration. Every add returns a new template;
 * matches are derived from the template name and declaration index
 * (`settings-0`, `settings-1`, ...) so they survive restarts.
 */
export class ColumnTemplate {
  private constructor(
    readonly name: string,
    private readonly controls: readonly ColumnControl[],
  ) {}

  static create(name: string): ColumnTemplate {
    return new ColumnTemplate(validateMatch(name), []);
  }

  /** Matches in declaration order, link buttons excluded */
  get idMatches(): readonly string[] {
    return this.controls.flatMap((c) => (c.type === "link-button" ? [] : [c.match]));
  }

  button(callback: ComponentCallback, options: TemplateButtonOptions = {}): ColumnTemplate {
    return this.with({
      type: "button",
      callback,
      match: this.nextMatch(),
      style: options.style ?? ButtonStyle.Primary,
      label: options.label,
      emoji: options.emoji,
      disabled: options.disabled,
    });
  }

  linkButton(url: string, options: LinkButtonOptions = {}): ColumnTemplate {
    return this.with({ type: "link-button", url, ...options });
  }

  textMenu(callback: ComponentCallback, options: TemplateTextMenuOptions): ColumnTemplate {
    validateTextMenu(options);
    return this.with({
      ...menuControl(callback, { ...options, match: this.nextMatch() }),
      type: "text-menu",
      options: options.options,
    });
  }

  userMenu(callback: ComponentCallback, options: TemplateMenuOptions = {}): ColumnTemplate {
    validateMenu(options);
    return this.with({
      ...menuControl(callback, { ...options, match: this.nextMatch() }),
      type: "user-menu",
    });
  }

  roleMenu(callback: ComponentCallback, options: TemplateMenuOptions = {}): ColumnTemplate {
    validateMenu(options);
    return this.with({
      ...menuControl(callback, { ...options, match: this.nextMatch() }),
      type: "role-menu",
    });
  }

  mentionableMenu(
    callback: ComponentCallback,
    options: TemplateMenuOptions = {},
  ): ColumnTemplate {
    validateMenu(options);
    return this.with({
      ...menuControl(callback, { ...options, match: this.nextMatch() }),
      type: "mentionable-menu",
    });
  }

  channelMenu(
    callback: ComponentCallback,
    options: TemplateChannelMenuOptions = {},
  ): ColumnTemplate {
    validateMenu(options);
    return this.with({
      ...menuControl(callback, { ...options, match: this.nextMatch() }),
      type: "channel-menu",
      channelTypes: options.channelTypes,
    });
  }

  /**
   * Create an executor from this template.
   */
  build(options: BuildColumnOptions = {}): ActionColumnExecutor {
    const executor = new ActionColumnExecutor(options);
    for (const control of this.controls) {
      if (control.type === "link-button") {
        executor.addControl(control);
      } else {
        executor.addControl({ ...control, metadata: options.metadata?.[control.match] });
      }
    }
    return executor;
  }

  private nextMatch(): string {
    return `${this.name}-${this.controls.length}`;
  }

  private with(control: ColumnControl): ColumnTemplate {
    return new ColumnTemplate(this.name, appendControl(this.controls, control));
  }
}
