/**
 * Modals
 *
 * A Modal declares its text inputs once and receives the submitted
 * values typed by field:
 *
 *   const profile = new Modal(
 *     { name: textInput({ label: "Name" }), bio: optionalTextInput({ label: "Bio" }) },
 *     async (ctx, values) => {
 *       values.get("name"); // string
 *       values.get("bio");  // string | undefined
 *     },
 *   );
 *   modals.register(profile, { match: "profile" });
 *   await ctx.createModalResponse(profile.build({ customId: "profile", title: "Profile" }));
 */

import {
  type APIActionRowComponent,
  type APIModalInteractionResponseCallbackData,
  type APITextInputComponent,
  ComponentType,
  TextInputStyle,
} from "discord-api-types/v10";
import { type ClientConfig, InteractionClient } from "./client";
import { type ContextOptions, ModalContext } from "./context";
import { ValidationError } from "./errors";
import { validateMatch } from "./identifier";
import type { Registration } from "./registry";
import { type ExpiryPolicy, sliding } from "./timeout";
import {
  DEFAULT_MODAL_TIMEOUT_MS,
  type InteractionEvent,
  MAX_CUSTOM_ID_LENGTH,
  MODAL_EXPIRED_MESSAGE,
} from "./types";

export const MAX_MODAL_FIELDS = 5;
export const MAX_MODAL_TITLE_LENGTH = 45;
export const MAX_FIELD_LABEL_LENGTH = 45;

// ============================================================================
// Fields
// ============================================================================

export type TextFieldStyle = "short" | "paragraph";

export interface TextFieldOptions {
  label: string;
  style?: TextFieldStyle;
  placeholder?: string;
  minLength?: number;
  maxLength?: number;
  /** Pre-filled value shown in the input */
  value?: string;
}

/**
 * A text input and how its submitted value is read.
 */
export interface ModalField<V extends string | undefined> {
  readonly label: string;
  readonly style: TextFieldStyle;
  readonly required: boolean;
  readonly placeholder?: string;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly value?: string;
  parse(raw: string | undefined): V;
}

function validateField(options: TextFieldOptions): void {
  if (options.label.length === 0 || options.label.length > MAX_FIELD_LABEL_LENGTH) {
    throw new ValidationError(
      `Field label must be 1-${MAX_FIELD_LABEL_LENGTH} characters: "${options.label}"`,
    );
  }
  const { minLength, maxLength } = options;
  if (minLength !== undefined && maxLength !== undefined && minLength > maxLength) {
    throw new ValidationError("minLength must not exceed maxLength");
  }
}

/**
 * A text input that always yields a string: required, or optional with a
 * default used when left empty.
 */
export function textInput(
  options: TextFieldOptions & { default?: string },
): ModalField<string> {
  validateField(options);
  const fallback = options.default;

  return {
    label: options.label,
    style: options.style ?? "short",
    required: fallback === undefined,
    placeholder: options.placeholder,
    minLength: options.minLength,
    maxLength: options.maxLength,
    value: options.value,
    parse(raw) {
      if (raw !== undefined && raw !== "") {
        return raw;
      }
      if (fallback === undefined) {
        throw new ValidationError(`Missing value for required field "${options.label}"`);
      }
      return fallback;
    },
  };
}

/**
 * An optional text input, undefined when left empty.
 */
export function optionalTextInput(
  options: TextFieldOptions,
): ModalField<string | undefined> {
  validateField(options);

  return {
    label: options.label,
    style: options.style ?? "short",
    required: false,
    placeholder: options.placeholder,
    minLength: options.minLength,
    maxLength: options.maxLength,
    value: options.value,
    parse(raw) {
      return raw === undefined || raw === "" ? undefined : raw;
    },
  };
}

// ============================================================================
// Modal
// ============================================================================

export type FieldValues = Record<string, string | undefined>;

export type ModalFieldMap<V extends FieldValues> = {
  [K in keyof V]: ModalField<V[K]>;
};

/**
 * Submitted values, typed by field.
 */
export class ModalValues<V extends FieldValues> {
  constructor(
    private readonly fields: ModalFieldMap<V>,
    /** Raw submitted values keyed by input custom id */
    readonly raw: Readonly<Record<string, string>>,
  ) {}

  get<K extends keyof V & string>(key: K): V[K] {
    return this.fields[key].parse(this.raw[key]);
  }
}

/**
 * Handles submissions of one modal.
 */
export interface ModalExecutor {
  execute(ctx: ModalContext): Promise<void>;
}

export type ModalCallback<V extends FieldValues> = (
  ctx: ModalContext,
  values: ModalValues<V>,
) => Promise<void>;

export interface ModalBuildOptions {
  /** Custom id sent with the submission, match plus optional metadata */
  customId: string;
  title: string;
}

type FieldEntry = [id: string, field: ModalField<string | undefined>];

function listFields<V extends FieldValues>(fields: ModalFieldMap<V>): FieldEntry[] {
  const entries: FieldEntry[] = [];
  for (const id in fields) {
    entries.push([id, fields[id]]);
  }
  return entries;
}

export class Modal<V extends FieldValues> implements ModalExecutor {
  private readonly entries: FieldEntry[];
  private readonly ephemeralDefault: boolean;

  constructor(
    readonly fields: ModalFieldMap<V>,
    private readonly callback: ModalCallback<V>,
    options: { ephemeralDefault?: boolean } = {},
  ) {
    this.entries = listFields(fields);
    this.ephemeralDefault = options.ephemeralDefault ?? false;

    if (this.entries.length === 0 || this.entries.length > MAX_MODAL_FIELDS) {
      throw new ValidationError(
        `A modal needs between 1 and ${MAX_MODAL_FIELDS} fields`,
      );
    }
    for (const [id] of this.entries) {
      if (id.length === 0 || id.length > MAX_CUSTOM_ID_LENGTH) {
        throw new ValidationError(`Invalid field id: "${id}"`);
      }
    }
  }

  /**
   * Render the modal for a modal response.
   */
  build(options: ModalBuildOptions): APIModalInteractionResponseCallbackData {
    if (options.title.length === 0 || options.title.length > MAX_MODAL_TITLE_LENGTH) {
      throw new ValidationError(
        `Modal title must be 1-${MAX_MODAL_TITLE_LENGTH} characters`,
      );
    }
    if (options.customId.length === 0 || options.customId.length > MAX_CUSTOM_ID_LENGTH) {
      throw new ValidationError(`Invalid modal custom id: "${options.customId}"`);
    }

    const rows = this.entries.map(
      ([id, field]): APIActionRowComponent<APITextInputComponent> => {
        return {
          type: ComponentType.ActionRow,
          components: [
            {
              type: ComponentType.TextInput,
              custom_id: id,
              label: field.label,
              style:
                field.style === "paragraph"
                  ? TextInputStyle.Paragraph
                  : TextInputStyle.Short,
              required: field.required,
              placeholder: field.placeholder,
              min_length: field.minLength,
              max_length: field.maxLength,
              value: field.value,
            },
          ],
        };
      },
    );

    return { custom_id: options.customId, title: options.title, components: rows };
  }

  /**
   * Read submitted values, checking required fields.
   *
   * @throws ValidationError if a required field has no value
   */
  parse(raw: Readonly<Record<string, string>>): ModalValues<V> {
    for (const [id, field] of this.entries) {
      field.parse(raw[id]);
    }
    return new ModalValues(this.fields, raw);
  }

  async execute(ctx: ModalContext): Promise<void> {
    if (this.ephemeralDefault) {
      ctx.setEphemeralDefault(true);
    }
    await this.callback(ctx, this.parse(ctx.fieldValues));
  }
}

// ============================================================================
// Client
// ============================================================================

export interface ModalRegisterOptions {
  /** Routing key the modal's custom id starts with */
  match: string;
  /** Defaults to a 10 minute sliding timeout */
  expiry?: ExpiryPolicy;
}

export type ModalClientConfig = ClientConfig<ModalExecutor>;

/**
 * Routes modal submissions to registered modals by match.
 */
export class ModalClient extends InteractionClient<ModalExecutor, ModalContext> {
  constructor(config: ModalClientConfig = {}) {
    super(
      "Modals",
      {
        expiry: sliding(DEFAULT_MODAL_TIMEOUT_MS),
        expiredMessage: MODAL_EXPIRED_MESSAGE,
      },
      config,
    );
  }

  /**
   * @throws ConflictError if the match is already registered
   */
  register(
    executor: ModalExecutor,
    options: ModalRegisterOptions,
  ): Registration<ModalExecutor> {
    return this.registry.add(executor, {
      matches: [validateMatch(options.match)],
      expiry: options.expiry ?? this.defaultExpiry,
    });
  }

  protected createContext(options: ContextOptions): ModalContext {
    return new ModalContext(options);
  }

  protected execute(executor: ModalExecutor, ctx: ModalContext): Promise<void> {
    return executor.execute(ctx);
  }

  protected lookup(
    _event: InteractionEvent,
    ctx: ModalContext,
  ): Registration<ModalExecutor> | undefined {
    return this.registry.resolve(undefined, ctx.idMatch);
  }
}
