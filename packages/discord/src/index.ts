/**
 * Discord Interaction Routing
 *
 * Component, modal and reaction routing with expiring registrations,
 * response contexts, executors and pagination. Platform payloads enter
 * through the gateway listener or the HTTP endpoint package.
 */

// Types and constants
export type {
  InteractionEvent,
  ReactionEvent,
  MessageComponents,
  MessagePayload,
  InitialResponse,
  SentMessage,
  InteractionResponder,
  InitialResponseSink,
  ServiceLookup,
  Clock,
  DispatchOutcome,
} from "./types";
export {
  CUSTOM_ID_SEPARATOR,
  MAX_CUSTOM_ID_LENGTH,
  DEFAULT_SWEEP_INTERVAL_MS,
  DEFAULT_EXECUTOR_TIMEOUT_MS,
  DEFAULT_MODAL_TIMEOUT_MS,
  INTERACTION_LIFETIME_MS,
  DELETE_AFTER_MARGIN_MS,
  INITIAL_RESPONSE_WINDOW_MS,
  NOT_PERMITTED_MESSAGE,
  COMPONENT_EXPIRED_MESSAGE,
  MODAL_EXPIRED_MESSAGE,
} from "./types";

// Errors
export {
  ValidationError,
  ConflictError,
  NotFoundError,
  ExecutorClosed,
  type ExecutorClosedOptions,
  ResponseStateError,
  UnsupportedOperationError,
  WaitForTimeoutError,
  toError,
} from "./errors";

// Identifiers and expiry
export {
  splitCustomId,
  validateMatch,
  joinCustomId,
  randomCustomId,
  type CustomIdParts,
} from "./identifier";
export {
  never,
  fixed,
  sliding,
  expiresAt,
  isExpired,
  recordUse,
  type ExpiryPolicy,
  type UsageState,
  type TimedPolicyOptions,
} from "./timeout";

// Responses
export { toApiResponse, toMessageData } from "./response";
export {
  createRestResponder,
  readSentMessage,
  type InteractionRest,
  type InteractionTarget,
} from "./rest";
export {
  InteractionContext,
  ComponentContext,
  ModalContext,
  type ResponseState,
  type ContextOptions,
  type CreateOptions,
  type EditOptions,
  type DeferOptions,
} from "./context";

// Registries and clients
export {
  ExecutorRegistry,
  type Registration,
  type RegistrationKeys,
  type RegistryConfig,
  type RegistryEvents,
} from "./registry";
export {
  InteractionClient,
  type ClientConfig,
  type ClientEvents,
  type DispatchOptions,
  type CloseOptions,
} from "./client";
export {
  ComponentClient,
  CallbackExecutor,
  type ComponentExecutor,
  type ComponentCallback,
  type ComponentRegisterOptions,
  type ComponentClientConfig,
} from "./components";
export {
  ModalClient,
  Modal,
  ModalValues,
  textInput,
  optionalTextInput,
  MAX_MODAL_FIELDS,
  MAX_MODAL_TITLE_LENGTH,
  MAX_FIELD_LABEL_LENGTH,
  type ModalExecutor,
  type ModalCallback,
  type ModalField,
  type ModalFieldMap,
  type FieldValues,
  type TextFieldOptions,
  type TextFieldStyle,
  type ModalBuildOptions,
  type ModalRegisterOptions,
  type ModalClientConfig,
} from "./modals";
export {
  ReactionClient,
  ReactionPaginator,
  type ReactionExecutor,
  type ReactionMessage,
  type ReactionChannel,
  type ReactionOutcome,
  type ReactionClientConfig,
  type ReactionPaginatorOptions,
} from "./reaction";

// Executors
export {
  ActionColumnExecutor,
  ColumnTemplate,
  packRows,
  renderRows,
  MAX_ROWS,
  MAX_BUTTONS_PER_ROW,
  MAX_MENU_OPTIONS,
  UNKNOWN_CONTROL_MESSAGE,
  type ColumnControl,
  type ColumnOptions,
  type BuildColumnOptions,
  type ButtonOptions,
  type LinkButtonOptions,
  type MenuOptions,
  type TextMenuOptions,
  type ChannelMenuOptions,
  type InteractiveButtonStyle,
  type ControlEmoji,
} from "./column";
export { WaitForExecutor, type WaitForOptions } from "./wait-for";

// Pagination
export {
  Paginator,
  pagePayload,
  resolveTriggers,
  DEFAULT_TRIGGERS,
  TRIGGER_EMOJI,
  CLOSE_EMOJI,
  type Page,
  type PageLike,
  type PageSource,
  type PageMove,
  type CursorState,
  type PaginatorOptions,
  type PaginatorTrigger,
} from "./pagination";
export {
  ComponentPaginator,
  type ComponentPaginatorOptions,
} from "./component-paginator";
export {
  paginateString,
  syncPaginateString,
  asyncPaginateString,
  splitLine,
  DISCORD_MAX_MESSAGE_LENGTH,
  DEFAULT_LINE_LIMIT,
  type StringPageOptions,
} from "./string-pages";

// Links
export {
  DISCORD_BASE_URL,
  messageLinks,
  channelLinks,
  inviteLinks,
  templateLinks,
  webhookLinks,
  makeMessageLink,
  makeChannelLink,
  makeInviteLink,
  makeTemplateLink,
  makeWebhookLink,
  type LinkParser,
  type MessageLink,
  type ChannelLink,
  type InviteLink,
  type TemplateLink,
  type WebhookLink,
} from "./links";

// Utilities
export {
  createBackoff,
  retryWithBackoff,
  DEFAULT_BACKOFF_CONFIG,
  DEFAULT_MAX_RETRIES,
  type Backoff,
  type BackoffConfig,
  type RetryDecision,
  type RetryOptions,
} from "./backoff";
export {
  createTaskTracker,
  type TaskTracker,
  type TaskTrackerConfig,
} from "./tasks";
export { sleep } from "./sleep";

// Gateway adapter
export {
  parseInteraction,
  parseReaction,
  snowflakeTime,
  DISCORD_EPOCH_MS,
  type ParsedInteraction,
} from "./interaction";
export {
  attachInteractionListener,
  type InteractionListenerConfig,
  type ListenerCleanup,
} from "./listener";
export {
  createGatewayClient,
  connectGateway,
  DEFAULT_CONNECTION_TIMEOUT_MS,
  type GatewayClientConfig,
} from "./gateway";
