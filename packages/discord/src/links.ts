/**
 * Discord Links
 *
 * Build and parse the links Discord clients share: messages, channels,
 * invites, guild templates and webhooks.
 *
 *   const link = messageLinks.parse("https://discord.com/channels/1/2/3");
 *   // { guildId: "1", channelId: "2", messageId: "3" }
 *
 * `parse` expects the whole string to be a link; `find` and `findAll`
 * pick links out of message content.
 */

import { ValidationError } from "./errors";

export const DISCORD_BASE_URL = "https://discord.com";

// ============================================================================
// Link shapes
// ============================================================================

export interface MessageLink {
  /** Undefined for DM messages (`@me`) */
  guildId: string | undefined;
  channelId: string;
  messageId: string;
}

export interface ChannelLink {
  /** Undefined for DM channels (`@me`) */
  guildId: string | undefined;
  channelId: string;
}

export interface InviteLink {
  code: string;
}

export interface TemplateLink {
  code: string;
}

export interface WebhookLink {
  webhookId: string;
  token: string;
}

export interface LinkParser<T> {
  /**
   * @throws ValidationError if the string is not a link of this kind
   */
  parse(link: string): T;
  /** First link of this kind in the content */
  find(content: string): T | undefined;
  /** Every link of this kind in the content, in order */
  findAll(content: string): T[];
}

function createLinkParser<T>(
  kind: string,
  pattern: string,
  fromMatch: (match: RegExpMatchArray) => T,
): LinkParser<T> {
  const exact = new RegExp(`^${pattern}$`);

  return {
    parse(link) {
      const match = exact.exec(link.trim());
      if (!match) {
        throw new ValidationError(`Not a ${kind} link: ${link}`);
      }
      return fromMatch(match);
    },

    find(content) {
      const match = new RegExp(pattern).exec(content);
      return match ? fromMatch(match) : undefined;
    },

    findAll(content) {
      return [...content.matchAll(new RegExp(pattern, "g"))].map(fromMatch);
    },
  };
}

function guildFromPath(segment: string): string | undefined {
  return segment === "@me" ? undefined : segment;
}

// ============================================================================
// Messages and channels
// ============================================================================

const DISCORD_HOST = String.raw`https://(?:www\.)?discord(?:app)?\.com`;

export const messageLinks = createLinkParser<MessageLink>(
  "message",
  String.raw`${DISCORD_HOST}/channels/(\d+|@me)/(\d+)/(\d+)`,
  ([, guild = "", channelId = "", messageId = ""]) => ({
    guildId: guildFromPath(guild),
    channelId,
    messageId,
  }),
);

// The lookahead keeps message links from also reading as channel links
export const channelLinks = createLinkParser<ChannelLink>(
  "channel",
  String.raw`${DISCORD_HOST}/channels/(\d+|@me)/(\d+)(?!\d|/\d)`,
  ([, guild = "", channelId = ""]) => ({
    guildId: guildFromPath(guild),
    channelId,
  }),
);

export function makeMessageLink(link: MessageLink): string {
  return `${DISCORD_BASE_URL}/channels/${link.guildId ?? "@me"}/${link.channelId}/${link.messageId}`;
}

export function makeChannelLink(link: ChannelLink): string {
  return `${DISCORD_BASE_URL}/channels/${link.guildId ?? "@me"}/${link.channelId}`;
}

// ============================================================================
// Invites and templates
// ============================================================================

export const inviteLinks = createLinkParser<InviteLink>(
  "invite",
  String.raw`https://(?:www\.)?(?:discord\.gg|discord(?:app)?\.com/invite)/(\w+)`,
  ([, code = ""]) => ({ code }),
);

export const templateLinks = createLinkParser<TemplateLink>(
  "template",
  String.raw`https://(?:www\.)?discord(?:\.new|(?:app)?\.com/template)/(\w+)`,
  ([, code = ""]) => ({ code }),
);

export function makeInviteLink(code: string): string {
  return `https://discord.gg/${code}`;
}

export function makeTemplateLink(code: string): string {
  return `https://discord.new/${code}`;
}

// ============================================================================
// Webhooks
// ============================================================================

export const webhookLinks = createLinkParser<WebhookLink>(
  "webhook",
  String.raw`${DISCORD_HOST}/api/(?:v\d+/)?webhooks/(\d+)/([\w.\-]+)`,
  ([, webhookId = "", token = ""]) => ({ webhookId, token }),
);

export function makeWebhookLink(link: WebhookLink): string {
  return `${DISCORD_BASE_URL}/api/webhooks/${link.webhookId}/${link.token}`;
}
