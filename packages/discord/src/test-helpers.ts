/**
 * Shared fakes for unit tests.
 */

import { vi } from "vitest";
import type {
  InitialResponse,
  InteractionEvent,
  InteractionResponder,
  MessagePayload,
} from "./types";

export function createMockResponder() {
  let nextId = 0;
  return {
    createInitialResponse: vi.fn(async (_response: InitialResponse) => {}),
    editInitialResponse: vi.fn(async (_payload: MessagePayload) => ({
      id: "original",
    })),
    deleteInitialResponse: vi.fn(async () => {}),
    createFollowup: vi.fn(async (_payload: MessagePayload) => ({
      id: `followup-${++nextId}`,
    })),
    editFollowup: vi.fn(async (messageId: string, _payload: MessagePayload) => ({
      id: messageId,
    })),
    deleteFollowup: vi.fn(async (_messageId: string) => {}),
  } satisfies InteractionResponder;
}

export type MockResponder = ReturnType<typeof createMockResponder>;

export function createEvent(
  overrides: Partial<InteractionEvent> = {},
): InteractionEvent {
  return {
    kind: "component",
    id: "interaction-1",
    token: "test-token",
    applicationId: "app-1",
    customId: "btn",
    messageId: "message-1",
    channelId: "channel-1",
    userId: "user-1",
    createdAt: 0,
    values: [],
    fields: {},
    ...overrides,
  };
}
