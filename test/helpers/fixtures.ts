import {
  Channel,
  ContentType,
  MessageEvent,
  MessageStatus,
} from "../../src/infra/queue/message-event.interface";
import type { MessageStatusRecord } from "../../src/infra/repositories/message-status.repository";
import type { StreamEntry } from "../../src/infra/queue/redis-streams.service";

export const USER_A = "3f0e8a52-1c2d-4e5f-8a9b-0c1d2e3f4a5b";
export const USER_B = "7a1b2c3d-4e5f-4a6b-8c7d-9e0f1a2b3c4d";

export function buildEvent(overrides: Partial<MessageEvent> = {}): MessageEvent {
  return {
    messageId: "m1",
    conversationId: "conv-1",
    senderId: "sender-1",
    recipientIds: ["+15550001111"],
    channel: Channel.WHATSAPP,
    content: "hello there",
    contentType: ContentType.TEXT,
    status: MessageStatus.PENDING,
    timestamp: "2026-10-18T09:00:00.000Z",
    metadata: {},
    ...overrides,
  };
}

export function buildRecord(
  overrides: Partial<MessageStatusRecord> = {},
): MessageStatusRecord {
  return {
    messageId: "m1",
    conversationId: "conv-1",
    senderId: "sender-1",
    recipientIds: ["recipient-1"],
    channel: Channel.WHATSAPP,
    status: MessageStatus.PENDING,
    updatedAt: "2026-10-18T09:00:00.000Z",
    updatedBy: "ingress",
    ...overrides,
  };
}

export function streamEntry(
  payload: unknown,
  streamId = "1700000000000-0",
  partition = 0,
): StreamEntry {
  const rawPayload = JSON.stringify(payload) ?? "";
  return { streamId, partition, payload, rawPayload };
}
