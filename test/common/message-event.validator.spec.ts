import {
  UnknownChannelError,
  ValidationFailedError,
} from "../../src/common/errors/delivery.errors";
import { MessageEventValidator } from "../../src/common/validators/message-event.validator";
import {
  Channel,
  ContentType,
  MessageStatus,
} from "../../src/infra/queue/message-event.interface";

const REQUEST = {
  conversationId: " conv-1 ",
  senderId: "sender-1",
  recipientIds: ["+15550001111", " +15550001111", "@someone"],
  channel: "telegram",
  content: "  spaced content  ",
};

describe("MessageEventValidator", () => {
  describe("validateAcceptRequest", () => {
    it("normalizes ids, channel and recipients", () => {
      expect(MessageEventValidator.validateAcceptRequest(REQUEST)).toEqual({
        messageId: undefined,
        conversationId: "conv-1",
        senderId: "sender-1",
        recipientIds: ["+15550001111", "@someone"],
        channel: Channel.TELEGRAM,
        content: "  spaced content  ",
        contentType: ContentType.TEXT,
        metadata: {},
      });
    });

    it("maps unrecognized content types to UNKNOWN", () => {
      const request = MessageEventValidator.validateAcceptRequest({
        ...REQUEST,
        contentType: "sticker",
      });

      expect(request.contentType).toBe(ContentType.UNKNOWN);
    });

    it("stringifies scalar metadata and refuses nested values", () => {
      expect(
        MessageEventValidator.validateAcceptRequest({
          ...REQUEST,
          metadata: { priority: 2, urgent: true, campaign: "fall" },
        }).metadata,
      ).toEqual({ priority: "2", urgent: "true", campaign: "fall" });

      expect(() =>
        MessageEventValidator.validateAcceptRequest({
          ...REQUEST,
          metadata: { nested: { a: 1 } },
        }),
      ).toThrow('Metadata value for "nested" must be a string');
    });

    it("rejects unknown channels with their own error", () => {
      expect(() =>
        MessageEventValidator.validateAcceptRequest({ ...REQUEST, channel: "sms" }),
      ).toThrow(UnknownChannelError);
    });

    it("rejects oversized content", () => {
      expect(() =>
        MessageEventValidator.validateAcceptRequest({
          ...REQUEST,
          content: "x".repeat(10_001),
        }),
      ).toThrow('Field "content" exceeds maximum length: 10001 > 10000');
    });

    it("rejects blank recipients", () => {
      expect(() =>
        MessageEventValidator.validateAcceptRequest({
          ...REQUEST,
          recipientIds: ["ok", "  "],
        }),
      ).toThrow(ValidationFailedError);
    });
  });

  describe("validateEvent", () => {
    it("defaults a missing status to PENDING", () => {
      const event = MessageEventValidator.validateEvent({
        ...REQUEST,
        messageId: "m1",
        channel: "INTERNAL",
        timestamp: "2026-10-18T09:00:00.000Z",
      });

      expect(event.status).toBe(MessageStatus.PENDING);
      expect(event.channel).toBe(Channel.INTERNAL);
      expect(event.timestamp).toBe("2026-10-18T09:00:00.000Z");
    });

    it("carries the dead-letter reason of a validation failure", () => {
      let caught: unknown;
      try {
        MessageEventValidator.validateEvent({ messageId: "m1" });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationFailedError);
      expect(caught instanceof ValidationFailedError && caught.deadLetterReason).toBe(
        "validation failed: Missing required field: conversationId",
      );
    });
  });

  describe("validateStatusUpdate", () => {
    it("fills in source and timestamp", () => {
      const update = MessageEventValidator.validateStatusUpdate({
        messageId: "m1",
        status: "READ",
      });

      expect(update.source).toBe("unknown");
      expect(update.status).toBe(MessageStatus.READ);
      expect(typeof update.timestamp).toBe("string");
    });

    it("rejects an unknown status", () => {
      expect(() =>
        MessageEventValidator.validateStatusUpdate({ messageId: "m1", status: "SEEN" }),
      ).toThrow("Invalid status: SEEN");
    });
  });

  it("extracts a messageId from a rejected payload", () => {
    expect(MessageEventValidator.extractMessageId({ messageId: " m7 " })).toBe("m7");
    expect(MessageEventValidator.extractMessageId({ messageId: 7 })).toBeUndefined();
    expect(MessageEventValidator.extractMessageId("m7")).toBeUndefined();
  });
});
