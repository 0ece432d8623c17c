import {
  UnknownChannelError,
  ValidationFailedError,
} from "../errors/delivery.errors";
import {
  Channel,
  ContentType,
  MessageEvent,
  MessageStatus,
  StatusUpdate,
  isChannel,
  isContentType,
  isMessageStatus,
} from "../../infra/queue/message-event.interface";

/**
 * Synchronous shape checks for everything that enters the pipeline: ingress
 * requests, events read back off the stream and status updates. All failures
 * are non-retryable {@link ValidationFailedError}s (or
 * {@link UnknownChannelError}) so the caller can dead-letter or 400 at once.
 */

export interface AcceptMessageRequest {
  readonly messageId?: string;
  readonly conversationId: string;
  readonly senderId: string;
  readonly recipientIds: string[];
  readonly channel: Channel;
  readonly content: string;
  readonly contentType: ContentType;
  readonly metadata: Record<string, string>;
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class MessageEventValidator {
  private static readonly MAX_CONTENT_LENGTH = 10000;
  private static readonly MAX_RECIPIENT_COUNT = 1000;
  private static readonly MAX_ID_LENGTH = 255;

  static validateAcceptRequest(input: unknown): AcceptMessageRequest {
    const request = this.requireRecord(input, "request body");

    const messageId = this.optionalString(request, "messageId");
    const conversationId = this.requireString(request, "conversationId");
    const senderId = this.requireString(request, "senderId");
    const content = this.requireString(request, "content");
    this.validateLength(content, "content", this.MAX_CONTENT_LENGTH);

    return {
      messageId,
      conversationId,
      senderId,
      recipientIds: this.parseRecipients(request.recipientIds),
      channel: this.parseChannel(request.channel),
      content,
      contentType: this.parseContentType(request.contentType),
      metadata: this.parseMetadata(request.metadata),
    };
  }

  static validateEvent(input: unknown): MessageEvent {
    const event = this.requireRecord(input, "event");

    const status = event.status ?? MessageStatus.PENDING;
    if (!isMessageStatus(status)) {
      throw new ValidationFailedError(`Invalid status: ${String(status)}`, {
        field: "status",
      });
    }

    return {
      messageId: this.requireString(event, "messageId"),
      conversationId: this.requireString(event, "conversationId"),
      senderId: this.requireString(event, "senderId"),
      recipientIds: this.parseRecipients(event.recipientIds),
      channel: this.parseChannel(event.channel),
      content: this.requireString(event, "content"),
      contentType: this.parseContentType(event.contentType),
      status,
      timestamp:
        this.optionalString(event, "timestamp") ?? new Date().toISOString(),
      metadata: this.parseMetadata(event.metadata),
    };
  }

  static validateStatusUpdate(input: unknown): StatusUpdate {
    const update = this.requireRecord(input, "status update");
    const status = update.status;
    if (!isMessageStatus(status)) {
      throw new ValidationFailedError(`Invalid status: ${String(status)}`, {
        field: "status",
      });
    }

    return {
      messageId: this.requireString(update, "messageId"),
      status,
      timestamp:
        this.optionalString(update, "timestamp") ?? new Date().toISOString(),
      source: this.optionalString(update, "source") ?? "unknown",
      errorMessage: this.optionalString(update, "errorMessage"),
    };
  }

  /**
   * Pulls a messageId out of a payload that failed validation, so the
   * dead-letter entry and FAILED status can still be attributed.
   */
  static extractMessageId(input: unknown): string | undefined {
    if (!isRecord(input)) {
      return undefined;
    }
    const candidate = input.messageId;
    return typeof candidate === "string" && candidate.trim().length > 0
      ? candidate.trim()
      : undefined;
  }

  static parseChannel(raw: unknown): Channel {
    if (typeof raw !== "string" || raw.trim().length === 0) {
      throw new ValidationFailedError("Missing required field: channel", {
        field: "channel",
      });
    }
    const normalized = raw.trim().toUpperCase();
    if (!isChannel(normalized)) {
      throw new UnknownChannelError(raw);
    }
    return normalized;
  }

  private static parseContentType(raw: unknown): ContentType {
    if (raw === undefined || raw === null || raw === "") {
      return ContentType.TEXT;
    }
    if (typeof raw !== "string") {
      throw new ValidationFailedError(
        `Invalid type for field "contentType": expected string, got ${typeof raw}`,
        { field: "contentType" },
      );
    }
    const normalized = raw.trim().toUpperCase();
    return isContentType(normalized) ? normalized : ContentType.UNKNOWN;
  }

  private static parseRecipients(raw: unknown): string[] {
    if (raw === undefined || raw === null) {
      return [];
    }
    if (!Array.isArray(raw)) {
      throw new ValidationFailedError(
        `Invalid type for field "recipientIds": expected array, got ${typeof raw}`,
        { field: "recipientIds" },
      );
    }
    if (raw.length > this.MAX_RECIPIENT_COUNT) {
      throw new ValidationFailedError(
        `Too many recipients: ${raw.length} > ${this.MAX_RECIPIENT_COUNT}`,
        { count: raw.length, max: this.MAX_RECIPIENT_COUNT },
      );
    }

    const seen = new Set<string>();
    const recipients: string[] = [];
    for (const entry of raw) {
      if (typeof entry !== "string" || entry.trim().length === 0) {
        throw new ValidationFailedError(
          "Recipient ID must be a non-empty string",
          { field: "recipientIds" },
        );
      }
      const recipientId = entry.trim();
      if (!seen.has(recipientId)) {
        seen.add(recipientId);
        recipients.push(recipientId);
      }
    }
    return recipients;
  }

  private static parseMetadata(raw: unknown): Record<string, string> {
    if (raw === undefined || raw === null) {
      return {};
    }
    if (!isRecord(raw)) {
      throw new ValidationFailedError(
        `Invalid type for field "metadata": expected object, got ${typeof raw}`,
        { field: "metadata" },
      );
    }

    const metadata: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === "string") {
        metadata[key] = value;
      } else if (typeof value === "number" || typeof value === "boolean") {
        metadata[key] = String(value);
      } else {
        throw new ValidationFailedError(
          `Metadata value for "${key}" must be a string`,
          { field: `metadata.${key}` },
        );
      }
    }
    return metadata;
  }

  private static requireRecord(input: unknown, label: string): UnknownRecord {
    if (!isRecord(input)) {
      throw new ValidationFailedError(`Malformed ${label}: expected object`);
    }
    return input;
  }

  private static requireString(record: UnknownRecord, field: string): string {
    const value = record[field];
    if (value === undefined || value === null) {
      throw new ValidationFailedError(`Missing required field: ${field}`, {
        field,
      });
    }
    if (typeof value !== "string") {
      throw new ValidationFailedError(
        `Invalid type for field "${field}": expected string, got ${typeof value}`,
        { field },
      );
    }
    const trimmed = field === "content" ? value : value.trim();
    const isFreeText = field === "content" || field === "errorMessage";
    if (trimmed.length === 0) {
      throw new ValidationFailedError(`Field "${field}" must not be empty`, {
        field,
      });
    }
    if (!isFreeText) {
      this.validateLength(trimmed, field, this.MAX_ID_LENGTH);
    }
    return trimmed;
  }

  private static optionalString(
    record: UnknownRecord,
    field: string,
  ): string | undefined {
    if (record[field] === undefined || record[field] === null) {
      return undefined;
    }
    return this.requireString(record, field);
  }

  private static validateLength(
    value: string,
    field: string,
    maxLength: number,
  ): void {
    if (value.length > maxLength) {
      throw new ValidationFailedError(
        `Field "${field}" exceeds maximum length: ${value.length} > ${maxLength}`,
        { field, maxLength, actualLength: value.length },
      );
    }
  }
}
