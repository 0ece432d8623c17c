/**
 * Records carried on the delivery streams.
 *
 * - MessageEvent: one message to route, keyed by conversationId. Never
 *   mutated once written; progress is expressed as StatusUpdate records.
 * - StatusUpdate: one status transition, keyed by messageId.
 * - DeadLetterEntry: a MessageEvent (or the raw payload that failed to
 *   parse) plus why and when it was quarantined.
 */

export enum Channel {
  WHATSAPP = "WHATSAPP",
  TELEGRAM = "TELEGRAM",
  INSTAGRAM = "INSTAGRAM",
  INTERNAL = "INTERNAL",
}

export type ExternalChannel = Exclude<Channel, Channel.INTERNAL>;

export const EXTERNAL_CHANNELS: readonly ExternalChannel[] = [
  Channel.WHATSAPP,
  Channel.TELEGRAM,
  Channel.INSTAGRAM,
];

export enum ContentType {
  TEXT = "TEXT",
  IMAGE = "IMAGE",
  VIDEO = "VIDEO",
  AUDIO = "AUDIO",
  DOCUMENT = "DOCUMENT",
  LOCATION = "LOCATION",
  CONTACT = "CONTACT",
  TEMPLATE = "TEMPLATE",
  UNKNOWN = "UNKNOWN",
}

/**
 * Declaration order is the forward ordering used by transition checks.
 */
export enum MessageStatus {
  PENDING = "PENDING",
  RECEIVED = "RECEIVED",
  SENT = "SENT",
  DELIVERED = "DELIVERED",
  READ = "READ",
  FAILED = "FAILED",
}

export interface MessageEvent {
  /**
   * Globally unique; the idempotency key for the whole pipeline
   */
  readonly messageId: string;

  /**
   * Partition key: every event of a conversation lands on one partition
   */
  readonly conversationId: string;

  readonly senderId: string;

  /**
   * Direct platform ids or internal user references (UUIDs), in order
   */
  readonly recipientIds: readonly string[];

  readonly channel: Channel;
  readonly content: string;
  readonly contentType: ContentType;
  readonly status: MessageStatus;

  /**
   * ISO 8601
   */
  readonly timestamp: string;

  /**
   * Channel-specific extension data; `correlationId` travels here
   */
  readonly metadata: Readonly<Record<string, string>>;
}

export interface StatusUpdate {
  readonly messageId: string;
  readonly status: MessageStatus;
  readonly timestamp: string;

  /**
   * Who emitted the transition (the router, a connector webhook, ...)
   */
  readonly source: string;

  readonly errorMessage?: string;
}

export interface DeadLetterEntry {
  /**
   * The event as consumed. Payloads that never parsed into a MessageEvent
   * are kept verbatim under `rawPayload` instead.
   */
  readonly event?: MessageEvent;
  readonly rawPayload?: string;
  readonly messageId?: string;
  readonly reason: string;
  readonly attemptsMade: number;
  readonly failedAt: string;
  readonly errorMessage?: string;
}

export interface ExternalIdentity {
  readonly platform: ExternalChannel;
  readonly platformUserId: string;
  readonly verified: boolean;
}

export interface DeliveryTarget {
  readonly channel: ExternalChannel;
  readonly identity: string;

  /**
   * The recipientId this target was derived from
   */
  readonly recipientId: string;
}

export interface DeliveryAttempt {
  readonly channel: ExternalChannel;
  readonly targetIdentity: string;
  readonly attemptNumber: number;
  readonly outcome: "success" | "retryable_failure" | "permanent_failure";
}

export function isChannel(value: unknown): value is Channel {
  return (
    typeof value === "string" &&
    Object.values(Channel).some((channel) => channel === value)
  );
}

export function isExternalChannel(value: unknown): value is ExternalChannel {
  return EXTERNAL_CHANNELS.some((channel) => channel === value);
}

export function isContentType(value: unknown): value is ContentType {
  return (
    typeof value === "string" &&
    Object.values(ContentType).some((type) => type === value)
  );
}

export function isMessageStatus(value: unknown): value is MessageStatus {
  return (
    typeof value === "string" &&
    Object.values(MessageStatus).some((status) => status === value)
  );
}
