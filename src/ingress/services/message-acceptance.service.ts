import { Inject, Injectable, Logger } from "@nestjs/common";
import { v4 as uuidv4 } from "uuid";
import {
  DeliveryError,
  EnqueueFailedError,
  MessageNotFoundError,
} from "../../common/errors/delivery.errors";
import { StructuredLogger, toLogError } from "../../common/logging/structured-logger";
import { MessageEventValidator } from "../../common/validators/message-event.validator";
import {
  MessageEvent,
  MessageStatus,
} from "../../infra/queue/message-event.interface";
import { RedisStreamsService } from "../../infra/queue/redis-streams.service";
import {
  MESSAGE_STATUS_REPOSITORY,
  MessageStatusRecord,
  MessageStatusRepository,
  StatusHistoryEntry,
} from "../../infra/repositories/message-status.repository";

const INGRESS_SOURCE = "ingress";

export interface AcceptedMessage {
  readonly messageId: string;
  readonly status: MessageStatus;
  readonly acceptedAt: string;
}

export interface MessageStatusView {
  readonly record: MessageStatusRecord;
  readonly history: StatusHistoryEntry[];
}

/**
 * Message acceptance (ingress hot path)
 *
 * 1. Validate the request (400 on anything malformed)
 * 2. Record the message as PENDING
 * 3. Enqueue the MessageEvent on its conversation's partition
 * 4. Answer with the pending acknowledgement; delivery is asynchronous
 *
 * A client-supplied messageId that already has a record is treated as a
 * retry of the same request: nothing is enqueued again and the stored
 * status is returned.
 */
@Injectable()
export class MessageAcceptanceService {
  private readonly logger = new Logger(MessageAcceptanceService.name);

  constructor(
    private readonly streams: RedisStreamsService,
    @Inject(MESSAGE_STATUS_REPOSITORY)
    private readonly repository: MessageStatusRepository,
  ) {}

  async accept(input: unknown, correlationId?: string): Promise<AcceptedMessage> {
    const request = MessageEventValidator.validateAcceptRequest(input);
    const messageId = request.messageId ?? uuidv4();
    const acceptedAt = new Date().toISOString();

    const event: MessageEvent = {
      messageId,
      conversationId: request.conversationId,
      senderId: request.senderId,
      recipientIds: request.recipientIds,
      channel: request.channel,
      content: request.content,
      contentType: request.contentType,
      status: MessageStatus.PENDING,
      timestamp: acceptedAt,
      metadata: correlationId
        ? { ...request.metadata, correlationId }
        : request.metadata,
    };

    let created: boolean;
    try {
      created = await this.repository.create({
        messageId,
        conversationId: event.conversationId,
        senderId: event.senderId,
        recipientIds: event.recipientIds,
        channel: event.channel,
        status: MessageStatus.PENDING,
        updatedAt: acceptedAt,
        updatedBy: INGRESS_SOURCE,
      });
    } catch (error) {
      throw this.enqueueFailure("status store unavailable", error);
    }

    if (!created) {
      const existing = await this.repository.find(messageId);
      this.logger.debug(`Message ${messageId} already accepted, not re-enqueued`);
      return {
        messageId,
        status: existing?.status ?? MessageStatus.PENDING,
        acceptedAt: existing?.updatedAt ?? acceptedAt,
      };
    }

    try {
      const receipt = await this.streams.enqueue(
        "messages",
        event.conversationId,
        event,
      );

      StructuredLogger.info("ingress.accepted", {
        messageId,
        conversationId: event.conversationId,
        correlationId,
        data: {
          channel: event.channel,
          recipientCount: event.recipientIds.length,
          partition: receipt.partition,
          streamId: receipt.streamId,
        },
      });
    } catch (error) {
      // A record without an event would make the client's retry look like a duplicate.
      await this.repository.remove(messageId).catch((removeError: unknown) => {
        StructuredLogger.error("ingress.rollback", {
          messageId,
          correlationId,
          error: toLogError(removeError, "ingress.rollback_failed"),
        });
      });
      throw this.enqueueFailure("event log unavailable", error);
    }

    return { messageId, status: MessageStatus.PENDING, acceptedAt };
  }

  private enqueueFailure(reason: string, error: unknown): DeliveryError {
    if (error instanceof DeliveryError) {
      return error;
    }
    return new EnqueueFailedError(
      reason,
      error instanceof Error ? error : undefined,
    );
  }

  async status(messageId: string): Promise<MessageStatusView> {
    const record = await this.repository.find(messageId);
    if (!record) {
      throw new MessageNotFoundError(messageId);
    }
    return { record, history: await this.repository.history(messageId) };
  }
}
