import { v4 as uuidv4 } from "uuid";
import {
  ExternalChannel,
  MessageEvent,
  MessageStatus,
} from "../infra/queue/message-event.interface";
import type { StatusPublisherService } from "../infra/services/status-publisher.service";
import {
  ChannelAdapter,
  DeliveryOutcome,
  ValidationResult,
  ValidationResults,
} from "./channel-adapter.interface";
import { ReceiptScheduler } from "./receipt-scheduler";

/**
 * Connector stand-in for local runs (CONNECTOR_MOCK_MODE). Accepts every send
 * and plays back the receipts a real platform would post: DELIVERED after
 * one delay, READ after two.
 */
export class LoopbackChannelAdapter implements ChannelAdapter {
  constructor(
    readonly channelName: ExternalChannel,
    private readonly publisher: StatusPublisherService,
    private readonly scheduler: ReceiptScheduler,
    private readonly receiptDelayMs: number,
  ) {}

  async send(
    message: MessageEvent,
    _targetIdentity: string,
  ): Promise<DeliveryOutcome> {
    const source = `${this.channelName.toLowerCase()}-loopback`;

    this.scheduler.schedule(
      this.receiptDelayMs,
      `receipt:${MessageStatus.DELIVERED}`,
      async () => {
        await this.publisher.publish(message.messageId, MessageStatus.DELIVERED, {
          source,
        });
      },
    );
    this.scheduler.schedule(
      this.receiptDelayMs * 2,
      `receipt:${MessageStatus.READ}`,
      async () => {
        await this.publisher.publish(message.messageId, MessageStatus.READ, {
          source,
        });
      },
    );

    return {
      externalMessageId: `loopback-${uuidv4()}`,
      status: MessageStatus.SENT,
      timestamp: new Date().toISOString(),
    };
  }

  async validateCredentials(): Promise<ValidationResult> {
    return ValidationResults.success(
      `${this.channelName} loopback connector`,
      "loopback",
    );
  }
}
