import { Injectable } from "@nestjs/common";
import { StructuredLogger, toLogError } from "../../common/logging/structured-logger";
import { TelemetryMetrics } from "../../observability/metrics-registry";
import { MessageStatus, StatusUpdate } from "../queue/message-event.interface";
import { RedisStreamsService } from "../queue/redis-streams.service";

export const ROUTER_SOURCE = "delivery-router";

export interface PublishStatusOptions {
  readonly source?: string;
  readonly errorMessage?: string;
  readonly correlationId?: string;
  /** ISO 8601; defaults to now */
  readonly timestamp?: string;
}

/**
 * Emits StatusUpdates onto the status topic, keyed by messageId.
 *
 * Never throws: a failed publish is logged and counted, not retried. The
 * returned promise resolves once the append was attempted, so callers that
 * await successive publishes keep them in order.
 */
@Injectable()
export class StatusPublisherService {
  constructor(private readonly streams: RedisStreamsService) {}

  async publish(
    messageId: string,
    status: MessageStatus,
    options: PublishStatusOptions = {},
  ): Promise<boolean> {
    const update: StatusUpdate = {
      messageId,
      status,
      timestamp: options.timestamp ?? new Date().toISOString(),
      source: options.source ?? ROUTER_SOURCE,
      errorMessage: options.errorMessage,
    };

    try {
      await this.streams.enqueue("status", messageId, update);
      TelemetryMetrics.recordStatusPublish("published");
      StructuredLogger.debug("status.published", {
        messageId,
        correlationId: options.correlationId,
        data: { toStatus: status, source: update.source },
      });
      return true;
    } catch (error) {
      TelemetryMetrics.recordStatusPublish("failed");
      StructuredLogger.warn("status.publish", {
        messageId,
        correlationId: options.correlationId,
        status: "failed",
        data: { toStatus: status },
        error: toLogError(error, "status.publish_failed"),
      });
      return false;
    }
  }
}
