import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from "@nestjs/common";
import { getEnv } from "../../config/environment";
import { DeliveryError, describeError } from "../../common/errors/delivery.errors";
import { correlationIdOf } from "../../common/logging/correlation";
import { StructuredLogger, toLogError } from "../../common/logging/structured-logger";
import { MessageEventValidator } from "../../common/validators/message-event.validator";
import {
  PipelineOutcome,
  TelemetryMetrics,
} from "../../observability/metrics-registry";
import { DeadLetterService } from "../queue/dead-letter.service";
import { DeduplicationService } from "../queue/deduplication.service";
import { MessageEvent, MessageStatus } from "../queue/message-event.interface";
import {
  PartitionWorker,
  startPartitionWorkers,
  stopPartitionWorkers,
} from "../queue/partition-worker";
import { RedisStreamsService, StreamEntry } from "../queue/redis-streams.service";
import { RoutingService } from "./routing.service";
import { StatusPublisherService } from "./status-publisher.service";

/**
 * Event Dispatcher
 *
 * Per message event, in partition order:
 * 1. Skip events whose messageId is already marked processed
 * 2. Validate; malformed events are dead-lettered as raw payloads
 * 3. Route (resolve targets, deliver, retry, dead-letter)
 * 4. Publish the resulting status
 * 5. Mark processed
 *
 * The partition worker acknowledges the entry only after process() resolves,
 * so the processed marker is always written before the XACK. Anything thrown
 * from here leaves the entry pending for redelivery.
 */
@Injectable()
export class EventDispatcherConsumer implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(EventDispatcherConsumer.name);
  private workers: PartitionWorker[] = [];

  constructor(
    private readonly streams: RedisStreamsService,
    private readonly dedup: DeduplicationService,
    private readonly routing: RoutingService,
    private readonly statusPublisher: StatusPublisherService,
    private readonly deadLetter: DeadLetterService,
  ) {}

  onModuleInit(): void {
    const env = getEnv();
    if (!env.streams.workersEnabled) {
      this.logger.log("Dispatcher workers disabled");
      return;
    }
    this.workers = startPartitionWorkers(
      this.streams,
      "messages",
      `${env.service.instanceId}:dispatcher`,
      (entry) => this.process(entry),
    );
    this.logger.log(
      `Started ${this.workers.length} dispatcher workers on partitions ${env.streams.assignedPartitions.join(",")}`,
    );
  }

  async onModuleDestroy(): Promise<void> {
    await stopPartitionWorkers(this.workers);
    this.workers = [];
  }

  get runningWorkers(): number {
    return this.workers.filter((worker) => worker.isRunning).length;
  }

  async process(entry: StreamEntry): Promise<PipelineOutcome> {
    const startedAt = Date.now();

    // The id is read from the raw payload so a rejected event is not
    // dead-lettered again when the log redelivers it.
    const messageId = MessageEventValidator.extractMessageId(entry.payload);
    if (messageId && (await this.dedup.isDuplicate(messageId))) {
      StructuredLogger.info("pipeline.duplicate", {
        messageId,
        data: { streamId: entry.streamId, partition: entry.partition },
      });
      TelemetryMetrics.recordPipelineEvent("duplicate", Date.now() - startedAt);
      return "duplicate";
    }

    let event: MessageEvent;
    try {
      event = MessageEventValidator.validateEvent(entry.payload);
    } catch (error) {
      await this.reject(entry, messageId, error);
      TelemetryMetrics.recordPipelineEvent("rejected", Date.now() - startedAt);
      return "rejected";
    }

    const correlationId = correlationIdOf(event);

    const result = await this.routing.route(event);

    await this.statusPublisher.publish(event.messageId, result.status, {
      errorMessage: result.errorMessage,
      correlationId,
    });

    await this.dedup.markProcessed(event.messageId);

    const outcome: PipelineOutcome = result.deadLettered ? "failed" : "processed";
    const durationMs = Date.now() - startedAt;
    TelemetryMetrics.recordPipelineEvent(outcome, durationMs);
    StructuredLogger.info("pipeline.event", {
      messageId: event.messageId,
      conversationId: event.conversationId,
      correlationId,
      durationMs,
      status: outcome,
      data: {
        channel: event.channel,
        toStatus: result.status,
        targetCount: result.targetCount,
        succeeded: result.succeeded,
        failed: result.failed,
        attemptsMade: result.attemptsMade,
        reason: result.reason,
      },
    });
    return outcome;
  }

  private async reject(
    entry: StreamEntry,
    messageId: string | undefined,
    error: unknown,
  ): Promise<void> {
    const reason =
      error instanceof DeliveryError ? error.deadLetterReason : "malformed event";

    StructuredLogger.warn("pipeline.rejected", {
      messageId,
      data: { streamId: entry.streamId, partition: entry.partition, reason },
      error: toLogError(error, "pipeline.invalid_event"),
    });

    await this.deadLetter.sendToDLQ(
      { kind: "raw", rawPayload: entry.rawPayload, messageId },
      reason,
      0,
      error,
    );

    if (messageId) {
      await this.statusPublisher.publish(messageId, MessageStatus.FAILED, {
        errorMessage: describeError(error),
      });
      await this.dedup.markProcessed(messageId);
    }
  }
}
