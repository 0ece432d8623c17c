import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from "@nestjs/common";
import { getEnv } from "../../config/environment";
import { StructuredLogger, toLogError } from "../../common/logging/structured-logger";
import { MessageEventValidator } from "../../common/validators/message-event.validator";
import {
  StatusUpdateResult,
  TelemetryMetrics,
} from "../../observability/metrics-registry";
import { LiveFanoutRegistry } from "../../realtime/live-fanout.registry";
import { StatusUpdate } from "../queue/message-event.interface";
import { classifyTransition } from "../queue/message-status";
import {
  PartitionWorker,
  startPartitionWorkers,
  stopPartitionWorkers,
} from "../queue/partition-worker";
import { RedisStreamsService, StreamEntry } from "../queue/redis-streams.service";
import {
  MESSAGE_STATUS_REPOSITORY,
  MessageStatusRecord,
  MessageStatusRepository,
} from "../repositories/message-status.repository";

const MAX_CAS_ATTEMPTS = 5;

/**
 * Applies StatusUpdates to the status repository.
 *
 * Illegal transitions, replays and updates for unknown messages are logged
 * and dropped; they are acknowledged like any handled entry. Only a
 * repository failure (or a CAS that keeps losing) throws, leaving the entry
 * pending.
 */
@Injectable()
export class StatusUpdateConsumer implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(StatusUpdateConsumer.name);
  private workers: PartitionWorker[] = [];

  constructor(
    private readonly streams: RedisStreamsService,
    @Inject(MESSAGE_STATUS_REPOSITORY)
    private readonly repository: MessageStatusRepository,
    private readonly liveFanout: LiveFanoutRegistry,
  ) {}

  onModuleInit(): void {
    const env = getEnv();
    if (!env.streams.workersEnabled) {
      this.logger.log("Status workers disabled");
      return;
    }
    this.workers = startPartitionWorkers(
      this.streams,
      "status",
      `${env.service.instanceId}:status`,
      (entry) => this.process(entry),
    );
    this.logger.log(`Started ${this.workers.length} status workers`);
  }

  async onModuleDestroy(): Promise<void> {
    await stopPartitionWorkers(this.workers);
    this.workers = [];
  }

  get runningWorkers(): number {
    return this.workers.filter((worker) => worker.isRunning).length;
  }

  async process(entry: StreamEntry): Promise<StatusUpdateResult> {
    let update: StatusUpdate;
    try {
      update = MessageEventValidator.validateStatusUpdate(entry.payload);
    } catch (error) {
      StructuredLogger.warn("status.invalid", {
        data: { streamId: entry.streamId, partition: entry.partition },
        error: toLogError(error, "status.invalid_update"),
      });
      TelemetryMetrics.recordStatusUpdate("invalid");
      return "invalid";
    }
    return this.apply(update);
  }

  async apply(update: StatusUpdate): Promise<StatusUpdateResult> {
    for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
      const current = await this.repository.find(update.messageId);
      if (!current) {
        return this.drop(update, "unknown_message");
      }

      const verdict = classifyTransition(current.status, update.status);
      if (verdict === "duplicate") {
        TelemetryMetrics.recordStatusUpdate("duplicate");
        StructuredLogger.debug("status.duplicate", {
          messageId: update.messageId,
          data: { toStatus: update.status, source: update.source },
        });
        return "duplicate";
      }
      if (verdict === "illegal") {
        return this.drop(update, "illegal", current);
      }

      const next: MessageStatusRecord = {
        ...current,
        status: update.status,
        updatedAt: update.timestamp,
        updatedBy: update.source,
      };
      const result = await this.repository.compareAndSet(current.status, next, {
        oldStatus: current.status,
        newStatus: update.status,
        timestamp: update.timestamp,
        updatedBy: update.source,
        errorMessage: update.errorMessage,
      });

      if (result === "applied") {
        TelemetryMetrics.recordStatusUpdate("applied");
        StructuredLogger.info("status.applied", {
          messageId: update.messageId,
          conversationId: current.conversationId,
          data: {
            fromStatus: current.status,
            toStatus: update.status,
            source: update.source,
          },
        });
        this.notify(next, update);
        return "applied";
      }
      if (result === "missing") {
        return this.drop(update, "unknown_message");
      }

      StructuredLogger.debug("status.conflict", {
        messageId: update.messageId,
        data: { attempt, toStatus: update.status },
      });
    }

    throw new Error(
      `Status update for ${update.messageId} lost ${MAX_CAS_ATTEMPTS} compare-and-set races`,
    );
  }

  private drop(
    update: StatusUpdate,
    result: "unknown_message" | "illegal",
    current?: MessageStatusRecord,
  ): StatusUpdateResult {
    TelemetryMetrics.recordStatusUpdate(result);
    StructuredLogger.warn(`status.${result}`, {
      messageId: update.messageId,
      data: {
        fromStatus: current?.status,
        toStatus: update.status,
        source: update.source,
      },
    });
    return result;
  }

  /**
   * The sender and every recipient get the transition on their live streams.
   */
  private notify(record: MessageStatusRecord, update: StatusUpdate): void {
    const audience = new Set([record.senderId, ...record.recipientIds]);
    for (const userId of audience) {
      this.liveFanout.deliverToUser(userId, {
        type: "message.status",
        messageId: record.messageId,
        conversationId: record.conversationId,
        status: update.status,
        errorMessage: update.errorMessage,
        timestamp: update.timestamp,
      });
    }
  }
}
