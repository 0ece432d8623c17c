import { Injectable } from "@nestjs/common";
import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { getEnv } from "../../config/environment";
import {
  DeadLetterWriteError,
  describeError,
} from "../../common/errors/delivery.errors";
import { StructuredLogger, toLogError } from "../../common/logging/structured-logger";
import { TelemetryMetrics } from "../../observability/metrics-registry";
import { DeadLetterEntry, MessageEvent } from "./message-event.interface";
import { RedisStreamsService } from "./redis-streams.service";

export type DeadLetterPayload =
  | { readonly kind: "event"; readonly event: MessageEvent }
  | {
      readonly kind: "raw";
      readonly rawPayload: string;
      readonly messageId?: string;
    };

export interface DeadLetterReceipt {
  readonly path: "stream" | "fallback_log";
  readonly entry: DeadLetterEntry;
}

/**
 * Quarantines messages that cannot be delivered.
 *
 * Primary path is the `msg:dlq` stream. When that append fails the entry is
 * written synchronously to the local fallback file and flagged for manual
 * intervention. If both fail, {@link DeadLetterWriteError} propagates so the
 * caller leaves the source event unacknowledged.
 */
@Injectable()
export class DeadLetterService {
  constructor(private readonly streams: RedisStreamsService) {}

  async sendToDLQ(
    payload: DeadLetterPayload,
    reason: string,
    attemptsMade: number,
    error?: unknown,
  ): Promise<DeadLetterReceipt> {
    const entry: DeadLetterEntry =
      payload.kind === "event"
        ? {
            event: payload.event,
            messageId: payload.event.messageId,
            reason,
            attemptsMade,
            failedAt: new Date().toISOString(),
            errorMessage: error === undefined ? undefined : describeError(error),
          }
        : {
            rawPayload: payload.rawPayload,
            messageId: payload.messageId,
            reason,
            attemptsMade,
            failedAt: new Date().toISOString(),
            errorMessage: error === undefined ? undefined : describeError(error),
          };

    try {
      await this.streams.appendDeadLetter(entry);
      TelemetryMetrics.recordDeadLetter(reason, "stream");
      StructuredLogger.warn("delivery.dead_lettered", {
        messageId: entry.messageId,
        conversationId: entry.event?.conversationId,
        data: { reason, attemptsMade, path: "stream" },
      });
      return { path: "stream", entry };
    } catch (streamError) {
      return this.writeFallback(entry, streamError);
    }
  }

  private writeFallback(
    entry: DeadLetterEntry,
    streamError: unknown,
  ): DeadLetterReceipt {
    const fallbackPath = getEnv().deadLetter.fallbackPath;

    try {
      mkdirSync(dirname(fallbackPath), { recursive: true });
      appendFileSync(
        fallbackPath,
        `${JSON.stringify({ ...entry, requiresManualIntervention: true })}\n`,
        { encoding: "utf8", flag: "a" },
      );
    } catch (fileError) {
      TelemetryMetrics.recordDeadLetter(entry.reason, "lost");
      StructuredLogger.error("delivery.dead_letter_lost", {
        messageId: entry.messageId,
        data: {
          reason: entry.reason,
          attemptsMade: entry.attemptsMade,
          path: fallbackPath,
          requiresManualIntervention: true,
        },
        error: toLogError(fileError, "dlq.fallback_write_failed"),
      });
      throw new DeadLetterWriteError(
        entry.messageId,
        `stream: ${describeError(streamError)}; fallback: ${describeError(fileError)}`,
      );
    }

    TelemetryMetrics.recordDeadLetter(entry.reason, "fallback_log");
    StructuredLogger.error("delivery.dead_letter_fallback", {
      messageId: entry.messageId,
      conversationId: entry.event?.conversationId,
      data: {
        reason: entry.reason,
        attemptsMade: entry.attemptsMade,
        path: fallbackPath,
        requiresManualIntervention: true,
      },
      error: toLogError(streamError, "dlq.stream_unavailable"),
    });
    return { path: "fallback_log", entry };
  }
}
