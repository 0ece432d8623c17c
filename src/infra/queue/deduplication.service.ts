import { Inject, Injectable } from "@nestjs/common";
import type { Redis } from "ioredis";
import { getEnv } from "../../config/environment";
import { StructuredLogger, toLogError } from "../../common/logging/structured-logger";
import { TelemetryMetrics } from "../../observability/metrics-registry";
import { REDIS_CLIENT } from "../redis/redis-manager";

const KEY_PREFIX = "router:processed:";
const PROCESSED_MARKER = "1";

/**
 * "Already processed" markers for message events, shared by every instance
 * of the consumer group.
 *
 * Both operations fail open: a store outage never blocks the pipeline. The
 * cost is a possible duplicate send, which adapters absorb because sends are
 * idempotent per messageId.
 */
@Injectable()
export class DeduplicationService {
  private readonly ttlSeconds: number;

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {
    this.ttlSeconds = getEnv().delivery.dedupTtlSeconds;
  }

  keyFor(messageId: string): string {
    return `${KEY_PREFIX}${messageId}`;
  }

  async isDuplicate(messageId: string): Promise<boolean> {
    try {
      const exists = await this.redis.exists(this.keyFor(messageId));
      return exists === 1;
    } catch (error) {
      TelemetryMetrics.recordDedupError("check");
      StructuredLogger.warn("dedup.check", {
        messageId,
        status: "failed_open",
        error: toLogError(error, "dedup.store_unavailable"),
      });
      return false;
    }
  }

  /**
   * SET ... EX is a single atomic write; re-marking only refreshes the TTL.
   */
  async markProcessed(messageId: string): Promise<void> {
    try {
      await this.redis.set(
        this.keyFor(messageId),
        PROCESSED_MARKER,
        "EX",
        this.ttlSeconds,
      );
    } catch (error) {
      TelemetryMetrics.recordDedupError("mark");
      StructuredLogger.error("dedup.mark", {
        messageId,
        status: "failed_open",
        error: toLogError(error, "dedup.store_unavailable"),
      });
    }
  }
}
