import {
  Inject,
  Injectable,
  Logger,
  OnModuleInit,
} from "@nestjs/common";
import type { Redis } from "ioredis";
import { getEnv } from "../../config/environment";
import { REDIS_CLIENT } from "../redis/redis-manager";
import { DeadLetterEntry } from "./message-event.interface";
import { partitionFor } from "./partitioning";

/**
 * Partitioned Redis Streams backing the delivery pipeline.
 *
 * - `messages` topic: MessageEvents, partitioned by conversationId
 * - `status` topic: StatusUpdates, partitioned by messageId
 * - `msg:dlq`: dead-letter entries, append only
 *
 * One consumer group per topic. Each partition is read by exactly one worker
 * per instance, so entries of one key are handled strictly in order. Entries
 * are only XACKed by the caller once their side effects are recorded; an
 * unacknowledged entry stays in the group's pending list and is read again
 * from cursor `0`.
 */

export type StreamTopic = "messages" | "status";
export type ReadCursor = "0" | ">";

interface TopicLayout {
  readonly prefix: string;
  readonly group: string;
}

const TOPICS: Record<StreamTopic, TopicLayout> = {
  messages: { prefix: "msg:stream", group: "delivery-router" },
  status: { prefix: "status:stream", group: "status-consumers" },
};

const TOPIC_NAMES: readonly StreamTopic[] = ["messages", "status"];

export const DEAD_LETTER_STREAM = "msg:dlq";
const DEAD_LETTER_GROUP = "dlq-processors";

export interface StreamEntry {
  readonly streamId: string;
  readonly partition: number;

  /**
   * Parsed JSON payload, or undefined when the entry held no parseable JSON
   */
  readonly payload: unknown;
  readonly rawPayload: string;
}

export interface EnqueueReceipt {
  readonly streamId: string;
  readonly partition: number;
}

interface RawStreamEntry {
  readonly streamId: string;
  readonly fields: readonly string[];
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * XREADGROUP replies are `[[streamKey, [[id, fields|null], ...]]]`.
 */
function parseReadReply(reply: unknown): RawStreamEntry[] {
  if (!Array.isArray(reply) || reply.length === 0) {
    return [];
  }
  const [streamReply] = reply;
  if (!Array.isArray(streamReply) || !Array.isArray(streamReply[1])) {
    return [];
  }

  const entries: RawStreamEntry[] = [];
  for (const item of streamReply[1]) {
    if (!Array.isArray(item) || typeof item[0] !== "string") {
      continue;
    }
    entries.push({
      streamId: item[0],
      fields: isStringArray(item[1]) ? item[1] : [],
    });
  }
  return entries;
}

function fieldValue(fields: readonly string[], name: string): string | undefined {
  for (let i = 0; i + 1 < fields.length; i += 2) {
    if (fields[i] === name) {
      return fields[i + 1];
    }
  }
  return undefined;
}

function parsePayload(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class RedisStreamsService implements OnModuleInit {
  private readonly logger = new Logger(RedisStreamsService.name);
  private readonly totalPartitions: number;

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {
    this.totalPartitions = getEnv().streams.partitions;
  }

  async onModuleInit(): Promise<void> {
    await this.initializeStreams();
    this.logger.log(
      `Redis Streams initialized with ${this.totalPartitions} partitions per topic`,
    );
  }

  get partitions(): number {
    return this.totalPartitions;
  }

  consumerGroup(topic: StreamTopic): string {
    return TOPICS[topic].group;
  }

  streamKey(topic: StreamTopic, partition: number): string {
    return `${TOPICS[topic].prefix}:${partition}`;
  }

  partitionOf(partitionKey: string): number {
    return partitionFor(partitionKey, this.totalPartitions);
  }

  /**
   * Creates every consumer group up front. BUSYGROUP means it already exists.
   */
  async initializeStreams(): Promise<void> {
    for (const topic of TOPIC_NAMES) {
      for (let partition = 0; partition < this.totalPartitions; partition++) {
        await this.ensureGroup(
          this.streamKey(topic, partition),
          this.consumerGroup(topic),
        );
      }
    }
    await this.ensureGroup(DEAD_LETTER_STREAM, DEAD_LETTER_GROUP);
  }

  private async ensureGroup(streamKey: string, group: string): Promise<void> {
    try {
      await this.redis.xgroup("CREATE", streamKey, group, "0", "MKSTREAM");
      this.logger.debug(`Created consumer group ${group} on ${streamKey}`);
    } catch (error) {
      if (!describeError(error).includes("BUSYGROUP")) {
        this.logger.error(
          `Failed to create consumer group ${group} on ${streamKey}: ${describeError(error)}`,
        );
        throw error;
      }
    }
  }

  async enqueue(
    topic: StreamTopic,
    partitionKey: string,
    payload: object,
  ): Promise<EnqueueReceipt> {
    const partition = this.partitionOf(partitionKey);
    const streamKey = this.streamKey(topic, partition);

    const streamId = await this.redis.xadd(
      streamKey,
      "*",
      "key",
      partitionKey,
      "payload",
      JSON.stringify(payload),
    );
    if (!streamId) {
      throw new Error(`XADD to ${streamKey} returned no id`);
    }

    this.logger.debug(
      `Enqueued ${topic} entry for ${partitionKey} to partition ${partition} as ${streamId}`,
    );

    return { streamId, partition };
  }

  /**
   * Reads from one partition on the given connection. Workers pass their own
   * connection because a blocking read holds it for up to `blockMs`.
   *
   * Cursor `0` returns this consumer's pending (delivered, unacked) entries;
   * `>` returns entries never delivered to the group.
   */
  async read(
    client: Redis,
    topic: StreamTopic,
    partition: number,
    consumerName: string,
    cursor: ReadCursor,
    count: number,
    blockMs: number,
  ): Promise<StreamEntry[]> {
    const streamKey = this.streamKey(topic, partition);
    const group = this.consumerGroup(topic);
    // BLOCK only applies to `>`; the pending list is answered immediately.
    const reply: unknown =
      cursor === ">" && blockMs > 0
        ? await client.xreadgroup(
            "GROUP",
            group,
            consumerName,
            "COUNT",
            count,
            "BLOCK",
            blockMs,
            "STREAMS",
            streamKey,
            cursor,
          )
        : await client.xreadgroup(
            "GROUP",
            group,
            consumerName,
            "COUNT",
            count,
            "STREAMS",
            streamKey,
            cursor,
          );

    return parseReadReply(reply).map(({ streamId, fields }) => {
      const rawPayload = fieldValue(fields, "payload") ?? "";
      return {
        streamId,
        partition,
        rawPayload,
        payload: parsePayload(rawPayload),
      };
    });
  }

  async acknowledge(
    topic: StreamTopic,
    partition: number,
    streamIds: readonly string[],
  ): Promise<number> {
    if (streamIds.length === 0) {
      return 0;
    }
    return this.redis.xack(
      this.streamKey(topic, partition),
      this.consumerGroup(topic),
      ...streamIds,
    );
  }

  async appendDeadLetter(entry: DeadLetterEntry): Promise<string> {
    const payload = entry.event
      ? JSON.stringify(entry.event)
      : (entry.rawPayload ?? "");

    const streamId = await this.redis.xadd(
      DEAD_LETTER_STREAM,
      "*",
      "messageId",
      entry.messageId ?? "",
      "reason",
      entry.reason,
      "attemptsMade",
      String(entry.attemptsMade),
      "failedAt",
      entry.failedAt,
      "errorMessage",
      entry.errorMessage ?? "",
      "payload",
      payload,
    );
    if (!streamId) {
      throw new Error(`XADD to ${DEAD_LETTER_STREAM} returned no id`);
    }
    return streamId;
  }
}
