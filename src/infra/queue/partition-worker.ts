import type { Redis } from "ioredis";
import { getEnv, RedisConfig } from "../../config/environment";
import { StructuredLogger, toLogError } from "../../common/logging/structured-logger";
import {
  createRedisClient,
  releaseRedisClient,
} from "../redis/redis-manager";
import { defaultSleep, Sleep } from "../services/retry-executor";
import {
  ReadCursor,
  RedisStreamsService,
  StreamEntry,
  StreamTopic,
} from "./redis-streams.service";

export type EntryHandler = (entry: StreamEntry) => Promise<unknown>;

export interface PartitionWorkerOptions {
  readonly topic: StreamTopic;
  readonly partition: number;
  readonly consumerName: string;
  readonly batchSize: number;
  readonly blockMs: number;
  readonly errorBackoffMs: number;
  readonly redis: RedisConfig;
  readonly sleep?: Sleep;
}

/**
 * Worker for a single partition.
 *
 * Loop:
 * 1. Read this consumer's pending entries (cursor `0`); once none are left,
 *    switch to new entries (cursor `>`)
 * 2. Hand each entry to the handler, in stream order
 * 3. XACK an entry only after its handler resolved
 * 4. A handler exception abandons the rest of the batch, waits
 *    `errorBackoffMs` and goes back to the pending list, so the failed entry
 *    is retried before anything behind it
 *
 * Each worker owns a connection because XREADGROUP BLOCK holds it.
 */
export class PartitionWorker {
  private running = false;
  private loop: Promise<void> | null = null;
  private client: Redis | null = null;
  private cursor: ReadCursor = "0";
  private readonly sleep: Sleep;

  constructor(
    private readonly streams: RedisStreamsService,
    private readonly options: PartitionWorkerOptions,
    private readonly handler: EntryHandler,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get partition(): number {
    return this.options.partition;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.cursor = "0";
    this.client = createRedisClient(
      this.options.redis,
      `${this.options.topic}-worker-${this.options.partition}`,
    );
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    this.running = false;
    const client = this.client;
    this.client = null;
    if (client) {
      // Disconnecting unblocks a pending XREADGROUP so the loop can exit.
      releaseRedisClient(client);
    }
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
  }

  /**
   * One read-handle-ack cycle. Returns the number of entries acknowledged.
   */
  async pollOnce(client: Redis): Promise<number> {
    const entries = await this.streams.read(
      client,
      this.options.topic,
      this.options.partition,
      this.options.consumerName,
      this.cursor,
      this.options.batchSize,
      this.cursor === "0" ? 0 : this.options.blockMs,
    );

    if (entries.length === 0) {
      this.cursor = ">";
      return 0;
    }

    let acknowledged = 0;
    for (const entry of entries) {
      try {
        await this.handler(entry);
      } catch (error) {
        this.cursor = "0";
        StructuredLogger.error("stream.entry_failed", {
          data: {
            topic: this.options.topic,
            partition: this.options.partition,
            streamId: entry.streamId,
            delayMs: this.options.errorBackoffMs,
          },
          error: toLogError(error, "stream.handler_failed"),
        });
        await this.sleep(this.options.errorBackoffMs);
        return acknowledged;
      }

      await this.streams.acknowledge(this.options.topic, this.options.partition, [
        entry.streamId,
      ]);
      acknowledged += 1;
    }
    return acknowledged;
  }

  private async run(): Promise<void> {
    StructuredLogger.info("stream.worker_started", {
      data: {
        topic: this.options.topic,
        partition: this.options.partition,
        consumer: this.options.consumerName,
      },
    });

    while (this.running && this.client) {
      try {
        await this.pollOnce(this.client);
      } catch (error) {
        if (!this.running) {
          break;
        }
        this.cursor = "0";
        StructuredLogger.warn("stream.read_failed", {
          data: {
            topic: this.options.topic,
            partition: this.options.partition,
            delayMs: this.options.errorBackoffMs,
          },
          error: toLogError(error, "stream.read_failed"),
        });
        await this.sleep(this.options.errorBackoffMs);
      }
    }

    StructuredLogger.info("stream.worker_stopped", {
      data: {
        topic: this.options.topic,
        partition: this.options.partition,
      },
    });
  }
}

/**
 * Starts one worker per partition assigned to this instance.
 */
export function startPartitionWorkers(
  streams: RedisStreamsService,
  topic: StreamTopic,
  consumerName: string,
  handler: EntryHandler,
): PartitionWorker[] {
  const env = getEnv();
  return env.streams.assignedPartitions.map((partition) => {
    const worker = new PartitionWorker(
      streams,
      {
        topic,
        partition,
        consumerName,
        batchSize: env.streams.batchSize,
        blockMs: env.streams.blockMs,
        errorBackoffMs: env.streams.errorBackoffMs,
        redis: env.redis,
      },
      handler,
    );
    worker.start();
    return worker;
  });
}

export async function stopPartitionWorkers(
  workers: readonly PartitionWorker[],
): Promise<void> {
  await Promise.all(workers.map((worker) => worker.stop()));
}
