import type { Redis } from "ioredis";
import { getEnv } from "../../src/config/environment";
import { TransientDeliveryError } from "../../src/common/errors/delivery.errors";
import { ChannelAdapterRegistry } from "../../src/connectors/channel-adapter.registry";
import { DeadLetterService } from "../../src/infra/queue/dead-letter.service";
import { DeduplicationService } from "../../src/infra/queue/deduplication.service";
import { Channel, MessageStatus } from "../../src/infra/queue/message-event.interface";
import { PartitionWorker } from "../../src/infra/queue/partition-worker";
import { RedisStreamsService } from "../../src/infra/queue/redis-streams.service";
import { EventDispatcherConsumer } from "../../src/infra/services/event-dispatcher.consumer";
import { IdentityResolverService } from "../../src/infra/services/identity-resolver.service";
import { RetryExecutor } from "../../src/infra/services/retry-executor";
import { RoutingService } from "../../src/infra/services/routing.service";
import { StatusPublisherService } from "../../src/infra/services/status-publisher.service";
import { LiveFanoutRegistry } from "../../src/realtime/live-fanout.registry";
import { buildEvent, streamEntry } from "../helpers/fixtures";
import { getMetricValue, resetMetrics } from "../helpers/metrics";
import { createTestRedis } from "../helpers/redis";
import { ScriptedChannelAdapter } from "../helpers/scripted-adapter";

const noSleep = async (): Promise<void> => undefined;

describe("EventDispatcherConsumer", () => {
  let redis: Redis;
  let streams: RedisStreamsService;
  let whatsapp: ScriptedChannelAdapter;
  let dedup: DeduplicationService;
  let deadLetter: DeadLetterService;
  let routing: RoutingService;
  let liveFanout: LiveFanoutRegistry;
  let dispatcher: EventDispatcherConsumer;
  let enqueue: jest.SpyInstance;

  beforeAll(() => {
    ({ redis, streams } = createTestRedis());
  });

  afterAll(() => {
    redis.disconnect();
  });

  beforeEach(async () => {
    await redis.flushall();
    resetMetrics();
    jest.restoreAllMocks();
    enqueue = jest
      .spyOn(streams, "enqueue")
      .mockResolvedValue({ streamId: "1700000000001-0", partition: 0 });
    jest.spyOn(streams, "appendDeadLetter").mockResolvedValue("1700000000002-0");

    whatsapp = new ScriptedChannelAdapter(Channel.WHATSAPP);
    dedup = new DeduplicationService(redis);
    deadLetter = new DeadLetterService(streams);
    liveFanout = new LiveFanoutRegistry();
    routing = new RoutingService(
      new IdentityResolverService(getEnv().identity, noSleep),
      new ChannelAdapterRegistry([whatsapp]),
      new RetryExecutor(
        { maxAttempts: 3, initialDelayMs: 1000, multiplier: 2, maxDelayMs: 10_000 },
        noSleep,
      ),
      deadLetter,
      liveFanout,
    );
    dispatcher = new EventDispatcherConsumer(
      streams,
      dedup,
      routing,
      new StatusPublisherService(streams),
      deadLetter,
    );
  });

  afterEach(() => {
    liveFanout.onModuleDestroy();
  });

  it("routes, publishes the status and marks the event processed", async () => {
    const outcome = await dispatcher.process(streamEntry(buildEvent()));

    expect(outcome).toBe("processed");
    expect(enqueue).toHaveBeenCalledWith(
      "status",
      "m1",
      expect.objectContaining({ messageId: "m1", status: MessageStatus.SENT }),
    );
    expect(await redis.exists(dedup.keyFor("m1"))).toBe(1);
    expect(
      await getMetricValue("pipeline_events_total", { outcome: "processed" }),
    ).toBe(1);
  });

  it("sends a redelivered event only once", async () => {
    const entry = streamEntry(buildEvent());

    expect(await dispatcher.process(entry)).toBe("processed");
    expect(await dispatcher.process(entry)).toBe("duplicate");

    expect(whatsapp.calls).toHaveLength(1);
    expect(enqueue).toHaveBeenCalledTimes(1);
  });

  it("publishes statuses in the order events are consumed", async () => {
    whatsapp.script(
      "+15550002222",
      new TransientDeliveryError("timeout", "WHATSAPP", "no answer"),
    );

    await dispatcher.process(streamEntry(buildEvent(), "1-0"));
    await dispatcher.process(
      streamEntry(
        buildEvent({ messageId: "m2", recipientIds: ["+15550002222"] }),
        "2-0",
      ),
    );

    expect(enqueue.mock.calls.map((call) => [call[1], call[2].status])).toEqual([
      ["m1", MessageStatus.SENT],
      ["m2", MessageStatus.FAILED],
    ]);
    expect(enqueue.mock.calls[1][2].errorMessage).toBe(
      "WHATSAPP delivery failed (timeout): no answer",
    );
  });

  it("reports a dead-lettered event as failed and still marks it", async () => {
    whatsapp.script(
      "+15550002222",
      new TransientDeliveryError("timeout", "WHATSAPP", "no answer"),
    );

    const outcome = await dispatcher.process(
      streamEntry(buildEvent({ messageId: "m2", recipientIds: ["+15550002222"] })),
    );

    expect(outcome).toBe("failed");
    expect(await redis.exists(dedup.keyFor("m2"))).toBe(1);
    expect(
      await getMetricValue("dead_letter_total", {
        reason: "retries exhausted",
        path: "stream",
      }),
    ).toBe(1);
  });

  it("fails open when the dedup store is unreachable", async () => {
    jest.spyOn(redis, "exists").mockRejectedValue(new Error("connection lost"));

    const outcome = await dispatcher.process(streamEntry(buildEvent()));

    expect(outcome).toBe("processed");
    expect(whatsapp.calls).toHaveLength(1);
    expect(
      await getMetricValue("dedup_store_errors_total", { operation: "check" }),
    ).toBe(1);
  });

  it("dead-letters a malformed event as its raw payload and fails the message", async () => {
    const dlq = jest.spyOn(deadLetter, "sendToDLQ");
    const entry = streamEntry({ messageId: "m9", channel: "WHATSAPP" });

    const outcome = await dispatcher.process(entry);

    expect(outcome).toBe("rejected");
    expect(dlq).toHaveBeenCalledWith(
      { kind: "raw", rawPayload: entry.rawPayload, messageId: "m9" },
      "validation failed: Missing required field: conversationId",
      0,
      expect.any(Error),
    );
    expect(enqueue).toHaveBeenCalledWith(
      "status",
      "m9",
      expect.objectContaining({
        status: MessageStatus.FAILED,
        errorMessage: "Missing required field: conversationId",
      }),
    );
    expect(whatsapp.calls).toHaveLength(0);
  });

  it("drops a redelivered malformed event without dead-lettering it again", async () => {
    const dlq = jest.spyOn(deadLetter, "sendToDLQ");
    const entry = streamEntry({ ...buildEvent({ messageId: "bad1" }), channel: "FAX" });

    expect(await dispatcher.process(entry)).toBe("rejected");
    expect(await dispatcher.process(entry)).toBe("duplicate");

    expect(dlq).toHaveBeenCalledTimes(1);
    expect(enqueue).toHaveBeenCalledTimes(1);
    expect(
      await getMetricValue("pipeline_events_total", { outcome: "duplicate" }),
    ).toBe(1);
  });

  it("dead-letters an unparseable payload without publishing a status", async () => {
    const dlq = jest.spyOn(deadLetter, "sendToDLQ");

    const outcome = await dispatcher.process(streamEntry("not an event"));

    expect(outcome).toBe("rejected");
    expect(dlq).toHaveBeenCalledWith(
      { kind: "raw", rawPayload: '"not an event"', messageId: undefined },
      "validation failed: Malformed event: expected object",
      0,
      expect.any(Error),
    );
    expect(enqueue).not.toHaveBeenCalled();
  });

  describe("with a partition worker", () => {
    function buildWorker(sleep: jest.Mock): PartitionWorker {
      return new PartitionWorker(
        streams,
        {
          topic: "messages",
          partition: 0,
          consumerName: "test:dispatcher",
          batchSize: 10,
          blockMs: 2000,
          errorBackoffMs: 1000,
          redis: getEnv().redis,
          sleep,
        },
        (entry) => dispatcher.process(entry),
      );
    }

    it("marks the event processed before acknowledging it", async () => {
      const mark = jest.spyOn(dedup, "markProcessed");
      const ack = jest.spyOn(streams, "acknowledge").mockResolvedValue(1);
      jest.spyOn(streams, "read").mockResolvedValueOnce([streamEntry(buildEvent())]);

      const acknowledged = await buildWorker(jest.fn()).pollOnce(redis);

      expect(acknowledged).toBe(1);
      expect(ack).toHaveBeenCalledWith("messages", 0, ["1700000000000-0"]);
      expect(mark.mock.invocationCallOrder[0]).toBeLessThan(
        ack.mock.invocationCallOrder[0],
      );
    });

    it("leaves a failing entry unacknowledged and rereads the pending list", async () => {
      const ack = jest.spyOn(streams, "acknowledge").mockResolvedValue(1);
      const read = jest
        .spyOn(streams, "read")
        .mockResolvedValueOnce([])
        .mockResolvedValueOnce([streamEntry(buildEvent(), "5-0")])
        .mockResolvedValueOnce([]);
      jest.spyOn(routing, "route").mockRejectedValue(new Error("redis down"));
      const sleep = jest.fn().mockResolvedValue(undefined);
      const worker = buildWorker(sleep);

      expect(await worker.pollOnce(redis)).toBe(0);
      expect(await worker.pollOnce(redis)).toBe(0);
      await worker.pollOnce(redis);

      expect(ack).not.toHaveBeenCalled();
      expect(sleep).toHaveBeenCalledWith(1000);
      expect(read.mock.calls.map((call) => [call[4], call[6]])).toEqual([
        ["0", 0],
        [">", 2000],
        ["0", 0],
      ]);
      expect(await redis.exists(dedup.keyFor("m1"))).toBe(0);
    });
  });
});
