import type { Redis } from "ioredis";
import { MessageStatus } from "../../src/infra/queue/message-event.interface";
import { RedisStreamsService } from "../../src/infra/queue/redis-streams.service";
import { StatusUpdateConsumer } from "../../src/infra/services/status-update.consumer";
import { LiveEvent, LiveFanoutRegistry } from "../../src/realtime/live-fanout.registry";
import { buildRecord, streamEntry } from "../helpers/fixtures";
import { InMemoryStatusRepository } from "../helpers/in-memory-status.repository";
import { getMetricValue, resetMetrics } from "../helpers/metrics";
import { createTestRedis } from "../helpers/redis";

function update(status: MessageStatus, timestamp: string, source = "whatsapp-webhook") {
  return { messageId: "m1", status, timestamp, source };
}

describe("StatusUpdateConsumer", () => {
  let redis: Redis;
  let streams: RedisStreamsService;
  let repository: InMemoryStatusRepository;
  let liveFanout: LiveFanoutRegistry;
  let consumer: StatusUpdateConsumer;

  beforeAll(() => {
    ({ redis, streams } = createTestRedis());
  });

  afterAll(() => {
    redis.disconnect();
  });

  beforeEach(async () => {
    resetMetrics();
    jest.restoreAllMocks();
    repository = new InMemoryStatusRepository();
    liveFanout = new LiveFanoutRegistry();
    consumer = new StatusUpdateConsumer(streams, repository, liveFanout);
    await repository.create(buildRecord());
  });

  afterEach(() => {
    liveFanout.onModuleDestroy();
  });

  it("walks SENT then DELIVERED and records both transitions", async () => {
    expect(
      await consumer.apply(update(MessageStatus.SENT, "2026-10-18T09:00:01.000Z", "delivery-router")),
    ).toBe("applied");
    expect(
      await consumer.apply(update(MessageStatus.DELIVERED, "2026-10-18T09:00:05.000Z")),
    ).toBe("applied");

    expect(repository.records.get("m1")).toMatchObject({
      status: MessageStatus.DELIVERED,
      updatedAt: "2026-10-18T09:00:05.000Z",
      updatedBy: "whatsapp-webhook",
    });
    expect(await repository.history("m1")).toEqual([
      {
        oldStatus: MessageStatus.PENDING,
        newStatus: MessageStatus.SENT,
        timestamp: "2026-10-18T09:00:01.000Z",
        updatedBy: "delivery-router",
        errorMessage: undefined,
      },
      {
        oldStatus: MessageStatus.SENT,
        newStatus: MessageStatus.DELIVERED,
        timestamp: "2026-10-18T09:00:05.000Z",
        updatedBy: "whatsapp-webhook",
        errorMessage: undefined,
      },
    ]);
  });

  it("drops anything after READ", async () => {
    await repository.create(buildRecord({ messageId: "m3", status: MessageStatus.READ }));

    const result = await consumer.apply({
      messageId: "m3",
      status: MessageStatus.DELIVERED,
      timestamp: "2026-10-18T09:01:00.000Z",
      source: "whatsapp-webhook",
    });

    expect(result).toBe("illegal");
    expect(repository.statusOf("m3")).toBe(MessageStatus.READ);
    expect(await getMetricValue("status_updates_total", { result: "illegal" })).toBe(1);
  });

  it("drops a backward transition", async () => {
    await consumer.apply(update(MessageStatus.DELIVERED, "2026-10-18T09:00:05.000Z"));

    expect(
      await consumer.apply(update(MessageStatus.SENT, "2026-10-18T09:00:06.000Z")),
    ).toBe("illegal");
    expect(repository.statusOf("m1")).toBe(MessageStatus.DELIVERED);
  });

  it("treats a replayed transition as a no-op", async () => {
    await consumer.apply(update(MessageStatus.SENT, "2026-10-18T09:00:01.000Z"));

    expect(
      await consumer.apply(update(MessageStatus.SENT, "2026-10-18T09:00:01.000Z")),
    ).toBe("duplicate");
    expect(await repository.history("m1")).toHaveLength(1);
  });

  it("drops updates for unknown messages", async () => {
    const result = await consumer.apply({
      messageId: "missing",
      status: MessageStatus.SENT,
      timestamp: "2026-10-18T09:00:01.000Z",
      source: "delivery-router",
    });

    expect(result).toBe("unknown_message");
  });

  it("re-reads and re-validates after losing a compare-and-set", async () => {
    const cas = jest
      .spyOn(repository, "compareAndSet")
      .mockResolvedValueOnce("conflict");

    const result = await consumer.apply(
      update(MessageStatus.DELIVERED, "2026-10-18T09:00:05.000Z"),
    );

    expect(result).toBe("applied");
    expect(cas).toHaveBeenCalledTimes(2);
    expect(repository.statusOf("m1")).toBe(MessageStatus.DELIVERED);
  });

  it("throws when every compare-and-set attempt conflicts", async () => {
    jest.spyOn(repository, "compareAndSet").mockResolvedValue("conflict");

    await expect(
      consumer.apply(update(MessageStatus.SENT, "2026-10-18T09:00:01.000Z")),
    ).rejects.toThrow("Status update for m1 lost 5 compare-and-set races");
  });

  it("counts an unparseable entry as invalid", async () => {
    expect(await consumer.process(streamEntry({ messageId: "m1", status: "SEEN" }))).toBe(
      "invalid",
    );
    expect(await getMetricValue("status_updates_total", { result: "invalid" })).toBe(1);
  });

  it("notifies the sender and recipients on their live streams", async () => {
    const senderEvents: LiveEvent[] = [];
    const recipientEvents: LiveEvent[] = [];
    liveFanout.register("sender-1", { sessionId: "a", send: (e) => senderEvents.push(e) });
    liveFanout.register("recipient-1", {
      sessionId: "b",
      send: (e) => recipientEvents.push(e),
    });

    await consumer.process(
      streamEntry(update(MessageStatus.SENT, "2026-10-18T09:00:01.000Z")),
    );
    await new Promise((resolve) => setImmediate(resolve));

    const expected = {
      type: "message.status",
      messageId: "m1",
      conversationId: "conv-1",
      status: MessageStatus.SENT,
      errorMessage: undefined,
      timestamp: "2026-10-18T09:00:01.000Z",
    };
    expect(senderEvents).toEqual([expected]);
    expect(recipientEvents).toEqual([expected]);
  });
});
