import type { Redis } from "ioredis";
import { DeduplicationService } from "../../src/infra/queue/deduplication.service";
import { getMetricValue, resetMetrics } from "../helpers/metrics";
import { createTestRedis } from "../helpers/redis";

describe("DeduplicationService", () => {
  let redis: Redis;
  let dedup: DeduplicationService;

  beforeAll(() => {
    redis = createTestRedis().redis;
  });

  afterAll(() => {
    redis.disconnect();
  });

  beforeEach(async () => {
    await redis.flushall();
    resetMetrics();
    jest.restoreAllMocks();
    dedup = new DeduplicationService(redis);
  });

  it("reports a message as new until it is marked", async () => {
    expect(await dedup.isDuplicate("m1")).toBe(false);

    await dedup.markProcessed("m1");

    expect(await dedup.isDuplicate("m1")).toBe(true);
    expect(await dedup.isDuplicate("m2")).toBe(false);
  });

  it("stores the marker with the configured TTL", async () => {
    await dedup.markProcessed("m1");

    const ttl = await redis.ttl("router:processed:m1");
    expect(ttl).toBeGreaterThan(0);
    expect(ttl).toBeLessThanOrEqual(7 * 24 * 60 * 60);
  });

  it("treats a failed lookup as not processed", async () => {
    jest.spyOn(redis, "exists").mockRejectedValue(new Error("ECONNREFUSED"));

    expect(await dedup.isDuplicate("m1")).toBe(false);
    expect(
      await getMetricValue("dedup_store_errors_total", { operation: "check" }),
    ).toBe(1);
  });

  it("swallows a failed mark and counts it", async () => {
    jest.spyOn(redis, "set").mockRejectedValue(new Error("READONLY"));

    await expect(dedup.markProcessed("m1")).resolves.toBeUndefined();
    expect(
      await getMetricValue("dedup_store_errors_total", { operation: "mark" }),
    ).toBe(1);
  });
});
