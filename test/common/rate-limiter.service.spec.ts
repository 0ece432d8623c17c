import type { Redis } from "ioredis";
import { resetEnvironmentCacheForTests } from "../../src/config/environment";
import { RateLimiterService } from "../../src/common/services/rate-limiter.service";
import { getMetricValue, resetMetrics } from "../helpers/metrics";
import { createTestRedis } from "../helpers/redis";

function useLimits(user: string | undefined, global: string | undefined): void {
  if (user === undefined) {
    delete process.env.RATE_LIMIT_USER_PER_WINDOW;
  } else {
    process.env.RATE_LIMIT_USER_PER_WINDOW = user;
  }
  if (global === undefined) {
    delete process.env.RATE_LIMIT_GLOBAL_PER_WINDOW;
  } else {
    process.env.RATE_LIMIT_GLOBAL_PER_WINDOW = global;
  }
  resetEnvironmentCacheForTests();
}

describe("RateLimiterService", () => {
  let redis: Redis;
  let limiter: RateLimiterService;

  afterAll(() => {
    useLimits(undefined, undefined);
  });

  describe("with default limits", () => {
    beforeAll(() => {
      useLimits(undefined, undefined);
      redis = createTestRedis().redis;
    });

    beforeEach(async () => {
      await redis.flushall();
      resetMetrics();
      limiter = new RateLimiterService(redis);
    });

    it("admits 100 requests per window and rejects the 101st", async () => {
      for (let i = 0; i < 100; i++) {
        expect((await limiter.check("user:u1")).allowed).toBe(true);
      }

      const decision = await limiter.check("user:u1");

      expect(decision.allowed).toBe(false);
      if (!decision.allowed) {
        expect(decision.scope).toBe("user");
        expect(decision.limit).toBe(100);
        expect(decision.source).toBe("redis");
        expect(decision.retryAfterSeconds).toBeGreaterThanOrEqual(1);
        expect(decision.retryAfterSeconds).toBeLessThanOrEqual(60);
      }
      expect(
        await getMetricValue("rate_limit_decisions_total", {
          decision: "allowed",
          source: "redis",
        }),
      ).toBe(100);
    });

    it("counts subjects separately", async () => {
      for (let i = 0; i < 100; i++) {
        await limiter.check("user:u1");
      }

      expect((await limiter.check("user:u2")).allowed).toBe(true);
    });

    it("starts each window with an expiry", async () => {
      await limiter.check("ip:10.0.0.1");

      const ttl = await redis.pttl(limiter.keyFor("ip:10.0.0.1"));
      expect(ttl).toBeGreaterThan(0);
      expect(ttl).toBeLessThanOrEqual(60_000);
    });
  });

  describe("with small limits", () => {
    beforeAll(() => {
      useLimits("3", "5");
      redis = createTestRedis().redis;
    });

    beforeEach(async () => {
      await redis.flushall();
      resetMetrics();
      jest.restoreAllMocks();
      limiter = new RateLimiterService(redis);
    });

    it("rejects on the global window once all subjects together exceed it", async () => {
      for (let i = 0; i < 3; i++) {
        expect((await limiter.check("user:a")).allowed).toBe(true);
      }
      for (let i = 0; i < 2; i++) {
        expect((await limiter.check("user:b")).allowed).toBe(true);
      }

      const decision = await limiter.check("user:b");

      expect(decision).toMatchObject({ allowed: false, scope: "global", limit: 5 });
    });

    it("falls back to per-process windows when Redis fails", async () => {
      jest.spyOn(redis, "incr").mockRejectedValue(new Error("ECONNRESET"));

      for (let i = 0; i < 3; i++) {
        expect(await limiter.check("user:a")).toEqual({ allowed: true, source: "local" });
      }
      const decision = await limiter.check("user:a");

      expect(decision).toMatchObject({
        allowed: false,
        source: "local",
        scope: "user",
        limit: 3,
        retryAfterSeconds: 60,
      });
    });
  });
});
