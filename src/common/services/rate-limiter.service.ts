import { Inject, Injectable } from "@nestjs/common";
import type { Redis } from "ioredis";
import { getEnv } from "../../config/environment";
import { REDIS_CLIENT } from "../../infra/redis/redis-manager";
import { TelemetryMetrics } from "../../observability/metrics-registry";
import { StructuredLogger, toLogError } from "../logging/structured-logger";

export type RateLimitScope = "user" | "global";

export type RateLimitDecision =
  | { readonly allowed: true; readonly source: "redis" | "local" }
  | {
      readonly allowed: false;
      readonly source: "redis" | "local";
      readonly scope: RateLimitScope;
      readonly limit: number;
      readonly retryAfterSeconds: number;
    };

interface WindowCount {
  readonly count: number;
  readonly remainingMs: number;
}

interface LocalWindow {
  windowStart: number;
  count: number;
}

const GLOBAL_KEY = "ratelimit:global";
const LOCAL_PRUNE_THRESHOLD = 10_000;

/**
 * Fixed-window admission control: one counter per subject (`user:<id>` or
 * `ip:<addr>`) plus one global counter, both in Redis.
 *
 * INCR is atomic; the first increment of a window sets its expiry. When Redis
 * is unreachable the same limits are approximated per process.
 */
@Injectable()
export class RateLimiterService {
  private readonly localWindows = new Map<string, LocalWindow>();

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  keyFor(subject: string): string {
    return `ratelimit:${subject}`;
  }

  async check(subject: string): Promise<RateLimitDecision> {
    const { rateLimit } = getEnv();
    try {
      const decision = await this.evaluate(subject, "redis", (key) =>
        this.incrementShared(key, rateLimit.windowMs),
      );
      TelemetryMetrics.recordRateLimitDecision(decision.allowed, "redis");
      return decision;
    } catch (error) {
      StructuredLogger.warn("rate_limit.store", {
        status: "fallback_local",
        data: { subject },
        error: toLogError(error, "rate_limit.store_unavailable"),
      });
      const decision = await this.evaluate(subject, "local", (key) =>
        Promise.resolve(this.incrementLocal(key, rateLimit.windowMs)),
      );
      TelemetryMetrics.recordRateLimitDecision(decision.allowed, "local");
      return decision;
    }
  }

  /**
   * Subject first; a request already over its own limit never counts
   * against the global window.
   */
  private async evaluate(
    subject: string,
    source: "redis" | "local",
    increment: (key: string) => Promise<WindowCount>,
  ): Promise<RateLimitDecision> {
    const { rateLimit } = getEnv();

    const own = await increment(this.keyFor(subject));
    if (own.count > rateLimit.userLimit) {
      return this.deny(subject, source, "user", rateLimit.userLimit, own);
    }

    const global = await increment(GLOBAL_KEY);
    if (global.count > rateLimit.globalLimit) {
      return this.deny(subject, source, "global", rateLimit.globalLimit, global);
    }

    return { allowed: true, source };
  }

  private deny(
    subject: string,
    source: "redis" | "local",
    scope: RateLimitScope,
    limit: number,
    window: WindowCount,
  ): RateLimitDecision {
    const retryAfterSeconds = Math.max(1, Math.ceil(window.remainingMs / 1000));
    StructuredLogger.info("rate_limit.rejected", {
      data: { subject, scope, limit, retryAfterSeconds, source },
    });
    return { allowed: false, source, scope, limit, retryAfterSeconds };
  }

  private async incrementShared(
    key: string,
    windowMs: number,
  ): Promise<WindowCount> {
    const count = await this.redis.incr(key);
    if (count === 1) {
      await this.redis.pexpire(key, windowMs);
      return { count, remainingMs: windowMs };
    }

    const ttl = await this.redis.pttl(key);
    if (ttl < 0) {
      // The expiry of this window was never set; start it now.
      await this.redis.pexpire(key, windowMs);
      return { count, remainingMs: windowMs };
    }
    return { count, remainingMs: ttl };
  }

  private incrementLocal(key: string, windowMs: number): WindowCount {
    const now = Date.now();
    if (this.localWindows.size > LOCAL_PRUNE_THRESHOLD) {
      this.pruneLocal(now, windowMs);
    }

    const window = this.localWindows.get(key);
    if (!window || now - window.windowStart >= windowMs) {
      this.localWindows.set(key, { windowStart: now, count: 1 });
      return { count: 1, remainingMs: windowMs };
    }

    window.count += 1;
    return {
      count: window.count,
      remainingMs: window.windowStart + windowMs - now,
    };
  }

  private pruneLocal(now: number, windowMs: number): void {
    for (const [key, window] of this.localWindows) {
      if (now - window.windowStart >= windowMs) {
        this.localWindows.delete(key);
      }
    }
  }
}
