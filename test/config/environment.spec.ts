import {
  EnvValidationError,
  getEnv,
  loadEnvironment,
} from "../../src/config/environment";

function validationReasons(overrides: Record<string, string>): readonly string[] {
  try {
    loadEnvironment(overrides);
  } catch (error) {
    if (error instanceof EnvValidationError) {
      return error.reasons;
    }
    throw error;
  }
  return [];
}

describe("environment", () => {
  it("applies delivery defaults", () => {
    const env = loadEnvironment({
      DELIVERY_MAX_ATTEMPTS: undefined,
      DELIVERY_INITIAL_DELAY_MS: undefined,
      DELIVERY_BACKOFF_MULTIPLIER: undefined,
      DELIVERY_MAX_DELAY_MS: undefined,
      RATE_LIMIT_USER_PER_WINDOW: undefined,
      RATE_LIMIT_WINDOW_MS: undefined,
    });

    expect(env.delivery).toMatchObject({
      maxAttempts: 3,
      initialDelayMs: 1000,
      multiplier: 2,
      maxDelayMs: 10_000,
    });
    expect(env.rateLimit.userLimit).toBe(100);
    expect(env.rateLimit.windowMs).toBe(60_000);
  });

  it("uses the mock Redis and keeps workers off under test", () => {
    const env = loadEnvironment({ USE_MOCK_REDIS: undefined, WORKERS_ENABLED: undefined });

    expect(env.service.nodeEnv).toBe("test");
    expect(env.redis.useMockRedis).toBe(true);
    expect(env.streams.workersEnabled).toBe(false);
  });

  it("assigns every partition when no subset is configured", () => {
    const env = loadEnvironment({ STREAM_PARTITIONS: "4", ASSIGNED_PARTITIONS: "" });

    expect(env.streams.assignedPartitions).toEqual([0, 1, 2, 3]);
  });

  it("expands ranges in ASSIGNED_PARTITIONS", () => {
    const env = loadEnvironment({
      STREAM_PARTITIONS: "8",
      ASSIGNED_PARTITIONS: "5,0-2,3,2",
    });

    expect(env.streams.assignedPartitions).toEqual([0, 1, 2, 3, 5]);
  });

  it("rejects partitions outside the configured count", () => {
    expect(
      validationReasons({ STREAM_PARTITIONS: "4", ASSIGNED_PARTITIONS: "1,9" }),
    ).toContain("ASSIGNED_PARTITIONS references partitions outside 0-3: 9");
  });

  it("rejects malformed numbers", () => {
    expect(validationReasons({ DELIVERY_MAX_ATTEMPTS: "three" })).toContain(
      "DELIVERY_MAX_ATTEMPTS must be a valid number",
    );
    expect(validationReasons({ FANOUT_CONCURRENCY: "0" })).toContain(
      "FANOUT_CONCURRENCY must be >= 1",
    );
  });

  it("rejects a global limit below the per-user limit", () => {
    expect(
      validationReasons({
        RATE_LIMIT_USER_PER_WINDOW: "100",
        RATE_LIMIT_GLOBAL_PER_WINDOW: "50",
      }),
    ).toContain(
      "RATE_LIMIT_GLOBAL_PER_WINDOW cannot be lower than RATE_LIMIT_USER_PER_WINDOW",
    );
  });

  it("forbids mock flags in production", () => {
    expect(
      validationReasons({
        NODE_ENV: "production",
        USE_MOCK_REDIS: "true",
        CONNECTOR_MOCK_MODE: "true",
      }),
    ).toContain(
      "Forbidden flags USE_MOCK_REDIS, CONNECTOR_MOCK_MODE cannot be enabled in production",
    );
  });

  it("normalizes service URLs", () => {
    const env = loadEnvironment({ USER_SERVICE_URL: "http://users.internal:8083/" });

    expect(env.identity.baseUrl).toBe("http://users.internal:8083");
    expect(validationReasons({ USER_SERVICE_URL: "users" })).toContain(
      "USER_SERVICE_URL must be an absolute URL (received: users)",
    );
  });

  it("reads CORS_ORIGINS and falls back to the local dev origin", () => {
    expect(
      loadEnvironment({
        CORS_ORIGINS: "https://ops.example.test, https://admin.example.test",
      }).service.corsOrigins,
    ).toEqual(["https://ops.example.test", "https://admin.example.test"]);
    expect(loadEnvironment({ CORS_ORIGINS: undefined }).service.corsOrigins).toEqual([
      "http://localhost:3000",
    ]);
  });

  it("caches the process configuration", () => {
    expect(getEnv()).toBe(getEnv());
  });
});
