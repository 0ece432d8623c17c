import { randomUUID } from "crypto";
import { hostname } from "os";
import { clearRedisClientsForTests } from "../infra/redis/redis-manager";

export type EnvironmentMode = "development" | "test" | "production";
export type LogLevel = "error" | "warn" | "info" | "debug";

const DEFAULT_CORS_ORIGIN = "http://localhost:3000";
const CONFIG_VERSION = "2026-10-01";
const ENVIRONMENT_MODES: readonly EnvironmentMode[] = [
  "development",
  "test",
  "production",
];
const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export interface RedisConfig {
  readonly url?: string;
  readonly host: string;
  readonly port: number;
  readonly password?: string;
  readonly db: number;
  readonly useMockRedis: boolean;
}

export interface RetryPolicyConfig {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly multiplier: number;
  readonly maxDelayMs: number;
}

export interface EnvironmentConfig {
  readonly service: {
    readonly nodeEnv: EnvironmentMode;
    readonly port: number;
    readonly logLevel: LogLevel;
    readonly configVersion: string;
    readonly configCorrelationId: string;
    readonly instanceId: string;
    readonly corsOrigins: readonly string[];
  };
  readonly redis: RedisConfig;
  readonly streams: {
    readonly partitions: number;
    readonly batchSize: number;
    readonly blockMs: number;
    readonly errorBackoffMs: number;
    readonly assignedPartitions: readonly number[];
    readonly workersEnabled: boolean;
  };
  readonly delivery: RetryPolicyConfig & {
    readonly adapterTimeoutMs: number;
    readonly fanoutConcurrency: number;
    readonly dedupTtlSeconds: number;
  };
  readonly identity: {
    readonly baseUrl: string;
    readonly timeoutMs: number;
    readonly maxRetries: number;
    readonly retryBackoffMs: number;
  };
  readonly connectors: {
    readonly whatsappUrl: string;
    readonly telegramUrl: string;
    readonly instagramUrl: string;
    readonly mockMode: boolean;
    readonly mockReceiptDelayMs: number;
  };
  readonly rateLimit: {
    readonly enabled: boolean;
    readonly userLimit: number;
    readonly globalLimit: number;
    readonly windowMs: number;
  };
  readonly deadLetter: {
    readonly fallbackPath: string;
  };
}

class EnvValidationError extends Error {
  constructor(readonly reasons: readonly string[]) {
    super(`Environment validation failed: ${reasons.join("; ")}`);
    this.name = "EnvValidationError";
  }
}

const TRUE_VALUES = new Set(["1", "true", "t", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["0", "false", "f", "no", "n", "off"]);

let cachedConfig: EnvironmentConfig | null = null;
let resolvedConfigLogged = false;

function isEnvironmentMode(value: string): value is EnvironmentMode {
  return ENVIRONMENT_MODES.some((mode) => mode === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function normalizeKeyList(
  raw: string | undefined,
  fallback: string[],
): string[] {
  const source = raw ?? fallback.join(",");

  if (!source) {
    return [];
  }

  const seen = new Set<string>();

  return source
    .split(/[,|]/)
    .map((entry) => entry.trim())
    .filter(Boolean)
    .filter((entry) => {
      if (seen.has(entry)) {
        return false;
      }
      seen.add(entry);
      return true;
    });
}

function parseBoolean(
  value: string | undefined,
  defaultValue: boolean,
  key: string,
  errors: string[],
): boolean {
  if (value === undefined || value === "") {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (TRUE_VALUES.has(normalized)) {
    return true;
  }

  if (FALSE_VALUES.has(normalized)) {
    return false;
  }

  errors.push(`${key} must be a boolean-like value (true/false)`);
  return defaultValue;
}

function parseNumber(
  value: string | undefined,
  key: string,
  errors: string[],
  options: {
    min?: number;
    max?: number;
    defaultValue: number;
    integer?: boolean;
  },
): number {
  if (value === undefined || value === "") {
    return options.defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed)) {
    errors.push(`${key} must be a valid number`);
    return options.defaultValue;
  }

  if (options.integer && !Number.isInteger(parsed)) {
    errors.push(`${key} must be an integer`);
    return options.defaultValue;
  }

  if (options.min !== undefined && parsed < options.min) {
    errors.push(`${key} must be >= ${options.min}`);
  }

  if (options.max !== undefined && parsed > options.max) {
    errors.push(`${key} must be <= ${options.max}`);
  }

  return parsed;
}

function parsePartitionList(
  raw: string | undefined,
  partitions: number,
  errors: string[],
): number[] {
  const entries = normalizeKeyList(raw, []);
  if (entries.length === 0) {
    return Array.from({ length: partitions }, (_, index) => index);
  }

  const assigned: number[] = [];
  for (const entry of entries) {
    const range = /^(\d+)-(\d+)$/.exec(entry);
    if (range) {
      const start = Number(range[1]);
      const end = Number(range[2]);
      for (let partition = start; partition <= end; partition += 1) {
        assigned.push(partition);
      }
      continue;
    }
    if (!/^\d+$/.test(entry)) {
      errors.push(`ASSIGNED_PARTITIONS entry "${entry}" is not a partition`);
      continue;
    }
    assigned.push(Number(entry));
  }

  const outOfRange = assigned.filter((partition) => partition >= partitions);
  if (outOfRange.length > 0) {
    errors.push(
      `ASSIGNED_PARTITIONS references partitions outside 0-${partitions - 1}: ${outOfRange.join(", ")}`,
    );
  }

  return Array.from(new Set(assigned)).sort((a, b) => a - b);
}

function parseUrl(
  value: string | undefined,
  key: string,
  fallback: string,
  errors: string[],
): string {
  const candidate = value?.trim() || fallback;
  try {
    return new URL(candidate).toString().replace(/\/$/, "");
  } catch {
    errors.push(`${key} must be an absolute URL (received: ${candidate})`);
    return fallback;
  }
}

function maskSecret(value: string | undefined): string | undefined {
  if (!value) {
    return value;
  }
  if (value.length <= 6) {
    return "***";
  }
  return `${value.slice(0, 3)}***${value.slice(-2)}`;
}

export function loadEnvironment(
  overrides?: Record<string, string | undefined>,
): EnvironmentConfig {
  if (!overrides && cachedConfig) {
    return cachedConfig;
  }

  const source: Record<string, string | undefined> = {
    ...process.env,
    ...overrides,
  };
  const errors: string[] = [];

  const nodeEnvRaw = source.NODE_ENV?.trim().toLowerCase();
  const nodeEnv: EnvironmentMode = ((): EnvironmentMode => {
    if (!nodeEnvRaw) {
      return "development";
    }
    if (isEnvironmentMode(nodeEnvRaw)) {
      return nodeEnvRaw;
    }
    errors.push(
      `NODE_ENV must be development|test|production (received: ${source.NODE_ENV})`,
    );
    return "development";
  })();

  const port = parseNumber(source.PORT, "PORT", errors, {
    min: 1024,
    max: 65535,
    integer: true,
    defaultValue: 3001,
  });

  const logLevelRaw = source.LOG_LEVEL?.trim().toLowerCase();
  const logLevel: LogLevel = ((): LogLevel => {
    if (!logLevelRaw) {
      return "info";
    }
    if (isLogLevel(logLevelRaw)) {
      return logLevelRaw;
    }
    errors.push(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (received: ${source.LOG_LEVEL})`,
    );
    return "info";
  })();

  const instanceId =
    source.INSTANCE_ID?.trim() || source.HOSTNAME?.trim() || hostname();

  const redisUrl = source.REDIS_URL?.trim() || undefined;
  const redisHost = source.REDIS_HOST?.trim() || "localhost";
  const redisPort = parseNumber(source.REDIS_PORT, "REDIS_PORT", errors, {
    min: 1,
    max: 65535,
    integer: true,
    defaultValue: 6379,
  });
  const redisPassword = source.REDIS_PASSWORD?.trim() || undefined;
  const redisDb = parseNumber(source.REDIS_DB, "REDIS_DB", errors, {
    min: 0,
    max: 15,
    integer: true,
    defaultValue: 0,
  });
  const useMockRedis = parseBoolean(
    source.USE_MOCK_REDIS,
    nodeEnv === "test",
    "USE_MOCK_REDIS",
    errors,
  );

  const partitions = parseNumber(
    source.STREAM_PARTITIONS,
    "STREAM_PARTITIONS",
    errors,
    { min: 1, max: 1024, integer: true, defaultValue: 16 },
  );
  const batchSize = parseNumber(
    source.STREAM_BATCH_SIZE,
    "STREAM_BATCH_SIZE",
    errors,
    { min: 1, max: 500, integer: true, defaultValue: 10 },
  );
  const blockMs = parseNumber(source.STREAM_BLOCK_MS, "STREAM_BLOCK_MS", errors, {
    min: 100,
    max: 60_000,
    integer: true,
    defaultValue: 2000,
  });
  const errorBackoffMs = parseNumber(
    source.STREAM_ERROR_BACKOFF_MS,
    "STREAM_ERROR_BACKOFF_MS",
    errors,
    { min: 0, max: 60_000, integer: true, defaultValue: 1000 },
  );
  const assignedPartitions = parsePartitionList(
    source.ASSIGNED_PARTITIONS,
    partitions,
    errors,
  );
  const workersEnabled = parseBoolean(
    source.WORKERS_ENABLED,
    nodeEnv !== "test",
    "WORKERS_ENABLED",
    errors,
  );

  const maxAttempts = parseNumber(
    source.DELIVERY_MAX_ATTEMPTS,
    "DELIVERY_MAX_ATTEMPTS",
    errors,
    { min: 1, max: 10, integer: true, defaultValue: 3 },
  );
  const initialDelayMs = parseNumber(
    source.DELIVERY_INITIAL_DELAY_MS,
    "DELIVERY_INITIAL_DELAY_MS",
    errors,
    { min: 0, integer: true, defaultValue: 1000 },
  );
  const multiplier = parseNumber(
    source.DELIVERY_BACKOFF_MULTIPLIER,
    "DELIVERY_BACKOFF_MULTIPLIER",
    errors,
    { min: 1, max: 10, defaultValue: 2 },
  );
  const maxDelayMs = parseNumber(
    source.DELIVERY_MAX_DELAY_MS,
    "DELIVERY_MAX_DELAY_MS",
    errors,
    { min: initialDelayMs, integer: true, defaultValue: 10_000 },
  );
  const adapterTimeoutMs = parseNumber(
    source.ADAPTER_TIMEOUT_MS,
    "ADAPTER_TIMEOUT_MS",
    errors,
    { min: 100, max: 60_000, integer: true, defaultValue: 5000 },
  );
  const fanoutConcurrency = parseNumber(
    source.FANOUT_CONCURRENCY,
    "FANOUT_CONCURRENCY",
    errors,
    { min: 1, max: 64, integer: true, defaultValue: 4 },
  );
  const dedupTtlSeconds = parseNumber(
    source.DEDUP_TTL_SECONDS,
    "DEDUP_TTL_SECONDS",
    errors,
    { min: 60, integer: true, defaultValue: 7 * 24 * 60 * 60 },
  );

  const identityBaseUrl = parseUrl(
    source.USER_SERVICE_URL,
    "USER_SERVICE_URL",
    "http://localhost:8083",
    errors,
  );
  const identityTimeoutMs = parseNumber(
    source.IDENTITY_TIMEOUT_MS,
    "IDENTITY_TIMEOUT_MS",
    errors,
    { min: 100, max: 60_000, integer: true, defaultValue: 10_000 },
  );
  const identityMaxRetries = parseNumber(
    source.IDENTITY_MAX_RETRIES,
    "IDENTITY_MAX_RETRIES",
    errors,
    { min: 0, max: 5, integer: true, defaultValue: 2 },
  );
  const identityRetryBackoffMs = parseNumber(
    source.IDENTITY_RETRY_BACKOFF_MS,
    "IDENTITY_RETRY_BACKOFF_MS",
    errors,
    { min: 0, integer: true, defaultValue: 500 },
  );

  const whatsappUrl = parseUrl(
    source.WHATSAPP_CONNECTOR_URL,
    "WHATSAPP_CONNECTOR_URL",
    "http://localhost:8091",
    errors,
  );
  const telegramUrl = parseUrl(
    source.TELEGRAM_CONNECTOR_URL,
    "TELEGRAM_CONNECTOR_URL",
    "http://localhost:8092",
    errors,
  );
  const instagramUrl = parseUrl(
    source.INSTAGRAM_CONNECTOR_URL,
    "INSTAGRAM_CONNECTOR_URL",
    "http://localhost:8093",
    errors,
  );
  const connectorMockMode = parseBoolean(
    source.CONNECTOR_MOCK_MODE,
    false,
    "CONNECTOR_MOCK_MODE",
    errors,
  );
  const mockReceiptDelayMs = parseNumber(
    source.MOCK_RECEIPT_DELAY_MS,
    "MOCK_RECEIPT_DELAY_MS",
    errors,
    { min: 0, max: 60_000, integer: true, defaultValue: 2000 },
  );

  const rateLimitEnabled = parseBoolean(
    source.RATE_LIMIT_ENABLED,
    true,
    "RATE_LIMIT_ENABLED",
    errors,
  );
  const userLimit = parseNumber(
    source.RATE_LIMIT_USER_PER_WINDOW,
    "RATE_LIMIT_USER_PER_WINDOW",
    errors,
    { min: 1, integer: true, defaultValue: 100 },
  );
  const globalLimit = parseNumber(
    source.RATE_LIMIT_GLOBAL_PER_WINDOW,
    "RATE_LIMIT_GLOBAL_PER_WINDOW",
    errors,
    { min: 1, integer: true, defaultValue: 1000 },
  );
  const windowMs = parseNumber(
    source.RATE_LIMIT_WINDOW_MS,
    "RATE_LIMIT_WINDOW_MS",
    errors,
    { min: 1000, integer: true, defaultValue: 60_000 },
  );

  if (globalLimit < userLimit) {
    errors.push(
      "RATE_LIMIT_GLOBAL_PER_WINDOW cannot be lower than RATE_LIMIT_USER_PER_WINDOW",
    );
  }

  const fallbackPath =
    source.DLQ_FALLBACK_PATH?.trim() || "./var/dead-letter-fallback.log";

  if (nodeEnv === "production") {
    const forbiddenFlags: string[] = [];
    if (useMockRedis) forbiddenFlags.push("USE_MOCK_REDIS");
    if (connectorMockMode) forbiddenFlags.push("CONNECTOR_MOCK_MODE");

    if (forbiddenFlags.length > 0) {
      errors.push(
        `Forbidden flags ${forbiddenFlags.join(", ")} cannot be enabled in production`,
      );
    }
  }

  const corsOrigins = normalizeKeyList(source.CORS_ORIGINS, [
    DEFAULT_CORS_ORIGIN,
  ]);

  if (errors.length > 0) {
    throw new EnvValidationError(errors);
  }

  const config: EnvironmentConfig = {
    service: {
      nodeEnv,
      port,
      logLevel,
      configVersion: CONFIG_VERSION,
      configCorrelationId: randomUUID(),
      instanceId,
      corsOrigins,
    },
    redis: {
      url: redisUrl,
      host: redisHost,
      port: redisPort,
      password: redisPassword,
      db: redisDb,
      useMockRedis,
    },
    streams: {
      partitions,
      batchSize,
      blockMs,
      errorBackoffMs,
      assignedPartitions,
      workersEnabled,
    },
    delivery: {
      maxAttempts,
      initialDelayMs,
      multiplier,
      maxDelayMs,
      adapterTimeoutMs,
      fanoutConcurrency,
      dedupTtlSeconds,
    },
    identity: {
      baseUrl: identityBaseUrl,
      timeoutMs: identityTimeoutMs,
      maxRetries: identityMaxRetries,
      retryBackoffMs: identityRetryBackoffMs,
    },
    connectors: {
      whatsappUrl,
      telegramUrl,
      instagramUrl,
      mockMode: connectorMockMode,
      mockReceiptDelayMs,
    },
    rateLimit: {
      enabled: rateLimitEnabled,
      userLimit,
      globalLimit,
      windowMs,
    },
    deadLetter: {
      fallbackPath,
    },
  };

  if (!overrides) {
    cachedConfig = config;
  }
  emitResolvedConfigLog(config);

  return config;
}

export function getEnv(): EnvironmentConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvironment();
  }
  return cachedConfig;
}

export function resetEnvironmentCacheForTests(): void {
  cachedConfig = null;
  resolvedConfigLogged = false;
  clearRedisClientsForTests();
}

function emitResolvedConfigLog(config: EnvironmentConfig): void {
  if (resolvedConfigLogged || config.service.nodeEnv === "test") {
    return;
  }

  const payload = {
    event: "config.resolved",
    version: config.service.configVersion,
    correlationId: config.service.configCorrelationId,
    timestamp: new Date().toISOString(),
    service: config.service,
    redis: {
      url: maskSecret(config.redis.url),
      host: config.redis.host,
      port: config.redis.port,
      db: config.redis.db,
      useMockRedis: config.redis.useMockRedis,
    },
    streams: config.streams,
    delivery: config.delivery,
    identity: config.identity,
    connectors: config.connectors,
    rateLimit: config.rateLimit,
    deadLetter: config.deadLetter,
  };

  console.info(JSON.stringify(payload));
  resolvedConfigLogged = true;
}

export { EnvValidationError };
