import type { Redis, RedisOptions } from "ioredis";
import RedisClient from "ioredis";
import { StructuredLogger } from "../../common/logging/structured-logger";
import type { RedisConfig } from "../../config/environment";

let cachedClient: Redis | null = null;
let cachedConfigKey: string | null = null;
const trackedClients = new Set<Redis>();

function serializeConfigKey(config: RedisConfig): string {
  return JSON.stringify({
    url: config.url,
    host: config.host,
    port: config.port,
    db: config.db,
    mock: config.useMockRedis,
  });
}

function buildRedisOptions(
  config: RedisConfig,
  connectionName: string,
): RedisOptions {
  const options: RedisOptions = {
    lazyConnect: false,
    maxRetriesPerRequest: 2,
    connectTimeout: 10_000,
    enableAutoPipelining: false,
    connectionName,
    db: config.db,
  };

  if (!config.url) {
    options.host = config.host;
    options.port = config.port;
  }

  if (config.password) {
    options.password = config.password;
  }

  return options;
}

export function maskRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const redactedAuth = parsed.username || parsed.password ? "***@" : "";
    return `${parsed.protocol}//${redactedAuth}${parsed.hostname}:${parsed.port || 6379}${parsed.pathname}`;
  } catch (error) {
    void error;
    return "masked";
  }
}

/**
 * Builds a new client. Blocking stream reads need a connection of their own,
 * so partition workers call this instead of sharing {@link getRedisClient}.
 */
export function createRedisClient(
  config: RedisConfig,
  connectionName: string,
): Redis {
  const options = buildRedisOptions(config, connectionName);
  const RedisLibrary: typeof RedisClient = config.useMockRedis
    ? // eslint-disable-next-line @typescript-eslint/no-var-requires
      (require("ioredis-mock") as unknown as typeof RedisClient)
    : RedisClient;

  const client = config.url
    ? new RedisLibrary(config.url, options)
    : new RedisLibrary(options);

  client.on("error", (error: unknown) => {
    StructuredLogger.warn("redis.connection", {
      status: "error",
      data: {
        connectionName,
        target: config.url ? maskRedisUrl(config.url) : config.host,
      },
      error: {
        code: "redis.connection_error",
        message: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
    });
  });

  trackedClients.add(client);
  return client;
}

export function getRedisClient(config: RedisConfig): Redis {
  const key = serializeConfigKey(config);
  if (cachedClient && cachedConfigKey === key) {
    return cachedClient;
  }

  cachedClient = createRedisClient(config, "delivery-router:shared");
  cachedConfigKey = key;

  StructuredLogger.info("redis.client", {
    status: "ready",
    data: {
      target: config.url ? maskRedisUrl(config.url) : config.host,
      mock: config.useMockRedis,
    },
  });

  return cachedClient;
}

export function releaseRedisClient(client: Redis): void {
  trackedClients.delete(client);
  if (client === cachedClient) {
    cachedClient = null;
    cachedConfigKey = null;
  }
  client.disconnect();
}

export function clearRedisClientsForTests(): void {
  for (const client of trackedClients) {
    client.disconnect();
  }
  trackedClients.clear();
  cachedClient = null;
  cachedConfigKey = null;
}

/**
 * Nest injection token for the shared command connection.
 */
export const REDIS_CLIENT = Symbol("REDIS_CLIENT");
