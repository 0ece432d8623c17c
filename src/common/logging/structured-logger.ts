import { randomUUID } from "crypto";
import { getEnv, type LogLevel as ConfiguredLevel } from "../../config/environment";

type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

type SanitizedData = Record<string, unknown>;

interface LogError {
  readonly code?: string;
  readonly message: string;
  readonly stack?: string;
}

export interface LogOptions {
  readonly requestId?: string;
  readonly correlationId?: string;
  readonly messageId?: string;
  readonly conversationId?: string;
  readonly endpoint?: string;
  readonly durationMs?: number;
  readonly status?: string | number;
  readonly data?: Record<string, unknown>;
  readonly error?: LogError;
}

const SERVICE_NAME = "delivery-router";
const LOG_SCHEMA_VERSION = "2026-10-01";
const MAX_STRING_LENGTH = 256;
const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};
const CONFIGURED_RANK: Record<ConfiguredLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};
const SAFE_DATA_KEYS = new Set([
  "ip",
  "method",
  "url",
  "statusCode",
  "socketId",
  "sessionId",
  "sessionCount",
  "userId",
  "reason",
  "detailCode",
  "attempt",
  "attemptsMade",
  "maxAttempts",
  "delayMs",
  "operation",
  "channel",
  "platform",
  "partition",
  "streamId",
  "topic",
  "consumer",
  "recipientCount",
  "targetCount",
  "succeeded",
  "failed",
  "fromStatus",
  "toStatus",
  "source",
  "path",
  "scope",
  "subject",
  "limit",
  "retryAfterSeconds",
  "requiresManualIntervention",
  "connectionName",
  "target",
  "mock",
  "outcome",
  "durationMs",
  "status",
]);
const SENSITIVE_KEY_MARKERS = [
  "token",
  "secret",
  "authorization",
  "password",
  "cookie",
  "content",
];
const SAMPLED_EVENTS = new Map<string, number>([
  ["http.request", 0.05],
  ["http.response", 0.05],
  ["live.connection", 0.2],
]);

function sanitizeString(value: string): string {
  if (value.length <= MAX_STRING_LENGTH) {
    return value;
  }
  return `${value.substring(0, MAX_STRING_LENGTH)}…`;
}

function sanitizeData(
  data: Record<string, unknown> | undefined,
): SanitizedData | undefined {
  if (!data) {
    return undefined;
  }

  const sanitizedEntries: [string, unknown][] = [];

  for (const [key, rawValue] of Object.entries(data)) {
    if (rawValue === undefined || rawValue === null) {
      continue;
    }

    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEY_MARKERS.some((marker) => lowerKey.includes(marker))) {
      sanitizedEntries.push([key, "[REDACTED]"]);
      continue;
    }

    if (!SAFE_DATA_KEYS.has(key)) {
      continue;
    }

    if (typeof rawValue === "string") {
      sanitizedEntries.push([key, sanitizeString(rawValue)]);
      continue;
    }

    if (Array.isArray(rawValue)) {
      const truncated = rawValue
        .slice(0, 25)
        .map((item) =>
          typeof item === "string" ? sanitizeString(item) : item,
        );
      sanitizedEntries.push([key, truncated]);
      continue;
    }

    if (typeof rawValue === "number" || typeof rawValue === "boolean") {
      sanitizedEntries.push([key, rawValue]);
      continue;
    }
  }

  if (sanitizedEntries.length === 0) {
    return undefined;
  }

  return Object.fromEntries(sanitizedEntries);
}

function sanitizeError(
  error: LogError | undefined,
  includeStack: boolean,
): LogError | undefined {
  if (!error) {
    return undefined;
  }

  return {
    code: error.code,
    message: sanitizeString(error.message),
    stack:
      includeStack && error.stack ? sanitizeString(error.stack) : undefined,
  };
}

function stripUndefined(
  entry: Record<string, unknown>,
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(entry).filter(([, value]) => value !== undefined),
  );
}

function shouldSample(
  level: LogLevel,
  event: string,
  options: LogOptions,
): boolean {
  if (level !== "INFO") {
    return false;
  }

  if (
    typeof options.status === "string" &&
    options.status !== "accepted" &&
    options.status !== "success"
  ) {
    return false;
  }

  const rate = SAMPLED_EVENTS.get(event);
  if (!rate) {
    return false;
  }

  return Math.random() > rate;
}

export function toLogError(error: unknown, code?: string): LogError {
  if (error instanceof Error) {
    return { code, message: error.message, stack: error.stack };
  }
  return { code, message: String(error) };
}

export class StructuredLogger {
  static generateCorrelationId(): string {
    return randomUUID();
  }

  static debug(event: string, options: LogOptions = {}): void {
    this.log("DEBUG", event, options);
  }

  static info(event: string, options: LogOptions = {}): void {
    this.log("INFO", event, options);
  }

  static warn(event: string, options: LogOptions = {}): void {
    this.log("WARN", event, options);
  }

  static error(event: string, options: LogOptions = {}): void {
    this.log("ERROR", event, options);
  }

  private static log(
    level: LogLevel,
    event: string,
    options: LogOptions,
  ): void {
    const env = getEnv();
    if (LEVEL_RANK[level] < CONFIGURED_RANK[env.service.logLevel]) {
      return;
    }

    if (shouldSample(level, event, options)) {
      return;
    }

    const includeStack = env.service.nodeEnv !== "production";

    const entry = stripUndefined({
      ts: new Date().toISOString(),
      level,
      schemaVersion: LOG_SCHEMA_VERSION,
      service: SERVICE_NAME,
      env: env.service.nodeEnv,
      instanceId: env.service.instanceId,
      event,
      requestId: options.requestId,
      correlationId: options.correlationId ?? env.service.configCorrelationId,
      messageId: options.messageId,
      conversationId: options.conversationId,
      endpoint: options.endpoint,
      durationMs: options.durationMs,
      status: options.status,
      data: sanitizeData(options.data),
      error: sanitizeError(options.error, includeStack),
    });

    const serialized = JSON.stringify(entry);

    switch (level) {
      case "ERROR":
        console.error(serialized);
        break;
      case "WARN":
        console.warn(serialized);
        break;
      default:
        console.log(serialized);
        break;
    }
  }
}
