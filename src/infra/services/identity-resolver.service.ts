import type { EnvironmentConfig } from "../../config/environment";
import {
  IdentityResolverUnavailableError,
  NoLinkedIdentityError,
  TransientDeliveryError,
  describeError,
} from "../../common/errors/delivery.errors";
import { StructuredLogger } from "../../common/logging/structured-logger";
import { TelemetryMetrics } from "../../observability/metrics-registry";
import {
  ExternalIdentity,
  isExternalChannel,
} from "../queue/message-event.interface";
import { RetryExecutor, Sleep, defaultSleep } from "./retry-executor";

type IdentityConfig = EnvironmentConfig["identity"];

const INTERNAL_REFERENCE_PATTERN =
  /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

interface UserDirectoryEntry {
  readonly id: string;
  readonly displayName?: string;
  readonly externalIdentities: readonly unknown[];
}

function isUserDirectoryEntry(value: unknown): value is UserDirectoryEntry {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "id" in value &&
    typeof value.id === "string" &&
    "externalIdentities" in value &&
    Array.isArray(value.externalIdentities)
  );
}

function toIdentity(raw: unknown): ExternalIdentity | null {
  if (typeof raw !== "object" || raw === null) {
    return null;
  }
  if (!("platform" in raw) || !("platformUserId" in raw)) {
    return null;
  }
  const platform =
    typeof raw.platform === "string" ? raw.platform.trim().toUpperCase() : "";
  const platformUserId = raw.platformUserId;
  if (!isExternalChannel(platform) || typeof platformUserId !== "string") {
    return null;
  }
  return {
    platform,
    platformUserId,
    verified: "verified" in raw && raw.verified === true,
  };
}

/**
 * Maps recipient ids onto external channel identities through the user
 * directory (`GET /users/{id}`).
 *
 * A UUID is an internal user reference and is looked up; anything else is a
 * platform id that callers address directly.
 */
export class IdentityResolverService {
  private readonly retry: RetryExecutor;

  constructor(
    private readonly config: IdentityConfig,
    sleep: Sleep = defaultSleep,
  ) {
    this.retry = new RetryExecutor(
      {
        maxAttempts: config.maxRetries + 1,
        initialDelayMs: config.retryBackoffMs,
        multiplier: 2,
        maxDelayMs: Math.max(config.retryBackoffMs * 4, config.retryBackoffMs),
      },
      sleep,
    );
  }

  isInternalReference(recipientId: string): boolean {
    return INTERNAL_REFERENCE_PATTERN.test(recipientId);
  }

  /**
   * Throws {@link NoLinkedIdentityError} for unknown users and users without
   * a usable identity, {@link IdentityResolverUnavailableError} once the
   * directory stays unreachable through every retry.
   */
  async resolve(
    userId: string,
    messageId?: string,
  ): Promise<ExternalIdentity[]> {
    const outcome = await this.retry.execute(
      () => this.fetchUser(userId),
      { operation: "identity_lookup", messageId },
    );

    if (!outcome.ok) {
      if (outcome.error instanceof NoLinkedIdentityError) {
        TelemetryMetrics.recordIdentityLookup("not_found");
        throw outcome.error;
      }
      TelemetryMetrics.recordIdentityLookup("unavailable");
      throw new IdentityResolverUnavailableError(
        userId,
        describeError(outcome.error),
      );
    }

    const user = outcome.value;
    const identities: ExternalIdentity[] = [];
    for (const raw of user.externalIdentities) {
      const identity = toIdentity(raw);
      if (identity) {
        identities.push(identity);
      } else {
        StructuredLogger.warn("identity.skipped", {
          messageId,
          data: { userId, reason: "unsupported platform or malformed entry" },
        });
      }
    }

    if (identities.length === 0) {
      TelemetryMetrics.recordIdentityLookup("empty");
      throw new NoLinkedIdentityError(userId, "empty");
    }

    TelemetryMetrics.recordIdentityLookup("resolved");
    return identities;
  }

  private async fetchUser(userId: string): Promise<UserDirectoryEntry> {
    const url = `${this.config.baseUrl}/users/${encodeURIComponent(userId)}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      const timedOut =
        error instanceof Error &&
        (error.name === "TimeoutError" || error.name === "AbortError");
      throw new TransientDeliveryError(
        timedOut ? "timeout" : "connection",
        "user-directory",
        describeError(error),
      );
    }

    if (response.status === 404) {
      throw new NoLinkedIdentityError(userId, "not_found");
    }

    if (!response.ok) {
      throw new TransientDeliveryError(
        "server_error",
        "user-directory",
        `HTTP ${response.status}`,
      );
    }

    const body: unknown = await response.json();
    if (!isUserDirectoryEntry(body)) {
      throw new NoLinkedIdentityError(userId, "empty");
    }
    return body;
  }
}
