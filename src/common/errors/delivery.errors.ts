/**
 * Error hierarchy for the delivery pipeline.
 *
 * `retryable` drives the retry executor: anything marked false aborts the
 * attempt loop at once and goes straight to dead-letter. `statusCode` is only
 * meaningful for the few errors that can reach an HTTP caller (ingress
 * validation, rate limiting, status lookups).
 */

export enum DeliveryErrorCode {
  // Validation (400)
  VALIDATION_FAILED = "VALIDATION_FAILED",
  UNKNOWN_CHANNEL = "UNKNOWN_CHANNEL",

  // Resolution
  NO_LINKED_IDENTITY = "NO_LINKED_IDENTITY",
  IDENTITY_RESOLVER_UNAVAILABLE = "IDENTITY_RESOLVER_UNAVAILABLE",

  // Channel delivery
  TRANSIENT_DELIVERY_FAILURE = "TRANSIENT_DELIVERY_FAILURE",
  DELIVERY_REJECTED = "DELIVERY_REJECTED",

  // Status
  MESSAGE_NOT_FOUND = "MESSAGE_NOT_FOUND",

  // Rate limiting (429)
  RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",

  // Internal (500)
  ENQUEUE_FAILED = "ENQUEUE_FAILED",
  DEAD_LETTER_WRITE_FAILED = "DEAD_LETTER_WRITE_FAILED",
}

export class DeliveryError extends Error {
  constructor(
    public readonly code: DeliveryErrorCode,
    public readonly statusCode: number,
    public readonly message: string,
    public readonly retryable: boolean,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "DeliveryError";

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Short, stable text recorded as the dead-letter `reason`.
   */
  get deadLetterReason(): string {
    return this.message;
  }

  toResponse() {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }

  getTelemetryLabel(): string {
    return this.code.toLowerCase();
  }
}

export class ValidationFailedError extends DeliveryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(DeliveryErrorCode.VALIDATION_FAILED, 400, message, false, details);
    this.name = "ValidationFailedError";
  }

  get deadLetterReason(): string {
    return `validation failed: ${this.message}`;
  }
}

export class UnknownChannelError extends DeliveryError {
  constructor(channel: string) {
    super(
      DeliveryErrorCode.UNKNOWN_CHANNEL,
      400,
      `Unknown channel: ${channel}`,
      false,
      { channel },
    );
    this.name = "UnknownChannelError";
  }

  get deadLetterReason(): string {
    return "unknown channel";
  }
}

export class NoLinkedIdentityError extends DeliveryError {
  constructor(recipientId: string, detail: "not_found" | "empty") {
    super(
      DeliveryErrorCode.NO_LINKED_IDENTITY,
      404,
      detail === "not_found"
        ? `User ${recipientId} is unknown to the user directory`
        : `User ${recipientId} has no linked external identity`,
      false,
      { recipientId, detail },
    );
    this.name = "NoLinkedIdentityError";
  }

  get deadLetterReason(): string {
    return "no linked identity";
  }
}

export class IdentityResolverUnavailableError extends DeliveryError {
  constructor(recipientId: string, cause: string) {
    super(
      DeliveryErrorCode.IDENTITY_RESOLVER_UNAVAILABLE,
      503,
      `Identity resolver unavailable for ${recipientId}: ${cause}`,
      true,
      { recipientId, cause },
    );
    this.name = "IdentityResolverUnavailableError";
  }

  get deadLetterReason(): string {
    return "identity resolver unavailable";
  }
}

export type TransientFailureKind = "timeout" | "server_error" | "connection";

export class TransientDeliveryError extends DeliveryError {
  constructor(
    public readonly kind: TransientFailureKind,
    channel: string,
    detail: string,
  ) {
    super(
      DeliveryErrorCode.TRANSIENT_DELIVERY_FAILURE,
      503,
      `${channel} delivery failed (${kind}): ${detail}`,
      true,
      { channel, kind },
    );
    this.name = "TransientDeliveryError";
  }
}

export class DeliveryRejectedError extends DeliveryError {
  constructor(channel: string, httpStatus: number, detail: string) {
    super(
      DeliveryErrorCode.DELIVERY_REJECTED,
      422,
      `${channel} rejected the message (HTTP ${httpStatus}): ${detail}`,
      false,
      { channel, httpStatus },
    );
    this.name = "DeliveryRejectedError";
  }

  get deadLetterReason(): string {
    return "rejected by channel";
  }
}

export class MessageNotFoundError extends DeliveryError {
  constructor(messageId: string) {
    super(
      DeliveryErrorCode.MESSAGE_NOT_FOUND,
      404,
      `Message not found: ${messageId}`,
      false,
      { messageId },
    );
    this.name = "MessageNotFoundError";
  }
}

export class RateLimitExceededError extends DeliveryError {
  constructor(
    limit: number,
    scope: "user" | "global",
    public readonly retryAfterSeconds: number,
  ) {
    super(
      DeliveryErrorCode.RATE_LIMIT_EXCEEDED,
      429,
      `Rate limit exceeded: ${limit} requests per window (${scope}). Retry after ${retryAfterSeconds}s`,
      false,
      { limit, scope, retryAfter: retryAfterSeconds },
    );
    this.name = "RateLimitExceededError";
  }
}

export class EnqueueFailedError extends DeliveryError {
  constructor(reason: string, originalError?: Error) {
    super(
      DeliveryErrorCode.ENQUEUE_FAILED,
      500,
      `Failed to enqueue message: ${reason}`,
      true,
      { originalError: originalError?.message },
    );
    this.name = "EnqueueFailedError";
  }
}

export class DeadLetterWriteError extends DeliveryError {
  constructor(messageId: string | undefined, cause: string) {
    super(
      DeliveryErrorCode.DEAD_LETTER_WRITE_FAILED,
      500,
      `Dead-letter write failed for ${messageId ?? "unidentified event"}: ${cause}`,
      true,
      { messageId, cause },
    );
    this.name = "DeadLetterWriteError";
  }
}

/**
 * Errors of unknown origin count as transient: a bug that throws will burn
 * the retry budget and then dead-letter rather than loop forever.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof DeliveryError) {
    return error.retryable;
  }
  return true;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
