import type { RetryPolicyConfig } from "../../config/environment";
import { describeError, isRetryable } from "../../common/errors/delivery.errors";
import { StructuredLogger, toLogError } from "../../common/logging/structured-logger";
import { TelemetryMetrics } from "../../observability/metrics-registry";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryContext {
  /**
   * Metric/log label, e.g. `send:WHATSAPP` or `identity_lookup`
   */
  readonly operation: string;
  readonly messageId?: string;
  readonly correlationId?: string;
}

export type AttemptResult = "success" | "retryable_failure" | "permanent_failure";

export type RetryOutcome<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: number }
  | {
      readonly ok: false;
      readonly error: unknown;
      readonly attempts: number;
      /** false when a non-retryable error cut the loop short */
      readonly exhausted: boolean;
    };

/**
 * Wait before attempt `n`: nothing before the first, then
 * `initialDelay * multiplier^(n-2)` capped at `maxDelay`.
 */
export function backoffDelayMs(
  policy: RetryPolicyConfig,
  attempt: number,
): number {
  if (attempt <= 1) {
    return 0;
  }
  const delay = policy.initialDelayMs * policy.multiplier ** (attempt - 2);
  return Math.min(delay, policy.maxDelayMs);
}

export class RetryExecutor {
  constructor(
    private readonly policy: RetryPolicyConfig,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  get maxAttempts(): number {
    return this.policy.maxAttempts;
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    context: RetryContext,
    onAttempt?: (attempt: number, result: AttemptResult, error?: unknown) => void,
  ): Promise<RetryOutcome<T>> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      const delayMs = backoffDelayMs(this.policy, attempt);
      if (delayMs > 0) {
        TelemetryMetrics.recordRetry(context.operation);
        StructuredLogger.info("delivery.retry.scheduled", {
          messageId: context.messageId,
          correlationId: context.correlationId,
          data: {
            operation: context.operation,
            attempt,
            maxAttempts: this.policy.maxAttempts,
            delayMs,
            reason: describeError(lastError),
          },
        });
        await this.sleep(delayMs);
      }

      try {
        const value = await operation(attempt);
        onAttempt?.(attempt, "success");
        TelemetryMetrics.recordRetryOutcome(context.operation, "success");
        return { ok: true, value, attempts: attempt };
      } catch (error) {
        lastError = error;

        if (!isRetryable(error)) {
          onAttempt?.(attempt, "permanent_failure", error);
          TelemetryMetrics.recordRetryOutcome(context.operation, "aborted");
          StructuredLogger.warn("delivery.retry.aborted", {
            messageId: context.messageId,
            correlationId: context.correlationId,
            data: { operation: context.operation, attempt },
            error: toLogError(error, "delivery.non_retryable"),
          });
          return { ok: false, error, attempts: attempt, exhausted: false };
        }

        onAttempt?.(attempt, "retryable_failure", error);
      }
    }

    TelemetryMetrics.recordRetryOutcome(context.operation, "exhausted");
    StructuredLogger.warn("delivery.retry.exhausted", {
      messageId: context.messageId,
      correlationId: context.correlationId,
      data: {
        operation: context.operation,
        attemptsMade: this.policy.maxAttempts,
      },
      error: toLogError(lastError, "delivery.retries_exhausted"),
    });

    return {
      ok: false,
      error: lastError,
      attempts: this.policy.maxAttempts,
      exhausted: true,
    };
  }
}
