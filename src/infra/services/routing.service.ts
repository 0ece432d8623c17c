import { Injectable } from "@nestjs/common";
import { Semaphore } from "async-mutex";
import { getEnv } from "../../config/environment";
import {
  DeliveryError,
  NoLinkedIdentityError,
  UnknownChannelError,
  ValidationFailedError,
  describeError,
} from "../../common/errors/delivery.errors";
import { correlationIdOf } from "../../common/logging/correlation";
import { StructuredLogger, toLogError } from "../../common/logging/structured-logger";
import { TelemetryMetrics } from "../../observability/metrics-registry";
import { ChannelAdapterRegistry } from "../../connectors/channel-adapter.registry";
import type { DeliveryOutcome } from "../../connectors/channel-adapter.interface";
import { LiveFanoutRegistry } from "../../realtime/live-fanout.registry";
import { DeadLetterService } from "../queue/dead-letter.service";
import {
  Channel,
  DeliveryAttempt,
  DeliveryTarget,
  MessageEvent,
  MessageStatus,
} from "../queue/message-event.interface";
import { IdentityResolverService } from "./identity-resolver.service";
import { RetryExecutor } from "./retry-executor";

/**
 * Routing
 *
 * 1. Classify each recipient: direct platform id, or internal reference that
 *    the identity resolver expands into every linked external identity
 * 2. Deliver to all resulting targets concurrently (bounded by
 *    FANOUT_CONCURRENCY), each send wrapped by the retry executor
 * 3. One success anywhere is enough: the message counts as delivered and
 *    the remaining failures are only logged and counted as partial
 * 4. No success at all dead-letters the event with the attempt count
 *
 * INTERNAL messages have no connector; they go to the recipients' live
 * streams and are marked DELIVERED.
 */

export interface RoutingResult {
  readonly status: MessageStatus;
  readonly targetCount: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly attemptsMade: number;
  readonly attempts: readonly DeliveryAttempt[];
  readonly deadLettered: boolean;
  readonly reason?: string;
  readonly errorMessage?: string;
}

interface TargetResult {
  readonly target: DeliveryTarget;
  readonly attempts: readonly DeliveryAttempt[];
  readonly outcome?: DeliveryOutcome;
  readonly error?: unknown;
  readonly exhausted: boolean;
}

interface ResolvedTargets {
  readonly targets: DeliveryTarget[];
  readonly failures: unknown[];
}

const RETRIES_EXHAUSTED = "retries exhausted";

function deadLetterReasonOf(error: unknown): string {
  return error instanceof DeliveryError
    ? error.deadLetterReason
    : "unexpected error";
}

@Injectable()
export class RoutingService {
  private readonly fanoutConcurrency: number;

  constructor(
    private readonly identityResolver: IdentityResolverService,
    private readonly adapters: ChannelAdapterRegistry,
    private readonly retry: RetryExecutor,
    private readonly deadLetter: DeadLetterService,
    private readonly liveFanout: LiveFanoutRegistry,
  ) {
    this.fanoutConcurrency = getEnv().delivery.fanoutConcurrency;
  }

  async route(event: MessageEvent): Promise<RoutingResult> {
    if (event.channel === Channel.INTERNAL) {
      return this.routeInternal(event);
    }

    if (!this.adapters.forChannel(event.channel)) {
      return this.reject(event, new UnknownChannelError(event.channel), 0, []);
    }

    if (event.recipientIds.length === 0) {
      return this.reject(
        event,
        new ValidationFailedError("Message has no recipients", {
          field: "recipientIds",
        }),
        0,
        [],
      );
    }

    const { targets, failures } = await this.resolveTargets(event);
    if (targets.length === 0) {
      return this.reject(event, failures[0], 0, []);
    }

    const results = await this.deliverAll(event, targets);
    const attempts = results.flatMap((result) => result.attempts);
    const successes = results.filter((result) => result.outcome !== undefined);
    const failedTargets = results.length - successes.length;

    if (successes.length > 0) {
      const unreachable = failedTargets + failures.length;
      if (unreachable > 0) {
        TelemetryMetrics.recordPartialFanout();
        StructuredLogger.warn("delivery.partial", {
          messageId: event.messageId,
          conversationId: event.conversationId,
          correlationId: correlationIdOf(event),
          data: {
            targetCount: targets.length,
            succeeded: successes.length,
            failed: unreachable,
          },
        });
      }

      const single = targets.length === 1 && failures.length === 0;
      return {
        status:
          single && successes[0].outcome
            ? successes[0].outcome.status
            : MessageStatus.DELIVERED,
        targetCount: targets.length,
        succeeded: successes.length,
        failed: unreachable,
        attemptsMade: attempts.length,
        attempts,
        deadLettered: false,
      };
    }

    const lastFailure = results[results.length - 1];
    const allExhausted = results.every((result) => result.exhausted);
    const error = allExhausted
      ? lastFailure.error
      : (results.find((result) => !result.exhausted)?.error ?? lastFailure.error);
    const reason = allExhausted ? RETRIES_EXHAUSTED : deadLetterReasonOf(error);

    await this.deadLetter.sendToDLQ(
      { kind: "event", event },
      reason,
      attempts.length,
      error,
    );

    return {
      status: MessageStatus.FAILED,
      targetCount: targets.length,
      succeeded: 0,
      failed: targets.length + failures.length,
      attemptsMade: attempts.length,
      attempts,
      deadLettered: true,
      reason,
      errorMessage: describeError(error),
    };
  }

  private routeInternal(event: MessageEvent): RoutingResult {
    let pushed = 0;
    for (const recipientId of event.recipientIds) {
      const delivered = this.liveFanout.deliverToUser(recipientId, {
        type: "message.new",
        messageId: event.messageId,
        conversationId: event.conversationId,
        senderId: event.senderId,
        content: event.content,
        timestamp: event.timestamp,
      });
      if (delivered) {
        pushed += 1;
      }
    }

    StructuredLogger.debug("delivery.internal", {
      messageId: event.messageId,
      conversationId: event.conversationId,
      data: { recipientCount: event.recipientIds.length, succeeded: pushed },
    });

    return {
      status: MessageStatus.DELIVERED,
      targetCount: event.recipientIds.length,
      succeeded: event.recipientIds.length,
      failed: 0,
      attemptsMade: 0,
      attempts: [],
      deadLettered: false,
    };
  }

  private async resolveTargets(event: MessageEvent): Promise<ResolvedTargets> {
    const targets: DeliveryTarget[] = [];
    const failures: unknown[] = [];

    const perRecipient = await Promise.all(
      event.recipientIds.map(async (recipientId) => {
        if (!this.identityResolver.isInternalReference(recipientId)) {
          // Direct addressing: the event's channel is the target channel.
          return this.directTarget(event, recipientId);
        }
        try {
          const identities = await this.identityResolver.resolve(
            recipientId,
            event.messageId,
          );
          return identities.map(
            (identity): DeliveryTarget | UnknownChannelError =>
              this.adapters.forChannel(identity.platform)
                ? {
                    channel: identity.platform,
                    identity: identity.platformUserId,
                    recipientId,
                  }
                : new UnknownChannelError(identity.platform),
          );
        } catch (error) {
          StructuredLogger.warn("delivery.resolution_failed", {
            messageId: event.messageId,
            conversationId: event.conversationId,
            data: { userId: recipientId },
            error: toLogError(
              error,
              error instanceof NoLinkedIdentityError
                ? "identity.none"
                : "identity.unavailable",
            ),
          });
          return [error];
        }
      }),
    );

    for (const entries of perRecipient) {
      for (const entry of entries) {
        if (isDeliveryTarget(entry)) {
          targets.push(entry);
        } else {
          failures.push(entry);
        }
      }
    }

    return { targets, failures };
  }

  private directTarget(
    event: MessageEvent,
    recipientId: string,
  ): DeliveryTarget[] {
    if (event.channel === Channel.INTERNAL) {
      return [];
    }
    return [{ channel: event.channel, identity: recipientId, recipientId }];
  }

  private async deliverAll(
    event: MessageEvent,
    targets: readonly DeliveryTarget[],
  ): Promise<TargetResult[]> {
    const semaphore = new Semaphore(this.fanoutConcurrency);
    return Promise.all(
      targets.map((target) =>
        semaphore.runExclusive(() => this.deliverTarget(event, target)),
      ),
    );
  }

  private async deliverTarget(
    event: MessageEvent,
    target: DeliveryTarget,
  ): Promise<TargetResult> {
    const adapter = this.adapters.forChannel(target.channel);
    if (!adapter) {
      return {
        target,
        attempts: [],
        error: new UnknownChannelError(target.channel),
        exhausted: false,
      };
    }

    const attempts: DeliveryAttempt[] = [];
    const outcome = await this.retry.execute(
      () => adapter.send(event, target.identity),
      {
        operation: `send:${target.channel}`,
        messageId: event.messageId,
        correlationId: correlationIdOf(event),
      },
      (attemptNumber, result) => {
        attempts.push({
          channel: target.channel,
          targetIdentity: target.identity,
          attemptNumber,
          outcome: result,
        });
        TelemetryMetrics.recordDeliveryAttempt(target.channel, result);
      },
    );

    if (outcome.ok) {
      return { target, attempts, outcome: outcome.value, exhausted: false };
    }

    StructuredLogger.warn("delivery.target_failed", {
      messageId: event.messageId,
      conversationId: event.conversationId,
      data: {
        channel: target.channel,
        attemptsMade: outcome.attempts,
        reason: outcome.exhausted
          ? RETRIES_EXHAUSTED
          : deadLetterReasonOf(outcome.error),
      },
      error: toLogError(outcome.error, "delivery.target_failed"),
    });
    return {
      target,
      attempts,
      error: outcome.error,
      exhausted: outcome.exhausted,
    };
  }

  private async reject(
    event: MessageEvent,
    error: unknown,
    attemptsMade: number,
    attempts: readonly DeliveryAttempt[],
  ): Promise<RoutingResult> {
    const reason = deadLetterReasonOf(error);
    await this.deadLetter.sendToDLQ(
      { kind: "event", event },
      reason,
      attemptsMade,
      error,
    );
    return {
      status: MessageStatus.FAILED,
      targetCount: 0,
      succeeded: 0,
      failed: event.recipientIds.length,
      attemptsMade,
      attempts,
      deadLettered: true,
      reason,
      errorMessage: describeError(error),
    };
  }
}

function isDeliveryTarget(entry: unknown): entry is DeliveryTarget {
  return (
    typeof entry === "object" &&
    entry !== null &&
    !(entry instanceof Error) &&
    "channel" in entry &&
    "identity" in entry
  );
}
