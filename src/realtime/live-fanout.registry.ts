import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { Subject, Subscription, asapScheduler, observeOn } from "rxjs";
import { StructuredLogger, toLogError } from "../common/logging/structured-logger";
import { TelemetryMetrics } from "../observability/metrics-registry";
import type { MessageStatus } from "../infra/queue/message-event.interface";

/**
 * Live fan-out registry
 *
 * - One logical stream per connected user, shared by all of that user's
 *   sessions (tabs, devices)
 * - A stream exists from the first session's register() until the last
 *   session's deregister()
 * - publish() only queues: each session drains on the asap scheduler, so a
 *   slow socket never holds up the pipeline that published
 *
 * Best effort by contract. Users without a stream simply miss the push and
 * catch up from persisted state through the pull API.
 */

export type LiveEventType = "message.status" | "message.new";

export interface LiveEvent {
  readonly type: LiveEventType;
  readonly messageId: string;
  readonly conversationId?: string;
  readonly status?: MessageStatus;
  readonly senderId?: string;
  readonly content?: string;
  readonly errorMessage?: string;
  readonly timestamp: string;
}

export interface LiveSession {
  readonly sessionId: string;
  send(event: LiveEvent): void;
}

interface UserStream {
  readonly subject: Subject<LiveEvent>;
  readonly sessions: Map<string, Subscription>;
}

@Injectable()
export class LiveFanoutRegistry implements OnModuleDestroy {
  private readonly logger = new Logger(LiveFanoutRegistry.name);
  private readonly streams = new Map<string, UserStream>();

  register(userId: string, session: LiveSession): void {
    let stream = this.streams.get(userId);
    if (!stream) {
      stream = { subject: new Subject<LiveEvent>(), sessions: new Map() };
      this.streams.set(userId, stream);
      TelemetryMetrics.setLiveStreams(this.streams.size);
    }

    stream.sessions.get(session.sessionId)?.unsubscribe();

    const subscription = stream.subject
      .pipe(observeOn(asapScheduler))
      .subscribe((event) => {
        try {
          session.send(event);
        } catch (error) {
          StructuredLogger.warn("live.session_send", {
            messageId: event.messageId,
            status: "failed",
            data: { userId, sessionId: session.sessionId },
            error: toLogError(error, "live.send_failed"),
          });
        }
      });
    stream.sessions.set(session.sessionId, subscription);

    this.logger.debug(
      `Registered session ${session.sessionId} for ${userId} (${stream.sessions.size} active)`,
    );
  }

  /**
   * Removing the last session completes and drops the stream in the same
   * synchronous step, so no publish can land on a half-torn-down stream.
   */
  deregister(userId: string, sessionId: string): void {
    const stream = this.streams.get(userId);
    if (!stream) {
      return;
    }

    stream.sessions.get(sessionId)?.unsubscribe();
    stream.sessions.delete(sessionId);

    if (stream.sessions.size === 0) {
      this.streams.delete(userId);
      stream.subject.complete();
      TelemetryMetrics.setLiveStreams(this.streams.size);
    }
  }

  /**
   * Returns whether the user had an open stream. Never blocks.
   */
  deliverToUser(userId: string, event: LiveEvent): boolean {
    const stream = this.streams.get(userId);
    TelemetryMetrics.recordLiveEvent(stream !== undefined);
    if (!stream) {
      return false;
    }
    stream.subject.next(event);
    return true;
  }

  isConnected(userId: string): boolean {
    return this.streams.has(userId);
  }

  sessionCount(userId: string): number {
    return this.streams.get(userId)?.sessions.size ?? 0;
  }

  get activeUsers(): number {
    return this.streams.size;
  }

  onModuleDestroy(): void {
    for (const stream of this.streams.values()) {
      for (const subscription of stream.sessions.values()) {
        subscription.unsubscribe();
      }
      stream.subject.complete();
    }
    this.streams.clear();
    TelemetryMetrics.setLiveStreams(0);
  }
}
