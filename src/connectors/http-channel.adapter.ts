import {
  DeliveryRejectedError,
  TransientDeliveryError,
  describeError,
} from "../common/errors/delivery.errors";
import {
  ExternalChannel,
  MessageEvent,
  MessageStatus,
} from "../infra/queue/message-event.interface";
import {
  ChannelAdapter,
  DeliveryOutcome,
  ValidationResult,
  ValidationResults,
} from "./channel-adapter.interface";

interface ConnectorSendResponse {
  readonly messageId?: string;
  readonly externalMessageId?: string;
  readonly status?: string;
  readonly timestamp?: string;
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

function parseSendResponse(body: unknown): ConnectorSendResponse {
  if (typeof body !== "object" || body === null) {
    return {};
  }
  return {
    messageId: readString(body, "messageId"),
    externalMessageId: readString(body, "externalMessageId"),
    status: readString(body, "status"),
    timestamp: readString(body, "timestamp"),
  };
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Talks to a per-channel connector service:
 * `POST {baseUrl}/v1/messages` answered by `202 {externalMessageId, status}`.
 */
export class HttpChannelAdapter implements ChannelAdapter {
  constructor(
    readonly channelName: ExternalChannel,
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
  ) {}

  async send(
    message: MessageEvent,
    targetIdentity: string,
  ): Promise<DeliveryOutcome> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/v1/messages`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Idempotency-Key": message.messageId,
        },
        body: JSON.stringify({
          messageId: message.messageId,
          recipient: targetIdentity,
          content: message.content,
          conversationId: message.conversationId,
          senderId: message.senderId,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const timedOut =
        error instanceof Error &&
        (error.name === "TimeoutError" || error.name === "AbortError");
      throw new TransientDeliveryError(
        timedOut ? "timeout" : "connection",
        this.channelName,
        describeError(error),
      );
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      if (isRetryableStatus(response.status)) {
        throw new TransientDeliveryError(
          "server_error",
          this.channelName,
          `HTTP ${response.status} ${detail}`.trim(),
        );
      }
      throw new DeliveryRejectedError(
        this.channelName,
        response.status,
        detail || response.statusText,
      );
    }

    const body = parseSendResponse(await response.json().catch(() => null));
    return {
      externalMessageId: body.externalMessageId ?? message.messageId,
      status:
        body.status?.toUpperCase() === MessageStatus.DELIVERED
          ? MessageStatus.DELIVERED
          : MessageStatus.SENT,
      timestamp: body.timestamp ?? new Date().toISOString(),
    };
  }

  async validateCredentials(): Promise<ValidationResult> {
    try {
      const response = await fetch(
        `${this.baseUrl}/v1/credentials/validate`,
        {
          method: "GET",
          headers: { Accept: "application/json" },
          signal: AbortSignal.timeout(this.timeoutMs),
        },
      );
      if (!response.ok) {
        return ValidationResults.failure(
          `${this.channelName} connector answered HTTP ${response.status}`,
        );
      }

      const body: unknown = await response.json().catch(() => null);
      if (typeof body !== "object" || body === null) {
        return ValidationResults.failure(
          `${this.channelName} connector returned an unreadable body`,
        );
      }
      const valid: unknown = Reflect.get(body, "valid");
      const message =
        readString(body, "message") ?? `${this.channelName} credentials checked`;
      const errors: unknown = Reflect.get(body, "errors");
      const errorList = Array.isArray(errors)
        ? errors.filter((entry): entry is string => typeof entry === "string")
        : [];

      return valid === true
        ? ValidationResults.success(message, readString(body, "platformInfo"))
        : ValidationResults.failure(message, errorList);
    } catch (error) {
      return ValidationResults.failure(
        `${this.channelName} connector unreachable`,
        [describeError(error)],
      );
    }
  }
}
