import type {
  ExternalChannel,
  MessageEvent,
  MessageStatus,
} from "../infra/queue/message-event.interface";

/**
 * Accepted send. Failures are thrown as DeliveryErrors instead, so the retry
 * executor can classify them.
 */
export interface DeliveryOutcome {
  readonly externalMessageId: string;
  readonly status: MessageStatus.SENT | MessageStatus.DELIVERED;
  readonly timestamp: string;
}

export interface ValidationResult {
  readonly valid: boolean;
  readonly message: string;
  readonly errors: readonly string[];
  readonly platformInfo?: string;
}

export const ValidationResults = {
  success(message: string, platformInfo?: string): ValidationResult {
    return { valid: true, message, errors: [], platformInfo };
  },
  failure(message: string, errors: readonly string[] = []): ValidationResult {
    return { valid: false, message, errors };
  },
};

/**
 * One external channel. Implementations must treat repeated sends with the
 * same messageId as the same send.
 */
export interface ChannelAdapter {
  readonly channelName: ExternalChannel;
  send(message: MessageEvent, targetIdentity: string): Promise<DeliveryOutcome>;
  validateCredentials(): Promise<ValidationResult>;
}
