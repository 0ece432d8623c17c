import type {
  ChannelAdapter,
  DeliveryOutcome,
  ValidationResult,
} from "../../src/connectors/channel-adapter.interface";
import { ValidationResults } from "../../src/connectors/channel-adapter.interface";
import {
  ExternalChannel,
  MessageEvent,
  MessageStatus,
} from "../../src/infra/queue/message-event.interface";

export type ScriptStep = "ok" | Error;

export interface SendCall {
  readonly messageId: string;
  readonly targetIdentity: string;
}

/**
 * Adapter whose answers are scripted per target identity. Each send consumes
 * the next step; once a script runs out its last step repeats. Targets
 * without a script succeed.
 */
export class ScriptedChannelAdapter implements ChannelAdapter {
  readonly calls: SendCall[] = [];
  private readonly scripts = new Map<string, ScriptStep[]>();

  constructor(
    readonly channelName: ExternalChannel,
    private readonly status: MessageStatus.SENT | MessageStatus.DELIVERED = MessageStatus.SENT,
  ) {}

  script(targetIdentity: string, ...steps: ScriptStep[]): this {
    this.scripts.set(targetIdentity, steps);
    return this;
  }

  async send(
    message: MessageEvent,
    targetIdentity: string,
  ): Promise<DeliveryOutcome> {
    this.calls.push({ messageId: message.messageId, targetIdentity });

    const steps = this.scripts.get(targetIdentity) ?? [];
    const step = steps.length > 1 ? steps.shift() : steps[0];
    if (step instanceof Error) {
      throw step;
    }
    return {
      externalMessageId: `${this.channelName.toLowerCase()}-${message.messageId}`,
      status: this.status,
      timestamp: "2026-10-18T09:00:01.000Z",
    };
  }

  async validateCredentials(): Promise<ValidationResult> {
    return ValidationResults.success(`${this.channelName} scripted`);
  }
}
