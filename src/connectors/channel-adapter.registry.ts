import { Inject, Injectable } from "@nestjs/common";
import type { EnvironmentConfig } from "../config/environment";
import {
  Channel,
  EXTERNAL_CHANNELS,
  ExternalChannel,
  isExternalChannel,
} from "../infra/queue/message-event.interface";
import type { StatusPublisherService } from "../infra/services/status-publisher.service";
import { ChannelAdapter, ValidationResult } from "./channel-adapter.interface";
import { HttpChannelAdapter } from "./http-channel.adapter";
import { LoopbackChannelAdapter } from "./loopback-channel.adapter";
import { ReceiptScheduler } from "./receipt-scheduler";

export const CHANNEL_ADAPTERS = Symbol("CHANNEL_ADAPTERS");

/**
 * One adapter per external channel: HTTP connectors normally, loopback
 * adapters when CONNECTOR_MOCK_MODE is on.
 */
export function createChannelAdapters(
  config: EnvironmentConfig,
  publisher: StatusPublisherService,
  scheduler: ReceiptScheduler,
): ChannelAdapter[] {
  const urls: Record<ExternalChannel, string> = {
    [Channel.WHATSAPP]: config.connectors.whatsappUrl,
    [Channel.TELEGRAM]: config.connectors.telegramUrl,
    [Channel.INSTAGRAM]: config.connectors.instagramUrl,
  };

  return EXTERNAL_CHANNELS.map((channel) =>
    config.connectors.mockMode
      ? new LoopbackChannelAdapter(
          channel,
          publisher,
          scheduler,
          config.connectors.mockReceiptDelayMs,
        )
      : new HttpChannelAdapter(
          channel,
          urls[channel],
          config.delivery.adapterTimeoutMs,
        ),
  );
}

@Injectable()
export class ChannelAdapterRegistry {
  private readonly adapters = new Map<ExternalChannel, ChannelAdapter>();

  constructor(@Inject(CHANNEL_ADAPTERS) adapters: readonly ChannelAdapter[]) {
    for (const adapter of adapters) {
      this.adapters.set(adapter.channelName, adapter);
    }
  }

  /**
   * INTERNAL and unconfigured channels have no adapter.
   */
  forChannel(channel: Channel): ChannelAdapter | undefined {
    return isExternalChannel(channel) ? this.adapters.get(channel) : undefined;
  }

  async validateAll(): Promise<Record<string, ValidationResult>> {
    const entries = await Promise.all(
      Array.from(this.adapters.values()).map(
        async (adapter) =>
          [adapter.channelName, await adapter.validateCredentials()] as const,
      ),
    );
    return Object.fromEntries(entries);
  }
}
