import { Module } from "@nestjs/common";
import { getEnv } from "../config/environment";
import {
  CHANNEL_ADAPTERS,
  ChannelAdapterRegistry,
  createChannelAdapters,
} from "../connectors/channel-adapter.registry";
import { ChannelAdapter } from "../connectors/channel-adapter.interface";
import { ReceiptScheduler } from "../connectors/receipt-scheduler";
import { MessagesController } from "../ingress/controllers/messages.controller";
import { StatusWebhookController } from "../ingress/controllers/status-webhook.controller";
import { MessageAcceptanceService } from "../ingress/services/message-acceptance.service";
import { EventDispatcherConsumer } from "../infra/services/event-dispatcher.consumer";
import { IdentityResolverService } from "../infra/services/identity-resolver.service";
import { RetryExecutor } from "../infra/services/retry-executor";
import { RoutingService } from "../infra/services/routing.service";
import { StatusPublisherService } from "../infra/services/status-publisher.service";
import { StatusUpdateConsumer } from "../infra/services/status-update.consumer";
import { RealtimeModule } from "../realtime/realtime.module";
import { HealthController } from "./controllers/health.controller";

/**
 * Delivery Pipeline Module
 *
 * COMPONENTS:
 * 1. Ingress:
 *    - MessagesController / MessageAcceptanceService (validate, record, enqueue)
 *    - StatusWebhookController (connector receipts onto the status topic)
 *
 * 2. Delivery:
 *    - EventDispatcherConsumer (dedup, route, publish, mark; per partition)
 *    - RoutingService (identity resolution, bounded fan-out, DLQ)
 *    - IdentityResolverService, RetryExecutor, ChannelAdapterRegistry
 *
 * 3. Status:
 *    - StatusUpdateConsumer (state machine, CAS, live fan-out)
 *
 * Config-bound helpers are plain classes built by factories here.
 */
@Module({
  imports: [RealtimeModule],
  controllers: [MessagesController, StatusWebhookController, HealthController],
  providers: [
    ReceiptScheduler,
    {
      provide: CHANNEL_ADAPTERS,
      useFactory: (
        publisher: StatusPublisherService,
        scheduler: ReceiptScheduler,
      ): ChannelAdapter[] => createChannelAdapters(getEnv(), publisher, scheduler),
      inject: [StatusPublisherService, ReceiptScheduler],
    },
    ChannelAdapterRegistry,
    {
      provide: RetryExecutor,
      useFactory: (): RetryExecutor => new RetryExecutor(getEnv().delivery),
    },
    {
      provide: IdentityResolverService,
      useFactory: (): IdentityResolverService =>
        new IdentityResolverService(getEnv().identity),
    },
    RoutingService,
    EventDispatcherConsumer,
    StatusUpdateConsumer,
    MessageAcceptanceService,
  ],
  exports: [RoutingService, EventDispatcherConsumer, StatusUpdateConsumer],
})
export class DeliveryPipelineModule {}
