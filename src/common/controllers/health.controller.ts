import { Controller, Get, Inject } from "@nestjs/common";
import type { Redis } from "ioredis";
import { getEnv } from "../../config/environment";
import { ChannelAdapterRegistry } from "../../connectors/channel-adapter.registry";
import { ValidationResult } from "../../connectors/channel-adapter.interface";
import { REDIS_CLIENT } from "../../infra/redis/redis-manager";
import { EventDispatcherConsumer } from "../../infra/services/event-dispatcher.consumer";
import { StatusUpdateConsumer } from "../../infra/services/status-update.consumer";
import { LiveFanoutRegistry } from "../../realtime/live-fanout.registry";
import { describeError } from "../errors/delivery.errors";

export interface HealthReport {
  readonly status: "ok" | "degraded";
  readonly timestamp: string;
  readonly environment: string;
  readonly instanceId: string;
  readonly redis: { readonly reachable: boolean; readonly error?: string };
  readonly workers: {
    readonly enabled: boolean;
    readonly assignedPartitions: readonly number[];
    readonly dispatcher: number;
    readonly status: number;
  };
  readonly adapters: Record<string, ValidationResult>;
  readonly liveUsers: number;
}

@Controller("health")
export class HealthController {
  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    private readonly adapters: ChannelAdapterRegistry,
    private readonly dispatcher: EventDispatcherConsumer,
    private readonly statusConsumer: StatusUpdateConsumer,
    private readonly liveFanout: LiveFanoutRegistry,
  ) {}

  @Get()
  async getHealthStatus(): Promise<HealthReport> {
    const env = getEnv();
    const [redis, adapters] = await Promise.all([
      this.checkRedis(),
      this.adapters.validateAll(),
    ]);

    const adaptersValid = Object.values(adapters).every((result) => result.valid);

    return {
      status: redis.reachable && adaptersValid ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      environment: env.service.nodeEnv,
      instanceId: env.service.instanceId,
      redis,
      workers: {
        enabled: env.streams.workersEnabled,
        assignedPartitions: env.streams.assignedPartitions,
        dispatcher: this.dispatcher.runningWorkers,
        status: this.statusConsumer.runningWorkers,
      },
      adapters,
      liveUsers: this.liveFanout.activeUsers,
    };
  }

  private async checkRedis(): Promise<HealthReport["redis"]> {
    try {
      await this.redis.ping();
      return { reachable: true };
    } catch (error) {
      return { reachable: false, error: describeError(error) };
    }
  }
}
