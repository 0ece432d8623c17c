import {
  Global,
  Inject,
  Module,
  OnApplicationShutdown,
} from "@nestjs/common";
import type { Redis } from "ioredis";
import { getEnv } from "../config/environment";
import { DeadLetterService } from "../infra/queue/dead-letter.service";
import { DeduplicationService } from "../infra/queue/deduplication.service";
import { RedisStreamsService } from "../infra/queue/redis-streams.service";
import {
  getRedisClient,
  REDIS_CLIENT,
  releaseRedisClient,
} from "../infra/redis/redis-manager";
import {
  MESSAGE_STATUS_REPOSITORY,
  RedisMessageStatusRepository,
} from "../infra/repositories/message-status.repository";
import { StatusPublisherService } from "../infra/services/status-publisher.service";
import { RateLimiterService } from "./services/rate-limiter.service";

/**
 * Shared infrastructure: the Redis command connection and everything that
 * only needs it (streams, dedup markers, status records, rate counters).
 */
@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      useFactory: (): Redis => getRedisClient(getEnv().redis),
    },
    RedisStreamsService,
    DeduplicationService,
    DeadLetterService,
    StatusPublisherService,
    RateLimiterService,
    {
      provide: MESSAGE_STATUS_REPOSITORY,
      useClass: RedisMessageStatusRepository,
    },
  ],
  exports: [
    REDIS_CLIENT,
    RedisStreamsService,
    DeduplicationService,
    DeadLetterService,
    StatusPublisherService,
    RateLimiterService,
    MESSAGE_STATUS_REPOSITORY,
  ],
})
export class CommonModule implements OnApplicationShutdown {
  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  onApplicationShutdown(): void {
    releaseRedisClient(this.redis);
  }
}
