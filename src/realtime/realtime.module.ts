import { Module } from "@nestjs/common";
import { LiveFanoutRegistry } from "./live-fanout.registry";
import { LiveGateway } from "./live.gateway";

@Module({
  providers: [LiveFanoutRegistry, LiveGateway],
  exports: [LiveFanoutRegistry],
})
export class RealtimeModule {}
