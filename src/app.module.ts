import { Module } from "@nestjs/common";
import { CommonModule } from "./common/common.module";
import { DeliveryPipelineModule } from "./common/delivery-pipeline.module";
import { RealtimeModule } from "./realtime/realtime.module";

@Module({
  imports: [CommonModule, RealtimeModule, DeliveryPipelineModule],
})
export class AppModule {}
