import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { collectorConfig } from "../config/collector.config";
import { QueueTimesModule } from "../external-apis/queue-times/queue-times.module";
import { QueueDataModule } from "../queue-data/queue-data.module";
import { CollectorService } from "./collector.service";

@Module({
  imports: [
    ConfigModule.forFeature(collectorConfig),
    QueueTimesModule,
    QueueDataModule,
  ],
  providers: [CollectorService],
  exports: [CollectorService, QueueDataModule],
})
export class CollectorModule {}
