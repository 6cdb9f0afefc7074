import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { CollectorConfig, collectorConfig } from "../../config/collector.config";
import {
  QUEUE_TIMES_HTTP,
  QueueTimesClient,
  createQueueTimesHttp,
} from "./queue-times.client";
import { QueueTimesNormalizer } from "./queue-times.normalizer";

@Module({
  imports: [ConfigModule.forFeature(collectorConfig)],
  providers: [
    {
      provide: QUEUE_TIMES_HTTP,
      inject: [collectorConfig.KEY],
      useFactory: (config: CollectorConfig) => createQueueTimesHttp(config),
    },
    QueueTimesClient,
    QueueTimesNormalizer,
  ],
  exports: [QueueTimesClient, QueueTimesNormalizer],
})
export class QueueTimesModule {}
