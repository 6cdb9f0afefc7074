import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import { collectorConfig } from "../config/collector.config";
import { COLLECTOR_ENTITIES } from "../database/entities";
import { WaitTimeStoreService } from "./wait-time-store.service";

/**
 * Queue Data Module
 *
 * Owns the wait-time store: parks, lands, rides and the
 * wait_time_observations fact table.
 */
@Module({
  imports: [
    ConfigModule.forFeature(collectorConfig),
    TypeOrmModule.forFeature(COLLECTOR_ENTITIES),
  ],
  providers: [WaitTimeStoreService],
  exports: [WaitTimeStoreService],
})
export class QueueDataModule {}
