import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import { typeOrmConfig } from "./config/typeorm.config";
import { CollectorModule } from "./collector/collector.module";

@Module({
  imports: [
    // Global config module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      cache: true,
    }),

    // TypeORM with async config
    TypeOrmModule.forRootAsync(typeOrmConfig),

    CollectorModule,
  ],
})
export class AppModule {}
