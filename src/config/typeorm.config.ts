import { ConfigModule } from "@nestjs/config";
import { TypeOrmModuleAsyncOptions, TypeOrmModuleOptions } from "@nestjs/typeorm";
import { DatabaseConfig, databaseConfig } from "./database.config";
import { COLLECTOR_ENTITIES } from "../database/entities";

interface PragmaCapable {
  pragma(source: string): unknown;
}

/**
 * Builds TypeORM options for the embedded SQLite store.
 *
 * - Foreign keys are switched on by the better-sqlite3 driver itself
 * - WAL lets the status command read while a collection run writes
 * - `timeout` bounds how long a writer waits for another process' lock
 */
export const buildTypeOrmOptions = (
  dbConfig: DatabaseConfig,
): TypeOrmModuleOptions => ({
  type: "better-sqlite3",
  database: dbConfig.path,
  entities: COLLECTOR_ENTITIES,
  synchronize: dbConfig.synchronize,
  logging: dbConfig.logging,
  timeout: dbConfig.busyTimeoutMs,
  prepareDatabase: (db: PragmaCapable) => {
    db.pragma("journal_mode = WAL");
  },
});

export const typeOrmConfig: TypeOrmModuleAsyncOptions = {
  imports: [ConfigModule.forFeature(databaseConfig)],
  inject: [databaseConfig.KEY],
  useFactory: (dbConfig: DatabaseConfig) => buildTypeOrmOptions(dbConfig),
};
