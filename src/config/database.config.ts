import { registerAs } from "@nestjs/config";
import {
  EnvironmentVariables,
  validateEnvironment,
} from "./environment.validation";

export interface DatabaseConfig {
  /** SQLite file path, or ":memory:" */
  path: string;
  busyTimeoutMs: number;
  synchronize: boolean;
  logging: boolean;
}

export const getDatabaseConfig = (env: EnvironmentVariables): DatabaseConfig => ({
  path: env.DB_PATH,
  busyTimeoutMs: env.DB_BUSY_TIMEOUT_MS,
  synchronize: env.DB_SYNCHRONIZE,
  logging: env.DB_LOGGING,
});

export const databaseConfig = registerAs(
  "database",
  (): DatabaseConfig => getDatabaseConfig(validateEnvironment(process.env)),
);
