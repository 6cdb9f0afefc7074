import { registerAs } from "@nestjs/config";
import { ConfigurationError } from "../common/errors/collector.errors";
import {
  EnvironmentVariables,
  validateEnvironment,
} from "./environment.validation";

export interface TrackedPark {
  /** Queue-Times park id */
  id: number;
  name: string;
  /** IANA timezone used for the observation calendar fields */
  timezone: string;
}

export interface CollectorConfig {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  parks: TrackedPark[];
  snapshotIntervalMinutes: number;
  parkConcurrency: number;
}

const TRACKED_PARK_PATTERN = /^(\d+)\s*:\s*(.+)$/;

/**
 * Parses the TRACKED_PARKS list ("64:Islands of Adventure,65:...").
 *
 * @throws ConfigurationError on malformed entries or duplicate ids
 */
export function parseTrackedParks(
  value: string,
  timezone: string,
): TrackedPark[] {
  const parks: TrackedPark[] = [];

  for (const entry of value.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const match = TRACKED_PARK_PATTERN.exec(trimmed);
    if (!match) {
      throw new ConfigurationError(
        `Invalid TRACKED_PARKS entry "${trimmed}" (expected "<id>:<name>")`,
      );
    }

    const id = parseInt(match[1], 10);
    if (id <= 0) {
      throw new ConfigurationError(`Invalid park id ${match[1]}`);
    }
    if (parks.some((park) => park.id === id)) {
      throw new ConfigurationError(`Park ${id} is configured twice`);
    }

    parks.push({ id, name: match[2].trim(), timezone });
  }

  if (parks.length === 0) {
    throw new ConfigurationError("TRACKED_PARKS does not name any park");
  }

  return parks;
}

export const getCollectorConfig = (
  env: EnvironmentVariables,
): CollectorConfig => ({
  apiBaseUrl: env.QUEUE_TIMES_BASE_URL.replace(/\/+$/, ""),
  requestTimeoutMs: env.QUEUE_TIMES_TIMEOUT_MS,
  maxAttempts: env.QUEUE_TIMES_MAX_ATTEMPTS,
  retryBaseDelayMs: env.QUEUE_TIMES_RETRY_DELAY_MS,
  parks: parseTrackedParks(env.TRACKED_PARKS, env.PARK_TIMEZONE),
  snapshotIntervalMinutes: env.SNAPSHOT_INTERVAL_MINUTES,
  parkConcurrency: env.PARK_CONCURRENCY,
});

export const collectorConfig = registerAs(
  "collector",
  (): CollectorConfig => getCollectorConfig(validateEnvironment(process.env)),
);
