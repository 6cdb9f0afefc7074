import {
  plainToInstance,
  Transform,
  TransformFnParams,
  Type,
} from "class-transformer";
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsString,
  IsTimeZone,
  IsUrl,
  Max,
  Min,
  validateSync,
} from "class-validator";
import { ConfigurationError } from "../common/errors/collector.errors";

// Uses the raw env string, not the implicitly converted value
const toBoolean = ({ key, obj, value }: TransformFnParams): unknown => {
  const raw: unknown = obj[key];
  if (typeof raw === "string") {
    return ["true", "1", "yes"].includes(raw.trim().toLowerCase());
  }
  return value;
};

/**
 * Environment Variables
 *
 * Every setting has a default, so an empty environment is a valid one.
 * Values arrive as strings from process.env and are converted here.
 */
export class EnvironmentVariables {
  @IsUrl({ require_tld: false, require_protocol: true })
  QUEUE_TIMES_BASE_URL = "https://queue-times.com/en-US";

  @Type(() => Number)
  @IsInt()
  @Min(1)
  QUEUE_TIMES_TIMEOUT_MS = 30000;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10)
  QUEUE_TIMES_MAX_ATTEMPTS = 3;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  QUEUE_TIMES_RETRY_DELAY_MS = 1000;

  @IsString()
  @IsNotEmpty()
  TRACKED_PARKS =
    "64:Islands of Adventure,65:Universal Studios Florida,334:Epic Universe";

  @IsTimeZone()
  PARK_TIMEZONE = "America/New_York";

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1440)
  SNAPSHOT_INTERVAL_MINUTES = 30;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  PARK_CONCURRENCY = 3;

  @IsString()
  @IsNotEmpty()
  DB_PATH = "data/wait_times.db";

  @Type(() => Number)
  @IsInt()
  @Min(0)
  DB_BUSY_TIMEOUT_MS = 5000;

  @Transform(toBoolean)
  @IsBoolean()
  DB_SYNCHRONIZE = true;

  @Transform(toBoolean)
  @IsBoolean()
  DB_LOGGING = false;
}

/**
 * Converts and validates raw environment values.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => {
        const constraints = Object.values(error.constraints ?? {}).join(", ");
        return `${error.property}: ${constraints}`;
      })
      .join("; ");
    throw new ConfigurationError(`Invalid environment - ${details}`);
  }

  return validated;
}
