import { Inject, Injectable, Logger } from "@nestjs/common";
import axios, { AxiosInstance, isAxiosError } from "axios";
import { CollectorConfig, collectorConfig } from "../../config/collector.config";
import {
  ConfigurationError,
  describeError,
} from "../../common/errors/collector.errors";
import { NetworkFailure, ParseFailure } from "../../common/types/failure.type";
import { isRecord } from "../../common/utils/type-guards.util";
import { FetchResult } from "./queue-times.types";

export const QUEUE_TIMES_HTTP = "QUEUE_TIMES_HTTP";

export type QueueTimesHttp = Pick<AxiosInstance, "get">;

/**
 * Creates the axios instance used by the client.
 *
 * Bodies are kept as text and statuses never throw, so the client decides
 * itself what is malformed and what is worth retrying.
 */
export function createQueueTimesHttp(config: CollectorConfig): QueueTimesHttp {
  return axios.create({
    baseURL: config.apiBaseUrl,
    timeout: config.requestTimeoutMs,
    responseType: "text",
    validateStatus: () => true,
    headers: {
      Accept: "application/json",
      "User-Agent": "park-wait-collector/1.0",
    },
  });
}

type AttemptOutcome =
  | { type: "body"; body: unknown }
  | { type: "failure"; retryable: boolean; status?: number; cause: string };

/**
 * Queue-Times.com API Client
 *
 * GET /parks/{parkId}/queue_times.json, one park per call.
 * Timestamps are in UTC.
 *
 * Retry policy:
 * - Timeouts, connection errors and 5xx are retried with exponential
 *   backoff (base, 2x base, ...) up to `maxAttempts` attempts in total
 * - 4xx is reported immediately
 * - A body that is not a JSON object with `lands`/`rides` is a ParseFailure
 *   and is never retried
 *
 * Attribution Required: "Powered by Queue-Times.com" in README
 */
@Injectable()
export class QueueTimesClient {
  private readonly logger = new Logger(QueueTimesClient.name);

  constructor(
    @Inject(QUEUE_TIMES_HTTP) private readonly http: QueueTimesHttp,
    @Inject(collectorConfig.KEY) private readonly config: CollectorConfig,
  ) {}

  /**
   * @throws ConfigurationError if the park is not configured (before any request)
   */
  async fetchParkQueueTimes(parkId: number): Promise<FetchResult> {
    if (!this.config.parks.some((park) => park.id === parkId)) {
      throw new ConfigurationError(`Park ${parkId} is not a tracked park`);
    }

    const url = `/parks/${parkId}/queue_times.json`;
    const maxAttempts = this.config.maxAttempts;
    let failure: NetworkFailure | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.logger.debug(
        `Fetching queue times for park ${parkId} (attempt ${attempt}/${maxAttempts})`,
      );

      const outcome = await this.attempt(url);

      if (outcome.type === "body") {
        return this.parseBody(parkId, outcome.body, attempt);
      }

      failure = {
        kind: "network",
        parkId,
        attempts: attempt,
        status: outcome.status,
        cause: outcome.cause,
      };

      if (!outcome.retryable) {
        this.logger.error(`Park ${parkId}: ${outcome.cause} (not retried)`);
        break;
      }

      if (attempt < maxAttempts) {
        const delay = this.config.retryBaseDelayMs * 2 ** (attempt - 1);
        this.logger.warn(
          `Park ${parkId}: ${outcome.cause}. Retrying in ${delay}ms...`,
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
      } else {
        this.logger.error(
          `Park ${parkId}: ${outcome.cause}. Giving up after ${attempt} attempts`,
        );
      }
    }

    return {
      ok: false,
      failure: failure ?? {
        kind: "network",
        parkId,
        attempts: 0,
        cause: "No request attempted",
      },
    };
  }

  private async attempt(url: string): Promise<AttemptOutcome> {
    try {
      const response = await this.http.get<unknown>(url);
      const status = response.status;

      if (status >= 500) {
        return {
          type: "failure",
          retryable: true,
          status,
          cause: `Server error (HTTP ${status})`,
        };
      }
      if (status >= 400) {
        return {
          type: "failure",
          retryable: false,
          status,
          cause: `Request rejected (HTTP ${status})`,
        };
      }

      return { type: "body", body: response.data };
    } catch (error) {
      return {
        type: "failure",
        retryable: true,
        cause: this.describeRequestError(error),
      };
    }
  }

  private describeRequestError(error: unknown): string {
    if (isAxiosError(error)) {
      if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
        return `Request timed out - ${error.message}`;
      }
      return `No response received - ${error.code ?? error.message}`;
    }
    return `Request failed - ${describeError(error)}`;
  }

  private parseBody(
    parkId: number,
    body: unknown,
    attempts: number,
  ): FetchResult {
    let parsed: unknown = body;

    if (typeof body === "string") {
      try {
        parsed = JSON.parse(body);
      } catch (error) {
        return this.parseFailure(
          parkId,
          `Response body is not valid JSON - ${describeError(error)}`,
        );
      }
    }

    if (!isRecord(parsed)) {
      return this.parseFailure(parkId, "Response body is not a JSON object");
    }

    const lands = parsed.lands ?? undefined;
    const rides = parsed.rides ?? undefined;

    if (lands === undefined && rides === undefined) {
      return this.parseFailure(
        parkId,
        'Response has neither "lands" nor "rides"',
      );
    }
    if (lands !== undefined && !Array.isArray(lands)) {
      return this.parseFailure(parkId, '"lands" is not an array');
    }
    if (rides !== undefined && !Array.isArray(rides)) {
      return this.parseFailure(parkId, '"rides" is not an array');
    }

    return {
      ok: true,
      attempts,
      snapshot: {
        parkId,
        lands: Array.isArray(lands) ? lands : [],
        rides: Array.isArray(rides) ? rides : [],
      },
    };
  }

  private parseFailure(parkId: number, cause: string): FetchResult {
    this.logger.error(`Park ${parkId}: ${cause}`);
    const failure: ParseFailure = { kind: "parse", parkId, cause };
    return { ok: false, failure };
  }
}
