import { Inject, Injectable, Logger } from "@nestjs/common";
import pLimit from "p-limit";
import {
  CollectorConfig,
  TrackedPark,
  collectorConfig,
} from "../config/collector.config";
import {
  ConfigurationError,
  StoreCommitError,
  describeError,
} from "../common/errors/collector.errors";
import { floorToInterval } from "../common/utils/date.util";
import { QueueTimesClient } from "../external-apis/queue-times/queue-times.client";
import { QueueTimesNormalizer } from "../external-apis/queue-times/queue-times.normalizer";
import { WaitTimeStoreService } from "../queue-data/wait-time-store.service";
import { NormalizedBatch } from "../queue-data/types/normalized-batch.type";
import {
  ParkRunResult,
  RunOptions,
  RunSummary,
} from "./types/run-summary.type";

/**
 * Collector Service
 *
 * One collection cycle: for every tracked park
 * Fetching → Normalizing → Committing → Done, or Failed at any stage.
 *
 * Parks are independent. A park that fails is reported in the summary and
 * the others carry on; nothing is thrown past the park boundary except a
 * ConfigurationError, which is raised before the first request.
 */
@Injectable()
export class CollectorService {
  private readonly logger = new Logger(CollectorService.name);

  constructor(
    @Inject(collectorConfig.KEY) private readonly config: CollectorConfig,
    private readonly client: QueueTimesClient,
    private readonly normalizer: QueueTimesNormalizer,
    private readonly store: WaitTimeStoreService,
  ) {}

  /**
   * @throws ConfigurationError when a requested park id is not configured
   */
  async run(options: RunOptions = {}): Promise<RunSummary> {
    const parks = this.resolveParks(options.parkIds);
    const observedAt = floorToInterval(
      options.now ?? new Date(),
      this.config.snapshotIntervalMinutes,
    );

    this.logger.log(
      `🎢 Collecting wait times for ${parks.length} park(s) at ${observedAt.toISOString()}`,
    );

    const limit = pLimit(this.config.parkConcurrency);
    const results = await Promise.all(
      parks.map((park) => limit(() => this.runPark(park, observedAt))),
    );

    const summary = this.summarize(observedAt, results);
    const icon = summary.exitCode === 0 ? "✅" : "❌";
    this.logger.log(
      `${icon} Run complete: ${summary.succeeded} succeeded, ${summary.failed} failed, ` +
        `${summary.observationsInserted} observations inserted, ` +
        `${summary.duplicatesDropped} duplicates dropped, ${summary.anomalies} anomalies`,
    );

    return summary;
  }

  private resolveParks(parkIds?: number[]): TrackedPark[] {
    if (parkIds === undefined || parkIds.length === 0) {
      return this.config.parks;
    }

    const unknown = parkIds.filter(
      (id) => !this.config.parks.some((park) => park.id === id),
    );
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `Unknown park id(s): ${unknown.join(", ")} (tracked: ${this.config.parks
          .map((park) => park.id)
          .join(", ")})`,
      );
    }

    const requested = new Set(parkIds);
    return this.config.parks.filter((park) => requested.has(park.id));
  }

  private async runPark(
    park: TrackedPark,
    observedAt: Date,
  ): Promise<ParkRunResult> {
    const base = { parkId: park.id, parkName: park.name };

    const fetched = await this.client.fetchParkQueueTimes(park.id);
    if (!fetched.ok) {
      this.logger.error(
        `Park ${park.id} (${park.name}) failed while fetching: ${fetched.failure.cause}`,
      );
      return {
        ...base,
        state: "failed",
        failedIn: "fetching",
        failure: fetched.failure,
      };
    }

    let batch: NormalizedBatch;
    try {
      batch = this.normalizer.normalize(park, fetched.snapshot, observedAt);
    } catch (error) {
      const cause = describeError(error);
      this.logger.error(
        `Park ${park.id} (${park.name}) failed while normalizing: ${cause}`,
      );
      return {
        ...base,
        state: "failed",
        failedIn: "normalizing",
        failure: { kind: "parse", parkId: park.id, cause },
      };
    }

    if (batch.anomalies.length > 0) {
      this.logger.log(
        `Park ${park.id}: skipped ${batch.anomalies.length} malformed entries`,
      );
    }

    try {
      const result = await this.store.apply(batch);
      this.logger.log(
        `Park ${park.id} (${park.name}): ${result.observationsInserted} new observations, ` +
          `${result.rides.inserted} new rides`,
      );
      return { ...base, state: "done", result, anomalies: batch.anomalies };
    } catch (error) {
      if (!(error instanceof StoreCommitError)) {
        throw error;
      }
      this.logger.error(
        `Park ${park.id} (${park.name}) failed while committing: ${error.message}`,
      );
      return {
        ...base,
        state: "failed",
        failedIn: "committing",
        failure: { kind: "commit", parkId: park.id, cause: error.message },
      };
    }
  }

  private summarize(observedAt: Date, results: ParkRunResult[]): RunSummary {
    let succeeded = 0;
    let observationsInserted = 0;
    let duplicatesDropped = 0;
    let anomalies = 0;

    for (const result of results) {
      if (result.state === "done") {
        succeeded++;
        observationsInserted += result.result.observationsInserted;
        duplicatesDropped += result.result.duplicatesDropped;
        anomalies += result.anomalies.length;
      }
    }

    const failed = results.length - succeeded;
    return {
      observedAt,
      results,
      succeeded,
      failed,
      observationsInserted,
      duplicatesDropped,
      anomalies,
      exitCode: results.length > 0 && failed === results.length ? 1 : 0,
    };
  }
}
