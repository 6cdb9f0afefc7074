import { Inject, Injectable, Logger } from "@nestjs/common";
import { InjectDataSource } from "@nestjs/typeorm";
import {
  DataSource,
  EntityManager,
  QueryFailedError,
  QueryRunner,
} from "typeorm";
import pLimit from "p-limit";
import { CollectorConfig, collectorConfig } from "../config/collector.config";
import {
  StoreCommitError,
  describeError,
} from "../common/errors/collector.errors";
import { isRecord } from "../common/utils/type-guards.util";
import { Park } from "../parks/entities/park.entity";
import { Land } from "../parks/entities/land.entity";
import { Ride } from "../rides/entities/ride.entity";
import { WaitTimeObservation } from "./entities/wait-time-observation.entity";
import {
  ApplyResult,
  DimensionCounts,
  NormalizedBatch,
} from "./types/normalized-batch.type";
import { ParkStatus, StoreCounts } from "./types/park-status.type";

// Keeps every multi-row INSERT below SQLite's 999 bound parameters
const INSERT_CHUNK_SIZE = 100;

// Bounded retry when another process holds the write lock past the busy timeout
const COMMIT_MAX_ATTEMPTS = 5;
const COMMIT_RETRY_DELAY_MS = 50;

interface RawParkStatusRow {
  parkId: number;
  rideCount: number;
  observationCount: number;
  lastObservedAt: string | null;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * SQLITE_BUSY and its extended codes (SQLITE_BUSY_SNAPSHOT, ...)
 */
function isBusyError(error: unknown): boolean {
  const driverError: unknown =
    error instanceof QueryFailedError ? error.driverError : error;
  if (isRecord(driverError) && typeof driverError.code === "string") {
    return driverError.code.startsWith("SQLITE_BUSY");
  }
  return describeError(error).includes("database is locked");
}

/**
 * Wait Time Store
 *
 * Embedded SQLite persistence for parks, lands, rides and observations.
 *
 * apply() writes one park's batch in one transaction:
 * 1. parks → lands → rides: insert if absent, update name if changed
 *    (INSERT ... ON CONFLICT(id) DO UPDATE SET name)
 * 2. observations: INSERT OR IGNORE on (ride_id, observed_at)
 *
 * Foreign keys are enforced, so an observation for an unknown ride aborts
 * the whole batch. Writes inside this process go through a single slot.
 * Other processes wait on SQLite's lock for at most the busy timeout, and a
 * commit that still finds the database busy is retried a few times.
 */
@Injectable()
export class WaitTimeStoreService {
  private readonly logger = new Logger(WaitTimeStoreService.name);
  private readonly writeSlot = pLimit(1);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    @Inject(collectorConfig.KEY) private readonly config: CollectorConfig,
  ) {}

  /**
   * @throws StoreCommitError when the transaction fails; nothing is persisted
   */
  async apply(batch: NormalizedBatch): Promise<ApplyResult> {
    return this.writeSlot(() => this.applyInTransaction(batch));
  }

  private async applyInTransaction(
    batch: NormalizedBatch,
  ): Promise<ApplyResult> {
    const parkId = batch.park.id;

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.writeBatch(batch);
        this.logger.debug(
          `Park ${parkId}: committed ${result.observationsInserted} observations ` +
            `(${result.duplicatesDropped} duplicates dropped)`,
        );
        return result;
      } catch (error) {
        if (isBusyError(error) && attempt < COMMIT_MAX_ATTEMPTS) {
          const delay = COMMIT_RETRY_DELAY_MS * 2 ** (attempt - 1);
          this.logger.warn(
            `Park ${parkId}: database is busy. Retrying commit in ${delay}ms...`,
          );
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        throw new StoreCommitError(
          parkId,
          `Transaction for park ${parkId} rolled back - ${describeError(error)}`,
        );
      }
    }
  }

  /**
   * BEGIN IMMEDIATE takes the write lock before the first read, so another
   * writer waits on the busy timeout instead of failing on a stale snapshot.
   */
  private async writeBatch(batch: NormalizedBatch): Promise<ApplyResult> {
    const queryRunner = this.dataSource.createQueryRunner();

    try {
      await queryRunner.connect();
      await queryRunner.query("BEGIN IMMEDIATE");

      try {
        const manager = queryRunner.manager;
        const parks = await this.upsertDimension(manager, Park, [batch.park]);
        const lands = await this.upsertDimension(manager, Land, batch.lands);
        const rides = await this.upsertDimension(manager, Ride, batch.rides);
        const { inserted, dropped } = await this.insertObservations(
          manager,
          batch,
        );
        await queryRunner.query("COMMIT");

        return {
          parkId: batch.park.id,
          parks,
          lands,
          rides,
          observationsInserted: inserted,
          duplicatesDropped: dropped,
        };
      } catch (error) {
        await this.rollback(queryRunner, batch.park.id);
        throw error;
      }
    } finally {
      await queryRunner.release();
    }
  }

  private async rollback(
    queryRunner: QueryRunner,
    parkId: number,
  ): Promise<void> {
    try {
      await queryRunner.query("ROLLBACK");
    } catch (error) {
      // SQLite may already have rolled the transaction back itself
      this.logger.warn(
        `Park ${parkId}: rollback failed - ${describeError(error)}`,
      );
    }
  }

  private async upsertDimension<R extends { id: number; name: string }>(
    manager: EntityManager,
    target: typeof Park | typeof Land | typeof Ride,
    records: R[],
  ): Promise<DimensionCounts> {
    const counts: DimensionCounts = { inserted: 0, updated: 0, unchanged: 0 };
    if (records.length === 0) {
      return counts;
    }

    const existingRows = await manager
      .createQueryBuilder(target, "dim")
      .select("dim.id", "id")
      .addSelect("dim.name", "name")
      .where("dim.id IN (:...ids)", { ids: records.map((record) => record.id) })
      .getRawMany<{ id: number; name: string }>();
    const existingNames = new Map(
      existingRows.map((row) => [Number(row.id), row.name]),
    );

    const pending: R[] = [];
    for (const record of records) {
      const storedName = existingNames.get(record.id);
      if (storedName === undefined) {
        counts.inserted++;
        pending.push(record);
      } else if (storedName !== record.name) {
        counts.updated++;
        pending.push(record);
      } else {
        counts.unchanged++;
      }
    }

    for (const rows of chunk(pending, INSERT_CHUNK_SIZE)) {
      await manager
        .createQueryBuilder()
        .insert()
        .into(target)
        .values(rows)
        .orUpdate(["name"], ["id"])
        .updateEntity(false)
        .execute();
    }

    return counts;
  }

  private async insertObservations(
    manager: EntityManager,
    batch: NormalizedBatch,
  ): Promise<{ inserted: number; dropped: number }> {
    if (batch.observations.length === 0) {
      return { inserted: 0, dropped: 0 };
    }

    const storedRows = await manager
      .createQueryBuilder(WaitTimeObservation, "obs")
      .select("obs.ride_id", "rideId")
      .where("obs.observed_at = :observedAt", {
        observedAt: batch.observedAt.toISOString(),
      })
      .getRawMany<{ rideId: number }>();
    const stored = new Set(storedRows.map((row) => Number(row.rideId)));

    const fresh = batch.observations.filter(
      (observation) => !stored.has(observation.rideId),
    );

    // OR IGNORE also absorbs rows another process committed since the read
    for (const rows of chunk(fresh, INSERT_CHUNK_SIZE)) {
      await manager
        .createQueryBuilder()
        .insert()
        .into(WaitTimeObservation)
        .values(rows)
        .orIgnore()
        .updateEntity(false)
        .execute();
    }

    return {
      inserted: fresh.length,
      dropped: batch.observations.length - fresh.length,
    };
  }

  /**
   * Newest observation per configured park, for health checks and the CLI.
   */
  async status(): Promise<ParkStatus[]> {
    const rows = await this.dataSource
      .createQueryBuilder(Ride, "ride")
      .leftJoin(WaitTimeObservation, "obs", "obs.ride_id = ride.id")
      .select("ride.park_id", "parkId")
      .addSelect("COUNT(DISTINCT ride.id)", "rideCount")
      .addSelect("COUNT(obs.id)", "observationCount")
      .addSelect("MAX(obs.observed_at)", "lastObservedAt")
      .groupBy("ride.park_id")
      .getRawMany<RawParkStatusRow>();
    const byPark = new Map(rows.map((row) => [Number(row.parkId), row]));

    return this.config.parks.map((park) => {
      const row = byPark.get(park.id);
      return {
        parkId: park.id,
        parkName: park.name,
        lastObservedAt: row?.lastObservedAt ? new Date(row.lastObservedAt) : null,
        rideCount: row ? Number(row.rideCount) : 0,
        observationCount: row ? Number(row.observationCount) : 0,
      };
    });
  }

  async counts(): Promise<StoreCounts> {
    const [parks, lands, rides, observations] = await Promise.all([
      this.dataSource.getRepository(Park).count(),
      this.dataSource.getRepository(Land).count(),
      this.dataSource.getRepository(Ride).count(),
      this.dataSource.getRepository(WaitTimeObservation).count(),
    ]);

    return { parks, lands, rides, observations };
  }
}
