import { TestingModule } from "@nestjs/testing";
import { DataSource } from "typeorm";
import { WaitTimeStoreService } from "./wait-time-store.service";
import { WaitTimeObservation } from "./entities/wait-time-observation.entity";
import { NormalizedBatch } from "./types/normalized-batch.type";
import { Ride } from "../rides/entities/ride.entity";
import { StoreCommitError } from "../common/errors/collector.errors";
import { QueueTimesNormalizer } from "../external-apis/queue-times/queue-times.normalizer";
import { QueueTimesParkQueueData } from "../external-apis/queue-times/queue-times.types";
import {
  TEST_OBSERVED_AT,
  createNestedResponse,
  createTestCollectorConfig,
} from "../../test/fixtures/queue-times.fixtures";
import {
  closeTestModule,
  createTestModule,
} from "../../test/helpers/test-app.helper";

describe("WaitTimeStoreService", () => {
  let module: TestingModule;
  let store: WaitTimeStoreService;
  let normalizer: QueueTimesNormalizer;
  let dataSource: DataSource;

  const [islands, universal] = createTestCollectorConfig().parks;
  const nextSnapshot = new Date("2026-10-19T11:00:00.000Z");

  const batchFor = (
    body: QueueTimesParkQueueData,
    observedAt: Date = TEST_OBSERVED_AT,
  ): NormalizedBatch =>
    normalizer.normalize(
      islands,
      { parkId: islands.id, lands: body.lands ?? [], rides: body.rides ?? [] },
      observedAt,
    );

  beforeEach(async () => {
    module = await createTestModule();
    store = module.get<WaitTimeStoreService>(WaitTimeStoreService);
    normalizer = module.get<QueueTimesNormalizer>(QueueTimesNormalizer);
    dataSource = module.get<DataSource>(DataSource);
  });

  afterEach(async () => {
    await closeTestModule(module);
  });

  describe("apply", () => {
    it("should insert dimensions and observations", async () => {
      const result = await store.apply(batchFor(createNestedResponse(64)));

      expect(result).toEqual({
        parkId: 64,
        parks: { inserted: 1, updated: 0, unchanged: 0 },
        lands: { inserted: 2, updated: 0, unchanged: 0 },
        rides: { inserted: 4, updated: 0, unchanged: 0 },
        observationsInserted: 4,
        duplicatesDropped: 0,
      });
      expect(await store.counts()).toEqual({
        parks: 1,
        lands: 2,
        rides: 4,
        observations: 4,
      });
    });

    it("should be idempotent for the same batch", async () => {
      const batch = batchFor(createNestedResponse(64));
      await store.apply(batch);

      const second = await store.apply(batch);

      expect(second).toEqual({
        parkId: 64,
        parks: { inserted: 0, updated: 0, unchanged: 1 },
        lands: { inserted: 0, updated: 0, unchanged: 2 },
        rides: { inserted: 0, updated: 0, unchanged: 4 },
        observationsInserted: 0,
        duplicatesDropped: 4,
      });
      expect(await store.counts()).toEqual({
        parks: 1,
        lands: 2,
        rides: 4,
        observations: 4,
      });
    });

    it("should update a renamed ride and append new observations", async () => {
      await store.apply(batchFor(createNestedResponse(64)));
      const renamed = createNestedResponse(64);
      const [firstLand] = renamed.lands ?? [];
      firstLand.rides[0] = { ...firstLand.rides[0], name: "Hulk Coaster" };

      const result = await store.apply(batchFor(renamed, nextSnapshot));

      expect(result.rides).toEqual({ inserted: 0, updated: 1, unchanged: 3 });
      expect(result.observationsInserted).toBe(4);
      const ride = await dataSource
        .getRepository(Ride)
        .findOneByOrFail({ id: 6411 });
      expect(ride.name).toBe("Hulk Coaster");
      expect((await store.counts()).observations).toBe(8);
    });

    it("should persist the observation columns", async () => {
      await store.apply(batchFor(createNestedResponse(64)));

      const observations = dataSource.getRepository(WaitTimeObservation);
      const open = await observations.findOneByOrFail({ rideId: 6411 });
      const closed = await observations.findOneByOrFail({ rideId: 6422 });

      expect(open).toMatchObject({
        rideId: 6411,
        observedAt: TEST_OBSERVED_AT,
        waitMinutes: 45,
        isOpen: true,
        sourceUpdatedAt: new Date("2026-10-19T10:44:03.000Z"),
        dayOfWeek: 0,
        hour: 6,
        isWeekend: false,
      });
      expect(closed).toMatchObject({ waitMinutes: null, isOpen: false });
    });

    it("should store observation times as ISO strings", async () => {
      await store.apply(batchFor(createNestedResponse(64)));

      const rows: unknown = await dataSource.query(
        "SELECT DISTINCT observed_at FROM wait_time_observations",
      );

      expect(rows).toEqual([{ observed_at: "2026-10-19T10:30:00.000Z" }]);
    });

    it("should roll back everything when an observation has no ride", async () => {
      const batch = batchFor(createNestedResponse(64));
      batch.observations.push({ ...batch.observations[0], rideId: 9999 });

      await expect(store.apply(batch)).rejects.toThrow(StoreCommitError);
      expect(await store.counts()).toEqual({
        parks: 0,
        lands: 0,
        rides: 0,
        observations: 0,
      });
    });

    it("should report the park of a failed commit", async () => {
      const batch = batchFor(createNestedResponse(64));
      batch.observations.push({ ...batch.observations[0], rideId: 9999 });

      await expect(store.apply(batch)).rejects.toMatchObject({
        name: "StoreCommitError",
        parkId: 64,
      });
    });

    it("should serialize concurrent applies of the same batch", async () => {
      const batch = batchFor(createNestedResponse(64));

      const results = await Promise.all([
        store.apply(batch),
        store.apply(batch),
      ]);

      expect(results.map((result) => result.observationsInserted)).toEqual([
        4, 0,
      ]);
      expect(results.map((result) => result.duplicatesDropped)).toEqual([
        0, 4,
      ]);
      expect((await store.counts()).observations).toBe(4);
    });

    it("should commit a park without rides", async () => {
      const result = await store.apply(batchFor({ lands: [], rides: [] }));

      expect(result.parks.inserted).toBe(1);
      expect(result.observationsInserted).toBe(0);
    });
  });

  describe("status", () => {
    it("should list every configured park before the first run", async () => {
      expect(await store.status()).toEqual([
        {
          parkId: 64,
          parkName: "Islands of Adventure",
          lastObservedAt: null,
          rideCount: 0,
          observationCount: 0,
        },
        {
          parkId: 65,
          parkName: "Universal Studios Florida",
          lastObservedAt: null,
          rideCount: 0,
          observationCount: 0,
        },
        {
          parkId: 334,
          parkName: "Epic Universe",
          lastObservedAt: null,
          rideCount: 0,
          observationCount: 0,
        },
      ]);
    });

    it("should report the newest observation per park", async () => {
      await store.apply(batchFor(createNestedResponse(64)));
      await store.apply(batchFor(createNestedResponse(64), nextSnapshot));

      const [islandsStatus, universalStatus] = await store.status();

      expect(islandsStatus).toEqual({
        parkId: 64,
        parkName: "Islands of Adventure",
        lastObservedAt: nextSnapshot,
        rideCount: 4,
        observationCount: 8,
      });
      expect(universalStatus).toEqual({
        parkId: universal.id,
        parkName: universal.name,
        lastObservedAt: null,
        rideCount: 0,
        observationCount: 0,
      });
    });
  });
});
