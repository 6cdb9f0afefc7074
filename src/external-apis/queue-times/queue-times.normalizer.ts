import { Injectable, Logger } from "@nestjs/common";
import { TrackedPark } from "../../config/collector.config";
import { SchemaDriftAnomaly } from "../../common/types/failure.type";
import {
  getCalendarFields,
  parseSourceTimestamp,
} from "../../common/utils/date.util";
import {
  isNonEmptyString,
  isPositiveInteger,
  isRecord,
} from "../../common/utils/type-guards.util";
import {
  LandRecord,
  NormalizedBatch,
  ObservationRecord,
  RideRecord,
} from "../../queue-data/types/normalized-batch.type";
import { RawSnapshot } from "./queue-times.types";

interface RawRideEntry {
  id: number;
  name: string;
  isOpen: boolean;
  waitMinutes: number | null;
  lastUpdated: Date | null;
}

interface RawLandEntry {
  id: number;
  name: string;
}

type ClassifiedRide =
  | { valid: true; ride: RawRideEntry }
  | { valid: false; reason: string };

type ClassifiedLand =
  | { valid: true; land: RawLandEntry; rides: unknown[] }
  | { valid: false; reason: string; rides: unknown[] };

/**
 * Queue-Times Normalizer
 *
 * Turns one raw snapshot into dimension records and one observation per ride.
 *
 * Accepted shapes:
 * - nested: { lands: [{ id, name, rides: [...] }] }
 * - flat:   { rides: [...] }
 * - both (top-level rides are usually single rider queues)
 *
 * Wait time mapping (the API's is_open flag is not used):
 * - wait_time null/absent      → closed, no wait
 * - wait_time >= 0             → open, rounded minutes
 *
 * Entries without a usable id/name are skipped and reported as anomalies.
 * A land that cannot be identified still contributes its rides, without a land.
 */
@Injectable()
export class QueueTimesNormalizer {
  private readonly logger = new Logger(QueueTimesNormalizer.name);

  normalize(
    park: TrackedPark,
    snapshot: RawSnapshot,
    observedAt: Date,
  ): NormalizedBatch {
    const calendar = getCalendarFields(observedAt, park.timezone);
    const lands = new Map<number, LandRecord>();
    const rides = new Map<number, RideRecord>();
    const observations: ObservationRecord[] = [];
    const anomalies: SchemaDriftAnomaly[] = [];

    const acceptRide = (
      raw: unknown,
      landId: number | null,
      path: string,
    ): void => {
      const entry = this.classifyRide(raw);

      if (!entry.valid) {
        anomalies.push({ entity: "ride", path, reason: entry.reason });
        return;
      }

      const ride = entry.ride;
      if (rides.has(ride.id)) {
        anomalies.push({
          entity: "ride",
          path,
          reason: `duplicate ride id ${ride.id}`,
        });
        return;
      }

      rides.set(ride.id, {
        id: ride.id,
        parkId: park.id,
        landId,
        name: ride.name,
      });
      observations.push({
        rideId: ride.id,
        observedAt,
        waitMinutes: ride.waitMinutes,
        isOpen: ride.isOpen,
        sourceUpdatedAt: ride.lastUpdated,
        ...calendar,
      });
    };

    snapshot.lands.forEach((rawLand, landIndex) => {
      const path = `lands[${landIndex}]`;
      const entry = this.classifyLand(rawLand);
      let landId: number | null = null;

      if (entry.valid) {
        landId = entry.land.id;
        if (!lands.has(landId)) {
          lands.set(landId, {
            id: landId,
            parkId: park.id,
            name: entry.land.name,
          });
        }
      } else {
        anomalies.push({ entity: "land", path, reason: entry.reason });
      }

      entry.rides.forEach((rawRide, rideIndex) =>
        acceptRide(rawRide, landId, `${path}.rides[${rideIndex}]`),
      );
    });

    snapshot.rides.forEach((rawRide, rideIndex) =>
      acceptRide(rawRide, null, `rides[${rideIndex}]`),
    );

    for (const anomaly of anomalies) {
      this.logger.warn(
        `Park ${park.id}: skipped ${anomaly.entity} at ${anomaly.path} (${anomaly.reason})`,
      );
    }

    return {
      park: { id: park.id, name: park.name, timezone: park.timezone },
      lands: [...lands.values()],
      rides: [...rides.values()],
      observations,
      anomalies,
      observedAt,
    };
  }

  private classifyLand(raw: unknown): ClassifiedLand {
    if (!isRecord(raw)) {
      return { valid: false, reason: "entry is not an object", rides: [] };
    }

    const rides = Array.isArray(raw.rides) ? raw.rides : [];

    if (!isPositiveInteger(raw.id)) {
      return { valid: false, reason: "missing or invalid id", rides };
    }
    if (!isNonEmptyString(raw.name)) {
      return { valid: false, reason: "missing or invalid name", rides };
    }

    return { valid: true, land: { id: raw.id, name: raw.name.trim() }, rides };
  }

  private classifyRide(raw: unknown): ClassifiedRide {
    if (!isRecord(raw)) {
      return { valid: false, reason: "entry is not an object" };
    }
    if (!isPositiveInteger(raw.id)) {
      return { valid: false, reason: "missing or invalid id" };
    }
    if (!isNonEmptyString(raw.name)) {
      return { valid: false, reason: "missing or invalid name" };
    }

    const waitTime = raw.wait_time;
    let isOpen: boolean;
    let waitMinutes: number | null;

    if (waitTime === null || waitTime === undefined) {
      isOpen = false;
      waitMinutes = null;
    } else if (
      typeof waitTime === "number" &&
      Number.isFinite(waitTime) &&
      waitTime >= 0
    ) {
      isOpen = true;
      waitMinutes = Math.round(waitTime);
    } else {
      return {
        valid: false,
        reason: `invalid wait_time ${JSON.stringify(waitTime)}`,
      };
    }

    return {
      valid: true,
      ride: {
        id: raw.id,
        name: raw.name.trim(),
        isOpen,
        waitMinutes,
        lastUpdated: parseSourceTimestamp(raw.last_updated),
      },
    };
  }
}
