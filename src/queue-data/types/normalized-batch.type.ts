import { SchemaDriftAnomaly } from "../../common/types/failure.type";

export interface ParkRecord {
  id: number;
  name: string;
  timezone: string;
}

export interface LandRecord {
  id: number;
  parkId: number;
  name: string;
}

export interface RideRecord {
  id: number;
  parkId: number;
  landId: number | null;
  name: string;
}

export interface ObservationRecord {
  rideId: number;
  observedAt: Date;
  waitMinutes: number | null;
  isOpen: boolean;
  sourceUpdatedAt: Date | null;
  dayOfWeek: number;
  hour: number;
  isWeekend: boolean;
}

/**
 * Everything one snapshot of one park contributes to the store.
 * All observations share `observedAt`.
 */
export interface NormalizedBatch {
  park: ParkRecord;
  lands: LandRecord[];
  rides: RideRecord[];
  observations: ObservationRecord[];
  anomalies: SchemaDriftAnomaly[];
  observedAt: Date;
}

export interface DimensionCounts {
  inserted: number;
  updated: number;
  unchanged: number;
}

export interface ApplyResult {
  parkId: number;
  parks: DimensionCounts;
  lands: DimensionCounts;
  rides: DimensionCounts;
  observationsInserted: number;
  /** Observations whose (ride_id, observed_at) was already stored */
  duplicatesDropped: number;
}
