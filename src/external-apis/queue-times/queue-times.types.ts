import { NetworkFailure, ParseFailure } from "../../common/types/failure.type";

/**
 * Queue-Times.com API Types
 *
 * Based on API documentation: https://queue-times.com/pages/api
 * These describe the documented wire format. Live responses drift from it,
 * so the normalizer never trusts them and validates every entry.
 */

/**
 * Response from /parks/{id}/queue_times.json
 */
export interface QueueTimesParkQueueData {
  lands?: QueueTimesLand[];
  rides?: QueueTimesRide[]; // Rides not in lands
}

/**
 * Land (themed area) within a park
 */
export interface QueueTimesLand {
  id: number;
  name: string;
  rides: QueueTimesRide[];
}

/**
 * Ride/Attraction with wait time
 */
export interface QueueTimesRide {
  id: number;
  name: string;
  is_open: boolean;
  wait_time: number | null; // Minutes, 0 or null if closed
  last_updated: string; // ISO 8601 timestamp (UTC)
}

/**
 * Response whose top level has been checked. Entries are still unvalidated.
 */
export interface RawSnapshot {
  parkId: number;
  lands: unknown[];
  rides: unknown[];
}

export type FetchResult =
  | { ok: true; snapshot: RawSnapshot; attempts: number }
  | { ok: false; failure: NetworkFailure | ParseFailure };
