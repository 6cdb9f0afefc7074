export interface ParkStatus {
  parkId: number;
  parkName: string;
  /** Time of the newest stored observation, null if the park has none */
  lastObservedAt: Date | null;
  rideCount: number;
  observationCount: number;
}

export interface StoreCounts {
  parks: number;
  lands: number;
  rides: number;
  observations: number;
}
