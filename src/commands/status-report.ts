import { ParkStatus, StoreCounts } from "../queue-data/types/park-status.type";

export interface StatusReport {
  parks: ParkStatus[];
  counts: StoreCounts;
}

/**
 * Plain-text rendering of the `status` command.
 *
 * @example
 * //   64  Islands of Adventure   last 2026-10-19T10:30:00.000Z  (52 rides, 104 observations)
 */
export function formatStatusReport(report: StatusReport): string[] {
  const nameWidth = Math.max(
    0,
    ...report.parks.map((park) => park.parkName.length),
  );

  const lines = report.parks.map((park) => {
    const last = park.lastObservedAt
      ? `last ${park.lastObservedAt.toISOString()}`
      : "never observed";
    return (
      `${String(park.parkId).padStart(4)}  ${park.parkName.padEnd(nameWidth)}  ` +
      `${last}  (${park.rideCount} rides, ${park.observationCount} observations)`
    );
  });

  const { counts } = report;
  lines.push(
    `Totals: ${counts.parks} parks, ${counts.lands} lands, ` +
      `${counts.rides} rides, ${counts.observations} observations`,
  );
  return lines;
}

/**
 * JSON shape of `status --json`, dates as ISO strings.
 */
export function toStatusJson(report: StatusReport): string {
  return JSON.stringify(
    {
      parks: report.parks.map((park) => ({
        ...park,
        lastObservedAt: park.lastObservedAt?.toISOString() ?? null,
      })),
      counts: report.counts,
    },
    null,
    2,
  );
}
