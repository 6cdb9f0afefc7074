import { ValueTransformer } from "typeorm";

/**
 * Stores Date columns as ISO-8601 UTC text ("2026-10-19T10:30:00.000Z").
 *
 * SQLite has no timestamp type; fixed-width ISO strings compare and sort
 * chronologically, and the same instant always maps to the same key, which
 * the (ride_id, observed_at) uniqueness relies on.
 */
export const isoTimestampTransformer: ValueTransformer = {
  to(value: Date | null | undefined): string | null | undefined {
    if (value === undefined) return undefined;
    return value === null ? null : value.toISOString();
  },
  from(value: string | null): Date | null {
    return value === null ? null : new Date(value);
  },
};
