/**
 * Per-park failure taxonomy.
 *
 * Failures are values, tagged by `kind`, so a park's pipeline can report
 * them without raising across park boundaries.
 */

export interface NetworkFailure {
  kind: "network";
  parkId: number;
  /** Number of HTTP attempts made before giving up */
  attempts: number;
  /** HTTP status of the last response, when one was received */
  status?: number;
  cause: string;
}

export interface ParseFailure {
  kind: "parse";
  parkId: number;
  cause: string;
}

export interface CommitFailure {
  kind: "commit";
  parkId: number;
  cause: string;
}

export type ParkFailure = NetworkFailure | ParseFailure | CommitFailure;

/**
 * Soft anomaly: a single ride or land entry that could not be used.
 * Counted and logged, never fatal.
 */
export interface SchemaDriftAnomaly {
  entity: "ride" | "land";
  /** Location in the raw tree, e.g. "lands[2].rides[0]" */
  path: string;
  reason: string;
}
