import {
  ParkFailure,
  SchemaDriftAnomaly,
} from "../../common/types/failure.type";
import { ApplyResult } from "../../queue-data/types/normalized-batch.type";

export type PipelineStage = "fetching" | "normalizing" | "committing";

export type ParkRunResult =
  | {
      state: "done";
      parkId: number;
      parkName: string;
      result: ApplyResult;
      anomalies: SchemaDriftAnomaly[];
    }
  | {
      state: "failed";
      parkId: number;
      parkName: string;
      failedIn: PipelineStage;
      failure: ParkFailure;
    };

export interface RunOptions {
  /** Subset of the configured parks; all of them when omitted */
  parkIds?: number[];
  now?: Date;
}

export interface RunSummary {
  observedAt: Date;
  results: ParkRunResult[];
  succeeded: number;
  failed: number;
  observationsInserted: number;
  duplicatesDropped: number;
  anomalies: number;
  /** 1 only when every park failed */
  exitCode: 0 | 1;
}
