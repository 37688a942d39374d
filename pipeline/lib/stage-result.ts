import type { StageFailedError } from "./pipeline-errors";

/**
 * Every stage the pipeline knows about, in the order they execute.
 */
export const STAGE_ORDER = [
  "alignment",
  "reference-index",
  "realignment",
  "bam-index",
  "variant-calling",
  "decompress",
  "bed-conversion",
] as const;

export type StageName = (typeof STAGE_ORDER)[number];

/**
 * The outcome of a single stage execution. A failure is always a StageFailedError -
 * for in-process stages the command names the function that failed.
 */
export type StageResult =
  | { type: "completed"; produced: string[] }
  | { type: "skipped"; reason: string }
  | { type: "failed"; error: StageFailedError };

export const StageResult = {
  Completed: (produced: string[]): StageResult => ({
    type: "completed",
    produced,
  }),

  Skipped: (reason: string): StageResult => ({
    type: "skipped",
    reason,
  }),

  Failed: (error: StageFailedError): StageResult => ({
    type: "failed",
    error,
  }),
};

/**
 * What the driver remembers about each stage once it has been dealt with.
 */
export type StageRecord = {
  name: StageName;
  status: StageResult["type"];
  started: Date;
  finished: Date;
  produced: string[];
  detail: string;
};
