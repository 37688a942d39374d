import { formatDistanceStrict } from "date-fns";
import { table } from "table";
import type { StageRecord } from "./stage-result";

const HEADER_ROW = ["stage", "status", "duration", "detail"];

/**
 * The rows (including header) of the end of run stage summary.
 *
 * @param records
 */
export function stageReportRows(records: StageRecord[]): string[][] {
  return [
    HEADER_ROW,
    ...records.map((r) => [
      r.name,
      r.status,
      r.status === "skipped" ? "-" : formatDistanceStrict(r.finished, r.started),
      // produced artifact lists get long - the workspace is printed separately anyway
      r.detail || `${r.produced.length} artifact(s)`,
    ]),
  ];
}

/**
 * Plain text table summarising what happened to each stage.
 *
 * @param records
 */
export function reportStages(records: StageRecord[]): string {
  return table(stageReportRows(records), {
    columns: { 3: { width: 60, wrapWord: true } },
  });
}
