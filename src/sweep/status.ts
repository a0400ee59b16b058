import type { SweepRow } from "../core/types";
import type { RunRecord, RunStore } from "./run-store";

export const SWEEP_BUCKETS = [
  "ok",
  "failed",
  "in_progress",
  "missing_dir",
  "parse_error",
] as const;

export type SweepBucket = (typeof SWEEP_BUCKETS)[number];

export interface SweepStatus {
  total: number;
  buckets: Record<SweepBucket, string[]>;
}

export const classifyRecord = (record: RunRecord | undefined): SweepBucket => {
  if (!record) {
    return "missing_dir";
  }
  switch (record.summary.kind) {
    case "ok":
      return record.summary.value.ok ? "ok" : "failed";
    case "parse-error":
      return "parse_error";
    case "missing":
      return record.dirExists || record.status.kind !== "missing" ? "in_progress" : "missing_dir";
  }
};

export const summarizeSweep = (
  rows: readonly SweepRow[],
  records: Map<string, RunRecord>,
): SweepStatus => {
  const buckets: Record<SweepBucket, string[]> = {
    ok: [],
    failed: [],
    in_progress: [],
    missing_dir: [],
    parse_error: [],
  };
  for (const row of rows) {
    buckets[classifyRecord(records.get(row.run_id))].push(row.run_id);
  }
  return { total: rows.length, buckets };
};

export const collectSweepStatus = async (
  runs: RunStore,
  rows: readonly SweepRow[],
): Promise<{ status: SweepStatus; records: Map<string, RunRecord> }> => {
  const records = await runs.readRecords(rows.map((row) => row.run_id));
  return { status: summarizeSweep(rows, records), records };
};

/**
 * Rows whose status says running but whose owning task is no longer
 * active: the work stopped without writing a summary.
 */
export const findStalledRows = (
  records: Map<string, RunRecord>,
  activeTasks: readonly string[],
): string[] =>
  [...records.values()]
    .filter(
      (record) =>
        record.summary.kind === "missing" &&
        record.status.kind === "ok" &&
        record.status.value.state === "running" &&
        !activeTasks.includes(record.status.value.task_id),
    )
    .map((record) => record.runId);

/** True when every row finished with summary ok. */
export const isSweepComplete = (status: SweepStatus): boolean =>
  status.buckets.ok.length === status.total;
