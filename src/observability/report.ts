import {
  ConfigError,
  DeterminismError,
  ExecutionError,
  PolicyViolationError,
  errorMessage,
} from "../core/errors";
import type {
  TaskStatusDocument,
  WorkflowState,
  WorkflowStateAuditEntry,
} from "../core/types";
import type { FlowSummary } from "../flow/orchestrator";
import type { TaskListEntry } from "../runtime/task-tracker";
import type { RowOutcome, SweepReport } from "../sweep/scheduler";
import { SWEEP_BUCKETS, type SweepStatus } from "../sweep/status";

export const renderSection = (title: string, lines: string[]): string[] => [
  `=== ${title} ===`,
  ...(lines.length > 0 ? lines : ["(empty)"]),
];

export const renderTable = (headers: string[], rows: string[][]): string[] => {
  if (rows.length === 0) {
    return ["(empty)"];
  }

  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => (row[index] ?? "").length)),
  );

  const formatRow = (values: string[]): string =>
    values
      .map((value, index) => value.padEnd(widths[index] ?? 0))
      .join(" | ")
      .trimEnd();

  return [
    formatRow(headers),
    widths.map((width) => "-".repeat(width)).join("-+-"),
    ...rows.map((row) => formatRow(row)),
  ];
};

export const buildFlowSummaryLines = (summary: FlowSummary): string[] => [
  ...renderSection("flow", [
    `flow_id=${summary.flow_id}`,
    `status=${summary.status}`,
    `target=${summary.resolved_target ?? "unbound"}`,
    ...(summary.failed_phase
      ? [`phase=${summary.failed_phase}`, `reason=${summary.reason ?? ""}`]
      : []),
  ]),
  ...renderSection(
    "phases",
    renderTable(
      ["phase", "command", "verdict", "detail"],
      summary.phases.map((phase) => [
        phase.attempt > 1 ? `${phase.phase_id}#${phase.attempt}` : phase.phase_id,
        phase.command,
        phase.phase_pass ? "pass" : "fail",
        phase.detail,
      ]),
    ),
  ),
];

export const buildSweepStatusLines = (status: SweepStatus): string[] => [
  [
    `total=${status.total}`,
    ...SWEEP_BUCKETS.map((bucket) => `${bucket}=${status.buckets[bucket].length}`),
  ].join(" "),
  ...SWEEP_BUCKETS.filter(
    (bucket) => bucket !== "ok" && status.buckets[bucket].length > 0,
  ).map((bucket) => `${bucket}: ${status.buckets[bucket].join(", ")}`),
];

const describeRow = (row: RowOutcome): string => {
  switch (row.kind) {
    case "skipped":
      return "skipped (summary ok)";
    case "dry-run":
      return `dry-run ${row.commandPath}`;
    case "queued":
      return `queued in ${row.taskId}`;
    case "still-running":
      return `still running in ${row.taskId}`;
    case "finished":
      return row.ok
        ? `ok (${row.taskId})`
        : `${row.state} ${row.failureClass ?? ""} attempts=${row.attempts}`.trimEnd();
  }
};

export const buildSweepReportLines = (report: SweepReport): string[] => [
  ...report.rows.map((row) => `${row.runId}: ${describeRow(row)}`),
  ...(report.inFlightTasks.length > 0
    ? [`in flight: ${report.inFlightTasks.join(", ")}`]
    : []),
  ...(report.halted
    ? [
        `${report.halted.runId ? `row=${report.halted.runId} ` : ""}halted: ${report.halted.reason}`,
      ]
    : []),
  report.ok ? "sweep ok" : "sweep failed",
];

export const buildTaskStatusLines = (status: TaskStatusDocument): string[] => [
  `task=${status.task_id}`,
  `state=${status.state}`,
  `created_at=${status.created_at}`,
  ...(status.started_at ? [`started_at=${status.started_at}`] : []),
  ...(status.ended_at ? [`ended_at=${status.ended_at}`] : []),
  ...(status.exit_code !== undefined ? [`exit_code=${status.exit_code}`] : []),
  `timeout_secs=${status.timeout_secs}`,
  `stdout=${status.stdout_path}`,
];

export const buildTaskListLines = (entries: TaskListEntry[]): string[] =>
  entries.length > 0
    ? renderTable(
        ["task", "state", "created", "exit"],
        entries.map((entry) =>
          typeof entry.status === "string"
            ? [entry.taskId, entry.status, "", ""]
            : [
                entry.taskId,
                entry.status.state,
                entry.status.created_at,
                entry.status.exit_code !== undefined ? String(entry.status.exit_code) : "",
              ],
        ),
      )
    : ["No tasks"];

export const buildStateLines = (state: WorkflowState): string[] => [
  `state=${state.state}`,
  `previous_state=${state.previous_state}`,
  `reason=${state.reason}`,
  `updated_at=${state.updated_at}`,
  `host=${state.host || "unknown"}`,
];

export const buildStateHistoryLines = (entries: WorkflowStateAuditEntry[]): string[] =>
  entries.length > 0
    ? entries.map(
        (entry) =>
          `${entry.written_at} ${entry.prior.state} -> ${entry.next.state}: ${entry.next.reason}`,
      )
    : ["No transitions recorded"];

/** Lines for a failure that ended a command. */
export const buildFailureLines = (error: unknown): string[] => {
  if (error instanceof PolicyViolationError) {
    return [`${error.phase ? `phase=${error.phase} ` : ""}refused (${error.code}): ${error.message}`];
  }
  if (error instanceof DeterminismError) {
    return [`${error.subject ? `subject=${error.subject} ` : ""}failed (${error.code}): ${error.message}`];
  }
  if (error instanceof ExecutionError) {
    return [`subject=${error.subject} failed (${error.failureClass}): ${error.message}`];
  }
  if (error instanceof ConfigError) {
    return [`configuration error: ${error.message}`];
  }
  return [`error: ${errorMessage(error)}`];
};
