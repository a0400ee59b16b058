import { type Clock, compactStamp, systemClock } from "../core/clock";
import type { RunSummaryRecord } from "../core/documents";
import { ExecutionError, PolicyViolationError } from "../core/errors";
import type { FailureClass, SweepRow } from "../core/types";
import { type Logger, silentLogger } from "../observability/logger";
import type { PodflowConfig } from "../project/config";
import { shellJoin, shellQuote } from "../runtime/process";
import type { TaskTracker } from "../runtime/task-tracker";
import { type RowSelection, selectRows } from "./manifest";
import type { DocumentRead, RunRecord, RunStore } from "./run-store";

export type SweepSettings = PodflowConfig["sweep"];

export interface SweepRunOptions {
  selection: RowSelection;
  /** Maximum rows to dispatch; 0 dispatches none. */
  limit?: number;
  force: boolean;
  dryRun: boolean;
  /**
   * Attached: dispatch rows one at a time and wait for each. Detached: hand
   * every row to one chained task and return.
   */
  attached: boolean;
}

export type RowOutcome =
  | { runId: string; kind: "skipped" }
  | { runId: string; kind: "dry-run"; commandPath: string }
  | {
      runId: string;
      kind: "finished";
      ok: boolean;
      state: string;
      failureClass?: FailureClass;
      attempts: number;
      taskId: string;
    }
  | { runId: string; kind: "queued"; taskId: string }
  | { runId: string; kind: "still-running"; taskId: string };

export interface SweepHalt {
  runId?: string;
  reason: string;
}

export interface SweepReport {
  rows: RowOutcome[];
  /** Sweep tasks that were already in flight when the sweep began. */
  inFlightTasks: string[];
  halted: SweepHalt | null;
  ok: boolean;
}

export interface SweepSchedulerDeps {
  tasks: TaskTracker;
  runs: RunStore;
  settings: SweepSettings;
  /** Default working directory for the trainer. */
  workdir: string;
  logger?: Logger;
  clock?: Clock;
  /** Runs once, before the first row is actually dispatched. */
  onDispatch?: () => Promise<void>;
}

const SWEEP_TASK_PREFIXES = ["run-", "sweep-"];

export const rowTaskId = (runId: string): string => `run-${runId}`.slice(0, 128);

export const isSweepTaskId = (taskId: string): boolean =>
  SWEEP_TASK_PREFIXES.some((prefix) => taskId.startsWith(prefix));

/** Sweep tasks on the host that are pending or running. */
export const activeSweepTasks = async (tasks: TaskTracker): Promise<string[]> =>
  (await tasks.list())
    .filter(
      (entry) =>
        isSweepTaskId(entry.taskId) &&
        typeof entry.status === "object" &&
        (entry.status.state === "pending" || entry.status.state === "running"),
    )
    .map((entry) => entry.taskId);

/**
 * Renders the trainer invocation for one row:
 * `<trainer...> <spec_reference> out_dir=<dir> seed=<n> <overrides...>`.
 */
export const renderRowCommand = (
  row: SweepRow,
  options: { trainer: readonly string[]; workdir: string; outDir: string; devices?: string },
): string =>
  [
    "#!/usr/bin/env bash",
    "set -euo pipefail",
    `cd ${shellQuote(options.workdir)}`,
    ...(options.devices !== undefined
      ? [`export CUDA_VISIBLE_DEVICES=${shellQuote(options.devices)}`]
      : []),
    `exec ${shellJoin([
      ...options.trainer,
      row.spec_reference,
      `out_dir=${options.outDir}`,
      `seed=${row.seed}`,
      ...row.overrides.map((override) => `${override.key}=${override.value}`),
    ])}`,
    "",
  ].join("\n");

type RowDecision =
  | { kind: "skip" }
  | { kind: "refuse"; reason: string }
  | { kind: "finalize"; record: RunRecord }
  | { kind: "dispatch"; archive: boolean };

/**
 * Runs manifest rows on the target. Results live next to each row on the
 * target (`runs/<id>/summary.json`), so a sweep can be resumed from any
 * controller and completed rows are never repeated.
 */
export class SweepScheduler {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private dispatchStarted = false;

  constructor(private readonly deps: SweepSchedulerDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? systemClock;
  }

  async run(rows: SweepRow[], options: SweepRunOptions): Promise<SweepReport> {
    const selected = selectRows(rows, options.selection);
    const inFlight = await activeSweepTasks(this.deps.tasks);

    if (inFlight.length > 0 && !options.dryRun) {
      if (!options.attached) {
        this.logger.info(`sweep tasks already in flight: ${inFlight.join(", ")}`);
        return { rows: [], inFlightTasks: inFlight, halted: null, ok: true };
      }
      for (const taskId of inFlight) {
        this.logger.info(`waiting for in-flight sweep task ${taskId}`);
        const result = await this.deps.tasks.wait(taskId, this.waitOptions());
        if (result.kind === "wait-timeout") {
          return {
            rows: [],
            inFlightTasks: inFlight,
            halted: { reason: `sweep task ${taskId} still running after the wait timeout` },
            ok: false,
          };
        }
      }
    }

    const records = await this.deps.runs.readRecords(selected.map((row) => row.run_id));
    return options.attached || options.dryRun
      ? this.runAttached(selected, records, inFlight, options)
      : this.runDetached(selected, records, inFlight, options);
  }

  private decide(
    runId: string,
    record: RunRecord | undefined,
    inFlight: readonly string[],
    force: boolean,
  ): RowDecision {
    const summary: DocumentRead<RunSummaryRecord> = record?.summary ?? { kind: "missing" };
    const hasResults = summary.kind !== "missing" || record?.status.kind === "ok";
    if (force) {
      return { kind: "dispatch", archive: hasResults };
    }
    if (summary.kind === "ok" && summary.value.ok) {
      return { kind: "skip" };
    }
    if (
      record &&
      summary.kind === "ok" &&
      record.status.kind === "ok" &&
      inFlight.includes(record.status.value.task_id)
    ) {
      return { kind: "finalize", record };
    }
    if (summary.kind === "ok") {
      return {
        kind: "refuse",
        reason: `row ${runId} has a failed summary (${summary.value.failure_class ?? summary.value.state ?? "not ok"}); use --force to re-run it`,
      };
    }
    if (summary.kind === "parse-error") {
      return {
        kind: "refuse",
        reason: `row ${runId} has an unreadable summary (${summary.reason}); use --force to re-run it`,
      };
    }
    return { kind: "dispatch", archive: false };
  }

  private async runAttached(
    rows: SweepRow[],
    records: Map<string, RunRecord>,
    inFlight: string[],
    options: SweepRunOptions,
  ): Promise<SweepReport> {
    const outcomes: RowOutcome[] = [];
    let dispatched = 0;
    let failed = false;

    for (const row of rows) {
      const decision = this.decide(row.run_id, records.get(row.run_id), inFlight, options.force);

      if (decision.kind === "skip") {
        this.logger.info(`skip ${row.run_id} (summary ok)`);
        outcomes.push({ runId: row.run_id, kind: "skipped" });
        continue;
      }
      if (decision.kind === "refuse") {
        return this.report(outcomes, inFlight, { runId: row.run_id, reason: decision.reason });
      }
      if (decision.kind === "finalize") {
        const outcome = this.finalize(row, decision.record, 1);
        outcomes.push(outcome);
        if (outcome.kind === "finished" && !outcome.ok) {
          failed = true;
          if (this.deps.settings.onFailure === "fail-fast") {
            return this.report(outcomes, inFlight, this.failureHalt(outcome));
          }
        }
        continue;
      }

      if (options.limit !== undefined && dispatched >= options.limit) {
        break;
      }
      dispatched += 1;

      if (options.dryRun) {
        const commandPath = await this.deps.runs.writeCommandRecord(row.run_id, this.commandFor(row, options));
        this.logger.info(`dry-run ${row.run_id}: ${commandPath}`);
        outcomes.push({ runId: row.run_id, kind: "dry-run", commandPath });
        continue;
      }

      await this.beginDispatch();
      if (decision.archive) {
        await this.deps.runs.archiveResults(row.run_id);
      }
      const outcome = await this.dispatchAndWait(row, options);
      outcomes.push(outcome);

      if (outcome.kind === "still-running") {
        return this.report(outcomes, inFlight, {
          runId: row.run_id,
          reason: `row ${row.run_id} still running after the wait timeout`,
        });
      }
      if (outcome.kind === "finished" && !outcome.ok) {
        failed = true;
        if (this.deps.settings.onFailure === "fail-fast") {
          return this.report(outcomes, inFlight, this.failureHalt(outcome));
        }
      }
    }

    const report = this.report(outcomes, inFlight, null);
    return failed ? { ...report, ok: false } : report;
  }

  private async runDetached(
    rows: SweepRow[],
    records: Map<string, RunRecord>,
    inFlight: string[],
    options: SweepRunOptions,
  ): Promise<SweepReport> {
    const outcomes: RowOutcome[] = [];
    const queued: Array<{ row: SweepRow; runner: string }> = [];
    let halted: SweepHalt | null = null;

    for (const row of rows) {
      const decision = this.decide(row.run_id, records.get(row.run_id), inFlight, options.force);
      if (decision.kind === "skip") {
        outcomes.push({ runId: row.run_id, kind: "skipped" });
        continue;
      }
      if (decision.kind === "refuse") {
        halted = { runId: row.run_id, reason: decision.reason };
        break;
      }
      if (decision.kind === "finalize") {
        outcomes.push(this.finalize(row, decision.record, 1));
        continue;
      }
      if (options.limit !== undefined && queued.length >= options.limit) {
        break;
      }

      await this.beginDispatch();
      if (decision.archive) {
        await this.deps.runs.archiveResults(row.run_id);
      }
      queued.push({ row, runner: await this.prepareRow(row, options) });
    }

    if (queued.length > 0) {
      const taskId = `sweep-${compactStamp(this.clock())}`;
      const lines = queued.map(({ row, runner }) =>
        shellJoin(["bash", runner, ...this.rowArgs(row, taskId)]),
      );
      const command =
        this.deps.settings.onFailure === "fail-fast"
          ? lines.join("\n")
          : ["rc=0", ...lines.map((line) => `${line} || rc=1`), 'exit "$rc"'].join("\n");

      const submitted = await this.deps.tasks.submit({ taskId, command, timeoutSecs: 0 });
      if (submitted.status === "rejected") {
        throw new ExecutionError(
          `sweep task ${taskId} was rejected: ${submitted.reason}`,
          "infrastructure",
          taskId,
        );
      }
      this.logger.info(`launched ${queued.length} row(s) as ${taskId}`);
      for (const { row } of queued) {
        outcomes.push({ runId: row.run_id, kind: "queued", taskId });
      }
    }

    return this.report(outcomes, inFlight, halted);
  }

  private async dispatchAndWait(row: SweepRow, options: SweepRunOptions): Promise<RowOutcome> {
    const taskId = rowTaskId(row.run_id);
    const maxAttempts = 1 + this.deps.settings.infraRetries;

    for (let attempt = 1; ; attempt += 1) {
      const outcome = await this.attempt(row, taskId, attempt, options);
      const retryable =
        outcome.kind === "finished" && !outcome.ok && outcome.failureClass === "infrastructure";
      if (!retryable || attempt >= maxAttempts) {
        return outcome;
      }
      this.logger.warn(`${row.run_id}: infrastructure failure, retrying (${attempt}/${maxAttempts - 1})`);
    }
  }

  private async attempt(
    row: SweepRow,
    taskId: string,
    attempt: number,
    options: SweepRunOptions,
  ): Promise<RowOutcome> {
    const infrastructure = (reason: string): RowOutcome => {
      this.logger.warn(`${row.run_id}: ${reason}`);
      return {
        runId: row.run_id,
        kind: "finished",
        ok: false,
        state: "failed",
        failureClass: "infrastructure",
        attempts: attempt,
        taskId,
      };
    };

    try {
      const runner = await this.prepareRow(row, options);
      const submitted = await this.deps.tasks.submit({
        taskId,
        command: shellJoin(["bash", runner, ...this.rowArgs(row, taskId)]),
        timeoutSecs: 0,
        force: true,
      });
      if (submitted.status === "rejected") {
        throw new PolicyViolationError(
          `row ${row.run_id} task was rejected: ${submitted.reason}`,
          "DUPLICATE_TASK",
        );
      }
      this.logger.info(`dispatched ${row.run_id} as ${taskId}`);
    } catch (error) {
      if (error instanceof ExecutionError && error.failureClass === "infrastructure") {
        return infrastructure(error.message);
      }
      throw error;
    }

    // Once launched, the task may outlive our view of it: never resubmit.
    try {
      const waited = await this.deps.tasks.wait(taskId, this.waitOptions());
      if (waited.kind === "wait-timeout") {
        return { runId: row.run_id, kind: "still-running", taskId };
      }
    } catch (error) {
      if (error instanceof ExecutionError && error.failureClass === "infrastructure") {
        this.logger.warn(`${row.run_id}: ${error.message}`);
        return { runId: row.run_id, kind: "still-running", taskId };
      }
      throw error;
    }

    const record = (await this.deps.runs.readRecords([row.run_id])).get(row.run_id);
    if (!record || record.summary.kind === "missing") {
      return infrastructure(`task ${taskId} ended without a run summary`);
    }
    return this.finalize(row, record, attempt, taskId);
  }

  private finalize(row: SweepRow, record: RunRecord, attempts: number, taskId?: string): RowOutcome {
    const owner =
      taskId ?? (record.status.kind === "ok" ? record.status.value.task_id : rowTaskId(row.run_id));
    if (record.summary.kind !== "ok") {
      return {
        runId: row.run_id,
        kind: "finished",
        ok: false,
        state: "failed",
        failureClass: "infrastructure",
        attempts,
        taskId: owner,
      };
    }
    const summary = record.summary.value;
    const outcome: RowOutcome = {
      runId: row.run_id,
      kind: "finished",
      ok: summary.ok,
      state: summary.state ?? (summary.ok ? "success" : "failed"),
      ...(summary.ok ? {} : { failureClass: summary.failure_class ?? "crash" }),
      attempts,
      taskId: owner,
    };
    this.logger.info(`${row.run_id}: ${outcome.state}`);
    return outcome;
  }

  private failureHalt(outcome: Extract<RowOutcome, { kind: "finished" }>): SweepHalt {
    return {
      runId: outcome.runId,
      reason: `row ${outcome.runId} failed (${outcome.failureClass ?? outcome.state})`,
    };
  }

  private report(outcomes: RowOutcome[], inFlight: string[], halted: SweepHalt | null): SweepReport {
    return {
      rows: outcomes,
      inFlightTasks: inFlight,
      halted,
      ok: halted === null,
    };
  }

  private async beginDispatch(): Promise<void> {
    if (this.dispatchStarted) {
      return;
    }
    this.dispatchStarted = true;
    await this.deps.onDispatch?.();
  }

  private waitOptions(): { timeoutSecs: number; pollIntervalMs: number } {
    return {
      timeoutSecs: this.deps.settings.waitTimeoutSecs,
      pollIntervalMs: this.deps.settings.pollIntervalSecs * 1000,
    };
  }

  private outDir(row: SweepRow): string {
    const settings = this.deps.settings;
    if (settings.outputMode === "durable") {
      return this.deps.runs.runDir(row.run_id);
    }
    if (!settings.localRoot.startsWith("/")) {
      throw new PolicyViolationError(
        `sweep.localRoot must be an absolute path when outputMode is local_sync: ${JSON.stringify(settings.localRoot)}`,
        "INVALID_IDENTIFIER",
      );
    }
    return `${settings.localRoot.replace(/\/+$/, "")}/${row.run_id}`;
  }

  private commandFor(row: SweepRow, options: SweepRunOptions): string {
    const shard = options.selection.shard;
    const devices = shard ? this.deps.settings.shardDevices[shard.index] : undefined;
    return renderRowCommand(row, {
      trainer: this.deps.settings.trainer,
      workdir: this.deps.settings.workdir || this.deps.workdir,
      outDir: this.outDir(row),
      ...(devices !== undefined ? { devices } : {}),
    });
  }

  /** Writes the command record and the row runner; returns the runner path. */
  private async prepareRow(row: SweepRow, options: SweepRunOptions): Promise<string> {
    await this.deps.runs.writeCommandRecord(row.run_id, this.commandFor(row, options));
    return this.deps.runs.writeRowRunner(row.run_id);
  }

  private rowArgs(row: SweepRow, taskId: string): string[] {
    const settings = this.deps.settings;
    return [
      this.deps.runs.runDir(row.run_id),
      this.outDir(row),
      row.run_id,
      String(row.seed),
      row.spec_reference,
      taskId,
      String(settings.timeoutSecs),
      String(settings.graceSecs),
      String(settings.syncIntervalSecs),
      settings.completionMarker,
    ];
  }
}
