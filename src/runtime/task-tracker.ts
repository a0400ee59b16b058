import {
  type Clock,
  type Sleep,
  compactStamp,
  isoSeconds,
  systemClock,
} from "../core/clock";
import { canonicalJson } from "../core/canonical-json";
import { TaskStatusSchema, tryParseDocument } from "../core/documents";
import { DeterminismError, ExecutionError, PolicyViolationError } from "../core/errors";
import {
  type TaskId,
  type TaskState,
  type TaskStatusDocument,
  TERMINAL_TASK_STATES,
  asTaskId,
  isIdentifier,
} from "../core/types";
import { type Logger, silentLogger } from "../observability/logger";
import {
  type LauncherKind,
  MISSING_FILE_EXIT,
  parseReadFilesOutput,
} from "./actions";
import { Poller } from "./poller";
import type { ExecOutcome, RemoteExecutor } from "./remote-executor";
import { shellQuote } from "./process";
import { loadTemplate } from "./templates";

export interface TaskTrackerOptions {
  /** Remote runtime root; tasks live under `<root>/_tasks`. */
  root: string;
  launcher: LauncherKind;
  session: string;
  graceSecs: number;
  pollIntervalMs: number;
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleep;
}

export interface TaskSubmission {
  taskId: string;
  command: string;
  timeoutSecs: number;
  workdir?: string;
  force?: boolean;
}

export type SubmitResult =
  | { status: "accepted"; taskId: TaskId; taskDir: string; archivedTo?: string }
  | { status: "rejected"; reason: string };

export type TaskWaitResult =
  | { kind: "terminal"; state: TaskState; exitCode: number | null }
  | { kind: "wait-timeout"; lastState: TaskState | "missing" };

export type TaskListEntry =
  | { taskId: string; status: TaskStatusDocument }
  | { taskId: string; status: "missing" | "parse_error" };

/** Exit status `task wait` uses when the remote task itself timed out. */
export const TASK_TIMEOUT_EXIT = 124;
/** Exit status `task wait` uses when the local wait gave up. */
export const WAIT_TIMEOUT_EXIT = 3;

export const isTerminalTaskState = (state: TaskState): boolean =>
  TERMINAL_TASK_STATES.includes(state);

/** Maps a wait result to the process exit status the CLI reports. */
export const waitExitCode = (result: TaskWaitResult): number => {
  if (result.kind === "wait-timeout") {
    return WAIT_TIMEOUT_EXIT;
  }
  switch (result.state) {
    case "success":
      return 0;
    case "timed_out":
      return TASK_TIMEOUT_EXIT;
    default:
      return result.exitCode && result.exitCode !== 0 ? result.exitCode : 1;
  }
};

const requireExited = (outcome: ExecOutcome, subject: string): { code: number; output: string } => {
  if (outcome.kind === "not-executed") {
    throw new ExecutionError(
      `${subject}: ${outcome.reason}`,
      "infrastructure",
      subject,
    );
  }
  return outcome;
};

const renderCommandScript = (command: string, workdir: string | undefined): string =>
  [
    "#!/usr/bin/env bash",
    "set -euo pipefail",
    ...(workdir ? [`cd ${shellQuote(workdir)}`] : []),
    command,
    "",
  ].join("\n");

/**
 * Tracked long-running remote commands. Each task owns
 * `<root>/_tasks/<id>/{command.sh,run.sh,status.json,stdout.log}`; the
 * runner script updates status.json, so the task outlives this process.
 */
export class TaskTracker {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly executor: RemoteExecutor,
    private readonly options: TaskTrackerOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  get tasksRoot(): string {
    return `${this.options.root}/_tasks`;
  }

  taskDir(taskId: string): string {
    return `${this.tasksRoot}/${taskId}`;
  }

  async submit(submission: TaskSubmission): Promise<SubmitResult> {
    if (!isIdentifier(submission.taskId)) {
      throw new PolicyViolationError(
        `invalid task id: ${submission.taskId} (allowed: [A-Za-z0-9._-], max 128 chars, must start alnum)`,
        "INVALID_IDENTIFIER",
      );
    }
    if (!Number.isInteger(submission.timeoutSecs) || submission.timeoutSecs < 0) {
      return {
        status: "rejected",
        reason: `timeout must be a non-negative integer (seconds), got: ${submission.timeoutSecs}`,
      };
    }
    if (submission.workdir !== undefined && !submission.workdir.startsWith("/")) {
      return {
        status: "rejected",
        reason: `workdir must be an absolute path: ${submission.workdir}`,
      };
    }

    const taskId = asTaskId(submission.taskId);
    const taskDir = this.taskDir(taskId);
    const now = this.clock();
    let archivedTo: string | undefined;

    const exists = requireExited(
      await this.executor.execute({ kind: "path-exists", path: taskDir }),
      `task ${taskId}`,
    );
    if (exists.code === 0) {
      if (!submission.force) {
        return {
          status: "rejected",
          reason: `task already exists: ${taskId} (use --force to archive and resubmit)`,
        };
      }
      archivedTo = `${taskDir}.bak-${compactStamp(now)}`;
      const moved = requireExited(
        await this.executor.execute({ kind: "move", from: taskDir, to: archivedTo }),
        `task ${taskId}`,
      );
      if (moved.code !== 0) {
        throw new ExecutionError(
          `could not archive existing task ${taskId}: ${moved.output.trim()}`,
          "infrastructure",
          taskId,
          moved.code,
        );
      }
      this.logger.info(`archived previous task ${taskId} to ${archivedTo}`);
    }

    const commandPath = `${taskDir}/command.sh`;
    const runnerPath = `${taskDir}/run.sh`;
    const status: TaskStatusDocument = {
      task_id: taskId,
      state: "pending",
      created_at: isoSeconds(now),
      timeout_secs: submission.timeoutSecs,
      command_path: commandPath,
      stdout_path: `${taskDir}/stdout.log`,
      ...(this.options.launcher === "tmux" ? { session: this.options.session } : {}),
    };

    for (const file of [
      { path: commandPath, content: renderCommandScript(submission.command, submission.workdir) },
      { path: runnerPath, content: loadTemplate("task-runner.sh") },
      { path: `${taskDir}/status.json`, content: canonicalJson(status) },
    ]) {
      const written = requireExited(
        await this.executor.execute({
          kind: "write-file",
          path: file.path,
          content: file.content,
          mode: file.path.endsWith(".sh") ? 0o755 : undefined,
        }),
        `task ${taskId}`,
      );
      if (written.code !== 0) {
        throw new ExecutionError(
          `could not write ${file.path}: ${written.output.trim()}`,
          "infrastructure",
          taskId,
          written.code,
        );
      }
    }

    const launched = requireExited(
      await this.executor.execute({
        kind: "launch-detached",
        launcher: this.options.launcher,
        session: this.options.session,
        window: `task-${taskId}`.slice(0, 128),
        runnerPath,
        args: [
          taskDir,
          taskId,
          status.created_at,
          String(submission.timeoutSecs),
          String(this.options.graceSecs),
          status.session ?? "",
        ],
      }),
      `task ${taskId}`,
    );
    if (launched.code !== 0) {
      throw new ExecutionError(
        `task ${taskId} could not be launched: ${launched.output.trim()}`,
        "infrastructure",
        taskId,
        launched.code,
      );
    }

    this.logger.info(`submitted task ${taskId} (${this.options.launcher})`);
    return {
      status: "accepted",
      taskId,
      taskDir,
      ...(archivedTo ? { archivedTo } : {}),
    };
  }

  /** Null when the task does not exist. Malformed status is an error. */
  async status(taskId: string): Promise<TaskStatusDocument | null> {
    this.assertTaskId(taskId);
    const outcome = requireExited(
      await this.executor.execute({
        kind: "read-file",
        path: `${this.taskDir(taskId)}/status.json`,
      }),
      `task ${taskId}`,
    );
    if (outcome.code === MISSING_FILE_EXIT) {
      return null;
    }
    if (outcome.code !== 0) {
      throw new ExecutionError(
        `could not read status of task ${taskId}`,
        "infrastructure",
        taskId,
        outcome.code,
      );
    }
    const parsed = tryParseDocument(TaskStatusSchema, outcome.output);
    if (!parsed.ok) {
      throw new DeterminismError(
        `task ${taskId} has an unreadable status document: ${parsed.reason}`,
        "MALFORMED_JSON",
        taskId,
      );
    }
    return parsed.value;
  }

  async list(): Promise<TaskListEntry[]> {
    const listing = requireExited(
      await this.executor.execute({ kind: "list-dir", path: this.tasksRoot }),
      "task list",
    );
    const ids = listing.output
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && isIdentifier(line) && !line.includes(".bak-"))
      .sort();
    if (ids.length === 0) {
      return [];
    }

    const read = requireExited(
      await this.executor.execute({
        kind: "read-files",
        paths: ids.map((id) => `${this.taskDir(id)}/status.json`),
      }),
      "task list",
    );
    const files = parseReadFilesOutput(read.output, ids.length);
    return ids.map((taskId, index): TaskListEntry => {
      const file = files[index];
      if (!file?.present) {
        return { taskId, status: "missing" };
      }
      const parsed = tryParseDocument(TaskStatusSchema, file.content);
      return parsed.ok
        ? { taskId, status: parsed.value }
        : { taskId, status: "parse_error" };
    });
  }

  async tail(taskId: string, lines: number): Promise<string> {
    this.assertTaskId(taskId);
    const outcome = requireExited(
      await this.executor.execute({
        kind: "read-file",
        path: `${this.taskDir(taskId)}/stdout.log`,
      }),
      `task ${taskId}`,
    );
    if (outcome.code !== 0) {
      return "";
    }
    const all = outcome.output.replace(/\n$/, "").split("\n");
    return all.slice(Math.max(0, all.length - lines)).join("\n");
  }

  /**
   * Polls status.json until the task is terminal or `timeoutSecs` elapses.
   * A transport failure on three consecutive polls is an infrastructure
   * error; a task that never existed is a wait-timeout with state `missing`.
   */
  async wait(
    taskId: string,
    options: { timeoutSecs: number; pollIntervalMs?: number },
  ): Promise<TaskWaitResult> {
    this.assertTaskId(taskId);
    const poller = new Poller({
      intervalMs: options.pollIntervalMs ?? this.options.pollIntervalMs,
      timeoutMs: options.timeoutSecs * 1000,
      sleep: this.options.sleep,
    });
    let lastState: TaskState | "missing" = "missing";

    const outcome = await poller.run<TaskStatusDocument | DeterminismError>(async () => {
      let status: TaskStatusDocument | null;
      try {
        status = await this.status(taskId);
      } catch (error) {
        if (error instanceof DeterminismError) {
          return { ok: true, done: true, value: error };
        }
        throw error;
      }
      if (!status) {
        lastState = "missing";
        return { ok: true, done: false, message: "missing" };
      }
      lastState = status.state;
      if (isTerminalTaskState(status.state)) {
        return { ok: true, done: true, value: status };
      }
      return { ok: true, done: false, message: status.state };
    });

    switch (outcome.kind) {
      case "done":
        if (outcome.value instanceof DeterminismError) {
          throw outcome.value;
        }
        return {
          kind: "terminal",
          state: outcome.value.state,
          exitCode: outcome.value.exit_code ?? null,
        };
      case "timeout":
        return { kind: "wait-timeout", lastState };
      case "escalated":
        throw new ExecutionError(
          `lost contact with task ${taskId}: ${outcome.last}`,
          "infrastructure",
          taskId,
        );
    }
  }

  private assertTaskId(taskId: string): void {
    if (!isIdentifier(taskId)) {
      throw new PolicyViolationError(
        `invalid task id: ${taskId}`,
        "INVALID_IDENTIFIER",
      );
    }
  }
}
