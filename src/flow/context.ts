import fs from "node:fs";
import path from "node:path";
import type { Clock, Sleep } from "../core/clock";
import { ConfigError, DeterminismError, PolicyViolationError } from "../core/errors";
import { RemoteFileBackend, WorkflowStateStore, advanceAlong } from "../core/state-store";
import type { SweepRow, WorkflowStateName } from "../core/types";
import { type Logger, silentLogger } from "../observability/logger";
import type { PodflowConfig } from "../project/config";
import type { ExecFn } from "../runtime/process";
import { RemoteExecutor } from "../runtime/remote-executor";
import { TaskTracker } from "../runtime/task-tracker";
import { createTransport } from "../runtime/transports";
import { parseManifest } from "../sweep/manifest";
import { RunStore } from "../sweep/run-store";
import { SweepScheduler } from "../sweep/scheduler";
import { ArtifactFetcher } from "./fetch";

export interface ServiceOptions {
  /** Controller working directory; relative local paths resolve against it. */
  cwd: string;
  exec?: ExecFn;
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleep;
  /** Replaces the transport-backed executor for a target. */
  executorFactory?: (target: string) => RemoteExecutor;
}

/** Everything that talks to one bound target. */
export interface TargetServices {
  target: string;
  executor: RemoteExecutor;
  state: WorkflowStateStore;
  tasks: TaskTracker;
  runs: RunStore;
  fetcher: ArtifactFetcher;
}

export const LOCAL_TARGET = "localhost";

/** The configured target for commands that run outside a flow. */
export const configuredTarget = (config: PodflowConfig): string => {
  if (config.target.host) {
    return config.target.host;
  }
  if (config.target.transport === "local") {
    return LOCAL_TARGET;
  }
  throw new ConfigError("target.host is not configured");
};

export const connectTarget = (
  config: PodflowConfig,
  target: string,
  options: ServiceOptions,
): TargetServices => {
  const logger = options.logger ?? silentLogger;
  const executor = options.executorFactory
    ? options.executorFactory(target)
    : new RemoteExecutor(
        createTransport({
          kind: config.target.transport,
          target,
          managedCli: config.target.managedCli,
          exec: options.exec,
        }),
        { logger: logger.child("exec: ") },
      );
  const root = config.remote.root;
  const runs = new RunStore(executor, root, { clock: options.clock });

  return {
    target,
    executor,
    state: new WorkflowStateStore(new RemoteFileBackend(executor, `${root}/_state`), {
      clock: options.clock,
    }),
    tasks: new TaskTracker(executor, {
      root,
      launcher: config.task.launcher,
      session: config.task.session,
      graceSecs: config.task.graceSecs,
      pollIntervalMs: config.task.pollIntervalSecs * 1000,
      logger: logger.child("task: "),
      clock: options.clock,
      sleep: options.sleep,
    }),
    runs,
    fetcher: new ArtifactFetcher(executor, runs, {
      localDir: path.resolve(options.cwd, config.fetch.localDir),
      exec: options.exec,
      clock: options.clock,
      logger: logger.child("fetch: "),
    }),
  };
};

export const createScheduler = (
  config: PodflowConfig,
  services: TargetServices,
  options: ServiceOptions & { onDispatch?: () => Promise<void> },
): SweepScheduler =>
  new SweepScheduler({
    tasks: services.tasks,
    runs: services.runs,
    settings: config.sweep,
    workdir: config.repo.dir,
    logger: (options.logger ?? silentLogger).child("sweep: "),
    clock: options.clock,
    onDispatch: options.onDispatch,
  });

export const SWEEP_DONE_STATES: readonly WorkflowStateName[] = [
  "SWEEP_COMPLETED",
  "ARTIFACTS_FETCHING",
  "ARTIFACTS_SYNCED",
];

export interface SweepManifest {
  text: string;
  rows: SweepRow[];
  /** Local file that was uploaded, for `start`. */
  localPath?: string;
}

/** Reads the manifest the target last received. */
export const readRemoteManifest = async (services: TargetServices): Promise<SweepManifest> => {
  const text = await services.runs.readLatestManifest();
  if (text === null) {
    throw new DeterminismError(
      `no manifest on ${services.target}; run a sweep start first`,
      "MISSING_ARTIFACT",
      services.runs.latestManifestPath,
    );
  }
  return { text, rows: parseManifest(text) };
};

export const readLocalManifest = (localPath: string): SweepManifest => {
  if (!fs.existsSync(localPath)) {
    throw new DeterminismError(`manifest not found: ${localPath}`, "MISSING_ARTIFACT", localPath);
  }
  const text = fs.readFileSync(localPath, "utf8");
  return { text, rows: parseManifest(text), localPath };
};

/** Validates a local manifest, then uploads it as the target's latest. */
export const uploadLocalManifest = async (
  services: TargetServices,
  localPath: string,
): Promise<SweepManifest> => {
  const manifest = readLocalManifest(localPath);
  await services.runs.uploadManifest(localPath);
  return manifest;
};

/**
 * Steps the workflow state into the running sweep. A sweep that already
 * completed on this target is not restarted.
 */
export const enterSweep = async (
  services: TargetServices,
  steps: readonly WorkflowStateName[],
  reason: string,
): Promise<void> => {
  const current = await services.state.load();
  if (SWEEP_DONE_STATES.includes(current.state)) {
    throw new PolicyViolationError(
      `illegal transition ${current.state} -> SWEEP_RUNNING: the sweep on ${services.target} already completed`,
      "ILLEGAL_TRANSITION",
    );
  }
  await advanceAlong(services.state, steps, reason, services.target);
};
