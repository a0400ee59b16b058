import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { type Clock, compactStamp, systemClock } from "../core/clock";
import { ExecutionError, PolicyViolationError } from "../core/errors";
import { isIdentifier } from "../core/types";
import { type Logger, silentLogger } from "../observability/logger";
import { type ExecFn, execProcess } from "../runtime/process";
import type { ExecOutcome, RemoteExecutor } from "../runtime/remote-executor";
import type { RunStore } from "../sweep/run-store";

export interface FetchedRun {
  runId: string;
  localDir: string;
}

export interface ArtifactFetcherOptions {
  /** Local directory runs are extracted into. */
  localDir: string;
  exec?: ExecFn;
  clock?: Clock;
  logger?: Logger;
}

const failure = (outcome: ExecOutcome, subject: string, step: string): ExecutionError | null => {
  if (outcome.kind === "not-executed") {
    return new ExecutionError(`${step} ${subject}: ${outcome.reason}`, "infrastructure", subject);
  }
  if (outcome.code !== 0) {
    return new ExecutionError(
      `${step} ${subject} failed (exit ${outcome.code}): ${outcome.output.trim()}`,
      "crash",
      subject,
      outcome.code,
    );
  }
  return null;
};

/** Selects run ids whose name matches `pattern`. */
export const matchRuns = (runIds: readonly string[], pattern: string): string[] =>
  runIds.filter((runId) => minimatch(runId, pattern, { dot: true }));

/**
 * Copies run directories to the controller: archive on the target,
 * download, extract locally, then remove both archives.
 */
export class ArtifactFetcher {
  private readonly exec: ExecFn;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly executor: RemoteExecutor,
    private readonly runs: RunStore,
    private readonly options: ArtifactFetcherOptions,
  ) {
    this.exec = options.exec ?? execProcess;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  async fetchRun(runId: string): Promise<FetchedRun> {
    if (!isIdentifier(runId)) {
      throw new PolicyViolationError(`invalid run id: ${runId}`, "INVALID_IDENTIFIER");
    }

    const stamp = compactStamp(this.clock());
    const stagingDir = `${this.runs.runsRoot}/.fetch`;
    const remoteArchive = `${stagingDir}/${runId}-${stamp}.tar.gz`;
    const incoming = path.join(this.options.localDir, ".incoming");
    const localArchive = path.join(incoming, `${runId}-${stamp}.tar.gz`);

    const steps: Array<[string, () => Promise<ExecOutcome>]> = [
      ["stage", () => this.executor.execute({ kind: "mkdir", path: stagingDir })],
      [
        "archive",
        () =>
          this.executor.execute({
            kind: "archive-dir",
            root: this.runs.runsRoot,
            name: runId,
            archive: remoteArchive,
          }),
      ],
      [
        "download",
        () => {
          fs.mkdirSync(incoming, { recursive: true });
          return this.executor.download(remoteArchive, localArchive);
        },
      ],
    ];

    try {
      for (const [step, run] of steps) {
        const error = failure(await run(), runId, step);
        if (error) {
          throw error;
        }
      }

      const extracted = await this.exec("tar", ["-xzf", localArchive, "-C", this.options.localDir]);
      if (extracted.code !== 0) {
        throw new ExecutionError(
          `extract ${runId} failed: ${extracted.stderr.trim()}`,
          "crash",
          runId,
          extracted.code,
        );
      }
    } finally {
      fs.rmSync(localArchive, { force: true });
      const removed = await this.executor.execute({ kind: "remove", path: remoteArchive });
      if (removed.kind === "not-executed" || removed.code !== 0) {
        this.logger.warn(`could not remove ${remoteArchive} on the target`);
      }
    }

    const localDir = path.join(this.options.localDir, runId);
    this.logger.info(`fetched ${runId} -> ${localDir}`);
    return { runId, localDir };
  }

  async fetchAll(runIds: readonly string[], pattern: string): Promise<FetchedRun[]> {
    const fetched: FetchedRun[] = [];
    for (const runId of matchRuns(runIds, pattern)) {
      fetched.push(await this.fetchRun(runId));
    }
    return fetched;
  }
}
