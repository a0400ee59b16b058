import { type Clock, compactStamp, systemClock } from "../core/clock";
import {
  RunStatusSchema,
  type RunSummaryRecord,
  RunSummarySchema,
  tryParseDocument,
} from "../core/documents";
import { ExecutionError } from "../core/errors";
import type { RunStatusDocument } from "../core/types";
import { MISSING_FILE_EXIT, parseReadFilesOutput } from "../runtime/actions";
import type { ExecOutcome, RemoteExecutor } from "../runtime/remote-executor";
import { loadTemplate } from "../runtime/templates";

export type DocumentRead<T> =
  | { kind: "missing" }
  | { kind: "ok"; value: T }
  | { kind: "parse-error"; reason: string };

export interface RunRecord {
  runId: string;
  dirExists: boolean;
  status: DocumentRead<RunStatusDocument>;
  summary: DocumentRead<RunSummaryRecord>;
}

const expectExited = (outcome: ExecOutcome, subject: string): Extract<ExecOutcome, { kind: "exited" }> => {
  if (outcome.kind === "not-executed") {
    throw new ExecutionError(`${subject}: ${outcome.reason}`, "infrastructure", subject);
  }
  return outcome;
};

const expectSuccess = (outcome: ExecOutcome, subject: string): string => {
  const exited = expectExited(outcome, subject);
  if (exited.code !== 0) {
    throw new ExecutionError(
      `${subject} failed: ${exited.output.trim()}`,
      "infrastructure",
      subject,
      exited.code,
    );
  }
  return exited.output;
};

/**
 * Remote layout of a sweep: `<root>/runs/<run_id>/` per row and
 * `<root>/_manifests/` for uploaded manifests.
 */
export class RunStore {
  private readonly clock: Clock;

  constructor(
    private readonly executor: RemoteExecutor,
    private readonly root: string,
    options: { clock?: Clock } = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  get runsRoot(): string {
    return `${this.root}/runs`;
  }

  get manifestsRoot(): string {
    return `${this.root}/_manifests`;
  }

  get latestManifestPath(): string {
    return `${this.manifestsRoot}/sweep-latest.csv`;
  }

  runDir(runId: string): string {
    return `${this.runsRoot}/${runId}`;
  }

  /** Reads status and summary of every row in one round trip. */
  async readRecords(runIds: readonly string[]): Promise<Map<string, RunRecord>> {
    const records = new Map<string, RunRecord>();
    if (runIds.length === 0) {
      return records;
    }

    const listing = expectSuccess(
      await this.executor.execute({ kind: "list-dir", path: this.runsRoot }),
      "run listing",
    );
    const dirs = new Set(
      listing
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0),
    );

    const paths = runIds.flatMap((runId) => [
      `${this.runDir(runId)}/status.json`,
      `${this.runDir(runId)}/summary.json`,
    ]);
    const output = expectSuccess(
      await this.executor.execute({ kind: "read-files", paths }),
      "run records",
    );
    const files = parseReadFilesOutput(output, paths.length);

    runIds.forEach((runId, index) => {
      const status = files[index * 2];
      const summary = files[index * 2 + 1];
      records.set(runId, {
        runId,
        dirExists: dirs.has(runId),
        status: readDocument(status, (text) => tryParseDocument(RunStatusSchema, text)),
        summary: readDocument(summary, (text) => tryParseDocument(RunSummarySchema, text)),
      });
    });
    return records;
  }

  async writeCommandRecord(runId: string, script: string): Promise<string> {
    const target = `${this.runDir(runId)}/command.sh`;
    expectSuccess(
      await this.executor.execute({ kind: "write-file", path: target, content: script, mode: 0o755 }),
      `command record for ${runId}`,
    );
    return target;
  }

  async writeRowRunner(runId: string): Promise<string> {
    const target = `${this.runDir(runId)}/row.sh`;
    expectSuccess(
      await this.executor.execute({
        kind: "write-file",
        path: target,
        content: loadTemplate("sweep-row.sh"),
        mode: 0o755,
      }),
      `row runner for ${runId}`,
    );
    return target;
  }

  /**
   * Moves an existing status and summary aside so a forced re-run starts
   * from a clean row. Returns the suffix used.
   */
  async archiveResults(runId: string): Promise<string> {
    const suffix = `bak-${compactStamp(this.clock())}`;
    for (const name of ["status.json", "summary.json"]) {
      const from = `${this.runDir(runId)}/${name}`;
      const exists = expectExited(
        await this.executor.execute({ kind: "path-exists", path: from }),
        `archive ${runId}`,
      );
      if (exists.code === 0) {
        expectSuccess(
          await this.executor.execute({ kind: "move", from, to: `${from}.${suffix}` }),
          `archive ${runId}`,
        );
      }
    }
    return suffix;
  }

  /** Uploads `localPath` as the latest manifest plus a timestamped copy. */
  async uploadManifest(localPath: string): Promise<{ latest: string; stamped: string }> {
    const latest = this.latestManifestPath;
    const stamped = `${this.manifestsRoot}/sweep-${compactStamp(this.clock())}.csv`;
    expectSuccess(
      await this.executor.execute({ kind: "mkdir", path: this.manifestsRoot }),
      "manifest upload",
    );
    const uploaded = await this.executor.upload(localPath, latest);
    if (uploaded.kind === "not-executed" || uploaded.code !== 0) {
      throw new ExecutionError(
        `manifest upload failed: ${uploaded.kind === "not-executed" ? uploaded.reason : uploaded.output.trim()}`,
        "infrastructure",
        localPath,
      );
    }
    expectSuccess(
      await this.executor.execute({ kind: "copy", from: latest, to: stamped }),
      "manifest copy",
    );
    return { latest, stamped };
  }

  /** Null when no manifest was ever uploaded. */
  async readLatestManifest(): Promise<string | null> {
    const outcome = expectExited(
      await this.executor.execute({ kind: "read-file", path: this.latestManifestPath }),
      "latest manifest",
    );
    if (outcome.code === MISSING_FILE_EXIT) {
      return null;
    }
    return expectSuccess(outcome, "latest manifest");
  }
}

const readDocument = <T>(
  file: { present: boolean; content: string } | undefined,
  parse: (text: string) => { ok: true; value: T } | { ok: false; reason: string },
): DocumentRead<T> => {
  if (!file?.present) {
    return { kind: "missing" };
  }
  const parsed = parse(file.content);
  return parsed.ok
    ? { kind: "ok", value: parsed.value }
    : { kind: "parse-error", reason: parsed.reason };
};
