import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { canonicalJson } from "../core/canonical-json";
import { type Clock, isoSeconds, systemClock } from "../core/clock";
import { DeterminismError } from "../core/errors";
import type { FlowId, PhaseId } from "../core/types";

export const FLOW_START_FILE = "flow-start.json";
export const FLOW_SUMMARY_FILE = "flow-summary.json";
export const INDEX_FILE = "index.jsonl";

export type PhaseRecordKind = "evidence" | "deterministic" | "policy" | "verdict";

export interface IndexEntry {
  file: string;
  sha256: string;
  written_at: string;
}

export interface WrittenRecord {
  file: string;
  path: string;
  sha256: string;
}

export const sha256 = (content: string): string =>
  createHash("sha256").update(content).digest("hex");

export const phaseRecordName = (
  phase: PhaseId,
  kind: PhaseRecordKind,
  attempt: number,
): string =>
  attempt <= 1 ? `${phase}.${kind}.json` : `${phase}.${kind}.${attempt}.json`;

/**
 * Write-once provenance records under `<root>/<flow_id>/`. Every record is
 * canonical JSON and listed in `index.jsonl` with its sha256.
 */
export class EvidenceWriter {
  private readonly clock: Clock;

  constructor(
    private readonly rootDir: string,
    options: { clock?: Clock } = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  flowDir(flowId: FlowId | string): string {
    return path.join(this.rootDir, flowId);
  }

  writeRecord(flowId: FlowId | string, file: string, value: unknown): WrittenRecord {
    const dir = this.flowDir(flowId);
    fs.mkdirSync(dir, { recursive: true });
    const target = path.join(dir, file);
    const content = canonicalJson(value);

    try {
      fs.writeFileSync(target, content, { flag: "wx" });
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "EEXIST") {
        throw new DeterminismError(
          `evidence record ${file} already exists for flow ${flowId}`,
          "RECORD_EXISTS",
          file,
        );
      }
      throw error;
    }

    const digest = sha256(content);
    const entry: IndexEntry = {
      file,
      sha256: digest,
      written_at: isoSeconds(this.clock()),
    };
    fs.appendFileSync(path.join(dir, INDEX_FILE), `${JSON.stringify(entry)}\n`);
    return { file, path: target, sha256: digest };
  }

  /** The first attempt number with no evidence record for `phase` yet. */
  nextAttempt(flowId: FlowId | string, phase: PhaseId): number {
    let attempt = 1;
    while (fs.existsSync(path.join(this.flowDir(flowId), phaseRecordName(phase, "evidence", attempt)))) {
      attempt += 1;
    }
    return attempt;
  }

  writePhaseRecord(
    flowId: FlowId | string,
    phase: PhaseId,
    kind: PhaseRecordKind,
    attempt: number,
    value: unknown,
  ): WrittenRecord {
    return this.writeRecord(flowId, phaseRecordName(phase, kind, attempt), value);
  }

  readIndex(flowId: FlowId | string): IndexEntry[] {
    const file = path.join(this.flowDir(flowId), INDEX_FILE);
    if (!fs.existsSync(file)) {
      return [];
    }
    return fs
      .readFileSync(file, "utf8")
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line, index): IndexEntry => {
        const parsed: unknown = JSON.parse(line);
        if (
          typeof parsed !== "object" ||
          parsed === null ||
          typeof Reflect.get(parsed, "file") !== "string" ||
          typeof Reflect.get(parsed, "sha256") !== "string"
        ) {
          throw new DeterminismError(
            `${INDEX_FILE}: malformed entry at line ${index + 1}`,
            "MALFORMED_JSON",
            INDEX_FILE,
          );
        }
        const writtenAt: unknown = Reflect.get(parsed, "written_at");
        return {
          file: String(Reflect.get(parsed, "file")),
          sha256: String(Reflect.get(parsed, "sha256")),
          written_at: typeof writtenAt === "string" ? writtenAt : "",
        };
      });
  }

  /**
   * Re-reads a record and checks it against the digest in the index.
   * Returns the exact bytes on disk and their parsed value.
   */
  readRecord(flowId: FlowId | string, file: string): { content: string; value: unknown } {
    const target = path.join(this.flowDir(flowId), file);
    if (!fs.existsSync(target)) {
      throw new DeterminismError(
        `evidence record ${file} is missing for flow ${flowId}`,
        "MISSING_ARTIFACT",
        file,
      );
    }
    const content = fs.readFileSync(target, "utf8");
    const entry = this.readIndex(flowId).find((candidate) => candidate.file === file);
    if (!entry || entry.sha256 !== sha256(content)) {
      throw new DeterminismError(
        `evidence record ${file} does not match its indexed digest`,
        "EVIDENCE_TAMPERED",
        file,
      );
    }
    try {
      return { content, value: JSON.parse(content) };
    } catch {
      throw new DeterminismError(
        `evidence record ${file} is not valid JSON`,
        "MALFORMED_JSON",
        file,
      );
    }
  }

  listFlows(): string[] {
    if (!fs.existsSync(this.rootDir)) {
      return [];
    }
    return fs
      .readdirSync(this.rootDir)
      .filter((entry) => fs.existsSync(path.join(this.rootDir, entry, FLOW_START_FILE)))
      .sort();
  }
}
