import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DeterminismError } from "../core/errors";
import { type SweepRow, asRunId, isIdentifier } from "../core/types";

export const MANIFEST_COLUMNS = [
  "run_id",
  "spec_reference",
  "seed",
  "overrides",
  "notes",
] as const;

/** Older manifests name the spec column `config`. */
const COLUMN_ALIASES: Record<string, (typeof MANIFEST_COLUMNS)[number]> = {
  config: "spec_reference",
};

const OVERRIDE_KEY = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

interface CsvRecord {
  fields: string[];
  line: number;
}

/**
 * RFC 4180 records. Lines starting with `#` outside a quoted field and
 * blank lines are skipped.
 */
export const parseCsv = (text: string): CsvRecord[] => {
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let field = "";
  let quoted = false;
  let line = 1;
  let recordLine = 1;
  let atRecordStart = true;
  let skipping = false;

  const endRecord = () => {
    fields.push(field);
    const blank = fields.length === 1 && fields[0]?.trim() === "";
    if (!blank) {
      records.push({ fields, line: recordLine });
    }
    fields = [];
    field = "";
    atRecordStart = true;
  };

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];

    if (skipping) {
      if (char === "\n") {
        skipping = false;
        line += 1;
      }
      continue;
    }

    if (atRecordStart) {
      recordLine = line;
      atRecordStart = false;
      if (char === "#") {
        skipping = true;
        atRecordStart = true;
        continue;
      }
    }

    if (quoted) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          quoted = false;
        }
      } else {
        if (char === "\n") line += 1;
        field += char;
      }
      continue;
    }

    if (char === '"' && field === "") {
      quoted = true;
    } else if (char === ",") {
      fields.push(field);
      field = "";
    } else if (char === "\n") {
      endRecord();
      line += 1;
    } else if (char !== "\r") {
      field += char;
    }
  }

  if (quoted) {
    throw new DeterminismError(
      `manifest: unterminated quoted field starting on line ${recordLine}`,
      "INVALID_MANIFEST",
    );
  }
  if (!atRecordStart || field !== "" || fields.length > 0) {
    endRecord();
  }
  return records;
};

const invalid = (message: string, runId?: string): DeterminismError =>
  new DeterminismError(`manifest: ${message}`, "INVALID_MANIFEST", runId);

export const parseOverrides = (
  raw: string,
  line: number,
): SweepRow["overrides"] =>
  raw
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map((token) => {
      const separator = token.indexOf("=");
      const key = separator > 0 ? token.slice(0, separator) : "";
      if (!OVERRIDE_KEY.test(key)) {
        throw invalid(`line ${line}: override must be key=value, got: ${token}`);
      }
      return { key, value: token.slice(separator + 1) };
    });

/** Parses and validates a sweep manifest into ordered rows. */
export const parseManifest = (text: string): SweepRow[] => {
  const records = parseCsv(text);
  const header = records.shift();
  if (!header) {
    throw invalid("empty manifest (expected a header row)");
  }

  const columns = header.fields.map((name) => {
    const trimmed = name.trim();
    return COLUMN_ALIASES[trimmed] ?? trimmed;
  });
  const position = (name: (typeof MANIFEST_COLUMNS)[number]): number =>
    columns.indexOf(name);
  for (const required of ["run_id", "spec_reference"] as const) {
    if (position(required) < 0) {
      throw invalid(`header is missing column ${required}`);
    }
  }

  const seen = new Set<string>();
  return records.map((record, index): SweepRow => {
    const cell = (name: (typeof MANIFEST_COLUMNS)[number]): string => {
      const at = position(name);
      return at < 0 ? "" : (record.fields[at] ?? "").trim();
    };

    const runId = cell("run_id");
    if (!isIdentifier(runId)) {
      throw invalid(
        `line ${record.line}: invalid run id ${JSON.stringify(runId)} (allowed: [A-Za-z0-9._-], max 128 chars, must start alnum)`,
        runId,
      );
    }
    if (seen.has(runId)) {
      throw invalid(`line ${record.line}: duplicate run id ${runId}`, runId);
    }
    seen.add(runId);

    const specReference = cell("spec_reference");
    if (specReference === "") {
      throw invalid(`line ${record.line}: empty spec_reference for ${runId}`, runId);
    }

    const rawSeed = cell("seed");
    const seed = rawSeed === "" ? 0 : Number(rawSeed);
    if (!Number.isInteger(seed)) {
      throw invalid(`line ${record.line}: seed must be an integer for ${runId}, got: ${rawSeed}`, runId);
    }

    return {
      run_id: asRunId(runId),
      spec_reference: specReference,
      seed,
      overrides: parseOverrides(cell("overrides"), record.line),
      notes: cell("notes"),
      index,
    };
  });
};

export interface Shard {
  index: number;
  count: number;
}

export const parseShard = (value: string): Shard => {
  const match = value.match(/^(\d+)\/(\d+)$/);
  const index = Number(match?.[1]);
  const count = Number(match?.[2]);
  if (!match || count < 1 || index >= count) {
    throw invalid(`shard must be <index>/<count> with index < count, got: ${value}`);
  }
  return { index, count };
};

export interface RowSelection {
  /** First run id to consider; earlier rows are passed over. */
  startAt?: string;
  /** Substring a run id must contain. */
  match?: string;
  shard?: Shard;
}

/** Applies start-at over manifest order, then match and shard. */
export const selectRows = (rows: SweepRow[], selection: RowSelection): SweepRow[] => {
  let candidates = rows;
  if (selection.startAt) {
    const start = rows.findIndex((row) => row.run_id === selection.startAt);
    if (start < 0) {
      throw invalid(`start-at row ${selection.startAt} is not in the manifest`, selection.startAt);
    }
    candidates = rows.slice(start);
  }
  return candidates.filter(
    (row) =>
      (!selection.match || row.run_id.includes(selection.match)) &&
      (!selection.shard || row.index % selection.shard.count === selection.shard.index),
  );
};

export const MANIFEST_TEMPLATE_PATH = fileURLToPath(
  new URL("./templates/manifest-template.csv", import.meta.url),
);

/** Writes a starter manifest; never overwrites. Returns false when the file exists. */
export const writeManifestTemplate = (target: string): boolean => {
  if (fs.existsSync(target)) {
    return false;
  }
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.copyFileSync(MANIFEST_TEMPLATE_PATH, target, fs.constants.COPYFILE_EXCL);
  return true;
};
