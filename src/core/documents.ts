import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { DeterminismError } from "./errors";
import { WORKFLOW_STATES } from "./types";

const literalUnion = <T extends readonly string[]>(values: T) =>
  Type.Union(values.map((value) => Type.Literal<T[number]>(value)));

export const WorkflowStateSchema = Type.Object({
  state: literalUnion(WORKFLOW_STATES),
  previous_state: literalUnion(WORKFLOW_STATES),
  reason: Type.String(),
  updated_at: Type.String(),
  host: Type.String(),
});

export const WorkflowStateAuditSchema = Type.Object({
  prior: WorkflowStateSchema,
  next: WorkflowStateSchema,
  written_at: Type.String(),
});

export const TaskStatusSchema = Type.Object({
  task_id: Type.String(),
  state: literalUnion(["pending", "running", "success", "failed", "timed_out"] as const),
  created_at: Type.String(),
  started_at: Type.Optional(Type.String()),
  ended_at: Type.Optional(Type.String()),
  exit_code: Type.Optional(Type.Integer()),
  timeout_secs: Type.Integer({ minimum: 0 }),
  command_path: Type.String(),
  stdout_path: Type.String(),
  session: Type.Optional(Type.String()),
});

export const RunStatusSchema = Type.Object({
  run_id: Type.String(),
  state: literalUnion(["running", "success", "failed", "timed_out"] as const),
  spec_reference: Type.String(),
  seed: Type.Integer(),
  task_id: Type.String(),
  started_at: Type.String(),
  ended_at: Type.Optional(Type.String()),
  exit_code: Type.Optional(Type.Integer()),
});

/** Only `ok` is required from a run summary; the rest is informational. */
export const RunSummarySchema = Type.Object({
  ok: Type.Boolean(),
  run_id: Type.Optional(Type.String()),
  state: Type.Optional(Type.String()),
  exit_code: Type.Optional(Type.Integer()),
  started_at: Type.Optional(Type.String()),
  ended_at: Type.Optional(Type.String()),
  failure_class: Type.Optional(
    literalUnion(["timeout", "crash", "infrastructure"] as const),
  ),
});

export type RunSummaryRecord = Static<typeof RunSummarySchema>;

const describeErrors = (schema: TSchema, value: unknown): string =>
  [...Value.Errors(schema, value)]
    .slice(0, 3)
    .map((error) => `${error.path || "/"}: ${error.message}`)
    .join("; ");

/**
 * Parses a JSON document and checks it against `schema`. Malformed or
 * non-conforming content is a determinism failure naming `subject`.
 */
export const parseDocument = <S extends TSchema>(
  schema: S,
  text: string,
  subject: string,
): Static<S> => {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new DeterminismError(
      `${subject}: malformed JSON (${error instanceof Error ? error.message : "parse error"})`,
      "MALFORMED_JSON",
      subject,
    );
  }
  if (!Value.Check(schema, value)) {
    throw new DeterminismError(
      `${subject}: unexpected document shape (${describeErrors(schema, value)})`,
      "MALFORMED_JSON",
      subject,
    );
  }
  return value;
};

/** Like `parseDocument`, but reports failure as a value. */
export const tryParseDocument = <S extends TSchema>(
  schema: S,
  text: string,
): { ok: true; value: Static<S> } | { ok: false; reason: string } => {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      reason: error instanceof Error ? error.message : "malformed JSON",
    };
  }
  return Value.Check(schema, value)
    ? { ok: true, value }
    : { ok: false, reason: describeErrors(schema, value) };
};
