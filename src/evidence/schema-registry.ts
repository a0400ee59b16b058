import type { PhaseId } from "../core/types";

export type FieldType =
  | "string"
  | "number"
  | "boolean"
  | "array"
  | "object"
  | "string?"
  | "number?";

export type EvidenceSchema = Record<string, FieldType>;

export interface EvidenceValidationDiagnostic {
  subject: string;
  ok: boolean;
  errors: string[];
}

/** Fields every phase evidence record carries. */
export const PHASE_EVIDENCE_SCHEMA: EvidenceSchema = {
  flow_id: "string",
  phase_id: "string",
  attempt: "number",
  command_name: "string",
  command_exit_code: "number?",
  command_executed: "boolean",
  phase_status: "string",
  fsm_before: "string?",
  fsm_after: "string?",
  transition_legal: "boolean",
  contract_intent: "string",
  allowed_commands: "array",
  command_in_contract: "boolean",
  applicable_laws: "array",
  config_fingerprint: "string",
  resolved_target: "string?",
  transport_kind: "string",
  flow_start_artifact: "string",
  recorded_at: "string",
  detail: "string",
  facts: "object",
  artifacts: "array",
};

/** Facts a phase must report, keyed by phase. */
export const PHASE_FACT_SCHEMAS: Partial<Record<PhaseId, EvidenceSchema>> = {
  P10: { provision_mode: "string" },
  P20: { target_source: "string" },
  P50: { repo_url: "string" },
  P60: { sweep_mode: "string", repo_url: "string" },
  P70: { wait: "boolean" },
  P80: { fetch_mode: "string" },
  P90: { teardown_mode: "string" },
};

const describe = (value: unknown): string =>
  Array.isArray(value) ? "array" : value === null ? "null" : typeof value;

const matchesType = (value: unknown, expected: FieldType): boolean => {
  switch (expected) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number";
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return typeof value === "object" && value !== null && !Array.isArray(value);
    case "string?":
      return value === null || typeof value === "string";
    case "number?":
      return value === null || typeof value === "number";
  }
};

export const validateAgainstSchema = (
  subject: string,
  schema: EvidenceSchema,
  record: Record<string, unknown>,
): EvidenceValidationDiagnostic => {
  const errors: string[] = [];

  for (const [key, typeName] of Object.entries(schema)) {
    if (!(key in record)) {
      errors.push(`missing key: ${key}`);
      continue;
    }

    if (!matchesType(record[key], typeName)) {
      errors.push(
        `type mismatch for ${key}: expected ${typeName}, got ${describe(record[key])}`,
      );
    }
  }

  return {
    subject,
    ok: errors.length === 0,
    errors,
  };
};

/** Checks the record envelope, then the facts its phase must carry. */
export const validatePhaseEvidence = (
  phase: PhaseId,
  record: Record<string, unknown>,
): EvidenceValidationDiagnostic => {
  const envelope = validateAgainstSchema(
    `${phase} evidence`,
    PHASE_EVIDENCE_SCHEMA,
    record,
  );
  const factSchema = PHASE_FACT_SCHEMAS[phase];
  const facts = record.facts;
  if (!factSchema || typeof facts !== "object" || facts === null || Array.isArray(facts)) {
    return envelope;
  }

  const factRecord: Record<string, unknown> = { ...facts };
  const factDiagnostic = validateAgainstSchema(`${phase} facts`, factSchema, factRecord);
  const errors = [
    ...envelope.errors,
    ...factDiagnostic.errors.map((error) => `facts: ${error}`),
  ];
  return { subject: envelope.subject, ok: errors.length === 0, errors };
};
