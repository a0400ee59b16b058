export type Brand<T, B extends string> = T & { readonly __brand: B };

export type FlowId = Brand<string, "FlowId">;
export type TaskId = Brand<string, "TaskId">;
export type RunId = Brand<string, "RunId">;

/** Operator-chosen identifiers: alphanumeric start, then [A-Za-z0-9._-], at most 128 chars. */
export const IDENTIFIER_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export const isIdentifier = (value: string): boolean =>
  IDENTIFIER_PATTERN.test(value);

export const asFlowId = (value: string): FlowId => value as FlowId;
export const asTaskId = (value: string): TaskId => value as TaskId;
export const asRunId = (value: string): RunId => value as RunId;

export const WORKFLOW_STATES = [
  "INIT",
  "POD_READY",
  "BOOTSTRAPPED",
  "CHECKED_OUT",
  "SWEEP_LAUNCHED",
  "SWEEP_RUNNING",
  "SWEEP_STALLED",
  "SWEEP_COMPLETED",
  "ARTIFACTS_FETCHING",
  "ARTIFACTS_SYNCED",
  "POD_TERMINATED",
] as const;

export type WorkflowStateName = (typeof WORKFLOW_STATES)[number];

export const isWorkflowStateName = (
  value: unknown,
): value is WorkflowStateName =>
  typeof value === "string" &&
  (WORKFLOW_STATES as readonly string[]).includes(value);

export interface WorkflowState {
  state: WorkflowStateName;
  previous_state: WorkflowStateName;
  reason: string;
  updated_at: string;
  host: string;
}

export interface WorkflowStateAuditEntry {
  /** The document as it was before the write. */
  prior: WorkflowState;
  next: WorkflowState;
  written_at: string;
}

export const PHASE_IDS = [
  "P00",
  "P10",
  "P20",
  "P30",
  "P40",
  "P50",
  "P60",
  "P70",
  "P80",
  "P90",
  "P99",
] as const;

export type PhaseId = (typeof PHASE_IDS)[number];

export const isPhaseId = (value: unknown): value is PhaseId =>
  typeof value === "string" && (PHASE_IDS as readonly string[]).includes(value);

export type ProvisionMode = "auto" | "skip";
export type SweepMode = "start" | "resume" | "skip";
export type FetchMode =
  | { kind: "none" }
  | { kind: "all" }
  | { kind: "run"; runId: RunId };
export type TeardownMode = "keep" | "delete";

export interface FlowOptions {
  provision: ProvisionMode;
  sweep: SweepMode;
  wait: boolean;
  fetch: FetchMode;
  teardown: TeardownMode;
}

export type TransportKind = "ssh" | "managed" | "local";

export interface FlowRun {
  flow_id: FlowId;
  started_at: string;
  config_fingerprint: string;
  config_path: string;
  resolved_target: string | null;
  transport_kind: TransportKind;
  options: FlowOptions;
}

export type PhaseStatus = "ok" | "failed" | "skipped";

export interface PhaseEvidence {
  flow_id: FlowId;
  phase_id: PhaseId;
  attempt: number;
  command_name: string;
  /** null when the command never executed on the target. */
  command_exit_code: number | null;
  command_executed: boolean;
  phase_status: PhaseStatus;
  fsm_before: WorkflowStateName | null;
  fsm_after: WorkflowStateName | null;
  transition_legal: boolean;
  contract_intent: string;
  allowed_commands: string[];
  command_in_contract: boolean;
  applicable_laws: string[];
  config_fingerprint: string;
  resolved_target: string | null;
  transport_kind: TransportKind;
  flow_start_artifact: string;
  recorded_at: string;
  detail: string;
  facts: Record<string, string | number | boolean | null>;
  artifacts: string[];
}

export type CheckStatus = "pass" | "fail";
export type PolicyStatus = "pass" | "fail" | "unverified";

export interface DeterministicResult {
  phase_id: PhaseId;
  status: CheckStatus;
  failures: string[];
  checked_at: string;
}

export interface PolicyResult {
  phase_id: PhaseId;
  status: PolicyStatus;
  violations: string[];
  engine: string;
  checked_at: string;
}

export interface PhaseVerdict {
  phase_id: PhaseId;
  deterministic: CheckStatus;
  constitutional: PolicyStatus;
  phase_pass: boolean;
  reasons: string[];
}

export type TaskState = "pending" | "running" | "success" | "failed" | "timed_out";

export const TERMINAL_TASK_STATES: readonly TaskState[] = [
  "success",
  "failed",
  "timed_out",
];

export interface TaskStatusDocument {
  task_id: string;
  state: TaskState;
  created_at: string;
  started_at?: string;
  ended_at?: string;
  exit_code?: number;
  timeout_secs: number;
  command_path: string;
  stdout_path: string;
  session?: string;
}

export interface SweepRow {
  run_id: RunId;
  spec_reference: string;
  seed: number;
  overrides: Array<{ key: string; value: string }>;
  notes: string;
  /** 0-based position among data rows. */
  index: number;
}

export type RunState = "running" | "success" | "failed" | "timed_out";

export interface RunStatusDocument {
  run_id: string;
  state: RunState;
  spec_reference: string;
  seed: number;
  task_id: string;
  started_at: string;
  ended_at?: string;
  exit_code?: number;
}

export interface RunSummary {
  ok: boolean;
  run_id: string;
  state: RunState;
  exit_code: number;
  started_at: string;
  ended_at: string;
  failure_class?: FailureClass;
}

export type FailureClass = "timeout" | "crash" | "infrastructure";
