import { PolicyViolationError } from "../core/errors";
import type { CommandName } from "../core/workflow-definition";
import {
  type FetchMode,
  type FlowOptions,
  type PhaseStatus,
  type TransportKind,
  type WorkflowStateName,
  asRunId,
  isIdentifier,
} from "../core/types";

export type Facts = Record<string, string | number | boolean | null>;

/** What a phase step reports back to the orchestrator. */
export interface StepResult {
  command: CommandName;
  executed: boolean;
  exitCode: number | null;
  status: PhaseStatus;
  detail: string;
  facts: Facts;
  artifacts?: string[];
  fsmBefore?: WorkflowStateName | null;
  fsmAfter?: WorkflowStateName | null;
  transitionLegal?: boolean;
}

export const okStep = (
  command: CommandName,
  detail: string,
  facts: Facts,
  artifacts: string[] = [],
): StepResult => ({
  command,
  executed: true,
  exitCode: 0,
  status: "ok",
  detail,
  facts,
  artifacts,
});

export const failedStep = (
  command: CommandName,
  detail: string,
  facts: Facts,
  exitCode: number | null = 1,
): StepResult => ({
  command,
  executed: exitCode !== null,
  exitCode,
  status: "failed",
  detail,
  facts,
});

export const parseFetchMode = (value: string): FetchMode => {
  if (value === "none" || value === "all") {
    return { kind: value };
  }
  const match = value.match(/^run:(.+)$/);
  if (match?.[1] && isIdentifier(match[1])) {
    return { kind: "run", runId: asRunId(match[1]) };
  }
  throw new PolicyViolationError(
    `fetch must be none, all or run:<run_id>, got: ${value}`,
    "INVALID_IDENTIFIER",
  );
};

export const formatFetchMode = (mode: FetchMode): string =>
  mode.kind === "run" ? `run:${mode.runId}` : mode.kind;

/**
 * Combinations that would run a phase against a sweep that is still in
 * flight. Returns the problems found.
 */
export const optionProblems = (options: FlowOptions): string[] => {
  const problems: string[] = [];
  const sweepInFlight = options.sweep !== "skip" && !options.wait;
  if (sweepInFlight && options.fetch.kind !== "none") {
    problems.push("fetch requires a finished sweep; use --wait true or --fetch none");
  }
  if (sweepInFlight && options.teardown === "delete") {
    problems.push("teardown delete would destroy a running sweep; use --wait true or --teardown keep");
  }
  return problems;
};

/** Controller binaries each transport shells out to. */
export const localBinariesFor = (
  transport: TransportKind,
  managedCli: string,
  options: FlowOptions,
): string[] => {
  const base =
    transport === "ssh" ? ["ssh", "scp"] : transport === "managed" ? [managedCli] : ["bash", "cp"];
  return options.fetch.kind === "none" ? base : [...base, "tar"];
};
