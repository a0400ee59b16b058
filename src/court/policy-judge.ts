import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { canonicalJson } from "../core/canonical-json";
import { PHASES } from "../core/workflow-definition";
import { type PhaseEvidence, type PolicyStatus, isPhaseId } from "../core/types";
import type { PodflowConfig } from "../project/config";
import { type ExecFn, execProcess } from "../runtime/process";

export const CONSTITUTION_PATH = fileURLToPath(
  new URL("./constitution.md", import.meta.url),
);

export const loadConstitution = (): string =>
  fs.readFileSync(CONSTITUTION_PATH, "utf8");

export interface PolicyJudgement {
  status: PolicyStatus;
  violations: string[];
}

/** Judges one evidence record against the rule text. */
export interface PolicyJudge {
  readonly name: string;
  evaluate(evidence: PhaseEvidence, rules: string): Promise<PolicyJudgement>;
}

const unverified = (reason: string): PolicyJudgement => ({
  status: "unverified",
  violations: [reason],
});

const readFlowStart = (
  file: string,
): { ok: true; value: Record<string, unknown> } | { ok: false; reason: string } => {
  if (!file || !fs.existsSync(file)) {
    return { ok: false, reason: "flow_start_missing" };
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return { ok: false, reason: "flow_start_invalid_json" };
    }
    return { ok: true, value: { ...parsed } };
  } catch {
    return { ok: false, reason: "flow_start_invalid_json" };
  }
};

const sameList = (left: readonly string[], right: readonly string[]): boolean =>
  left.length === right.length && left.every((value, index) => value === right[index]);

/**
 * Built-in judge for the rule book: provenance, declared intent, applicable
 * laws, and drift against the flow-start record.
 */
export class RuleBookJudge implements PolicyJudge {
  readonly name = "rule-book";

  async evaluate(evidence: PhaseEvidence, rules: string): Promise<PolicyJudgement> {
    if (rules.trim().length === 0) {
      return unverified("rule_text_empty");
    }
    if (!isPhaseId(evidence.phase_id)) {
      return { status: "fail", violations: ["unknown_phase"] };
    }

    const contract = PHASES[evidence.phase_id];
    const violations: string[] = [];

    for (const field of ["flow_id", "config_fingerprint", "flow_start_artifact", "recorded_at"] as const) {
      if (!evidence[field]) {
        violations.push(`missing_provenance:${field}`);
      }
    }
    if (evidence.contract_intent !== contract.intent) {
      violations.push("contract_intent_mismatch");
    }
    if (!sameList(evidence.allowed_commands, contract.commands)) {
      violations.push("allowed_commands_mismatch");
    }
    for (const law of contract.laws) {
      if (!evidence.applicable_laws.includes(law)) {
        violations.push(`missing_applicable_law:${law}`);
      }
    }
    if (evidence.phase_status !== "ok") {
      violations.push("phase_status_not_ok");
    }
    if (evidence.command_exit_code !== 0) {
      violations.push("command_exit_nonzero");
    }

    const flowStart = readFlowStart(evidence.flow_start_artifact);
    if (!flowStart.ok) {
      violations.push(flowStart.reason);
    } else {
      const start = flowStart.value;
      if (start.flow_id !== evidence.flow_id) {
        violations.push("flow_id_mismatch");
      }
      if (start.config_fingerprint !== evidence.config_fingerprint) {
        violations.push("config_fingerprint_drift");
      }
      const startTarget = typeof start.resolved_target === "string" ? start.resolved_target : null;
      if (
        startTarget &&
        evidence.resolved_target &&
        startTarget !== evidence.resolved_target
      ) {
        violations.push("target_drift_from_flow_start");
      }
    }

    return { status: violations.length === 0 ? "pass" : "fail", violations };
  }
}

const isJudgementStatus = (value: unknown): value is PolicyStatus =>
  value === "pass" || value === "fail" || value === "unverified";

/** Parses `{"status": ..., "violations": [...]}` from a judge's stdout. */
export const parseJudgement = (stdout: string): PolicyJudgement | null => {
  const trimmed = stdout.trim();
  const start = trimmed.lastIndexOf("\n{");
  const candidate = start >= 0 ? trimmed.slice(start + 1) : trimmed;
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) {
    return null;
  }
  const status: unknown = Reflect.get(parsed, "status");
  const violations: unknown = Reflect.get(parsed, "violations");
  if (!isJudgementStatus(status)) {
    return null;
  }
  return {
    status,
    violations: Array.isArray(violations)
      ? violations.filter((entry): entry is string => typeof entry === "string")
      : [],
  };
};

/**
 * External judge program: evidence JSON on stdin, the rule text path as
 * its last argument, a judgement object on stdout.
 */
export class CommandJudge implements PolicyJudge {
  readonly name: string;

  constructor(
    private readonly command: readonly string[],
    private readonly timeoutMs: number,
    private readonly exec: ExecFn = execProcess,
    private readonly rulesPath: string = CONSTITUTION_PATH,
  ) {
    this.name = `command:${command[0] ?? "?"}`;
  }

  async evaluate(evidence: PhaseEvidence, _rules: string): Promise<PolicyJudgement> {
    const [bin, ...args] = this.command;
    if (!bin) {
      return unverified("judge_command_empty");
    }
    const result = await this.exec(bin, [...args, this.rulesPath], {
      input: canonicalJson(evidence),
      timeout: this.timeoutMs,
    });
    if (result.killed) {
      return unverified("judge_timeout");
    }
    const judgement = parseJudgement(result.stdout);
    if (!judgement) {
      return unverified(`judge_unparsable_response:exit=${result.code}`);
    }
    return judgement;
  }
}

/**
 * Bounds any judge: a late answer or a thrown error becomes `unverified`.
 */
export const withTimeout = (judge: PolicyJudge, timeoutMs: number): PolicyJudge => ({
  name: judge.name,
  evaluate: (evidence, rules) =>
    new Promise<PolicyJudgement>((resolve) => {
      const timer = setTimeout(() => {
        resolve(unverified("judge_timeout"));
      }, timeoutMs);
      judge.evaluate(evidence, rules).then(
        (judgement) => {
          clearTimeout(timer);
          resolve(judgement);
        },
        (error: unknown) => {
          clearTimeout(timer);
          resolve(
            unverified(
              `judge_error:${error instanceof Error ? error.message : "unknown"}`,
            ),
          );
        },
      );
    }),
});

export const DEFAULT_JUDGE_TIMEOUT_MS = 60_000;
const KILL_MARGIN_MS = 5_000;

/** Builds the judge the configuration names, with its time bound. */
export const createJudge = (
  settings: PodflowConfig["policy"]["judge"],
  exec: ExecFn = execProcess,
): { judge: PolicyJudge; timeoutMs: number } =>
  settings.kind === "command"
    ? {
        judge: new CommandJudge(settings.command, settings.timeoutMs, exec),
        // the child is killed at timeoutMs; the outer bound covers its exit
        timeoutMs: settings.timeoutMs + KILL_MARGIN_MS,
      }
    : { judge: new RuleBookJudge(), timeoutMs: DEFAULT_JUDGE_TIMEOUT_MS };
