import { type Clock, isoSeconds, systemClock } from "../core/clock";
import type {
  DeterministicResult,
  PhaseEvidence,
  PhaseVerdict,
  PolicyResult,
} from "../core/types";
import type { EvidenceWriter, WrittenRecord } from "../evidence/evidence-writer";
import { type Logger, silentLogger } from "../observability/logger";
import {
  type DeterministicCheckOptions,
  checkDeterministic,
} from "./deterministic-checker";
import { type PolicyJudge, withTimeout } from "./policy-judge";

export interface GateOptions {
  rules: string;
  /** Upper bound on one policy judgement. */
  judgeTimeoutMs: number;
  clock?: Clock;
  logger?: Logger;
  checker?: DeterministicCheckOptions;
}

export interface GateResult {
  deterministic: DeterministicResult;
  policy: PolicyResult;
  verdict: PhaseVerdict;
  records: WrittenRecord[];
}

export const mergeVerdict = (
  deterministic: DeterministicResult,
  policy: PolicyResult,
): PhaseVerdict => {
  const reasons = [
    ...deterministic.failures.map((failure) => `deterministic:${failure}`),
    ...(policy.status === "pass"
      ? []
      : policy.violations.length > 0
        ? policy.violations.map((violation) => `policy:${violation}`)
        : [`policy:${policy.status}`]),
  ];
  return {
    phase_id: deterministic.phase_id,
    deterministic: deterministic.status,
    constitutional: policy.status,
    phase_pass: deterministic.status === "pass" && policy.status === "pass",
    reasons,
  };
};

/**
 * Two-layer validation of one phase: objective checks, then the policy
 * judge. Both results and the merged verdict are persisted for the flow.
 */
export class ValidationGate {
  private readonly judge: PolicyJudge;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly writer: EvidenceWriter,
    judge: PolicyJudge,
    private readonly options: GateOptions,
  ) {
    this.judge = withTimeout(judge, options.judgeTimeoutMs);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  async evaluate(evidence: PhaseEvidence): Promise<GateResult> {
    const deterministic = checkDeterministic(evidence, {
      clock: this.clock,
      ...this.options.checker,
    });

    const judgement = await this.judge.evaluate(evidence, this.options.rules);
    const policy: PolicyResult = {
      phase_id: evidence.phase_id,
      status: judgement.status,
      violations: judgement.violations,
      engine: this.judge.name,
      checked_at: isoSeconds(this.clock()),
    };

    const verdict = mergeVerdict(deterministic, policy);
    const records = [
      this.writer.writePhaseRecord(evidence.flow_id, evidence.phase_id, "deterministic", evidence.attempt, deterministic),
      this.writer.writePhaseRecord(evidence.flow_id, evidence.phase_id, "policy", evidence.attempt, policy),
      this.writer.writePhaseRecord(evidence.flow_id, evidence.phase_id, "verdict", evidence.attempt, verdict),
    ];

    if (verdict.phase_pass) {
      this.logger.debug(`${evidence.phase_id} pass`);
    } else {
      this.logger.warn(`${evidence.phase_id} fail: ${verdict.reasons.join(", ")}`);
    }
    return { deterministic, policy, verdict, records };
  }
}
