import fs from "node:fs";
import { type Clock, isoSeconds, systemClock } from "../core/clock";
import { isCommandInPhase } from "../core/workflow-definition";
import { type DeterministicResult, type PhaseEvidence, isPhaseId } from "../core/types";
import { validatePhaseEvidence } from "../evidence/schema-registry";

export interface DeterministicCheckOptions {
  clock?: Clock;
  artifactExists?: (artifact: string) => boolean;
}

const TEARDOWN_LITERALS = ["keep", "delete"];

const nonEmptyFact = (evidence: PhaseEvidence, key: string): boolean => {
  const value = evidence.facts[key];
  return typeof value === "string" && value.trim().length > 0;
};

/**
 * Objective assertions over one evidence record. Failure identifiers name
 * the exact check that did not hold.
 */
export const checkDeterministic = (
  evidence: PhaseEvidence,
  options: DeterministicCheckOptions = {},
): DeterministicResult => {
  const clock = options.clock ?? systemClock;
  const artifactExists = options.artifactExists ?? fs.existsSync;
  const failures: string[] = [];
  const phase = evidence.phase_id;

  if (!isPhaseId(phase)) {
    return {
      phase_id: phase,
      status: "fail",
      failures: [`unknown_phase:${String(phase)}`],
      checked_at: isoSeconds(clock()),
    };
  }

  const shape = validatePhaseEvidence(phase, { ...evidence });
  failures.push(...shape.errors.map((error) => `evidence_shape:${error}`));

  if (!isCommandInPhase(phase, evidence.command_name) || !evidence.command_in_contract) {
    failures.push(`command_not_in_contract:${evidence.command_name}`);
  }
  if (!evidence.command_executed) {
    failures.push("command_not_executed");
  } else if (evidence.command_exit_code !== 0) {
    failures.push(`command_exit_nonzero:${String(evidence.command_exit_code)}`);
  }
  if (evidence.phase_status !== "ok") {
    failures.push(`phase_status_not_ok:${evidence.phase_status}`);
  }
  if (!evidence.transition_legal) {
    failures.push(
      `illegal_transition:${String(evidence.fsm_before)}->${String(evidence.fsm_after)}`,
    );
  }

  switch (phase) {
    case "P20":
      if (!evidence.resolved_target || evidence.resolved_target.trim() === "") {
        failures.push("target_not_resolved");
      }
      break;
    case "P50":
    case "P60":
      if (!nonEmptyFact(evidence, "repo_url")) {
        failures.push("repo_url_missing");
      }
      break;
    case "P90": {
      const mode = evidence.facts.teardown_mode;
      if (typeof mode !== "string" || !TEARDOWN_LITERALS.includes(mode)) {
        failures.push(`invalid_teardown_mode:${String(mode)}`);
      }
      break;
    }
    default:
      break;
  }

  if (phase === "P60" && evidence.command_name === "sweep-start" && !nonEmptyFact(evidence, "manifest_sha256")) {
    failures.push("manifest_not_recorded");
  }
  if (phase === "P80" || phase === "P00") {
    for (const artifact of evidence.artifacts) {
      if (!artifactExists(artifact)) {
        failures.push(`artifact_missing:${artifact}`);
      }
    }
  }

  return {
    phase_id: phase,
    status: failures.length === 0 ? "pass" : "fail",
    failures,
    checked_at: isoSeconds(clock()),
  };
};
