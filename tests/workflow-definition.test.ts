import { describe, expect, it } from "vitest";
import { PHASE_IDS, WORKFLOW_STATES } from "../src/core/types";
import { pathBetween } from "../src/core/workflow-dag";
import {
  COMMAND_CONTRACTS,
  COMMAND_NAMES,
  LAWS,
  PHASES,
  isCommandInPhase,
  isCommandName,
} from "../src/core/workflow-definition";

describe("phase contracts", () => {
  it("defines every phase with its own id", () => {
    for (const phase of PHASE_IDS) {
      expect(PHASES[phase].id).toBe(phase);
      expect(PHASES[phase].commands.length).toBeGreaterThan(0);
    }
  });

  it("always applies the contract, provenance and validation laws", () => {
    for (const phase of PHASE_IDS) {
      expect(PHASES[phase].laws).toEqual(
        expect.arrayContaining(["L5-phase-contract", "L6-provenance", "L8-phase-end-validation"]),
      );
    }
    expect(PHASES.P90.laws).toContain("L7-explicit-destruction");
    expect(PHASES.P00.laws).toContain("L1-canonical-config");
    expect(LAWS).toHaveLength(8);
  });

  it("limits commands to their phase", () => {
    expect(isCommandInPhase("P60", "sweep-resume")).toBe(true);
    expect(isCommandInPhase("P70", "sweep-start")).toBe(false);
    expect(isCommandInPhase("P90", "pod-delete")).toBe(true);
    expect(isCommandInPhase("P90", "rm -rf /")).toBe(false);
  });

  it("assigns every command to some phase", () => {
    for (const command of COMMAND_NAMES) {
      expect(PHASE_IDS.some((phase) => isCommandInPhase(phase, command))).toBe(true);
    }
    expect(isCommandName("sweep-wait")).toBe(true);
    expect(isCommandName("sweep-restart")).toBe(false);
  });
});

describe("command contracts", () => {
  it("only advances along legal paths", () => {
    for (const command of COMMAND_NAMES) {
      const contract = COMMAND_CONTRACTS[command];
      if (contract.allowFrom === "unbound" || !contract.advancesTo) {
        continue;
      }
      const first = contract.advancesTo[0];
      const reachable = contract.allowFrom.some(
        (state) => first !== undefined && pathBetween(state, first) !== null,
      );
      expect(reachable, command).toBe(true);
    }
  });

  it("never allows work after teardown", () => {
    for (const command of COMMAND_NAMES) {
      const { allowFrom } = COMMAND_CONTRACTS[command];
      if (allowFrom !== "unbound") {
        expect(allowFrom, command).not.toContain("POD_TERMINATED");
      }
    }
    expect(COMMAND_CONTRACTS["pod-status"].allowFrom).toEqual(
      WORKFLOW_STATES.filter((state) => state !== "POD_TERMINATED"),
    );
  });

  it("refuses to restart a sweep while one is in flight", () => {
    const { allowFrom } = COMMAND_CONTRACTS["sweep-start"];
    expect(allowFrom).not.toContain("SWEEP_RUNNING");
    expect(allowFrom).not.toContain("SWEEP_STALLED");
    expect(COMMAND_CONTRACTS["sweep-resume"].allowFrom).toContain("SWEEP_STALLED");
  });
});
