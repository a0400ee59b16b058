import {
  type PhaseId,
  WORKFLOW_STATES,
  type WorkflowStateName,
} from "./types";

export const LAWS = [
  "L1-canonical-config",
  "L2-single-lifecycle",
  "L3-target-resolution",
  "L4-noninteractive-safety",
  "L5-phase-contract",
  "L6-provenance",
  "L7-explicit-destruction",
  "L8-phase-end-validation",
] as const;

export type LawId = (typeof LAWS)[number];

export const COMMAND_NAMES = [
  "flow-precheck",
  "pod-up",
  "provision-policy",
  "target-bind",
  "pod-status",
  "bootstrap",
  "checkout",
  "sweep-start",
  "sweep-resume",
  "sweep-status",
  "sweep-policy",
  "sweep-wait",
  "fetch-policy",
  "fetch-all",
  "fetch-run",
  "teardown-policy",
  "pod-delete",
  "flow-summary",
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export const isCommandName = (value: unknown): value is CommandName =>
  typeof value === "string" &&
  (COMMAND_NAMES as readonly string[]).includes(value);

/**
 * `unbound` commands run before a target (and so its state document)
 * exists, or only record a policy decision.
 */
export interface CommandContract {
  allowFrom: readonly WorkflowStateName[] | "unbound";
  /**
   * States the command steps through on success. A state already behind
   * the current one is not revisited.
   */
  advancesTo?: readonly WorkflowStateName[];
}

export interface PhaseContract {
  id: PhaseId;
  name: string;
  intent: string;
  commands: readonly CommandName[];
  laws: readonly LawId[];
}

export const definePhase = (phase: PhaseContract): PhaseContract => phase;

export const commandContract = (contract: CommandContract): CommandContract =>
  contract;

const allBut = (...excluded: WorkflowStateName[]): WorkflowStateName[] =>
  WORKFLOW_STATES.filter((state) => !excluded.includes(state));

const ALWAYS: readonly LawId[] = [
  "L5-phase-contract",
  "L6-provenance",
  "L8-phase-end-validation",
];

export const PHASES: Readonly<Record<PhaseId, PhaseContract>> = {
  P00: definePhase({
    id: "P00",
    name: "PRECHECK",
    intent: "Confirm configuration, options and local prerequisites before anything touches a remote host.",
    commands: ["flow-precheck"],
    laws: ["L1-canonical-config", "L2-single-lifecycle", "L4-noninteractive-safety", "L6-provenance", "L8-phase-end-validation"],
  }),
  P10: definePhase({
    id: "P10",
    name: "PROVISION",
    intent: "Allocate a host through the provisioner, or record that provisioning was skipped by policy.",
    commands: ["pod-up", "provision-policy"],
    laws: ["L3-target-resolution", "L4-noninteractive-safety", ...ALWAYS],
  }),
  P20: definePhase({
    id: "P20",
    name: "TARGET_BIND",
    intent: "Resolve one execution target and lock it for the rest of the flow.",
    commands: ["target-bind"],
    laws: ["L3-target-resolution", ...ALWAYS],
  }),
  P30: definePhase({
    id: "P30",
    name: "POD_READY",
    intent: "Show that the bound target accepts commands.",
    commands: ["pod-status"],
    laws: [...ALWAYS],
  }),
  P40: definePhase({
    id: "P40",
    name: "BOOTSTRAP",
    intent: "Verify required tooling on the target and run the bootstrap hook.",
    commands: ["bootstrap"],
    laws: [...ALWAYS],
  }),
  P50: definePhase({
    id: "P50",
    name: "CHECKOUT",
    intent: "Check out the configured repository revision on the target.",
    commands: ["checkout"],
    laws: [...ALWAYS],
  }),
  P60: definePhase({
    id: "P60",
    name: "SWEEP",
    intent: "Start or resume the sweep in the declared mode, or record that it was skipped by policy.",
    commands: ["sweep-start", "sweep-resume", "sweep-status", "sweep-policy"],
    laws: [...ALWAYS],
  }),
  P70: definePhase({
    id: "P70",
    name: "MONITOR",
    intent: "Observe sweep completion by waiting or by taking a status snapshot.",
    commands: ["sweep-wait", "sweep-status", "sweep-policy"],
    laws: [...ALWAYS],
  }),
  P80: definePhase({
    id: "P80",
    name: "FETCH",
    intent: "Retrieve run artifacts according to the declared fetch mode.",
    commands: ["fetch-policy", "fetch-all", "fetch-run"],
    laws: [...ALWAYS],
  }),
  P90: definePhase({
    id: "P90",
    name: "TEARDOWN",
    intent: "Apply the declared teardown mode; nothing is destroyed unless asked.",
    commands: ["teardown-policy", "pod-delete"],
    laws: ["L7-explicit-destruction", ...ALWAYS],
  }),
  P99: definePhase({
    id: "P99",
    name: "SUMMARY",
    intent: "Record the outcome of every phase that ran.",
    commands: ["flow-summary"],
    laws: [...ALWAYS],
  }),
};

export const COMMAND_CONTRACTS: Readonly<Record<CommandName, CommandContract>> = {
  "flow-precheck": commandContract({ allowFrom: "unbound" }),
  "pod-up": commandContract({ allowFrom: "unbound" }),
  "provision-policy": commandContract({ allowFrom: "unbound" }),
  "target-bind": commandContract({ allowFrom: "unbound" }),
  "pod-status": commandContract({
    allowFrom: allBut("POD_TERMINATED"),
    advancesTo: ["POD_READY"],
  }),
  bootstrap: commandContract({
    allowFrom: ["POD_READY", "BOOTSTRAPPED", "CHECKED_OUT", "SWEEP_COMPLETED", "ARTIFACTS_SYNCED"],
    advancesTo: ["BOOTSTRAPPED"],
  }),
  checkout: commandContract({
    allowFrom: ["BOOTSTRAPPED", "CHECKED_OUT", "SWEEP_COMPLETED", "ARTIFACTS_SYNCED"],
    advancesTo: ["CHECKED_OUT"],
  }),
  "sweep-start": commandContract({
    allowFrom: ["CHECKED_OUT", "SWEEP_COMPLETED", "ARTIFACTS_SYNCED"],
    advancesTo: ["SWEEP_LAUNCHED", "SWEEP_RUNNING"],
  }),
  "sweep-resume": commandContract({
    allowFrom: ["SWEEP_LAUNCHED", "SWEEP_RUNNING", "SWEEP_STALLED", "SWEEP_COMPLETED", "ARTIFACTS_SYNCED"],
    advancesTo: ["SWEEP_RUNNING"],
  }),
  "sweep-status": commandContract({
    allowFrom: ["SWEEP_LAUNCHED", "SWEEP_RUNNING", "SWEEP_STALLED", "SWEEP_COMPLETED", "ARTIFACTS_SYNCED"],
  }),
  "sweep-policy": commandContract({ allowFrom: "unbound" }),
  "sweep-wait": commandContract({
    allowFrom: ["SWEEP_RUNNING", "SWEEP_STALLED", "SWEEP_COMPLETED", "ARTIFACTS_SYNCED"],
    advancesTo: ["SWEEP_RUNNING", "SWEEP_COMPLETED"],
  }),
  "fetch-policy": commandContract({ allowFrom: "unbound" }),
  "fetch-all": commandContract({
    allowFrom: ["CHECKED_OUT", "SWEEP_COMPLETED", "ARTIFACTS_FETCHING", "ARTIFACTS_SYNCED"],
    advancesTo: ["ARTIFACTS_FETCHING", "ARTIFACTS_SYNCED"],
  }),
  "fetch-run": commandContract({
    allowFrom: ["CHECKED_OUT", "SWEEP_COMPLETED", "ARTIFACTS_FETCHING", "ARTIFACTS_SYNCED"],
    advancesTo: ["ARTIFACTS_FETCHING", "ARTIFACTS_SYNCED"],
  }),
  "teardown-policy": commandContract({ allowFrom: "unbound" }),
  "pod-delete": commandContract({
    allowFrom: ["CHECKED_OUT", "SWEEP_COMPLETED", "ARTIFACTS_SYNCED"],
    advancesTo: ["POD_TERMINATED"],
  }),
  "flow-summary": commandContract({ allowFrom: "unbound" }),
};

export const isCommandInPhase = (phase: PhaseId, command: string): boolean =>
  (PHASES[phase].commands as readonly string[]).includes(command);
