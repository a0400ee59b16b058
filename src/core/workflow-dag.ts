import type { WorkflowStateName } from "./types";

/**
 * Legal successor states. Braced groups in the lifecycle (the sweep group and
 * the artifact group) are optional, so their entry points can be skipped.
 */
export const WORKFLOW_TRANSITIONS: Readonly<
  Record<WorkflowStateName, readonly WorkflowStateName[]>
> = {
  INIT: ["POD_READY"],
  POD_READY: ["BOOTSTRAPPED"],
  BOOTSTRAPPED: ["CHECKED_OUT"],
  CHECKED_OUT: ["SWEEP_LAUNCHED", "ARTIFACTS_FETCHING", "POD_TERMINATED"],
  SWEEP_LAUNCHED: ["SWEEP_RUNNING"],
  SWEEP_RUNNING: ["SWEEP_STALLED", "SWEEP_COMPLETED"],
  SWEEP_STALLED: ["SWEEP_RUNNING"],
  SWEEP_COMPLETED: ["ARTIFACTS_FETCHING", "POD_TERMINATED"],
  ARTIFACTS_FETCHING: ["ARTIFACTS_SYNCED"],
  ARTIFACTS_SYNCED: ["ARTIFACTS_FETCHING", "POD_TERMINATED"],
  POD_TERMINATED: [],
};

export const isLegalTransition = (
  from: WorkflowStateName,
  to: WorkflowStateName,
): boolean => WORKFLOW_TRANSITIONS[from].includes(to);

/** Every state reachable from `from` through one or more legal transitions. */
export const reachableFrom = (
  from: WorkflowStateName,
): Set<WorkflowStateName> => {
  const seen = new Set<WorkflowStateName>();
  const queue: WorkflowStateName[] = [...WORKFLOW_TRANSITIONS[from]];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) {
      continue;
    }
    seen.add(next);
    queue.push(...WORKFLOW_TRANSITIONS[next]);
  }
  return seen;
};

/**
 * Shortest legal path from `from` to `to`, excluding `from`. Returns null when
 * `to` is not reachable; an empty array when they are equal.
 */
export const pathBetween = (
  from: WorkflowStateName,
  to: WorkflowStateName,
): WorkflowStateName[] | null => {
  if (from === to) {
    return [];
  }

  const previous = new Map<WorkflowStateName, WorkflowStateName>();
  const queue: WorkflowStateName[] = [from];
  const visited = new Set<WorkflowStateName>([from]);
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) {
      break;
    }
    for (const next of WORKFLOW_TRANSITIONS[current]) {
      if (visited.has(next)) {
        continue;
      }
      visited.add(next);
      previous.set(next, current);
      if (next === to) {
        const path: WorkflowStateName[] = [to];
        let cursor = current;
        while (cursor !== from) {
          path.unshift(cursor);
          const before = previous.get(cursor);
          if (before === undefined) {
            return null;
          }
          cursor = before;
        }
        return path;
      }
      queue.push(next);
    }
  }
  return null;
};

export const isTerminalWorkflowState = (state: WorkflowStateName): boolean =>
  WORKFLOW_TRANSITIONS[state].length === 0;
