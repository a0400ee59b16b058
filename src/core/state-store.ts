import fs from "node:fs";
import path from "node:path";
import { MISSING_FILE_EXIT } from "../runtime/actions";
import type { ExecOutcome, RemoteExecutor } from "../runtime/remote-executor";
import { canonicalJson } from "./canonical-json";
import { type Clock, isoSeconds, systemClock } from "./clock";
import {
  WorkflowStateAuditSchema,
  WorkflowStateSchema,
  parseDocument,
} from "./documents";
import { ExecutionError, PolicyViolationError } from "./errors";
import type {
  WorkflowState,
  WorkflowStateAuditEntry,
  WorkflowStateName,
} from "./types";
import { isLegalTransition, reachableFrom } from "./workflow-dag";

export const STATE_FILE = "workflow_state.json";
export const HISTORY_FILE = "workflow_state.history.jsonl";

/**
 * Where the workflow state document lives. `write` replaces the whole file
 * atomically; `append` adds one line.
 */
export interface StateBackend {
  readonly location: string;
  read(name: string): Promise<string | null>;
  write(name: string, content: string): Promise<void>;
  append(name: string, line: string): Promise<void>;
}

export class LocalFileBackend implements StateBackend {
  constructor(private readonly rootDir: string) {}

  get location(): string {
    return this.rootDir;
  }

  async read(name: string): Promise<string | null> {
    const file = path.join(this.rootDir, name);
    if (!fs.existsSync(file)) {
      return null;
    }
    return fs.readFileSync(file, "utf8");
  }

  async write(name: string, content: string): Promise<void> {
    fs.mkdirSync(this.rootDir, { recursive: true });
    const file = path.join(this.rootDir, name);
    const tmp = `${file}.tmp.${process.pid}`;
    fs.writeFileSync(tmp, content);
    fs.renameSync(tmp, file);
  }

  async append(name: string, line: string): Promise<void> {
    fs.mkdirSync(this.rootDir, { recursive: true });
    fs.appendFileSync(path.join(this.rootDir, name), `${line}\n`);
  }
}

/** The state directory on the target host, reached through the executor. */
export class RemoteFileBackend implements StateBackend {
  constructor(
    private readonly executor: RemoteExecutor,
    private readonly stateDir: string,
  ) {}

  get location(): string {
    return `${this.executor.target}:${this.stateDir}`;
  }

  async read(name: string): Promise<string | null> {
    const outcome = await this.executor.execute({
      kind: "read-file",
      path: `${this.stateDir}/${name}`,
    });
    if (outcome.kind === "not-executed") {
      throw new ExecutionError(
        `could not read ${name}: ${outcome.reason}`,
        "infrastructure",
        name,
      );
    }
    if (outcome.code === MISSING_FILE_EXIT) {
      return null;
    }
    if (outcome.code !== 0) {
      throw new ExecutionError(
        `could not read ${name} (exit ${outcome.code})`,
        "infrastructure",
        name,
        outcome.code,
      );
    }
    return outcome.output;
  }

  async write(name: string, content: string): Promise<void> {
    this.expectSuccess(
      await this.executor.execute({
        kind: "write-file",
        path: `${this.stateDir}/${name}`,
        content,
      }),
      name,
    );
  }

  async append(name: string, line: string): Promise<void> {
    this.expectSuccess(
      await this.executor.execute({
        kind: "append-line",
        path: `${this.stateDir}/${name}`,
        line,
      }),
      name,
    );
  }

  private expectSuccess(
    outcome: ExecOutcome,
    name: string,
  ): void {
    if (outcome.kind === "not-executed") {
      throw new ExecutionError(
        `could not write ${name}: ${outcome.reason}`,
        "infrastructure",
        name,
      );
    }
    if (outcome.code !== 0) {
      throw new ExecutionError(
        `could not write ${name} (exit ${outcome.code}): ${outcome.output.trim()}`,
        "infrastructure",
        name,
        outcome.code,
      );
    }
  }
}

export interface TransitionRequest {
  to: WorkflowStateName;
  reason: string;
  /** States the requesting command may run from. */
  allowFrom?: readonly WorkflowStateName[];
  host?: string;
}

/**
 * Read-modify-write over the single workflow state document. Every write
 * replaces the document and logs the value it replaced. Writers must be
 * serialized by the caller.
 */
export class WorkflowStateStore {
  private readonly clock: Clock;

  constructor(
    private readonly backend: StateBackend,
    options: { clock?: Clock } = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  get location(): string {
    return this.backend.location;
  }

  async load(): Promise<WorkflowState> {
    const content = await this.backend.read(STATE_FILE);
    if (content === null) {
      return {
        state: "INIT",
        previous_state: "INIT",
        reason: "no state recorded",
        updated_at: isoSeconds(this.clock()),
        host: "",
      };
    }
    return parseDocument(WorkflowStateSchema, content, STATE_FILE);
  }

  /** Throws unless the current state is in `allowFrom`. */
  async authorize(
    command: string,
    allowFrom: readonly WorkflowStateName[],
  ): Promise<WorkflowState> {
    const current = await this.load();
    if (!allowFrom.includes(current.state)) {
      throw new PolicyViolationError(
        `${command} is not allowed in state ${current.state} (allowed: ${allowFrom.join(", ")})`,
        "STATE_NOT_ALLOWED",
      );
    }
    return current;
  }

  async transition(request: TransitionRequest): Promise<WorkflowState> {
    const prior = await this.load();
    if (request.allowFrom && !request.allowFrom.includes(prior.state)) {
      throw new PolicyViolationError(
        `transition to ${request.to} is not allowed from ${prior.state} (allowed: ${request.allowFrom.join(", ")})`,
        "STATE_NOT_ALLOWED",
      );
    }
    if (!isLegalTransition(prior.state, request.to)) {
      throw new PolicyViolationError(
        `illegal transition ${prior.state} -> ${request.to}`,
        "ILLEGAL_TRANSITION",
      );
    }

    const next: WorkflowState = {
      state: request.to,
      previous_state: prior.state,
      reason: request.reason,
      updated_at: isoSeconds(this.clock()),
      host: request.host ?? prior.host,
    };
    const entry: WorkflowStateAuditEntry = {
      prior,
      next,
      written_at: next.updated_at,
    };

    await this.backend.write(STATE_FILE, canonicalJson(next));
    await this.backend.append(HISTORY_FILE, JSON.stringify(entry));
    return next;
  }

  async history(): Promise<WorkflowStateAuditEntry[]> {
    const content = await this.backend.read(HISTORY_FILE);
    if (content === null) {
      return [];
    }
    return content
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line, index) =>
        parseDocument(
          WorkflowStateAuditSchema,
          line,
          `${HISTORY_FILE} line ${index + 1}`,
        ),
      );
  }
}

/**
 * Moves to `to` when that is a legal step, and does nothing when the
 * current state is already at or past `to`. Anything else is illegal.
 */
export const advanceState = async (
  store: WorkflowStateStore,
  to: WorkflowStateName,
  reason: string,
  host?: string,
): Promise<{ before: WorkflowState; after: WorkflowState }> => {
  const before = await store.load();
  if (before.state === to) {
    return { before, after: before };
  }
  if (!isLegalTransition(before.state, to)) {
    if (reachableFrom(to).has(before.state)) {
      return { before, after: before };
    }
    throw new PolicyViolationError(
      `illegal transition ${before.state} -> ${to}`,
      "ILLEGAL_TRANSITION",
    );
  }
  const after = await store.transition({ to, reason, host });
  return { before, after };
};

/** Applies `advanceState` to each state of `path` in order. */
export const advanceAlong = async (
  store: WorkflowStateStore,
  path: readonly WorkflowStateName[],
  reason: string,
  host?: string,
): Promise<{ before: WorkflowState; after: WorkflowState }> => {
  const before = await store.load();
  let after = before;
  for (const to of path) {
    after = (await advanceState(store, to, reason, host)).after;
  }
  return { before, after };
};
