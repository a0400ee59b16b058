import path from "node:path";
import { nanoid } from "nanoid";
import { type Clock, type Sleep, compactStamp, isoSeconds, sleep as defaultSleep, systemClock } from "../core/clock";
import {
  DeterminismError,
  ExecutionError,
  PolicyViolationError,
  errorMessage,
} from "../core/errors";
import { advanceAlong } from "../core/state-store";
import {
  type FlowId,
  type FlowOptions,
  type FlowRun,
  type PhaseEvidence,
  type PhaseId,
  type SweepRow,
  type WorkflowState,
  asFlowId,
} from "../core/types";
import {
  COMMAND_CONTRACTS,
  type CommandName,
  PHASES,
  isCommandInPhase,
} from "../core/workflow-definition";
import { ValidationGate } from "../court/gate";
import { type PolicyJudge, loadConstitution } from "../court/policy-judge";
import {
  EvidenceWriter,
  FLOW_START_FILE,
  FLOW_SUMMARY_FILE,
  sha256,
} from "../evidence/evidence-writer";
import { type Logger, silentLogger } from "../observability/logger";
import type { LoadedConfig, PodflowConfig } from "../project/config";
import { renderAction } from "../runtime/actions";
import { Poller } from "../runtime/poller";
import { type ExecFn, execProcess } from "../runtime/process";
import { WAIT_TIMEOUT_EXIT } from "../runtime/task-tracker";
import { activeSweepTasks } from "../sweep/scheduler";
import { collectSweepStatus, findStalledRows, isSweepComplete } from "../sweep/status";
import {
  LOCAL_TARGET,
  type ServiceOptions,
  type TargetServices,
  connectTarget,
  createScheduler,
  enterSweep,
  readRemoteManifest,
  uploadLocalManifest,
} from "./context";
import {
  type Facts,
  type StepResult,
  failedStep,
  formatFetchMode,
  localBinariesFor,
  okStep,
  optionProblems,
} from "./phases";
import type { Provisioner } from "./provisioner";

export const READY_TOKEN = "podflow-ready";
const PROBE_TIMEOUT_MS = 30_000;

export interface FlowDeps extends ServiceOptions {
  loaded: LoadedConfig;
  provisioner: Provisioner;
  judge: PolicyJudge;
  judgeTimeoutMs: number;
  /** Rule text handed to the judge; defaults to the bundled rule book. */
  rules?: string;
  /** Defaults to `<cwd>/.podflow/flows`. */
  flowsDir?: string;
}

export interface PhaseOutcome {
  phase_id: PhaseId;
  attempt: number;
  command: CommandName;
  phase_pass: boolean;
  reasons: string[];
  detail: string;
}

export interface FlowSummary {
  flow_id: FlowId;
  status: "ok" | "failed";
  failed_phase: PhaseId | null;
  reason: string | null;
  started_at: string;
  finished_at: string;
  config_fingerprint: string;
  resolved_target: string | null;
  phases: PhaseOutcome[];
}

export interface FlowResult {
  flow: FlowRun;
  summary: FlowSummary;
  flowDir: string;
  ok: boolean;
}

export const createFlowId = (clock: Clock = systemClock): FlowId =>
  asFlowId(`${compactStamp(clock())}-${nanoid(8)}`);

interface PlannedPhase {
  phase: PhaseId;
  command: CommandName;
  run: () => Promise<StepResult>;
}

/**
 * Runs P00..P90 in order for one set of flow options, gating every phase,
 * and always closes with the P99 summary.
 */
export class FlowOrchestrator {
  constructor(private readonly deps: FlowDeps) {}

  async run(options: FlowOptions): Promise<FlowResult> {
    const session = new FlowSession(this.deps, options);
    return session.run();
  }
}

class FlowSession {
  private readonly config: PodflowConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly exec: ExecFn;
  private readonly writer: EvidenceWriter;
  private readonly gate: ValidationGate;
  private readonly flow: FlowRun;
  private readonly flowStartPath: string;
  private readonly outcomes: PhaseOutcome[] = [];
  private target: string | null = null;
  private provisionedHost: string | null = null;
  private services: TargetServices | null = null;
  private manifestRows: SweepRow[] | null = null;

  constructor(
    private readonly deps: FlowDeps,
    private readonly options: FlowOptions,
  ) {
    this.config = deps.loaded.config;
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? defaultSleep;
    this.exec = deps.exec ?? execProcess;
    this.writer = new EvidenceWriter(
      deps.flowsDir ?? path.join(deps.cwd, ".podflow", "flows"),
      { clock: this.clock },
    );
    this.gate = new ValidationGate(this.writer, deps.judge, {
      rules: deps.rules ?? loadConstitution(),
      judgeTimeoutMs: deps.judgeTimeoutMs,
      clock: this.clock,
      logger: this.logger.child("gate: "),
    });

    this.flow = {
      flow_id: createFlowId(this.clock),
      started_at: isoSeconds(this.clock()),
      config_fingerprint: deps.loaded.fingerprint,
      config_path: deps.loaded.path,
      resolved_target: this.config.target.host || null,
      transport_kind: this.config.target.transport,
      options,
    };
    this.flowStartPath = this.writer.writeRecord(this.flow.flow_id, FLOW_START_FILE, this.flow).path;
  }

  async run(): Promise<FlowResult> {
    this.logger.info(`flow ${this.flow.flow_id} started`);
    let failure: { phase: PhaseId; reason: string } | null = null;

    for (const planned of this.plan()) {
      const outcome = await this.runPhase(planned);
      if (!outcome.phase_pass) {
        failure = {
          phase: planned.phase,
          reason: outcome.reasons.join(", ") || outcome.detail,
        };
        this.logger.error(`phase=${planned.phase} ${failure.reason}`);
        break;
      }
    }

    const closing = await this.runPhase({
      phase: "P99",
      command: "flow-summary",
      run: async () =>
        okStep("flow-summary", failure ? `halted at ${failure.phase}` : "all phases passed", {
          phases_run: this.outcomes.length,
          failed_phase: failure?.phase ?? null,
        }),
    });
    if (!failure && !closing.phase_pass) {
      failure = { phase: "P99", reason: closing.reasons.join(", ") };
    }

    const summary: FlowSummary = {
      flow_id: this.flow.flow_id,
      status: failure ? "failed" : "ok",
      failed_phase: failure?.phase ?? null,
      reason: failure?.reason ?? null,
      started_at: this.flow.started_at,
      finished_at: isoSeconds(this.clock()),
      config_fingerprint: this.flow.config_fingerprint,
      resolved_target: this.target,
      phases: this.outcomes,
    };
    this.writer.writeRecord(this.flow.flow_id, FLOW_SUMMARY_FILE, summary);

    return {
      flow: this.flow,
      summary,
      flowDir: this.writer.flowDir(this.flow.flow_id),
      ok: failure === null,
    };
  }

  private plan(): PlannedPhase[] {
    const { options } = this;
    const sweepCommand: CommandName =
      options.sweep === "start" ? "sweep-start" : options.sweep === "resume" ? "sweep-resume" : "sweep-policy";
    const monitorCommand: CommandName =
      options.sweep === "skip" ? "sweep-policy" : options.wait ? "sweep-wait" : "sweep-status";
    const fetchCommand: CommandName =
      options.fetch.kind === "none" ? "fetch-policy" : options.fetch.kind === "all" ? "fetch-all" : "fetch-run";

    return [
      { phase: "P00", command: "flow-precheck", run: () => this.precheck() },
      {
        phase: "P10",
        command: options.provision === "auto" ? "pod-up" : "provision-policy",
        run: () => this.provision(),
      },
      { phase: "P20", command: "target-bind", run: () => this.bindTarget() },
      { phase: "P30", command: "pod-status", run: () => this.podReady() },
      { phase: "P40", command: "bootstrap", run: () => this.bootstrap() },
      { phase: "P50", command: "checkout", run: () => this.checkout() },
      { phase: "P60", command: sweepCommand, run: () => this.sweep(sweepCommand) },
      { phase: "P70", command: monitorCommand, run: () => this.monitor(monitorCommand) },
      { phase: "P80", command: fetchCommand, run: () => this.fetch(fetchCommand) },
      { phase: "P90", command: options.teardown === "delete" ? "pod-delete" : "teardown-policy", run: () => this.teardown() },
    ];
  }

  private baseFacts(phase: PhaseId): Facts {
    const repoUrl = this.config.repo.url;
    switch (phase) {
      case "P10":
        return { provision_mode: this.options.provision };
      case "P20":
        return { target_source: "unresolved" };
      case "P50":
        return { repo_url: repoUrl };
      case "P60":
        return { sweep_mode: this.options.sweep, repo_url: repoUrl };
      case "P70":
        return { wait: this.options.wait };
      case "P80":
        return { fetch_mode: formatFetchMode(this.options.fetch) };
      case "P90":
        return { teardown_mode: this.options.teardown };
      default:
        return {};
    }
  }

  private async runPhase(planned: PlannedPhase): Promise<PhaseOutcome> {
    const { phase } = planned;
    const attempt = this.writer.nextAttempt(this.flow.flow_id, phase);
    let result: StepResult;
    try {
      result = await planned.run();
    } catch (error) {
      result = this.fromError(planned.command, error);
    }

    const contract = PHASES[phase];
    const evidence: PhaseEvidence = {
      flow_id: this.flow.flow_id,
      phase_id: phase,
      attempt,
      command_name: result.command,
      command_exit_code: result.exitCode,
      command_executed: result.executed,
      phase_status: result.status,
      fsm_before: result.fsmBefore ?? null,
      fsm_after: result.fsmAfter ?? null,
      transition_legal: result.transitionLegal ?? true,
      contract_intent: contract.intent,
      allowed_commands: [...contract.commands],
      command_in_contract: isCommandInPhase(phase, result.command),
      applicable_laws: [...contract.laws],
      config_fingerprint: this.flow.config_fingerprint,
      resolved_target: this.target,
      transport_kind: this.flow.transport_kind,
      flow_start_artifact: this.flowStartPath,
      recorded_at: isoSeconds(this.clock()),
      detail: result.detail,
      facts: { ...this.baseFacts(phase), ...result.facts },
      artifacts: result.artifacts ?? [],
    };
    this.writer.writePhaseRecord(this.flow.flow_id, phase, "evidence", attempt, evidence);

    const gated = await this.gate.evaluate(evidence);
    const outcome: PhaseOutcome = {
      phase_id: phase,
      attempt,
      command: result.command,
      phase_pass: gated.verdict.phase_pass,
      reasons: gated.verdict.reasons,
      detail: result.detail,
    };
    this.outcomes.push(outcome);
    this.logger.info(`${phase} ${result.command}: ${outcome.phase_pass ? "pass" : "fail"}`);
    return outcome;
  }

  private fromError(command: CommandName, error: unknown): StepResult {
    const detail = errorMessage(error);
    if (error instanceof PolicyViolationError) {
      const transitionRefused = error.code === "ILLEGAL_TRANSITION" || error.code === "STATE_NOT_ALLOWED";
      return {
        ...failedStep(command, detail, { error_code: error.code }, null),
        ...(transitionRefused ? { transitionLegal: false } : {}),
      };
    }
    if (error instanceof ExecutionError) {
      const executed = error.failureClass !== "infrastructure";
      return failedStep(
        command,
        detail,
        { failure_class: error.failureClass },
        executed ? (error.exitCode ?? 1) : null,
      );
    }
    if (error instanceof DeterminismError) {
      return failedStep(command, detail, { error_code: error.code }, null);
    }
    return failedStep(command, detail, {}, null);
  }

  private requireServices(): TargetServices {
    if (!this.services) {
      throw new DeterminismError("no target is bound for this flow", "UNRESOLVED_TARGET");
    }
    return this.services;
  }

  /**
   * Runs a state-bound command: refuses it outside its allowed states and,
   * on success, steps the workflow state along the command's path.
   */
  private async bound(
    command: CommandName,
    work: (before: WorkflowState) => Promise<StepResult>,
    options: { advanceFirst?: boolean } = {},
  ): Promise<StepResult> {
    const services = this.requireServices();
    const contract = COMMAND_CONTRACTS[command];
    if (contract.allowFrom === "unbound") {
      return work(await services.state.load());
    }

    let before: WorkflowState;
    try {
      before = await services.state.authorize(command, contract.allowFrom);
    } catch (error) {
      if (error instanceof PolicyViolationError) {
        const current = await services.state.load();
        return {
          ...failedStep(command, error.message, { error_code: error.code }, null),
          fsmBefore: current.state,
          fsmAfter: current.state,
          transitionLegal: false,
        };
      }
      throw error;
    }

    const reason = `${command} (flow ${this.flow.flow_id})`;
    const advance = async () =>
      contract.advancesTo
        ? (await advanceAlong(services.state, contract.advancesTo, reason, services.target)).after
        : await services.state.load();

    if (options.advanceFirst) {
      const after = await advance();
      const result = await work(before);
      return { ...result, fsmBefore: before.state, fsmAfter: after.state, transitionLegal: true };
    }

    const result = await work(before);
    const after = result.status === "ok" ? await advance() : await services.state.load();
    return { ...result, fsmBefore: before.state, fsmAfter: after.state, transitionLegal: true };
  }

  private async precheck(): Promise<StepResult> {
    const problems = optionProblems(this.options);
    if (!this.flow.config_fingerprint) {
      problems.push("configuration fingerprint is empty");
    }

    const binaries = localBinariesFor(
      this.config.target.transport,
      this.config.target.managedCli,
      this.options,
    );
    const check = await this.exec("bash", ["-c", renderAction({ kind: "check-binaries", names: binaries })]);
    const missing =
      check.code === 127 && check.stdout === ""
        ? ["bash"]
        : [...check.stdout.matchAll(/^missing:(\S+)$/gm)].map((match) => match[1] ?? "");
    if (missing.length > 0) {
      problems.push(`missing local binaries: ${missing.join(", ")}`);
    }

    const facts: Facts = {
      config_path: this.deps.loaded.path,
      config_source: this.deps.loaded.source,
      provision: this.options.provision,
      sweep: this.options.sweep,
      wait: this.options.wait,
      fetch: formatFetchMode(this.options.fetch),
      teardown: this.options.teardown,
      local_binaries: binaries.join(","),
    };
    if (problems.length > 0) {
      return failedStep("flow-precheck", problems.join("; "), facts);
    }
    return okStep("flow-precheck", "configuration and options accepted", facts, [
      this.deps.loaded.path,
      this.flowStartPath,
    ]);
  }

  private async provision(): Promise<StepResult> {
    if (this.options.provision === "skip") {
      return okStep("provision-policy", "provisioning skipped by policy", {});
    }
    const host = await this.deps.provisioner.allocate(this.config.provision.spec);
    this.provisionedHost = host;
    return okStep("pod-up", `allocated ${host}`, {
      host,
      provisioner: this.deps.provisioner.name,
    });
  }

  private async bindTarget(): Promise<StepResult> {
    const resolved = this.config.target.host
      ? { host: this.config.target.host, source: "config" }
      : this.provisionedHost
        ? { host: this.provisionedHost, source: "provisioned" }
        : this.config.target.transport === "local"
          ? { host: LOCAL_TARGET, source: "local" }
          : null;
    if (!resolved) {
      throw new DeterminismError(
        "no target: set target.host or use --provision auto",
        "UNRESOLVED_TARGET",
      );
    }
    if (this.target !== null) {
      throw new PolicyViolationError(
        `target already bound to ${this.target} for flow ${this.flow.flow_id}`,
        "TARGET_REBIND",
      );
    }
    this.target = resolved.host;
    this.services = connectTarget(this.config, resolved.host, this.deps);
    return okStep("target-bind", `bound ${resolved.host}`, {
      target_source: resolved.source,
      target: resolved.host,
    });
  }

  private async podReady(): Promise<StepResult> {
    const services = this.requireServices();
    const poller = new Poller({
      intervalMs: this.config.provision.intervalSecs * 1000,
      timeoutMs: this.config.provision.waitTimeoutSecs * 1000,
      sleep: this.sleep,
    });
    const probed = await poller.run<number>(async () => {
      const outcome = await services.executor.execute(
        { kind: "probe", token: READY_TOKEN },
        { timeoutMs: PROBE_TIMEOUT_MS },
      );
      if (outcome.kind === "exited" && outcome.code === 0 && outcome.output.includes(READY_TOKEN)) {
        return { ok: true, done: true, value: outcome.code };
      }
      return {
        ok: true,
        done: false,
        message: outcome.kind === "exited" ? `probe exited ${outcome.code}` : outcome.reason,
      };
    });
    if (probed.kind !== "done") {
      throw new ExecutionError(
        `target ${services.target} did not answer the readiness probe within ${this.config.provision.waitTimeoutSecs}s (${probed.last})`,
        "infrastructure",
        services.target,
      );
    }
    return this.bound("pod-status", async () =>
      okStep("pod-status", `target answered after ${probed.polls} poll(s)`, { polls: probed.polls }),
    );
  }

  private async bootstrap(): Promise<StepResult> {
    const services = this.requireServices();
    return this.bound("bootstrap", async () => {
      const { executor } = services;
      const root = this.config.remote.root;
      const names = this.config.bootstrap.requiredBinaries;
      const scriptPath = this.config.bootstrap.script
        ? this.config.bootstrap.script.startsWith("/")
          ? this.config.bootstrap.script
          : `${root}/${this.config.bootstrap.script}`
        : "";
      const facts: Facts = { required_binaries: names.join(","), script: scriptPath };

      const prepared = await executor.execute({ kind: "mkdir", path: root });
      const checked = await executor.execute({ kind: "check-binaries", names });
      for (const outcome of [prepared, checked]) {
        if (outcome.kind === "not-executed") {
          throw new ExecutionError(`bootstrap: ${outcome.reason}`, "infrastructure", services.target);
        }
      }
      if (prepared.kind === "exited" && prepared.code !== 0) {
        return failedStep("bootstrap", `could not create ${root}: ${prepared.output.trim()}`, facts, prepared.code);
      }
      if (checked.kind === "exited" && checked.code !== 0) {
        const missing = [...checked.output.matchAll(/^missing:(\S+)$/gm)].map((match) => match[1]);
        return failedStep("bootstrap", `missing binaries on target: ${missing.join(", ")}`, facts, checked.code);
      }

      if (scriptPath) {
        const ran = await executor.execute({ kind: "run-script", path: scriptPath, args: [], bestEffort: true });
        if (ran.kind === "not-executed") {
          throw new ExecutionError(`bootstrap script: ${ran.reason}`, "infrastructure", services.target);
        }
        if (/^(warn|skip): /m.test(ran.output)) {
          this.logger.warn(`bootstrap script ${scriptPath}: ${ran.output.trim().split("\n").at(-1) ?? ""}`);
        }
      }
      return okStep("bootstrap", "target tooling verified", facts);
    });
  }

  private async checkout(): Promise<StepResult> {
    const services = this.requireServices();
    const repo = this.config.repo;
    return this.bound("checkout", async () => {
      const ref = repo.pr !== undefined ? { pr: repo.pr } : { branch: repo.branch };
      const facts: Facts = {
        repo_url: repo.url,
        ref: repo.pr !== undefined ? `pr-${repo.pr}` : repo.branch,
      };
      if (!repo.url) {
        return failedStep("checkout", "repo.url is not configured", facts, null);
      }
      const outcome = await services.executor.execute({
        kind: "git-checkout",
        repoDir: repo.dir,
        url: repo.url,
        ref,
        forceClean: repo.forceClean,
        ...(repo.expectSha ? { expectSha: repo.expectSha } : {}),
      });
      if (outcome.kind === "not-executed") {
        throw new ExecutionError(`checkout: ${outcome.reason}`, "infrastructure", services.target);
      }
      if (outcome.code !== 0) {
        return failedStep("checkout", checkoutFailure(outcome.code, outcome.output), facts, outcome.code);
      }
      const head = outcome.output.match(/^head=([0-9a-f]+)$/m)?.[1] ?? "";
      return okStep("checkout", `checked out ${facts.ref} at ${head}`, { ...facts, head });
    });
  }

  private async loadRemoteManifest(services: TargetServices): Promise<SweepRow[]> {
    if (!this.manifestRows) {
      this.manifestRows = (await readRemoteManifest(services)).rows;
    }
    return this.manifestRows;
  }

  private async sweep(command: CommandName): Promise<StepResult> {
    if (command === "sweep-policy") {
      return okStep("sweep-policy", "sweep skipped by policy", {});
    }
    const services = this.requireServices();
    const steps = COMMAND_CONTRACTS[command].advancesTo ?? [];

    return this.bound(command, async () => {
      const manifest =
        command === "sweep-start"
          ? await uploadLocalManifest(services, path.resolve(this.deps.cwd, this.config.sweep.manifest))
          : await readRemoteManifest(services);
      const { text, rows } = manifest;
      const artifacts = manifest.localPath ? [manifest.localPath] : [];
      this.manifestRows = rows;

      const scheduler = createScheduler(this.config, services, {
        ...this.deps,
        onDispatch: () => enterSweep(services, steps, `sweep dispatch (flow ${this.flow.flow_id})`),
      });
      const report = await scheduler.run(rows, {
        selection: {},
        force: false,
        dryRun: false,
        attached: this.options.wait,
      });

      const count = (kind: string) => report.rows.filter((row) => row.kind === kind).length;
      const failedRows = report.rows
        .filter((row) => row.kind === "finished" && !row.ok)
        .map((row) => row.runId);
      const facts: Facts = {
        manifest_sha256: sha256(text),
        rows_total: rows.length,
        skipped: count("skipped"),
        finished: count("finished"),
        queued: count("queued"),
        failed_rows: failedRows.join(","),
        in_flight_tasks: report.inFlightTasks.join(","),
        halted_row: report.halted?.runId ?? null,
      };

      if (!report.ok) {
        const detail = report.halted
          ? `${report.halted.runId ? `row=${report.halted.runId} ` : ""}${report.halted.reason}`
          : `failed rows: ${failedRows.join(", ")}`;
        return { ...failedStep(command, detail, facts), artifacts };
      }
      return okStep(command, `${rows.length} row(s) in manifest`, facts, artifacts);
    });
  }

  private async monitor(command: CommandName): Promise<StepResult> {
    if (command === "sweep-policy") {
      return okStep("sweep-policy", "sweep skipped by policy", {});
    }
    const services = this.requireServices();
    const settings = this.config.sweep;

    if (command === "sweep-wait") {
      return this.bound("sweep-wait", async () => {
        const rows = await this.loadRemoteManifest(services);
        for (const taskId of await activeSweepTasks(services.tasks)) {
          const waited = await services.tasks.wait(taskId, {
            timeoutSecs: settings.waitTimeoutSecs,
            pollIntervalMs: settings.pollIntervalSecs * 1000,
          });
          if (waited.kind === "wait-timeout") {
            return failedStep(
              "sweep-wait",
              `sweep task ${taskId} still ${waited.lastState} after ${settings.waitTimeoutSecs}s`,
              { task_id: taskId },
              WAIT_TIMEOUT_EXIT,
            );
          }
        }
        const { status } = await collectSweepStatus(services.runs, rows);
        const facts = bucketFacts(status.buckets, status.total);
        if (!isSweepComplete(status)) {
          const pending = [
            ...status.buckets.failed.map((id) => `${id}(failed)`),
            ...status.buckets.parse_error.map((id) => `${id}(parse_error)`),
            ...status.buckets.in_progress.map((id) => `${id}(in_progress)`),
            ...status.buckets.missing_dir.map((id) => `${id}(missing)`),
          ];
          return failedStep("sweep-wait", `sweep incomplete: ${pending.join(", ")}`, facts);
        }
        return okStep("sweep-wait", `all ${status.total} row(s) ok`, facts);
      });
    }

    return this.bound("sweep-status", async (before) => {
      const rows = await this.loadRemoteManifest(services);
      const active = await activeSweepTasks(services.tasks);
      const { status, records } = await collectSweepStatus(services.runs, rows);
      const stalled = findStalledRows(records, active);
      const facts: Facts = {
        ...bucketFacts(status.buckets, status.total),
        active_tasks: active.join(","),
        stalled_rows: stalled.join(","),
      };
      const reason = `sweep-status (flow ${this.flow.flow_id})`;

      if (stalled.length > 0) {
        if (before.state === "SWEEP_RUNNING") {
          await services.state.transition({ to: "SWEEP_STALLED", reason, host: services.target });
        }
        return failedStep("sweep-status", `sweep stalled: ${stalled.join(", ")} have no live task`, facts);
      }
      if (before.state === "SWEEP_STALLED" && active.length > 0) {
        await services.state.transition({ to: "SWEEP_RUNNING", reason, host: services.target });
      }
      return okStep("sweep-status", `${status.buckets.ok.length}/${status.total} row(s) ok`, facts);
    });
  }

  private async fetch(command: CommandName): Promise<StepResult> {
    const mode = this.options.fetch;
    if (mode.kind === "none") {
      return okStep("fetch-policy", "fetch skipped by policy", {});
    }
    const services = this.requireServices();

    if (mode.kind === "run") {
      return this.bound("fetch-run", async () => {
        const fetched = await services.fetcher.fetchRun(mode.runId);
        return okStep("fetch-run", `fetched ${mode.runId}`, { run_id: mode.runId }, [fetched.localDir]);
      });
    }

    return this.bound(command, async () => {
      const rows = await this.loadRemoteManifest(services);
      const records = await services.runs.readRecords(rows.map((row) => row.run_id));
      const present = rows
        .map((row) => row.run_id)
        .filter((runId) => records.get(runId)?.dirExists ?? false);
      const fetched = await services.fetcher.fetchAll(present, this.config.fetch.runPattern);
      return okStep(
        "fetch-all",
        `fetched ${fetched.length} run(s)`,
        { pattern: this.config.fetch.runPattern, fetched: fetched.length },
        fetched.map((run) => run.localDir),
      );
    });
  }

  private async teardown(): Promise<StepResult> {
    const host = this.target ?? "";
    if (this.options.teardown === "keep") {
      return okStep("teardown-policy", `kept ${host}`, { host });
    }
    return this.bound(
      "pod-delete",
      async () => {
        await this.deps.provisioner.deallocate(host);
        return okStep("pod-delete", `deleted ${host}`, { host });
      },
      { advanceFirst: true },
    );
  }
}

const checkoutFailure = (code: number, output: string): string => {
  const tail = output.trim().split("\n").slice(-3).join(" | ");
  switch (code) {
    case 4:
      return `repository has tracked modifications: ${tail}`;
    case 5:
      return `repository HEAD does not match repo.expectSha: ${tail}`;
    case 6:
      return `branch not found on origin: ${tail}`;
    default:
      return `checkout failed (exit ${code}): ${tail}`;
  }
};

const bucketFacts = (buckets: Record<string, string[]>, total: number): Facts => {
  const facts: Facts = { total };
  for (const [bucket, ids] of Object.entries(buckets)) {
    facts[bucket] = ids.length;
  }
  return facts;
};
