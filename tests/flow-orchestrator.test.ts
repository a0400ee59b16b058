import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { FlowOptions } from "../src/core/types";
import { RuleBookJudge } from "../src/court/policy-judge";
import { EvidenceWriter } from "../src/evidence/evidence-writer";
import { type FlowDeps, FlowOrchestrator } from "../src/flow/orchestrator";
import type { Provisioner } from "../src/flow/provisioner";
import { type PodflowConfigInput, normalizeConfig } from "../src/project/config";
import type { ExecFn } from "../src/runtime/process";
import { FIXED_TIME, FakeTarget, type RowBehavior } from "./support/fake-target";

const MANIFEST = ["run_id,spec_reference,seed", "r0,configs/a.py,0", "r1,configs/a.py,1", ""].join("\n");

class FakeProvisioner implements Provisioner {
  readonly name = "fake";
  readonly allocated: string[] = [];
  readonly released: string[] = [];

  constructor(private readonly host = "gpu-host-9") {}

  async allocate(spec: string): Promise<string> {
    this.allocated.push(spec);
    return this.host;
  }

  async deallocate(host: string): Promise<void> {
    this.released.push(host);
  }
}

/** Local commands: the binary check passes and tar "extracts" the run directory. */
const localExec = (missing: string[] = []): ExecFn => async (bin, args) => {
  if (bin === "tar") {
    const [, archive = "", , into = ""] = args;
    const runId = path.basename(archive).replace(/-\d{8}T\d{6}Z\.tar\.gz$/, "");
    fs.mkdirSync(path.join(into, runId), { recursive: true });
    return { code: 0, stdout: "", stderr: "", killed: false };
  }
  return {
    code: missing.length > 0 ? 2 : 0,
    stdout: missing.map((name) => `missing:${name}\n`).join(""),
    stderr: "",
    killed: false,
  };
};

const setup = (
  input: PodflowConfigInput = {},
  options: { rows?: Record<string, RowBehavior>; missing?: string[] } = {},
) => {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "podflow-flow-"));
  const configPath = path.join(cwd, ".podflow", "config.json");
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(input));
  fs.mkdirSync(path.join(cwd, "sweeps"));
  fs.writeFileSync(path.join(cwd, "sweeps", "manifest.csv"), MANIFEST);

  const config = normalizeConfig(
    {
      ...input,
      repo: { url: "https://example.invalid/lab.git", ...input.repo },
      target: { host: "gpu-host-1", ...input.target },
    },
    configPath,
  );
  const targets = new Map<string, FakeTarget>();
  const provisioner = new FakeProvisioner();
  const deps: FlowDeps = {
    cwd,
    loaded: { config, path: configPath, source: "canonical", fingerprint: "a".repeat(64) },
    provisioner,
    judge: new RuleBookJudge(),
    judgeTimeoutMs: 5_000,
    exec: localExec(options.missing),
    clock: () => new Date(FIXED_TIME),
    sleep: async () => {},
    executorFactory: (host) => {
      const target = targets.get(host) ?? new FakeTarget(host);
      for (const [runId, behavior] of Object.entries(options.rows ?? {})) {
        target.rowBehavior.set(runId, behavior);
      }
      targets.set(host, target);
      return target;
    },
  };
  return { cwd, deps, targets, provisioner, orchestrator: new FlowOrchestrator(deps) };
};

const flowOptions = (overrides: Partial<FlowOptions> = {}): FlowOptions => ({
  provision: "skip",
  sweep: "skip",
  wait: false,
  fetch: { kind: "none" },
  teardown: "keep",
  ...overrides,
});

describe("FlowOrchestrator", () => {
  it("runs a full sweep flow and records every phase", async () => {
    const { cwd, targets, orchestrator } = setup();

    const result = await orchestrator.run(
      flowOptions({ sweep: "start", wait: true, fetch: { kind: "all" } }),
    );

    expect(result.ok).toBe(true);
    expect(result.summary.phases.map((phase) => `${phase.phase_id}:${phase.command}`)).toEqual([
      "P00:flow-precheck",
      "P10:provision-policy",
      "P20:target-bind",
      "P30:pod-status",
      "P40:bootstrap",
      "P50:checkout",
      "P60:sweep-start",
      "P70:sweep-wait",
      "P80:fetch-all",
      "P90:teardown-policy",
      "P99:flow-summary",
    ]);
    expect(result.summary.resolved_target).toBe("gpu-host-1");

    const target = targets.get("gpu-host-1");
    expect(target?.executedRows).toEqual(["r0", "r1"]);
    expect(target?.readJson("/mnt/podflow/_state/workflow_state.json")).toMatchObject({
      state: "ARTIFACTS_SYNCED",
      host: "gpu-host-1",
    });
    expect(target?.files.get("/mnt/podflow/_manifests/sweep-latest.csv")).toBe(MANIFEST);
    expect(fs.existsSync(path.join(cwd, ".podflow", "artifacts", "r1"))).toBe(true);

    const writer = new EvidenceWriter(path.join(cwd, ".podflow", "flows"));
    expect(writer.readRecord(result.flow.flow_id, "P60.verdict.json").value).toMatchObject({
      phase_pass: true,
    });
    expect(writer.readRecord(result.flow.flow_id, "flow-summary.json").value).toEqual(
      JSON.parse(JSON.stringify(result.summary)),
    );
  });

  it("resolves a relative bootstrap script against the remote root", async () => {
    const { targets, orchestrator } = setup({ bootstrap: { script: "setup/prepare.sh" } });

    await orchestrator.run(flowOptions());

    const ran = targets.get("gpu-host-1")?.actions.filter((action) => action.kind === "run-script");
    expect(ran).toEqual([
      { kind: "run-script", path: "/mnt/podflow/setup/prepare.sh", args: [], bestEffort: true },
    ]);
  });

  it("gives each flow its own id under one configuration fingerprint", async () => {
    const { cwd, orchestrator } = setup();

    const first = await orchestrator.run(flowOptions());
    const second = await orchestrator.run(flowOptions());

    expect(first.flow.flow_id).not.toBe(second.flow.flow_id);
    expect(first.flow.flow_id).toMatch(/^20260301T120000Z-[A-Za-z0-9_-]{8}$/);
    expect(first.summary.config_fingerprint).toBe(second.summary.config_fingerprint);
    expect(new EvidenceWriter(path.join(cwd, ".podflow", "flows")).listFlows()).toHaveLength(2);
  });

  it("rejects option combinations that would race a running sweep", async () => {
    const { targets, orchestrator } = setup();

    const result = await orchestrator.run(flowOptions({ sweep: "start", fetch: { kind: "all" } }));

    expect(result.ok).toBe(false);
    expect(result.summary.failed_phase).toBe("P00");
    expect(result.summary.phases.map((phase) => phase.phase_id)).toEqual(["P00", "P99"]);
    expect(result.summary.phases[0]?.detail).toBe(
      "fetch requires a finished sweep; use --wait true or --fetch none",
    );
    expect(targets.size).toBe(0);
  });

  it("stops before the target when a local binary is missing", async () => {
    const { orchestrator } = setup({}, { missing: ["scp"] });

    const result = await orchestrator.run(flowOptions());

    expect(result.summary.failed_phase).toBe("P00");
    expect(result.summary.phases[0]?.detail).toBe("missing local binaries: scp");
  });

  it("binds a provisioned host and keeps it unless told otherwise", async () => {
    const { provisioner, targets, orchestrator } = setup({ target: { host: "" }, provision: { spec: "a100x2" } });

    const result = await orchestrator.run(flowOptions({ provision: "auto" }));

    expect(result.ok).toBe(true);
    expect(provisioner.allocated).toEqual(["a100x2"]);
    expect(provisioner.released).toEqual([]);
    expect(result.summary.resolved_target).toBe("gpu-host-9");
    expect([...targets.keys()]).toEqual(["gpu-host-9"]);
  });

  it("deletes the host only when asked", async () => {
    const { provisioner, targets, orchestrator } = setup({ target: { host: "" } });

    const result = await orchestrator.run(flowOptions({ provision: "auto", teardown: "delete" }));

    expect(result.ok).toBe(true);
    expect(result.summary.phases.at(-2)?.command).toBe("pod-delete");
    expect(provisioner.released).toEqual(["gpu-host-9"]);
    expect(targets.get("gpu-host-9")?.readJson("/mnt/podflow/_state/workflow_state.json")).toMatchObject({
      state: "POD_TERMINATED",
    });
  });

  it("fails when there is no target to bind", async () => {
    const { orchestrator } = setup({ target: { host: "" } });

    const result = await orchestrator.run(flowOptions());

    expect(result.summary.failed_phase).toBe("P20");
    expect(result.summary.phases[2]?.detail).toBe("no target: set target.host or use --provision auto");
  });

  it("halts the flow at the sweep when a row crashes", async () => {
    const { targets, orchestrator } = setup({}, { rows: { r0: "crash" } });

    const result = await orchestrator.run(flowOptions({ sweep: "start", wait: true }));

    expect(result.summary.failed_phase).toBe("P60");
    expect(result.summary.phases.find((phase) => phase.phase_id === "P60")?.detail).toBe(
      "row=r0 row r0 failed (crash)",
    );
    expect(targets.get("gpu-host-1")?.executedRows).toEqual(["r0"]);
  });

  it("reports a dirty checkout", async () => {
    const { deps } = setup();
    const target = new FakeTarget();
    target.checkoutExit = 4;

    const result = await new FlowOrchestrator({ ...deps, executorFactory: () => target }).run(flowOptions());

    expect(result.summary.failed_phase).toBe("P50");
    expect(result.summary.phases.find((phase) => phase.phase_id === "P50")?.detail).toBe(
      "repository has tracked modifications: error: repo has tracked modifications |  M train.py",
    );
    expect(target.readJson("/mnt/podflow/_state/workflow_state.json")).toMatchObject({
      state: "BOOTSTRAPPED",
    });
  });

  it("launches a detached sweep and takes a status snapshot", async () => {
    const { targets, orchestrator } = setup();

    const result = await orchestrator.run(flowOptions({ sweep: "start" }));

    expect(result.ok).toBe(true);
    expect(result.summary.phases.find((phase) => phase.phase_id === "P70")).toMatchObject({
      command: "sweep-status",
      detail: "2/2 row(s) ok",
    });
    expect(targets.get("gpu-host-1")?.launches.map((launch) => launch.args[1])).toEqual([
      "sweep-20260301T120000Z",
    ]);
  });
});

