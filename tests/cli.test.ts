import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { type CliEnvironment, runCli } from "../src/cli/program";
import { RuleBookJudge } from "../src/court/policy-judge";
import type { Provisioner } from "../src/flow/provisioner";
import { silentLogger } from "../src/observability/logger";
import { FIXED_TIME, FakeTarget } from "./support/fake-target";

const MANIFEST = ["run_id,spec_reference,seed", "r0,configs/a.py,0", "r1,configs/a.py,1", ""].join("\n");

const noProvisioner: Provisioner = {
  name: "none",
  allocate: async () => {
    throw new Error("no allocation in tests");
  },
  deallocate: async () => {},
};

const cli = (options: { config?: boolean } = {}) => {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "podflow-cli-"));
  if (options.config !== false) {
    fs.mkdirSync(path.join(cwd, ".podflow"));
    fs.writeFileSync(
      path.join(cwd, ".podflow", "config.json"),
      JSON.stringify({ target: { host: "gpu-host-1" }, repo: { url: "https://example.invalid/lab.git" } }),
    );
    fs.mkdirSync(path.join(cwd, "sweeps"));
    fs.writeFileSync(path.join(cwd, "sweeps", "manifest.csv"), MANIFEST);
  }
  const target = new FakeTarget();
  const out: string[] = [];
  const err: string[] = [];
  const environment: CliEnvironment = {
    cwd,
    env: {},
    out: (line) => out.push(line),
    err: (line) => err.push(line),
    logger: silentLogger,
    clock: () => new Date(FIXED_TIME),
    sleep: async () => {},
    exec: async () => ({ code: 0, stdout: "", stderr: "", killed: false }),
    executorFactory: () => target,
    provisioner: noProvisioner,
    judge: { judge: new RuleBookJudge(), timeoutMs: 5_000 },
  };
  const run = (...argv: string[]) => runCli(argv, environment);
  return { cwd, target, out, err, run };
};

const seedState = (target: FakeTarget, state: string) =>
  target.writeJson("/mnt/podflow/_state/workflow_state.json", {
    state,
    previous_state: "BOOTSTRAPPED",
    reason: "seeded",
    updated_at: FIXED_TIME,
    host: "gpu-host-1",
  });

describe("podflow cli", () => {
  it("submits and waits for a task", async () => {
    const { out, run } = cli();

    expect(await run("task", "submit", "--id", "t1", "--cmd", "echo hi")).toBe(0);
    expect(await run("task", "wait", "--id", "t1")).toBe(0);

    expect(out).toEqual([
      "task=t1 submitted",
      "dir=/mnt/podflow/_tasks/t1",
      "task=t1 state=success exit_code=0",
    ]);
  });

  it("exits 3 when a waited task never appears", async () => {
    const { out, run } = cli();

    expect(await run("task", "wait", "--id", "ghost", "--timeout", "1")).toBe(3);
    expect(out).toEqual(["task=ghost still missing: wait timed out"]);
  });

  it("refuses a sweep outside its allowed states", async () => {
    const { err, target, run } = cli();

    expect(await run("sweep", "start")).toBe(1);
    expect(err).toEqual([
      "refused (STATE_NOT_ALLOWED): sweep-start is not allowed in state INIT (allowed: CHECKED_OUT, SWEEP_COMPLETED, ARTIFACTS_SYNCED)",
    ]);
    expect(target.count("launch-detached")).toBe(0);
  });

  it("leaves the remote manifest alone when a sweep is refused", async () => {
    const { target, run } = cli();
    seedState(target, "SWEEP_RUNNING");
    target.put("/mnt/podflow/_manifests/sweep-latest.csv", "run_id,spec_reference\nold,configs/a.py\n");

    expect(await run("sweep", "start")).toBe(1);

    expect(target.files.get("/mnt/podflow/_manifests/sweep-latest.csv")).toBe(
      "run_id,spec_reference\nold,configs/a.py\n",
    );
    expect(target.files.has("/mnt/podflow/_manifests/sweep-20260301T120000Z.csv")).toBe(false);
  });

  it("runs a sweep and reports its status", async () => {
    const { out, target, run } = cli();
    seedState(target, "CHECKED_OUT");

    expect(await run("sweep", "start")).toBe(0);
    expect(out).toEqual(["r0: ok (run-r0)", "r1: ok (run-r1)", "sweep ok"]);

    out.length = 0;
    expect(await run("sweep", "status")).toBe(0);
    expect(await run("state", "show")).toBe(0);
    expect(out).toEqual([
      "total=2 ok=2 failed=0 in_progress=0 missing_dir=0 parse_error=0",
      "state=SWEEP_RUNNING",
      "previous_state=SWEEP_LAUNCHED",
      "reason=sweep-start (cli)",
      `updated_at=${FIXED_TIME}`,
      "host=gpu-host-1",
    ]);
  });

  it("writes a manifest template once", async () => {
    const { cwd, out, run } = cli();
    const file = path.join(cwd, "new.csv");

    expect(await run("sweep", "template", "--csv", "new.csv")).toBe(0);
    expect(await run("sweep", "template", "--csv", "new.csv")).toBe(1);

    expect(out).toEqual([`wrote ${file}`, `${file} already exists; not overwritten`]);
  });

  it("runs a flow and points at its evidence", async () => {
    const { cwd, out, run } = cli();

    const code = await run(
      "flow",
      "--provision", "skip",
      "--sweep", "skip",
      "--wait", "false",
      "--fetch", "none",
      "--teardown", "keep",
    );

    expect(code).toBe(0);
    expect(out.slice(0, 4)).toEqual(["=== flow ===", expect.stringMatching(/^flow_id=/), "status=ok", "target=gpu-host-1"]);
    expect(out.at(-1)?.startsWith(`evidence: ${path.join(cwd, ".podflow", "flows")}${path.sep}`)).toBe(true);
  });

  it("rejects invalid option values", async () => {
    const { err, run } = cli();

    const code = await run(
      "flow",
      "--provision", "maybe",
      "--sweep", "skip",
      "--wait", "false",
      "--fetch", "none",
      "--teardown", "keep",
    );

    expect(code).toBe(1);
    expect(err[0]).toContain("--provision");
  });

  it("reports a missing configuration", async () => {
    const { err, run } = cli({ config: false });

    expect(await run("state", "show")).toBe(1);
    expect(err[0]).toMatch(/^configuration error: no configuration found/);
  });
});
