import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { DeterminismError, ExecutionError, PolicyViolationError } from "../src/core/errors";
import { RemoteExecutor } from "../src/runtime/remote-executor";
import {
  TaskTracker,
  type TaskTrackerOptions,
  waitExitCode,
} from "../src/runtime/task-tracker";
import { LocalTransport } from "../src/runtime/transports";
import { FIXED_TIME, FakeTarget } from "./support/fake-target";

const ROOT = "/mnt/podflow";

const trackerFor = (
  target: FakeTarget,
  overrides: Partial<TaskTrackerOptions> = {},
): TaskTracker =>
  new TaskTracker(target, {
    root: ROOT,
    launcher: "tmux",
    session: "podflow",
    graceSecs: 30,
    pollIntervalMs: 1000,
    clock: () => new Date(FIXED_TIME),
    sleep: async () => {},
    ...overrides,
  });

describe("TaskTracker.submit", () => {
  it("writes the task files and launches the runner", async () => {
    const target = new FakeTarget();
    const tracker = trackerFor(target);

    const result = await tracker.submit({
      taskId: "train-1",
      command: "python3 train.py --seed 1",
      timeoutSecs: 600,
      workdir: "/mnt/podflow/repo",
    });

    expect(result).toEqual({
      status: "accepted",
      taskId: "train-1",
      taskDir: "/mnt/podflow/_tasks/train-1",
    });
    expect(target.files.get("/mnt/podflow/_tasks/train-1/command.sh")).toBe(
      "#!/usr/bin/env bash\nset -euo pipefail\ncd /mnt/podflow/repo\npython3 train.py --seed 1\n",
    );
    expect(target.files.get("/mnt/podflow/_tasks/train-1/run.sh")).toContain(
      "# Tracked task runner.",
    );
    expect(target.launches).toHaveLength(1);
    expect(target.launches[0]).toMatchObject({
      launcher: "tmux",
      session: "podflow",
      window: "task-train-1",
      runnerPath: "/mnt/podflow/_tasks/train-1/run.sh",
      args: ["/mnt/podflow/_tasks/train-1", "train-1", FIXED_TIME, "600", "30", "podflow"],
    });
  });

  it("omits the session for nohup launches", async () => {
    const target = new FakeTarget();
    target.taskBehavior.set("train-1", "hang");
    const tracker = trackerFor(target, { launcher: "nohup" });

    await tracker.submit({ taskId: "train-1", command: "true", timeoutSecs: 0 });

    expect(target.launches[0]?.args.at(-1)).toBe("");
    expect(await tracker.status("train-1")).toEqual({
      task_id: "train-1",
      state: "running",
      created_at: FIXED_TIME,
      started_at: FIXED_TIME,
      timeout_secs: 0,
      command_path: "/mnt/podflow/_tasks/train-1/command.sh",
      stdout_path: "/mnt/podflow/_tasks/train-1/stdout.log",
    });
  });

  it("rejects a duplicate id without touching the existing task", async () => {
    const target = new FakeTarget();
    const tracker = trackerFor(target);
    await tracker.submit({ taskId: "train-1", command: "true", timeoutSecs: 10 });

    const again = await tracker.submit({ taskId: "train-1", command: "false", timeoutSecs: 10 });

    expect(again).toEqual({
      status: "rejected",
      reason: "task already exists: train-1 (use --force to archive and resubmit)",
    });
    expect(target.launches).toHaveLength(1);
    expect(target.files.get("/mnt/podflow/_tasks/train-1/command.sh")).toContain("\ntrue\n");
  });

  it("archives the previous task when forced", async () => {
    const target = new FakeTarget();
    const tracker = trackerFor(target);
    await tracker.submit({ taskId: "train-1", command: "true", timeoutSecs: 10 });

    const again = await tracker.submit({
      taskId: "train-1",
      command: "false",
      timeoutSecs: 10,
      force: true,
    });

    expect(again).toEqual({
      status: "accepted",
      taskId: "train-1",
      taskDir: "/mnt/podflow/_tasks/train-1",
      archivedTo: "/mnt/podflow/_tasks/train-1.bak-20260301T120000Z",
    });
    expect(
      target.files.get("/mnt/podflow/_tasks/train-1.bak-20260301T120000Z/command.sh"),
    ).toContain("\ntrue\n");
    expect(target.files.get("/mnt/podflow/_tasks/train-1/command.sh")).toContain("\nfalse\n");
  });

  it("validates ids, timeouts and workdirs", async () => {
    const tracker = trackerFor(new FakeTarget());

    await expect(
      tracker.submit({ taskId: "../etc", command: "true", timeoutSecs: 1 }),
    ).rejects.toBeInstanceOf(PolicyViolationError);
    expect(await tracker.submit({ taskId: "t1", command: "true", timeoutSecs: -1 })).toEqual({
      status: "rejected",
      reason: "timeout must be a non-negative integer (seconds), got: -1",
    });
    expect(
      await tracker.submit({ taskId: "t1", command: "true", timeoutSecs: 1, workdir: "repo" }),
    ).toEqual({ status: "rejected", reason: "workdir must be an absolute path: repo" });
  });

  it("raises an infrastructure error when the target is unreachable", async () => {
    const target = new FakeTarget();
    target.unreachable = true;

    const error = await trackerFor(target)
      .submit({ taskId: "t1", command: "true", timeoutSecs: 1 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toMatchObject({
      failureClass: "infrastructure",
      message: "task t1: ssh connection failed",
    });
  });
});

describe("TaskTracker queries", () => {
  it("returns null for a task that does not exist", async () => {
    expect(await trackerFor(new FakeTarget()).status("nope")).toBeNull();
  });

  it("treats a malformed status document as a determinism failure", async () => {
    const target = new FakeTarget();
    target.put("/mnt/podflow/_tasks/t1/status.json", '{"task_id":"t1"');
    const tracker = trackerFor(target);

    await expect(tracker.status("t1")).rejects.toBeInstanceOf(DeterminismError);
    await expect(tracker.wait("t1", { timeoutSecs: 60 })).rejects.toMatchObject({
      code: "MALFORMED_JSON",
      subject: "t1",
    });
    expect(target.count("read-file")).toBe(2);
  });

  it("lists tasks with unreadable entries marked", async () => {
    const target = new FakeTarget();
    const tracker = trackerFor(target);
    await tracker.submit({ taskId: "train-1", command: "true", timeoutSecs: 10 });
    await tracker.submit({ taskId: "train-1", command: "true", timeoutSecs: 10, force: true });
    target.put("/mnt/podflow/_tasks/broken/status.json", "{");
    target.dirs.add("/mnt/podflow/_tasks/empty");

    const entries = await tracker.list();

    expect(entries.map((entry) => [entry.taskId, typeof entry.status === "string" ? entry.status : entry.status.state])).toEqual([
      ["broken", "parse_error"],
      ["empty", "missing"],
      ["train-1", "success"],
    ]);
  });

  it("returns the last lines of the task output", async () => {
    const target = new FakeTarget();
    target.put("/mnt/podflow/_tasks/t1/stdout.log", "one\ntwo\nthree\n");
    const tracker = trackerFor(target);

    expect(await tracker.tail("t1", 2)).toBe("two\nthree");
    expect(await tracker.tail("t2", 2)).toBe("");
  });
});

describe("TaskTracker.wait", () => {
  it("returns the terminal state and exit code", async () => {
    const target = new FakeTarget();
    target.taskBehavior.set("bad", { state: "failed", exitCode: 7 });
    target.taskBehavior.set("slow", { state: "timed_out", exitCode: 124 });
    const tracker = trackerFor(target);
    for (const taskId of ["good", "bad", "slow"]) {
      await tracker.submit({ taskId, command: "true", timeoutSecs: 10 });
    }

    const good = await tracker.wait("good", { timeoutSecs: 10 });
    const bad = await tracker.wait("bad", { timeoutSecs: 10 });
    const slow = await tracker.wait("slow", { timeoutSecs: 10 });

    expect(good).toEqual({ kind: "terminal", state: "success", exitCode: 0 });
    expect(bad).toEqual({ kind: "terminal", state: "failed", exitCode: 7 });
    expect([good, bad, slow].map(waitExitCode)).toEqual([0, 7, 124]);
  });

  it("gives up after the wait timeout with the last observed state", async () => {
    const target = new FakeTarget();
    target.taskBehavior.set("t1", "hang");
    const tracker = trackerFor(target);
    await tracker.submit({ taskId: "t1", command: "sleep 999", timeoutSecs: 0 });

    const result = await tracker.wait("t1", { timeoutSecs: 3 });

    expect(result).toEqual({ kind: "wait-timeout", lastState: "running" });
    expect(waitExitCode(result)).toBe(3);
    expect(target.count("read-file")).toBe(3);
  });

  it("reports a task that never appears as missing", async () => {
    const result = await trackerFor(new FakeTarget()).wait("ghost", { timeoutSecs: 2 });
    expect(result).toEqual({ kind: "wait-timeout", lastState: "missing" });
  });

  it("escalates when the target stops answering", async () => {
    const target = new FakeTarget();
    target.taskBehavior.set("t1", "hang");
    const tracker = trackerFor(target);
    await tracker.submit({ taskId: "t1", command: "sleep 999", timeoutSecs: 0 });
    target.unreachable = true;

    await expect(tracker.wait("t1", { timeoutSecs: 60 })).rejects.toThrow(
      "lost contact with task t1: task t1: ssh connection failed",
    );
  });

  it("maps a failure without an exit code to 1", () => {
    expect(waitExitCode({ kind: "terminal", state: "failed", exitCode: null })).toBe(1);
    expect(waitExitCode({ kind: "terminal", state: "failed", exitCode: 0 })).toBe(1);
  });
});

const hasBinaries = ["bash", "timeout", "setsid"].every((bin) =>
  (process.env.PATH ?? "")
    .split(path.delimiter)
    .some((dir) => dir.length > 0 && fs.existsSync(path.join(dir, bin))),
);

describe.runIf(process.platform === "linux" && hasBinaries)("TaskTracker on the local host", () => {
  const localTracker = (root: string) =>
    new TaskTracker(new RemoteExecutor(new LocalTransport()), {
      root,
      launcher: "nohup",
      session: "podflow",
      graceSecs: 1,
      pollIntervalMs: 100,
    });

  it("records success and the command output", async () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "podflow-task-"));
    const tracker = localTracker(root);

    await tracker.submit({ taskId: "hello", command: "echo hello-from-task", timeoutSecs: 30 });
    const result = await tracker.wait("hello", { timeoutSecs: 20 });

    expect(result).toEqual({ kind: "terminal", state: "success", exitCode: 0 });
    expect(await tracker.tail("hello", 50)).toMatch(/^\[\d{2}:\d{2}:\d{2}\] hello-from-task$/m);
  });

  it("marks a task that outlives its timeout as timed out", async () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "podflow-task-"));
    const tracker = localTracker(root);

    await tracker.submit({ taskId: "sleepy", command: "sleep 30", timeoutSecs: 1 });
    const result = await tracker.wait("sleepy", { timeoutSecs: 20 });

    expect(result).toEqual({ kind: "terminal", state: "timed_out", exitCode: 124 });
    expect(waitExitCode(result)).toBe(124);
  }, 30_000);
});
