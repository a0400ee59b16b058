import { describe, expect, it } from "vitest";
import {
  ConfigError,
  DeterminismError,
  ExecutionError,
  PolicyViolationError,
} from "../src/core/errors";
import { asFlowId } from "../src/core/types";
import type { FlowSummary } from "../src/flow/orchestrator";
import {
  buildFailureLines,
  buildFlowSummaryLines,
  buildStateHistoryLines,
  buildSweepReportLines,
  buildTaskListLines,
  buildTaskStatusLines,
  renderSection,
} from "../src/observability/report";
import { FIXED_TIME } from "./support/fake-target";

describe("report", () => {
  it("renders a flow summary with its phase table", () => {
    const summary: FlowSummary = {
      flow_id: asFlowId("20260301T120000Z-abcdefgh"),
      status: "failed",
      failed_phase: "P60",
      reason: "deterministic:phase_status_not_ok:failed",
      started_at: FIXED_TIME,
      finished_at: FIXED_TIME,
      config_fingerprint: "a".repeat(64),
      resolved_target: "gpu-host-1",
      phases: [
        {
          phase_id: "P00",
          attempt: 1,
          command: "flow-precheck",
          phase_pass: true,
          reasons: [],
          detail: "configuration and options accepted",
        },
        {
          phase_id: "P60",
          attempt: 2,
          command: "sweep-start",
          phase_pass: false,
          reasons: ["deterministic:phase_status_not_ok:failed"],
          detail: "row=r0 row r0 failed (crash)",
        },
      ],
    };

    expect(buildFlowSummaryLines(summary)).toEqual([
      "=== flow ===",
      "flow_id=20260301T120000Z-abcdefgh",
      "status=failed",
      "target=gpu-host-1",
      "phase=P60",
      "reason=deterministic:phase_status_not_ok:failed",
      "=== phases ===",
      "phase | command       | verdict | detail",
      "------+---------------+---------+-----------------------------------",
      "P00   | flow-precheck | pass    | configuration and options accepted",
      "P60#2 | sweep-start   | fail    | row=r0 row r0 failed (crash)",
    ]);
  });

  it("marks empty sections", () => {
    expect(renderSection("phases", [])).toEqual(["=== phases ===", "(empty)"]);
    expect(buildStateHistoryLines([])).toEqual(["No transitions recorded"]);
    expect(buildTaskListLines([])).toEqual(["No tasks"]);
  });

  it("lists tasks including unreadable ones", () => {
    expect(
      buildTaskListLines([
        {
          taskId: "t1",
          status: {
            task_id: "t1",
            state: "success",
            created_at: FIXED_TIME,
            exit_code: 0,
            timeout_secs: 0,
            command_path: "/mnt/podflow/_tasks/t1/command.sh",
            stdout_path: "/mnt/podflow/_tasks/t1/stdout.log",
          },
        },
        { taskId: "t2", status: "parse_error" },
      ]),
    ).toEqual([
      "task | state       | created              | exit",
      "-----+-------------+----------------------+-----",
      "t1   | success     | 2026-03-01T12:00:00Z | 0",
      "t2   | parse_error |                      |",
    ]);
  });

  it("prints only the timestamps a task has", () => {
    expect(
      buildTaskStatusLines({
        task_id: "t1",
        state: "running",
        created_at: FIXED_TIME,
        started_at: FIXED_TIME,
        timeout_secs: 600,
        command_path: "/mnt/podflow/_tasks/t1/command.sh",
        stdout_path: "/mnt/podflow/_tasks/t1/stdout.log",
      }),
    ).toEqual([
      "task=t1",
      "state=running",
      `created_at=${FIXED_TIME}`,
      `started_at=${FIXED_TIME}`,
      "timeout_secs=600",
      "stdout=/mnt/podflow/_tasks/t1/stdout.log",
    ]);
  });

  it("describes each row of a sweep report", () => {
    expect(
      buildSweepReportLines({
        rows: [
          { runId: "r0", kind: "skipped" },
          {
            runId: "r1",
            kind: "finished",
            ok: false,
            state: "failed",
            failureClass: "crash",
            attempts: 1,
            taskId: "run-r1",
          },
        ],
        inFlightTasks: [],
        halted: { runId: "r1", reason: "row r1 failed (crash)" },
        ok: false,
      }),
    ).toEqual([
      "r0: skipped (summary ok)",
      "r1: failed crash attempts=1",
      "row=r1 halted: row r1 failed (crash)",
      "sweep failed",
    ]);
  });

  it("names the failure class of an error", () => {
    expect(buildFailureLines(new PolicyViolationError("illegal transition INIT -> SWEEP_RUNNING", "ILLEGAL_TRANSITION", "P60"))).toEqual([
      "phase=P60 refused (ILLEGAL_TRANSITION): illegal transition INIT -> SWEEP_RUNNING",
    ]);
    expect(buildFailureLines(new DeterminismError("no manifest", "MISSING_ARTIFACT"))).toEqual([
      "failed (MISSING_ARTIFACT): no manifest",
    ]);
    expect(buildFailureLines(new ExecutionError("stage r0: ssh connection failed", "infrastructure", "r0"))).toEqual([
      "subject=r0 failed (infrastructure): stage r0: ssh connection failed",
    ]);
    expect(buildFailureLines(new ConfigError("target.host is not configured"))).toEqual([
      "configuration error: target.host is not configured",
    ]);
    expect(buildFailureLines(new Error("boom"))).toEqual(["error: boom"]);
  });
});
