import { describe, expect, it } from "vitest";
import {
  validateAgainstSchema,
  validatePhaseEvidence,
} from "../src/evidence/schema-registry";
import { passingEvidence } from "./support/evidence";

describe("evidence schema registry", () => {
  it("reports missing keys and type mismatches", () => {
    expect(
      validateAgainstSchema("demo", { note: "string" }, { note: "ok" }),
    ).toEqual({ subject: "demo", ok: true, errors: [] });

    const invalid = validateAgainstSchema(
      "demo",
      { note: "string", score: "number", tags: "array", owner: "string?" },
      { note: 1, tags: {}, owner: null },
    );
    expect(invalid.ok).toBe(false);
    expect(invalid.errors).toEqual([
      "type mismatch for note: expected string, got number",
      "missing key: score",
      "type mismatch for tags: expected array, got object",
    ]);
  });

  it("accepts a complete phase record", () => {
    const record = passingEvidence("P50", "/tmp/flow-start.json", {
      facts: { repo_url: "https://example.invalid/lab.git" },
    });

    expect(validatePhaseEvidence("P50", { ...record })).toEqual({
      subject: "P50 evidence",
      ok: true,
      errors: [],
    });
  });

  it("checks the facts a phase must carry", () => {
    const record = passingEvidence("P70", "/tmp/flow-start.json", {
      facts: { wait: "yes" },
    });

    expect(validatePhaseEvidence("P70", { ...record }).errors).toEqual([
      "facts: type mismatch for wait: expected boolean, got string",
    ]);
    expect(validatePhaseEvidence("P90", { ...record, facts: {} }).errors).toEqual([
      "facts: missing key: teardown_mode",
    ]);
  });

  it("reports a broken envelope", () => {
    const record: Record<string, unknown> = {
      ...passingEvidence("P30", "/tmp/flow-start.json"),
      attempt: "1",
    };
    delete record.detail;

    expect(validatePhaseEvidence("P30", record).errors).toEqual([
      "type mismatch for attempt: expected number, got string",
      "missing key: detail",
    ]);
  });
});
