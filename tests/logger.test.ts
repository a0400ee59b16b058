import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, logLevelFromEnv } from "../src/observability/logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads PODFLOW_LOG_LEVEL and ignores unknown values", () => {
    expect(logLevelFromEnv({ PODFLOW_LOG_LEVEL: "debug" })).toBe("debug");
    expect(logLevelFromEnv({ PODFLOW_LOG_LEVEL: "loud" })).toBeUndefined();
    expect(logLevelFromEnv({})).toBeUndefined();
  });

  it("writes at or above its level to stderr with the prefix", () => {
    const written = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("podflow: ", "warn").child("sweep: ");

    logger.info("hidden");
    logger.warn("row r0 retried");
    logger.error("row r0 failed");

    expect(written.mock.calls).toEqual([
      ["podflow: sweep: warn: row r0 retried"],
      ["podflow: sweep: error: row r0 failed"],
    ]);
  });
});
