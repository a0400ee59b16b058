import type { FailureClass, PhaseId } from "./types";

export type PolicyViolationCode =
  | "ILLEGAL_TRANSITION"
  | "STATE_NOT_ALLOWED"
  | "UNKNOWN_COMMAND"
  | "CONFIG_OVERRIDE_UNAUTHORIZED"
  | "INVALID_IDENTIFIER"
  | "TARGET_REBIND"
  | "DUPLICATE_TASK";

/**
 * Fatal, never retried: the request itself is illegal.
 */
export class PolicyViolationError extends Error {
  readonly kind = "policy" as const;

  constructor(
    message: string,
    public readonly code: PolicyViolationCode,
    public readonly phase?: PhaseId,
  ) {
    super(message);
    this.name = "PolicyViolationError";
  }
}

export type DeterminismErrorCode =
  | "MISSING_ARTIFACT"
  | "MALFORMED_JSON"
  | "UNRESOLVED_TARGET"
  | "INVALID_MANIFEST"
  | "EVIDENCE_TAMPERED"
  | "RECORD_EXISTS";

/**
 * Fatal for the current phase: an objective fact did not hold.
 */
export class DeterminismError extends Error {
  readonly kind = "determinism" as const;

  constructor(
    message: string,
    public readonly code: DeterminismErrorCode,
    public readonly subject?: string,
  ) {
    super(message);
    this.name = "DeterminismError";
  }
}

/**
 * A row or task ran and did not succeed, or never ran at all
 * (`infrastructure`).
 */
export class ExecutionError extends Error {
  readonly kind = "execution" as const;

  constructor(
    message: string,
    public readonly failureClass: FailureClass,
    public readonly subject: string,
    public readonly exitCode: number | null = null,
  ) {
    super(message);
    this.name = "ExecutionError";
  }
}

export class ConfigError extends Error {
  readonly kind = "config" as const;

  constructor(
    message: string,
    public readonly configPath?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type PodflowError =
  | PolicyViolationError
  | DeterminismError
  | ExecutionError
  | ConfigError;

export const isPodflowError = (error: unknown): error is PodflowError =>
  error instanceof PolicyViolationError ||
  error instanceof DeterminismError ||
  error instanceof ExecutionError ||
  error instanceof ConfigError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : "unknown error";
