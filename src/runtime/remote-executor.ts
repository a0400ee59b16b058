import { customAlphabet } from "nanoid";
import type { TransportKind } from "../core/types";
import { type Logger, silentLogger } from "../observability/logger";
import { type RemoteAction, renderAction } from "./actions";
import type { ExecResult } from "./process";
import type { Transport } from "./transports";

/**
 * `exited`: the command ran on the target and reported `code`.
 * `not-executed`: there is no evidence it ran at all.
 */
export type ExecOutcome =
  | { kind: "exited"; code: number; output: string }
  | { kind: "not-executed"; output: string; reason: string };

export interface RemoteExecutorOptions {
  logger?: Logger;
  /** Per-call token generator; tests pin it. */
  sentinel?: () => string;
  defaultTimeoutMs?: number;
}

const sentinelSuffix = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 16);

export const createSentinel = (): string => `__PODFLOW_RC_${sentinelSuffix()}__`;

/** ssh reserves 255 for its own connection failures. */
const SSH_CONNECTION_FAILURE = 255;
const SPAWN_FAILURE = 127;
const SPAWN_ERROR = /spawn \S+ ENOENT/;

export const wrapWithSentinel = (script: string, sentinel: string): string =>
  `(\n${script}\n)\nrc=$?\necho "${sentinel}=$rc"\nexit $rc`;

/**
 * Extracts the exit status printed after `sentinel=` and removes that line
 * from the output. Returns null for the code when the sentinel is absent.
 */
export const parseSentinel = (
  output: string,
  sentinel: string,
): { code: number | null; output: string } => {
  const pattern = new RegExp(`^${sentinel}=(\\d+)\\r?$`);
  let code: number | null = null;
  const kept: string[] = [];
  for (const line of output.split("\n")) {
    const match = line.match(pattern);
    if (match) {
      code = Number(match[1]);
      continue;
    }
    kept.push(line);
  }
  return { code, output: kept.join("\n") };
};

const combined = (result: ExecResult): string =>
  result.stderr ? `${result.stdout}${result.stderr}` : result.stdout;

export class RemoteExecutor {
  private readonly logger: Logger;
  private readonly sentinel: () => string;

  constructor(
    private readonly transport: Transport,
    private readonly options: RemoteExecutorOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.sentinel = options.sentinel ?? createSentinel;
  }

  get target(): string {
    return this.transport.target;
  }

  get transportKind(): TransportKind {
    return this.transport.kind;
  }

  async execute(
    action: RemoteAction,
    options: { timeoutMs?: number } = {},
  ): Promise<ExecOutcome> {
    const script = renderAction(action);
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    this.logger.debug(`exec ${action.kind} on ${this.transport.target}`);

    if (this.transport.reportsExitCode) {
      const result = await this.transport.run(script, { timeoutMs });
      return this.fromNativeResult(result);
    }

    const sentinel = this.sentinel();
    const result = await this.transport.run(wrapWithSentinel(script, sentinel), {
      timeoutMs,
    });
    const parsed = parseSentinel(combined(result), sentinel);
    if (parsed.code === null) {
      this.logger.warn(
        `${action.kind}: no exit status reported by ${this.transport.kind} transport`,
      );
      return {
        kind: "not-executed",
        output: parsed.output,
        reason: result.killed
          ? "transport timed out before the command reported an exit status"
          : "command did not report an exit status",
      };
    }
    return { kind: "exited", code: parsed.code, output: parsed.output };
  }

  async upload(localPath: string, remotePath: string): Promise<ExecOutcome> {
    const result = await this.transport.upload(localPath, remotePath);
    if (result.code !== 0) {
      return {
        kind: "not-executed",
        output: combined(result),
        reason: `upload to ${remotePath} failed`,
      };
    }
    if (this.transport.reportsExitCode) {
      return { kind: "exited", code: 0, output: combined(result) };
    }

    const check = await this.execute({ kind: "path-exists", path: remotePath });
    if (check.kind === "exited" && check.code === 0) {
      return { kind: "exited", code: 0, output: combined(result) };
    }
    return {
      kind: "not-executed",
      output: combined(result),
      reason: `uploaded file ${remotePath} is not present on the target`,
    };
  }

  async download(remotePath: string, localPath: string): Promise<ExecOutcome> {
    const result = await this.transport.download(remotePath, localPath);
    if (result.code !== 0) {
      return {
        kind: "not-executed",
        output: combined(result),
        reason: `download of ${remotePath} failed`,
      };
    }
    return { kind: "exited", code: 0, output: combined(result) };
  }

  private fromNativeResult(result: ExecResult): ExecOutcome {
    const output = combined(result);
    if (result.killed) {
      return {
        kind: "not-executed",
        output,
        reason: "transport timed out before the command reported an exit status",
      };
    }
    if (this.transport.kind === "ssh" && result.code === SSH_CONNECTION_FAILURE) {
      return { kind: "not-executed", output, reason: "ssh connection failed" };
    }
    if (result.code === SPAWN_FAILURE && SPAWN_ERROR.test(result.stderr)) {
      return {
        kind: "not-executed",
        output,
        reason: `${this.transport.kind} client could not be started`,
      };
    }
    return { kind: "exited", code: result.code, output };
  }
}
