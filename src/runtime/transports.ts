import fs from "node:fs";
import type { TransportKind } from "../core/types";
import { type ExecFn, type ExecResult, execProcess, shellQuote } from "./process";

export interface Transport {
  readonly kind: TransportKind;
  readonly target: string;
  /** Whether `run` reports the remote command's exit code faithfully. */
  readonly reportsExitCode: boolean;
  run(script: string, options?: { timeoutMs?: number }): Promise<ExecResult>;
  upload(localPath: string, remotePath: string): Promise<ExecResult>;
  download(remotePath: string, localPath: string): Promise<ExecResult>;
}

/** Direct shell access: ssh/scp report exit codes natively. */
export class SshTransport implements Transport {
  readonly kind = "ssh" as const;
  readonly reportsExitCode = true;

  constructor(
    readonly target: string,
    private readonly exec: ExecFn = execProcess,
    private readonly sshArgs: string[] = ["-o", "BatchMode=yes"],
  ) {}

  run(script: string, options: { timeoutMs?: number } = {}): Promise<ExecResult> {
    return this.exec(
      "ssh",
      [...this.sshArgs, this.target, `bash -lc ${shellQuote(script)}`],
      options.timeoutMs ? { timeout: options.timeoutMs } : {},
    );
  }

  upload(localPath: string, remotePath: string): Promise<ExecResult> {
    return this.exec("scp", [
      ...this.sshArgs,
      localPath,
      `${this.target}:${remotePath}`,
    ]);
  }

  download(remotePath: string, localPath: string): Promise<ExecResult> {
    return this.exec("scp", [
      ...this.sshArgs,
      `${this.target}:${remotePath}`,
      localPath,
    ]);
  }
}

const MANAGED_FAILURE_MARKERS = [
  /^Failed:/,
  /^Error:/,
  /^No pods match targets/,
  /^No active pods/,
  /^Failed to upload/,
  /^Failed to download/,
];

export const hasManagedFailureMarker = (output: string): boolean =>
  output
    .split("\n")
    .some((line) => MANAGED_FAILURE_MARKERS.some((marker) => marker.test(line)));

/**
 * A managed-exec CLI (`<cli> exec <target> <cmd>`, `<cli> scp ...`). Its exit
 * status does not reliably reflect the remote command, so callers must rely
 * on the executor's sentinel protocol.
 */
export class ManagedExecTransport implements Transport {
  readonly kind = "managed" as const;
  readonly reportsExitCode = false;

  constructor(
    readonly target: string,
    private readonly cli: string,
    private readonly exec: ExecFn = execProcess,
  ) {}

  run(script: string, options: { timeoutMs?: number } = {}): Promise<ExecResult> {
    return this.exec(
      this.cli,
      ["exec", this.target, `bash -lc ${shellQuote(script)}`],
      options.timeoutMs ? { timeout: options.timeoutMs } : {},
    );
  }

  async upload(localPath: string, remotePath: string): Promise<ExecResult> {
    const result = await this.exec(this.cli, [
      "scp",
      this.target,
      localPath,
      remotePath,
    ]);
    const output = `${result.stdout}${result.stderr}`;
    return hasManagedFailureMarker(output)
      ? { ...result, code: result.code === 0 ? 1 : result.code }
      : { ...result, code: 0 };
  }

  async download(remotePath: string, localPath: string): Promise<ExecResult> {
    const result = await this.exec(this.cli, [
      "scp",
      this.target,
      remotePath,
      localPath,
      "-d",
    ]);
    const output = `${result.stdout}${result.stderr}`;
    if (hasManagedFailureMarker(output) || !fs.existsSync(localPath)) {
      return { ...result, code: result.code === 0 ? 1 : result.code };
    }
    return { ...result, code: 0 };
  }
}

/** Runs on the controller itself; the target is the local machine. */
export class LocalTransport implements Transport {
  readonly kind = "local" as const;
  readonly reportsExitCode = true;
  readonly target = "localhost";

  constructor(private readonly exec: ExecFn = execProcess) {}

  run(script: string, options: { timeoutMs?: number } = {}): Promise<ExecResult> {
    return this.exec(
      "bash",
      ["-c", script],
      options.timeoutMs ? { timeout: options.timeoutMs } : {},
    );
  }

  upload(localPath: string, remotePath: string): Promise<ExecResult> {
    return this.exec("cp", ["-f", localPath, remotePath]);
  }

  download(remotePath: string, localPath: string): Promise<ExecResult> {
    return this.exec("cp", ["-f", remotePath, localPath]);
  }
}

export const createTransport = (input: {
  kind: TransportKind;
  target: string;
  managedCli: string;
  exec?: ExecFn;
}): Transport => {
  const exec = input.exec ?? execProcess;
  switch (input.kind) {
    case "ssh":
      return new SshTransport(input.target, exec);
    case "managed":
      return new ManagedExecTransport(input.target, input.managedCli, exec);
    case "local":
      return new LocalTransport(exec);
  }
};
