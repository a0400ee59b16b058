import { spawn } from "node:child_process";

export interface ExecResult {
  code: number;
  stdout: string;
  stderr: string;
  killed: boolean;
}

export interface ExecOptions {
  cwd?: string;
  /** Milliseconds before the child is sent SIGTERM (then SIGKILL). */
  timeout?: number;
  input?: string;
  env?: Record<string, string>;
}

export type ExecFn = (
  bin: string,
  args: string[],
  options?: ExecOptions,
) => Promise<ExecResult>;

const KILL_GRACE_MS = 2_000;

/**
 * Spawns `bin` without a shell. A missing binary resolves with code 127
 * instead of rejecting.
 */
export const execProcess: ExecFn = (bin, args, options = {}) =>
  new Promise((resolve) => {
    const child = spawn(bin, args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: ["pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let killed = false;
    let settled = false;
    let termTimer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    const finish = (result: ExecResult) => {
      if (settled) {
        return;
      }
      settled = true;
      if (termTimer) clearTimeout(termTimer);
      if (killTimer) clearTimeout(killTimer);
      resolve(result);
    };

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => {
      finish({ code: 127, stdout, stderr: `${stderr}${error.message}`, killed });
    });

    child.on("close", (code, signal) => {
      finish({
        code: code ?? (signal ? 128 + signalNumber(signal) : 1),
        stdout,
        stderr,
        killed,
      });
    });

    if (options.timeout && options.timeout > 0) {
      termTimer = setTimeout(() => {
        killed = true;
        child.kill("SIGTERM");
        killTimer = setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS);
      }, options.timeout);
    }

    // EPIPE means the child exited before reading its input; close reports it.
    child.stdin.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code !== "EPIPE") {
        stderr += `stdin: ${error.message}\n`;
      }
    });
    if (options.input !== undefined) {
      child.stdin.end(options.input);
    } else {
      child.stdin.end();
    }
  });

const signalNumber = (signal: NodeJS.Signals): number => {
  switch (signal) {
    case "SIGKILL":
      return 9;
    case "SIGINT":
      return 2;
    case "SIGHUP":
      return 1;
    default:
      return 15;
  }
};

/** POSIX single-quote escaping for one shell word. */
export const shellQuote = (value: string): string =>
  /^[A-Za-z0-9_@%+=:,./-]+$/.test(value)
    ? value
    : `'${value.replace(/'/g, "'\\''")}'`;

export const shellJoin = (words: readonly string[]): string =>
  words.map(shellQuote).join(" ");
