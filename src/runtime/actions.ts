import { PolicyViolationError } from "../core/errors";
import { isIdentifier } from "../core/types";
import { shellJoin, shellQuote } from "./process";

/** Exit status a `read-file` action uses for "file does not exist". */
export const MISSING_FILE_EXIT = 44;

export type LauncherKind = "tmux" | "nohup";

export type RemoteAction =
  | { kind: "probe"; token: string }
  | { kind: "mkdir"; path: string }
  | { kind: "write-file"; path: string; content: string; mode?: number }
  | { kind: "append-line"; path: string; line: string }
  | { kind: "read-file"; path: string }
  | { kind: "read-files"; paths: string[] }
  | { kind: "path-exists"; path: string }
  | { kind: "move"; from: string; to: string }
  | { kind: "copy"; from: string; to: string }
  | { kind: "remove"; path: string }
  | { kind: "list-dir"; path: string }
  | { kind: "archive-dir"; root: string; name: string; archive: string }
  | { kind: "check-binaries"; names: string[] }
  | { kind: "run-script"; path: string; args: string[]; bestEffort: boolean }
  | {
      kind: "git-checkout";
      repoDir: string;
      url: string;
      ref: { branch: string } | { pr: number };
      forceClean: boolean;
      expectSha?: string;
    }
  | {
      kind: "launch-detached";
      launcher: LauncherKind;
      session: string;
      window: string;
      runnerPath: string;
      args: string[];
    };

export type RemoteActionKind = RemoteAction["kind"];

const SAFE_PATH = /^\/[^\0\n\r]*$/;
const SAFE_BINARY = /^[A-Za-z0-9._+-]+$/;
const SAFE_GIT_REF = /^[A-Za-z0-9][A-Za-z0-9._/-]{0,199}$/;
const GIT_SHA = /^[0-9a-f]{7,40}$/;

export const assertRemotePath = (value: string, field: string): string => {
  if (!SAFE_PATH.test(value) || value.split("/").includes("..")) {
    throw new PolicyViolationError(
      `${field} must be an absolute path without '..' segments: ${JSON.stringify(value)}`,
      "INVALID_IDENTIFIER",
    );
  }
  return value;
};

const assertIdentifier = (value: string, field: string): string => {
  if (!isIdentifier(value)) {
    throw new PolicyViolationError(
      `invalid ${field}: ${value} (allowed: [A-Za-z0-9._-], max 128 chars, must start alnum)`,
      "INVALID_IDENTIFIER",
    );
  }
  return value;
};

const dirnameOf = (value: string): string => {
  const index = value.lastIndexOf("/");
  return index <= 0 ? "/" : value.slice(0, index);
};

const encodeContent = (content: string): string =>
  Buffer.from(content, "utf8").toString("base64");

const renderGitCheckout = (
  action: Extract<RemoteAction, { kind: "git-checkout" }>,
): string => {
  const repo = shellQuote(assertRemotePath(action.repoDir, "repoDir"));
  const lines = [
    "set -euo pipefail",
    `mkdir -p ${shellQuote(dirnameOf(action.repoDir))}`,
    `if [[ ! -d ${repo}/.git ]]; then git clone ${shellQuote(action.url)} ${repo}; fi`,
    `cd ${repo}`,
    "git fetch origin --prune",
    'dirty="$(git status --porcelain --untracked-files=no)"',
    'if [[ -n "$dirty" ]]; then',
    action.forceClean
      ? '  echo "warn: repo has tracked modifications; resetting"; git reset --hard HEAD'
      : '  echo "error: repo has tracked modifications (refusing to proceed):"; echo "$dirty"; exit 4',
    "fi",
  ];

  if ("pr" in action.ref) {
    if (!Number.isInteger(action.ref.pr) || action.ref.pr <= 0) {
      throw new PolicyViolationError(
        `invalid pull request number: ${action.ref.pr}`,
        "INVALID_IDENTIFIER",
      );
    }
    const local = `pr-${action.ref.pr}`;
    lines.push(
      `git fetch origin ${shellQuote(`pull/${action.ref.pr}/head:${local}`)}`,
      `git checkout ${shellQuote(local)}`,
    );
  } else {
    const branch = action.ref.branch;
    if (!SAFE_GIT_REF.test(branch) || branch.includes("..")) {
      throw new PolicyViolationError(
        `invalid branch name: ${branch}`,
        "INVALID_IDENTIFIER",
      );
    }
    lines.push(
      `git show-ref --verify --quiet ${shellQuote(`refs/remotes/origin/${branch}`)} || { echo ${shellQuote(`error: origin/${branch} not found`)}; exit 6; }`,
      `git checkout -B ${shellQuote(branch)} ${shellQuote(`origin/${branch}`)}`,
    );
  }

  if (action.expectSha) {
    if (!GIT_SHA.test(action.expectSha)) {
      throw new PolicyViolationError(
        `invalid expected sha: ${action.expectSha}`,
        "INVALID_IDENTIFIER",
      );
    }
    lines.push(
      'actual="$(git rev-parse HEAD)"',
      `case "$actual" in ${shellQuote(action.expectSha)}*) ;; *) echo "error: repo HEAD mismatch"; echo ${shellQuote(`expected: ${action.expectSha}`)}; echo "actual:   $actual"; exit 5 ;; esac`,
    );
  }

  lines.push('echo "head=$(git rev-parse HEAD)"');
  return lines.join("\n");
};

const renderLaunch = (
  action: Extract<RemoteAction, { kind: "launch-detached" }>,
): string => {
  const session = shellQuote(assertIdentifier(action.session, "session"));
  const window = assertIdentifier(action.window, "window");
  const runner = shellJoin([
    "bash",
    assertRemotePath(action.runnerPath, "runnerPath"),
    ...action.args,
  ]);

  if (action.launcher === "tmux") {
    return [
      'command -v tmux >/dev/null 2>&1 || { echo "tmux is required for task launch" >&2; exit 3; }',
      `tmux has-session -t ${session} 2>/dev/null || tmux new-session -d -s ${session} -n overview`,
      `tmux set-option -t ${session} remain-on-exit on >/dev/null`,
      `window=${shellQuote(window)}`,
      "for i in $(seq 1 50); do",
      `  if tmux list-windows -t ${session} -F '#{window_name}' | grep -qx "$window"; then window=${shellQuote(window)}-$i; else break; fi`,
      "done",
      `tmux new-window -t ${session} -n "$window" ${shellQuote(runner)}`,
      'echo "window=$window"',
    ].join("\n");
  }

  return [
    "if command -v setsid >/dev/null 2>&1; then",
    `  setsid nohup ${runner} </dev/null >/dev/null 2>&1 &`,
    "else",
    `  nohup ${runner} </dev/null >/dev/null 2>&1 &`,
    "fi",
    'echo "pid=$!"',
  ].join("\n");
};

/**
 * Renders an action to a bash script. Every value is validated and quoted;
 * free-form content only travels base64-encoded.
 */
export const renderAction = (action: RemoteAction): string => {
  switch (action.kind) {
    case "probe":
      return `echo ${shellQuote(assertIdentifier(action.token, "probe token"))}`;
    case "mkdir":
      return `mkdir -p ${shellQuote(assertRemotePath(action.path, "path"))}`;
    case "write-file": {
      const target = assertRemotePath(action.path, "path");
      const tmp = `${target}.tmp.$$`;
      const lines = [
        "set -euo pipefail",
        `mkdir -p ${shellQuote(dirnameOf(target))}`,
        `printf %s ${shellQuote(encodeContent(action.content))} | base64 -d > "${tmp.replace(/"/g, '\\"')}"`,
      ];
      if (action.mode !== undefined) {
        lines.push(`chmod ${action.mode.toString(8)} "${tmp.replace(/"/g, '\\"')}"`);
      }
      lines.push(`mv -f "${tmp.replace(/"/g, '\\"')}" ${shellQuote(target)}`);
      return lines.join("\n");
    }
    case "append-line": {
      const target = assertRemotePath(action.path, "path");
      if (action.line.includes("\n")) {
        throw new PolicyViolationError(
          "append-line content must be a single line",
          "INVALID_IDENTIFIER",
        );
      }
      return [
        "set -euo pipefail",
        `mkdir -p ${shellQuote(dirnameOf(target))}`,
        `printf '%s\\n' ${shellQuote(action.line)} >> ${shellQuote(target)}`,
      ].join("\n");
    }
    case "read-file": {
      const target = shellQuote(assertRemotePath(action.path, "path"));
      return `test -f ${target} || exit ${MISSING_FILE_EXIT}\ncat ${target}`;
    }
    case "read-files":
      return action.paths
        .map((entry, index) => {
          const target = shellQuote(assertRemotePath(entry, "path"));
          return `if [[ -f ${target} ]]; then echo "@@podflow-file ${index} present"; cat ${target}; echo; else echo "@@podflow-file ${index} missing"; fi`;
        })
        .join("\n");
    case "path-exists":
      return `test -e ${shellQuote(assertRemotePath(action.path, "path"))}`;
    case "move":
      return `mv -f ${shellQuote(assertRemotePath(action.from, "from"))} ${shellQuote(assertRemotePath(action.to, "to"))}`;
    case "copy":
      return `cp -f ${shellQuote(assertRemotePath(action.from, "from"))} ${shellQuote(assertRemotePath(action.to, "to"))}`;
    case "remove":
      return `rm -f ${shellQuote(assertRemotePath(action.path, "path"))}`;
    case "list-dir": {
      const target = shellQuote(assertRemotePath(action.path, "path"));
      return `if [[ -d ${target} ]]; then ls -1 ${target}; fi`;
    }
    case "archive-dir":
      return `tar -C ${shellQuote(assertRemotePath(action.root, "root"))} -czf ${shellQuote(assertRemotePath(action.archive, "archive"))} ${shellQuote(assertIdentifier(action.name, "archive member"))}`;
    case "check-binaries": {
      for (const name of action.names) {
        if (!SAFE_BINARY.test(name)) {
          throw new PolicyViolationError(
            `invalid binary name: ${name}`,
            "INVALID_IDENTIFIER",
          );
        }
      }
      return [
        "missing=0",
        `for b in ${action.names.join(" ")}; do`,
        '  command -v "$b" >/dev/null 2>&1 || { echo "missing:$b"; missing=1; }',
        "done",
        'if [[ "$missing" == 1 ]]; then exit 2; fi',
      ].join("\n");
    }
    case "run-script": {
      const target = shellQuote(assertRemotePath(action.path, "path"));
      const invocation = `bash ${target}${action.args.length > 0 ? ` ${shellJoin(action.args)}` : ""}`;
      return action.bestEffort
        ? `if [[ -f ${target} ]]; then ${invocation} || echo "warn: script failed (continuing)"; else echo "skip: script not found"; fi`
        : `test -f ${target} || { echo "script not found"; exit 2; }\n${invocation}`;
    }
    case "git-checkout":
      return renderGitCheckout(action);
    case "launch-detached":
      return renderLaunch(action);
  }
};

export interface FileReadResult {
  present: boolean;
  content: string;
}

/** Splits the combined output of a `read-files` action back into files. */
export const parseReadFilesOutput = (
  output: string,
  count: number,
): FileReadResult[] => {
  const results: FileReadResult[] = Array.from({ length: count }, () => ({
    present: false,
    content: "",
  }));
  let current: FileReadResult | undefined;
  const buffer: string[] = [];

  const flush = () => {
    if (current?.present) {
      current.content = buffer.join("\n").replace(/\n$/, "");
    }
    buffer.length = 0;
  };

  for (const line of output.split("\n")) {
    const marker = line.match(/^@@podflow-file (\d+) (present|missing)$/);
    if (marker) {
      flush();
      const index = Number(marker[1]);
      current = results[index];
      if (current) {
        current.present = marker[2] === "present";
      }
      continue;
    }
    if (current) {
      buffer.push(line);
    }
  }
  flush();
  return results;
};
