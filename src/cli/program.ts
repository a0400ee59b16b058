import path from "node:path";
import {
  Command,
  CommanderError,
  InvalidArgumentError,
  Option,
} from "commander";
import { errorMessage } from "../core/errors";
import { advanceAlong } from "../core/state-store";
import type { FetchMode, FlowOptions, SweepRow } from "../core/types";
import { COMMAND_CONTRACTS, type CommandName } from "../core/workflow-definition";
import { type PolicyJudge, createJudge } from "../court/policy-judge";
import {
  type ServiceOptions,
  type TargetServices,
  configuredTarget,
  connectTarget,
  createScheduler,
  enterSweep,
  readLocalManifest,
  readRemoteManifest,
  uploadLocalManifest,
} from "../flow/context";
import { FlowOrchestrator } from "../flow/orchestrator";
import { parseFetchMode } from "../flow/phases";
import { CommandProvisioner, type Provisioner } from "../flow/provisioner";
import { type Logger, createLogger, logLevelFromEnv } from "../observability/logger";
import {
  buildFailureLines,
  buildFlowSummaryLines,
  buildStateHistoryLines,
  buildStateLines,
  buildSweepReportLines,
  buildSweepStatusLines,
  buildTaskListLines,
  buildTaskStatusLines,
} from "../observability/report";
import { type LoadedConfig, type PodflowConfig, loadConfig } from "../project/config";
import { execProcess } from "../runtime/process";
import { waitExitCode } from "../runtime/task-tracker";
import { type Shard, parseShard, writeManifestTemplate } from "../sweep/manifest";
import { activeSweepTasks } from "../sweep/scheduler";
import { collectSweepStatus, findStalledRows } from "../sweep/status";

export interface CliEnvironment extends Omit<ServiceOptions, "logger"> {
  env?: NodeJS.ProcessEnv;
  /** Command output, one line at a time. */
  out?: (line: string) => void;
  /** Failure reports. */
  err?: (line: string) => void;
  logger?: Logger;
  provisioner?: Provisioner;
  judge?: { judge: PolicyJudge; timeoutMs: number };
}

interface Session {
  loaded: LoadedConfig;
  config: PodflowConfig;
  logger: Logger;
  options: ServiceOptions;
}

interface FlowCommandOptions {
  provision: FlowOptions["provision"];
  sweep: FlowOptions["sweep"];
  wait: "true" | "false";
  fetch: FetchMode;
  teardown: FlowOptions["teardown"];
}

interface TaskSubmitOptions {
  id: string;
  cmd: string;
  timeout?: number;
  workdir?: string;
  force?: boolean;
}

interface TaskStatusOptions {
  id: string;
  tail?: number;
}

interface TaskWaitOptions {
  id: string;
  timeout?: number;
}

interface SweepStartOptions {
  csv?: string;
  force?: boolean;
  startAt?: string;
  limit?: number;
  match?: string;
  shard?: Shard;
  dryRun?: boolean;
  detach?: boolean;
}

interface SweepResumeOptions {
  detach?: boolean;
}

interface CsvOptions {
  csv?: string;
}

interface FetchAllOptions {
  pattern?: string;
}

const integerArgument =
  (minimum: number) =>
  (value: string): number => {
    const parsed = Number(value);
    if (!/^\d+$/.test(value) || parsed < minimum) {
      throw new InvalidArgumentError(`expected an integer >= ${minimum}, got: ${value}`);
    }
    return parsed;
  };

const fetchArgument = (value: string): FetchMode => {
  try {
    return parseFetchMode(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
};

const shardArgument = (value: string): Shard => {
  try {
    return parseShard(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
};

/**
 * Builds the `podflow` program. Actions report their exit status through
 * `setExit`; output goes through the environment's writers.
 */
export const buildProgram = (
  environment: CliEnvironment,
  setExit: (code: number) => void,
): Command => {
  const out = environment.out ?? ((line: string) => console.log(line));
  const print = (lines: string[]) => {
    for (const line of lines) {
      out(line);
    }
  };

  const program = new Command();
  program
    .name("podflow")
    .description("Governed experiment sweeps on remote GPU hosts")
    .version("0.1.0")
    .option("--config <path>", "configuration override (needs allowConfigOverride in the canonical file)")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => out(text.trimEnd()),
      writeErr: (text) => (environment.err ?? ((line: string) => console.error(line)))(text.trimEnd()),
    });

  const open = async (): Promise<Session> => {
    const loaded = await loadConfig({
      cwd: environment.cwd,
      overridePath: program.opts<{ config?: string }>().config,
      env: environment.env,
    });
    const logger =
      environment.logger ??
      createLogger("podflow: ", logLevelFromEnv(environment.env ?? process.env) ?? loaded.config.logLevel);
    return { loaded, config: loaded.config, logger, options: { ...environment, logger } };
  };

  const connect = async (): Promise<Session & { services: TargetServices }> => {
    const session = await open();
    const services = connectTarget(session.config, configuredTarget(session.config), session.options);
    return { ...session, services };
  };

  /** Refuses the command outside its allowed states; advances on success. */
  const guarded = async (
    services: TargetServices,
    command: CommandName,
    work: () => Promise<boolean>,
    options: { advance?: boolean } = {},
  ): Promise<boolean> => {
    const contract = COMMAND_CONTRACTS[command];
    if (contract.allowFrom !== "unbound") {
      await services.state.authorize(command, contract.allowFrom);
    }
    const ok = await work();
    if (ok && contract.advancesTo && options.advance !== false) {
      await advanceAlong(services.state, contract.advancesTo, `${command} (cli)`, services.target);
    }
    return ok;
  };

  program
    .command("flow")
    .description("Run the governed phase sequence end to end")
    .addOption(new Option("--provision <mode>", "allocate a host or use the configured one").choices(["auto", "skip"]).makeOptionMandatory())
    .addOption(new Option("--sweep <mode>", "sweep mode").choices(["start", "resume", "skip"]).makeOptionMandatory())
    .addOption(new Option("--wait <bool>", "wait for the sweep to finish").choices(["true", "false"]).makeOptionMandatory())
    .addOption(new Option("--fetch <mode>", "none, all or run:<run_id>").argParser(fetchArgument).makeOptionMandatory())
    .addOption(new Option("--teardown <mode>", "keep or delete the host").choices(["keep", "delete"]).makeOptionMandatory())
    .action(async (options: FlowCommandOptions) => {
      const session = await open();
      const exec = environment.exec ?? execProcess;
      const judged = environment.judge ?? createJudge(session.config.policy.judge, exec);
      const orchestrator = new FlowOrchestrator({
        ...session.options,
        loaded: session.loaded,
        provisioner:
          environment.provisioner ??
          new CommandProvisioner(session.config.provision, exec, session.logger.child("provision: ")),
        judge: judged.judge,
        judgeTimeoutMs: judged.timeoutMs,
      });
      const result = await orchestrator.run({
        provision: options.provision,
        sweep: options.sweep,
        wait: options.wait === "true",
        fetch: options.fetch,
        teardown: options.teardown,
      });
      print(buildFlowSummaryLines(result.summary));
      out(`evidence: ${result.flowDir}`);
      setExit(result.ok ? 0 : 1);
    });

  const task = program.command("task").description("Tracked long-running commands on the target");

  task
    .command("submit")
    .description("Start a command in a detached session")
    .requiredOption("--id <task_id>", "task identifier")
    .requiredOption("--cmd <command>", "shell command to run")
    .option("--timeout <secs>", "wall-clock limit, 0 for none", integerArgument(0))
    .option("--workdir <dir>", "absolute working directory")
    .option("--force", "archive an existing task with this id and resubmit")
    .action(async (options: TaskSubmitOptions) => {
      const { services } = await connect();
      const result = await services.tasks.submit({
        taskId: options.id,
        command: options.cmd,
        timeoutSecs: options.timeout ?? 0,
        workdir: options.workdir,
        force: options.force ?? false,
      });
      if (result.status === "rejected") {
        print([`task=${options.id} rejected: ${result.reason}`]);
        setExit(1);
        return;
      }
      print([
        `task=${result.taskId} submitted`,
        `dir=${result.taskDir}`,
        ...(result.archivedTo ? [`archived=${result.archivedTo}`] : []),
      ]);
    });

  task
    .command("status")
    .description("Show a task's status document")
    .requiredOption("--id <task_id>", "task identifier")
    .option("--tail <lines>", "also print the last lines of its output", integerArgument(1))
    .action(async (options: TaskStatusOptions) => {
      const { services } = await connect();
      const status = await services.tasks.status(options.id);
      if (!status) {
        print([`task=${options.id} not found`]);
        setExit(1);
        return;
      }
      print(buildTaskStatusLines(status));
      if (options.tail) {
        const tail = await services.tasks.tail(options.id, options.tail);
        print(["--- stdout ---", ...(tail ? tail.split("\n") : [])]);
      }
    });

  task
    .command("wait")
    .description("Wait for a task to finish; exits with the task's status")
    .requiredOption("--id <task_id>", "task identifier")
    .option("--timeout <secs>", "how long to wait", integerArgument(1))
    .action(async (options: TaskWaitOptions) => {
      const { services, config } = await connect();
      const result = await services.tasks.wait(options.id, {
        timeoutSecs: options.timeout ?? config.task.waitTimeoutSecs,
      });
      print([
        result.kind === "terminal"
          ? `task=${options.id} state=${result.state} exit_code=${result.exitCode ?? "none"}`
          : `task=${options.id} still ${result.lastState}: wait timed out`,
      ]);
      setExit(waitExitCode(result));
    });

  task
    .command("list")
    .description("List tasks on the target")
    .action(async () => {
      const { services } = await connect();
      print(buildTaskListLines(await services.tasks.list()));
    });

  const sweep = program.command("sweep").description("Manifest-driven sweeps");

  const runSweep = async (
    session: Session & { services: TargetServices },
    command: "sweep-start" | "sweep-resume",
    loadRows: () => Promise<SweepRow[]>,
    options: SweepStartOptions,
  ) => {
    const { services } = session;
    const steps = COMMAND_CONTRACTS[command].advancesTo ?? [];
    const dryRun = options.dryRun ?? false;
    let lines: string[] = [];
    const ok = await guarded(
      services,
      command,
      async () => {
        const rows = await loadRows();
        const scheduler = createScheduler(session.config, services, {
          ...session.options,
          onDispatch: () => enterSweep(services, steps, `${command} (cli)`),
        });
        const report = await scheduler.run(rows, {
          selection: { startAt: options.startAt, match: options.match, shard: options.shard },
          limit: options.limit,
          force: options.force ?? false,
          dryRun,
          attached: !options.detach,
        });
        lines = buildSweepReportLines(report);
        return report.ok;
      },
      { advance: !dryRun },
    );
    print(lines);
    setExit(ok ? 0 : 1);
  };

  sweep
    .command("start")
    .description("Upload the manifest and dispatch its rows")
    .option("--csv <path>", "local manifest (defaults to sweep.manifest)")
    .option("--force", "re-run rows that already have results")
    .option("--start-at <run_id>", "skip rows before this one")
    .option("--limit <n>", "dispatch at most n rows", integerArgument(0))
    .option("--match <text>", "only rows whose id contains text")
    .option("--shard <i/n>", "only rows at positions i mod n", shardArgument)
    .option("--dry-run", "write command records without running anything")
    .option("--detach", "queue the rows in one background task and return")
    .action(async (options: SweepStartOptions) => {
      const session = await connect();
      const local = path.resolve(environment.cwd, options.csv ?? session.config.sweep.manifest);
      const loadRows = async () =>
        (options.dryRun ? readLocalManifest(local) : await uploadLocalManifest(session.services, local))
          .rows;
      await runSweep(session, "sweep-start", loadRows, options);
    });

  sweep
    .command("resume")
    .description("Continue the sweep from the manifest already on the target")
    .option("--detach", "queue the remaining rows in one background task and return")
    .action(async (options: SweepResumeOptions) => {
      const session = await connect();
      const loadRows = async () => (await readRemoteManifest(session.services)).rows;
      await runSweep(session, "sweep-resume", loadRows, { detach: options.detach });
    });

  sweep
    .command("status")
    .description("Count rows by outcome")
    .option("--csv <path>", "read row ids from a local manifest instead of the target's")
    .action(async (options: CsvOptions) => {
      const { services } = await connect();
      const rows = options.csv
        ? readLocalManifest(path.resolve(environment.cwd, options.csv)).rows
        : (await readRemoteManifest(services)).rows;
      const { status, records } = await collectSweepStatus(services.runs, rows);
      const stalled = findStalledRows(records, await activeSweepTasks(services.tasks));
      print([
        ...buildSweepStatusLines(status),
        ...(stalled.length > 0 ? [`stalled: ${stalled.join(", ")}`] : []),
      ]);
    });

  sweep
    .command("template")
    .description("Write a starter manifest")
    .option("--csv <path>", "where to write it (defaults to sweep.manifest)")
    .action(async (options: CsvOptions) => {
      const target = path.resolve(
        environment.cwd,
        options.csv ?? (await open()).config.sweep.manifest,
      );
      if (!writeManifestTemplate(target)) {
        print([`${target} already exists; not overwritten`]);
        setExit(1);
        return;
      }
      print([`wrote ${target}`]);
    });

  const fetchCommand = program.command("fetch").description("Copy run artifacts to this machine");

  fetchCommand
    .command("run")
    .description("Fetch one run")
    .argument("<run_id>", "run to fetch")
    .action(async (runId: string) => {
      const { services } = await connect();
      await guarded(services, "fetch-run", async () => {
        const fetched = await services.fetcher.fetchRun(runId);
        print([`fetched ${fetched.runId} -> ${fetched.localDir}`]);
        return true;
      });
    });

  fetchCommand
    .command("all")
    .description("Fetch every run of the latest manifest that has a directory")
    .option("--pattern <glob>", "only run ids matching the glob (defaults to fetch.runPattern)")
    .action(async (options: FetchAllOptions) => {
      const { services, config } = await connect();
      await guarded(services, "fetch-all", async () => {
        const { rows } = await readRemoteManifest(services);
        const records = await services.runs.readRecords(rows.map((row) => row.run_id));
        const present = rows
          .map((row) => row.run_id)
          .filter((runId) => records.get(runId)?.dirExists ?? false);
        const fetched = await services.fetcher.fetchAll(present, options.pattern ?? config.fetch.runPattern);
        print([
          ...fetched.map((run) => `fetched ${run.runId} -> ${run.localDir}`),
          `${fetched.length} run(s) fetched`,
        ]);
        return true;
      });
    });

  const state = program.command("state").description("The target's workflow state");

  state
    .command("show")
    .description("Print the current state document")
    .action(async () => {
      const { services } = await connect();
      print(buildStateLines(await services.state.load()));
    });

  state
    .command("history")
    .description("Print every recorded transition")
    .action(async () => {
      const { services } = await connect();
      print(buildStateHistoryLines(await services.state.history()));
    });

  return program;
};

/** Parses and runs one command line; resolves to the process exit status. */
export const runCli = async (argv: string[], environment: CliEnvironment): Promise<number> => {
  let exitCode = 0;
  const program = buildProgram(environment, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const err = environment.err ?? ((line: string) => console.error(line));
    for (const line of buildFailureLines(error)) {
      err(line);
    }
    return 1;
  }
  return exitCode;
};
