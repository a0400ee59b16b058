import { ExecutionError } from "../core/errors";
import { type Logger, silentLogger } from "../observability/logger";
import type { PodflowConfig } from "../project/config";
import { type ExecFn, execProcess } from "../runtime/process";

/** Allocates and releases target hosts. */
export interface Provisioner {
  readonly name: string;
  /** Returns the identifier of the new host. */
  allocate(spec: string): Promise<string>;
  deallocate(host: string): Promise<void>;
}

const HOST_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._@:-]*$/;

export const substitute = (
  argv: readonly string[],
  values: Record<string, string>,
): string[] =>
  argv.map((word) =>
    word.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match),
  );

/**
 * Runs operator-configured commands: `allocate` prints the new host id as
 * its last non-empty output line; `deallocate` receives it as `{host}`.
 */
export class CommandProvisioner implements Provisioner {
  readonly name = "command";
  private readonly logger: Logger;

  constructor(
    private readonly settings: PodflowConfig["provision"],
    private readonly exec: ExecFn = execProcess,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger;
  }

  async allocate(spec: string): Promise<string> {
    const output = await this.run("allocate", this.settings.allocate, { spec });
    const host = output
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .at(-1);
    if (!host || !HOST_PATTERN.test(host)) {
      throw new ExecutionError(
        `allocate did not print a host id (last line: ${JSON.stringify(host ?? "")})`,
        "infrastructure",
        "provision",
      );
    }
    this.logger.info(`allocated ${host}`);
    return host;
  }

  async deallocate(host: string): Promise<void> {
    await this.run("deallocate", this.settings.deallocate, { host });
    this.logger.info(`deallocated ${host}`);
  }

  private async run(
    step: string,
    template: readonly string[],
    values: Record<string, string>,
  ): Promise<string> {
    const [bin, ...args] = substitute(template, values);
    if (!bin) {
      throw new ExecutionError(
        `provision.${step} is not configured`,
        "infrastructure",
        "provision",
      );
    }
    const result = await this.exec(bin, args);
    if (result.code !== 0) {
      throw new ExecutionError(
        `${step} failed (exit ${result.code}): ${(result.stderr || result.stdout).trim()}`,
        "infrastructure",
        "provision",
        result.code,
      );
    }
    return result.stdout;
  }
}
