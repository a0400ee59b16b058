import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { createJiti } from "jiti";
import { ConfigError, PolicyViolationError } from "../core/errors";

const Argv = Type.Array(Type.String({ minLength: 1 }), { default: [] });

export const PodflowConfigSchema = Type.Object({
  project: Type.Object(
    { name: Type.String({ default: "podflow-project" }) },
    { default: {} },
  ),
  /** Only honored in the canonical file. */
  allowConfigOverride: Type.Boolean({ default: false }),
  /** Wins over the built-in default; `PODFLOW_LOG_LEVEL` wins over it. */
  logLevel: Type.Optional(
    Type.Union([
      Type.Literal("debug"),
      Type.Literal("info"),
      Type.Literal("warn"),
      Type.Literal("error"),
      Type.Literal("silent"),
    ]),
  ),
  target: Type.Object(
    {
      /** Explicit target; wins over a provisioned host. */
      host: Type.String({ default: "" }),
      transport: Type.Union(
        [Type.Literal("ssh"), Type.Literal("managed"), Type.Literal("local")],
        { default: "ssh" },
      ),
      managedCli: Type.String({ default: "lium", minLength: 1 }),
    },
    { default: {} },
  ),
  provision: Type.Object(
    {
      /** argv printing the new host id as its last output line; `{spec}` is substituted. */
      allocate: Argv,
      /** argv releasing `{host}`. */
      deallocate: Argv,
      spec: Type.String({ default: "" }),
      waitTimeoutSecs: Type.Integer({ minimum: 1, default: 480 }),
      intervalSecs: Type.Integer({ minimum: 1, default: 15 }),
    },
    { default: {} },
  ),
  remote: Type.Object(
    { root: Type.String({ pattern: "^/", default: "/mnt/podflow" }) },
    { default: {} },
  ),
  repo: Type.Object(
    {
      url: Type.String({ default: "" }),
      branch: Type.String({ default: "main" }),
      pr: Type.Optional(Type.Integer({ minimum: 1 })),
      expectSha: Type.Optional(Type.String()),
      forceClean: Type.Boolean({ default: false }),
      /** Defaults to `<remote.root>/repo`. */
      dir: Type.String({ default: "" }),
    },
    { default: {} },
  ),
  bootstrap: Type.Object(
    {
      requiredBinaries: Type.Array(Type.String(), {
        default: ["bash", "git", "tar", "timeout"],
      }),
      /** Script run best-effort after the binary check; relative paths resolve against `remote.root`. */
      script: Type.String({ default: "" }),
    },
    { default: {} },
  ),
  sweep: Type.Object(
    {
      /** Local manifest uploaded by `sweep start`. */
      manifest: Type.String({ default: "sweeps/manifest.csv" }),
      trainer: Type.Array(Type.String({ minLength: 1 }), {
        default: ["python3", "train.py"],
      }),
      /** Defaults to the repository checkout. */
      workdir: Type.String({ default: "" }),
      timeoutSecs: Type.Integer({ minimum: 0, default: 0 }),
      graceSecs: Type.Integer({ minimum: 1, default: 30 }),
      onFailure: Type.Union(
        [Type.Literal("fail-fast"), Type.Literal("continue")],
        { default: "fail-fast" },
      ),
      infraRetries: Type.Integer({ minimum: 0, default: 1 }),
      /** Run-relative file the trainer writes with `"ok": true`. */
      completionMarker: Type.String({ default: "" }),
      outputMode: Type.Union(
        [Type.Literal("durable"), Type.Literal("local_sync")],
        { default: "durable" },
      ),
      localRoot: Type.String({ default: "" }),
      syncIntervalSecs: Type.Integer({ minimum: 1, default: 60 }),
      pollIntervalSecs: Type.Integer({ minimum: 1, default: 30 }),
      waitTimeoutSecs: Type.Integer({ minimum: 1, default: 172_800 }),
      /** `CUDA_VISIBLE_DEVICES` per shard index. */
      shardDevices: Type.Array(Type.String(), { default: [] }),
    },
    { default: {} },
  ),
  task: Type.Object(
    {
      launcher: Type.Union([Type.Literal("tmux"), Type.Literal("nohup")], {
        default: "tmux",
      }),
      session: Type.String({ default: "podflow" }),
      graceSecs: Type.Integer({ minimum: 1, default: 30 }),
      pollIntervalSecs: Type.Integer({ minimum: 1, default: 5 }),
      waitTimeoutSecs: Type.Integer({ minimum: 1, default: 86_400 }),
    },
    { default: {} },
  ),
  policy: Type.Object(
    {
      judge: Type.Union(
        [
          Type.Object({ kind: Type.Literal("rules") }),
          Type.Object({
            kind: Type.Literal("command"),
            command: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
            timeoutMs: Type.Integer({ minimum: 1, default: 60_000 }),
          }),
        ],
        { default: { kind: "rules" } },
      ),
    },
    { default: {} },
  ),
  fetch: Type.Object(
    {
      localDir: Type.String({ default: ".podflow/artifacts" }),
      /** Glob over run ids for `fetch all`. */
      runPattern: Type.String({ default: "*" }),
    },
    { default: {} },
  ),
});

export type PodflowConfig = Static<typeof PodflowConfigSchema>;

type DeepPartial<T> = T extends readonly unknown[]
  ? T
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

export type PodflowConfigInput = DeepPartial<PodflowConfig>;

/** Identity helper for typed `.podflow/config.ts` files. */
export const defineConfig = (config: PodflowConfigInput): PodflowConfigInput =>
  config;

export const POD_WAIT_CLAMP_SECS = 480;

export const CANONICAL_CONFIG_FILES = [
  path.join(".podflow", "config.ts"),
  path.join(".podflow", "config.json"),
];

export interface LoadedConfig {
  config: PodflowConfig;
  path: string;
  source: "canonical" | "override";
  /** sha256 of the active file's bytes. */
  fingerprint: string;
}

export interface LoadConfigOptions {
  cwd: string;
  overridePath?: string;
  env?: NodeJS.ProcessEnv;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Applies defaults, validates, and fills the derived fields. */
export const normalizeConfig = (raw: unknown, source: string): PodflowConfig => {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: configuration must be an object`, source);
  }
  const candidate = Value.Default(PodflowConfigSchema, Value.Clone(raw));
  if (!Value.Check(PodflowConfigSchema, candidate)) {
    const problems = [...Value.Errors(PodflowConfigSchema, candidate)]
      .slice(0, 5)
      .map((error) => `${error.path || "/"}: ${error.message}`);
    throw new ConfigError(
      `${source}: invalid configuration (${problems.join("; ")})`,
      source,
    );
  }

  const config = candidate;
  const root = config.remote.root.replace(/\/+$/, "") || "/";
  const repoDir = config.repo.dir || `${root}/repo`;
  return {
    ...config,
    remote: { ...config.remote, root },
    repo: { ...config.repo, dir: repoDir },
    sweep: { ...config.sweep, workdir: config.sweep.workdir || repoDir },
    provision: {
      ...config.provision,
      waitTimeoutSecs: Math.min(config.provision.waitTimeoutSecs, POD_WAIT_CLAMP_SECS),
    },
  };
};

const readConfigObject = async (file: string): Promise<unknown> => {
  const extension = path.extname(file);
  if (extension === ".json") {
    try {
      return JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (error) {
      throw new ConfigError(
        `${file}: ${error instanceof Error ? error.message : "unreadable JSON"}`,
        file,
      );
    }
  }
  if (extension === ".ts" || extension === ".mts" || extension === ".js") {
    const jiti = createJiti(import.meta.url, {
      fsCache: false,
      moduleCache: false,
    });
    try {
      return await jiti.import(file, { default: true });
    } catch (error) {
      throw new ConfigError(
        `${file}: ${error instanceof Error ? error.message : "could not load module"}`,
        file,
      );
    }
  }
  throw new ConfigError(`unsupported configuration file type: ${file}`, file);
};

export const fingerprintFile = (file: string): string =>
  createHash("sha256").update(fs.readFileSync(file)).digest("hex");

export const findCanonicalConfig = (cwd: string): string | null => {
  for (const candidate of CANONICAL_CONFIG_FILES) {
    const file = path.join(cwd, candidate);
    if (fs.existsSync(file)) {
      return file;
    }
  }
  return null;
};

/**
 * Loads the canonical configuration, or an override when the canonical file
 * itself sets `allowConfigOverride: true`. A flag inside the override file is
 * never consulted.
 */
export const loadConfig = async (
  options: LoadConfigOptions,
): Promise<LoadedConfig> => {
  const env = options.env ?? process.env;
  const canonical = findCanonicalConfig(options.cwd);
  const requested = options.overridePath ?? env.PODFLOW_CONFIG;
  const overridePath = requested
    ? path.resolve(options.cwd, requested)
    : undefined;

  if (overridePath && overridePath !== canonical) {
    if (!canonical) {
      throw new PolicyViolationError(
        `config override ${overridePath} requested but no canonical configuration authorizes overrides`,
        "CONFIG_OVERRIDE_UNAUTHORIZED",
      );
    }
    const canonicalRaw = await readConfigObject(canonical);
    if (!isRecord(canonicalRaw) || canonicalRaw.allowConfigOverride !== true) {
      throw new PolicyViolationError(
        `config override ${overridePath} rejected: ${canonical} does not set allowConfigOverride`,
        "CONFIG_OVERRIDE_UNAUTHORIZED",
      );
    }
    if (!fs.existsSync(overridePath)) {
      throw new ConfigError(`config override not found: ${overridePath}`, overridePath);
    }
    return {
      config: normalizeConfig(await readConfigObject(overridePath), overridePath),
      path: overridePath,
      source: "override",
      fingerprint: fingerprintFile(overridePath),
    };
  }

  if (!canonical) {
    throw new ConfigError(
      `no configuration found (expected ${CANONICAL_CONFIG_FILES.join(" or ")} under ${options.cwd})`,
    );
  }
  return {
    config: normalizeConfig(await readConfigObject(canonical), canonical),
    path: canonical,
    source: "canonical",
    fingerprint: fingerprintFile(canonical),
  };
};
