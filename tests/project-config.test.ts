import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError, PolicyViolationError } from "../src/core/errors";
import {
  fingerprintFile,
  loadConfig,
  normalizeConfig,
} from "../src/project/config";

const projectDir = (files: Record<string, string>): string => {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "podflow-config-"));
  for (const [name, content] of Object.entries(files)) {
    const file = path.join(cwd, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }
  return cwd;
};

describe("normalizeConfig", () => {
  it("fills defaults and derived paths", () => {
    const config = normalizeConfig({ remote: { root: "/data/pf/" } }, "test");

    expect(config.remote.root).toBe("/data/pf");
    expect(config.repo.dir).toBe("/data/pf/repo");
    expect(config.sweep.workdir).toBe("/data/pf/repo");
    expect(config.sweep.onFailure).toBe("fail-fast");
    expect(config.sweep.infraRetries).toBe(1);
    expect(config.task).toEqual({
      launcher: "tmux",
      session: "podflow",
      graceSecs: 30,
      pollIntervalSecs: 5,
      waitTimeoutSecs: 86_400,
    });
    expect(config.policy.judge).toEqual({ kind: "rules" });
    expect(config.logLevel).toBeUndefined();
    expect(config.bootstrap.requiredBinaries).toEqual(["bash", "git", "tar", "timeout"]);
  });

  it("clamps the provisioning wait", () => {
    expect(normalizeConfig({ provision: { waitTimeoutSecs: 3600 } }, "test").provision.waitTimeoutSecs).toBe(480);
    expect(normalizeConfig({ provision: { waitTimeoutSecs: 60 } }, "test").provision.waitTimeoutSecs).toBe(60);
  });

  it("rejects invalid values with their path", () => {
    expect(() => normalizeConfig({ sweep: { onFailure: "retry-forever" } }, "cfg.json")).toThrow(
      /^cfg\.json: invalid configuration \(.*\/sweep\/onFailure/,
    );
    expect(() => normalizeConfig({ remote: { root: "relative" } }, "cfg.json")).toThrow(ConfigError);
    expect(() => normalizeConfig([], "cfg.json")).toThrow("cfg.json: configuration must be an object");
  });
});

describe("loadConfig", () => {
  it("loads the canonical JSON file and fingerprints its bytes", async () => {
    const cwd = projectDir({ ".podflow/config.json": '{"target":{"host":"gpu-host-1"}}' });

    const loaded = await loadConfig({ cwd, env: {} });

    expect(loaded.source).toBe("canonical");
    expect(loaded.path).toBe(path.join(cwd, ".podflow", "config.json"));
    expect(loaded.config.target.host).toBe("gpu-host-1");
    expect(loaded.fingerprint).toBe(fingerprintFile(loaded.path));
    expect(loaded.fingerprint).toMatch(/^[0-9a-f]{64}$/);
  });

  it("prefers a TypeScript config", async () => {
    const cwd = projectDir({
      ".podflow/config.ts": 'const host: string = "from-ts";\nexport default { target: { host } };\n',
      ".podflow/config.json": '{"target":{"host":"from-json"}}',
    });

    const loaded = await loadConfig({ cwd, env: {} });

    expect(loaded.config.target.host).toBe("from-ts");
  });

  it("gives the same fingerprint for the same bytes", async () => {
    const content = '{"sweep":{"onFailure":"continue"}}';
    const first = await loadConfig({ cwd: projectDir({ ".podflow/config.json": content }), env: {} });
    const second = await loadConfig({ cwd: projectDir({ ".podflow/config.json": content }), env: {} });

    expect(first.fingerprint).toBe(second.fingerprint);
  });

  it("fails without a canonical file", async () => {
    await expect(loadConfig({ cwd: projectDir({}), env: {} })).rejects.toThrow(
      /^no configuration found/,
    );
  });

  it("refuses an override the canonical file does not authorize", async () => {
    const cwd = projectDir({
      ".podflow/config.json": "{}",
      "other.json": '{"allowConfigOverride":true}',
    });

    await expect(loadConfig({ cwd, overridePath: "other.json", env: {} })).rejects.toBeInstanceOf(
      PolicyViolationError,
    );
    await expect(loadConfig({ cwd, env: { PODFLOW_CONFIG: "other.json" } })).rejects.toMatchObject({
      code: "CONFIG_OVERRIDE_UNAUTHORIZED",
    });
  });

  it("refuses an override when there is no canonical file", async () => {
    const cwd = projectDir({ "other.json": "{}" });

    await expect(loadConfig({ cwd, overridePath: "other.json", env: {} })).rejects.toThrow(
      `config override ${path.join(cwd, "other.json")} requested but no canonical configuration authorizes overrides`,
    );
  });

  it("uses an authorized override and fingerprints the override", async () => {
    const cwd = projectDir({
      ".podflow/config.json": '{"allowConfigOverride":true,"target":{"host":"canonical"}}',
      "staging.json": '{"target":{"host":"staging"}}',
    });

    const loaded = await loadConfig({ cwd, overridePath: "staging.json", env: {} });

    expect(loaded.source).toBe("override");
    expect(loaded.config.target.host).toBe("staging");
    expect(loaded.fingerprint).toBe(fingerprintFile(path.join(cwd, "staging.json")));
  });

  it("reports a missing authorized override", async () => {
    const cwd = projectDir({ ".podflow/config.json": '{"allowConfigOverride":true}' });

    await expect(loadConfig({ cwd, overridePath: "nope.json", env: {} })).rejects.toThrow(
      `config override not found: ${path.join(cwd, "nope.json")}`,
    );
  });

  it("treats naming the canonical file as no override", async () => {
    const cwd = projectDir({ ".podflow/config.json": "{}" });

    const loaded = await loadConfig({ cwd, overridePath: ".podflow/config.json", env: {} });

    expect(loaded.source).toBe("canonical");
  });
});
