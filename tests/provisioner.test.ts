import { describe, expect, it } from "vitest";
import { ExecutionError } from "../src/core/errors";
import { CommandProvisioner, substitute } from "../src/flow/provisioner";
import { normalizeConfig } from "../src/project/config";
import type { ExecFn, ExecResult } from "../src/runtime/process";

const settings = normalizeConfig(
  {
    provision: {
      allocate: ["gpu-cli", "up", "--spec", "{spec}"],
      deallocate: ["gpu-cli", "down", "{host}"],
    },
  },
  "test",
).provision;

const scripted = (...results: ExecResult[]) => {
  const calls: string[][] = [];
  const exec: ExecFn = async (bin, args) => {
    calls.push([bin, ...args]);
    return results.shift() ?? { code: 0, stdout: "", stderr: "", killed: false };
  };
  return { calls, exec };
};

describe("substitute", () => {
  it("fills known placeholders and leaves the rest", () => {
    expect(substitute(["--spec={spec}", "{other}", "{host}"], { spec: "a100x2", host: "h1" })).toEqual([
      "--spec=a100x2",
      "{other}",
      "h1",
    ]);
  });
});

describe("CommandProvisioner", () => {
  it("takes the last output line as the host", async () => {
    const { calls, exec } = scripted({
      code: 0,
      stdout: "requesting a100x2...\ngpu-host-7\n\n",
      stderr: "",
      killed: false,
    });

    const host = await new CommandProvisioner(settings, exec).allocate("a100x2");

    expect(host).toBe("gpu-host-7");
    expect(calls).toEqual([["gpu-cli", "up", "--spec", "a100x2"]]);
  });

  it("rejects output that is not a host id", async () => {
    const { exec } = scripted({ code: 0, stdout: "capacity exhausted, try later\n", stderr: "", killed: false });

    await expect(new CommandProvisioner(settings, exec).allocate("a100x2")).rejects.toThrow(
      'allocate did not print a host id (last line: "capacity exhausted, try later")',
    );
  });

  it("reports a failing command as infrastructure", async () => {
    const { exec } = scripted({ code: 3, stdout: "", stderr: "quota exceeded\n", killed: false });

    const error = await new CommandProvisioner(settings, exec).allocate("a100x2").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toMatchObject({
      message: "allocate failed (exit 3): quota exceeded",
      failureClass: "infrastructure",
      exitCode: 3,
    });
  });

  it("releases the host it is given", async () => {
    const { calls, exec } = scripted();

    await new CommandProvisioner(settings, exec).deallocate("gpu-host-7");

    expect(calls).toEqual([["gpu-cli", "down", "gpu-host-7"]]);
  });

  it("requires a configured command", async () => {
    const { exec } = scripted();
    const unconfigured = normalizeConfig({}, "test").provision;

    await expect(new CommandProvisioner(unconfigured, exec).deallocate("gpu-host-7")).rejects.toThrow(
      "provision.deallocate is not configured",
    );
  });
});
