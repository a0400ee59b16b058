import { defineConfig } from "../src/project/config";

// Copy to .podflow/config.ts and adjust.
export default defineConfig({
  project: { name: "image-classifier-sweeps" },
  target: {
    transport: "ssh",
    host: "",
  },
  provision: {
    allocate: ["./scripts/allocate-host.sh", "{spec}"],
    deallocate: ["./scripts/release-host.sh", "{host}"],
    spec: "1xA100",
    waitTimeoutSecs: 480,
    intervalSecs: 15,
  },
  remote: { root: "/mnt/podflow" },
  repo: {
    url: "https://example.com/lab/trainer.git",
    branch: "main",
  },
  bootstrap: {
    requiredBinaries: ["bash", "git", "tar", "timeout", "tmux", "python3"],
    script: "repo/scripts/setup.sh",
  },
  sweep: {
    manifest: "sweeps/manifest.csv",
    trainer: ["python3", "train.py"],
    timeoutSecs: 21_600,
    onFailure: "fail-fast",
    infraRetries: 1,
    completionMarker: "metrics.json",
    shardDevices: ["0", "1"],
  },
  task: { launcher: "tmux", session: "podflow" },
  policy: { judge: { kind: "rules" } },
  fetch: { localDir: ".podflow/artifacts", runPattern: "*" },
});
