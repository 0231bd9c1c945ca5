import { describe, it, expect } from "vitest";
import { ProcessCommandRunner } from "../../../src/backends/command-runner.js";
import { CommandLog, DryRunDockerBackend, createDryRunBackends } from "../../../src/backends/dry-run.js";
import { createBackends } from "../../../src/backends/factory.js";

describe("dry-run backends", () => {
  it("records container commands without running anything", async () => {
    const log = new CommandLog();
    const docker = new DryRunDockerBackend(log);

    expect(await docker.exists("container", "ct")).toBe(false);
    expect(await docker.create("container", "ct", "/wt")).toBe(true);
    expect(await docker.exec("container", "ct", "ls")).toEqual({ exitCode: 0, output: "" });
    expect(await docker.stop("container", "ct")).toBe(true);
    expect(await docker.runAgent("container", "ct", "/wt", "Fix it")).toBe(true);

    expect(log.commands).toEqual([
      "docker ps -a --format {{.Names}} | grep ct",
      "docker run -d --name ct -v /wt:/workspace",
      "docker exec ct sh -c 'ls'",
      "docker rm -f ct",
      "docker exec -d ct claude --prompt 'Fix it'",
    ]);
  });

  it("shares one log across every backend", async () => {
    const log = new CommandLog();
    const backends = createDryRunBackends(log);

    await backends.git.clone("https://example.com/r.git", "/src/r");
    await backends.auth.setupGitAuth("container", "ct");
    await backends.terminal.spawn(["claude", "--prompt", "x"], "/wt");
    expect(await backends.state.initialize("/wt", "x")).toBe("/wt/.ralph");

    expect(log.commands).toEqual([
      "git clone https://example.com/r.git /src/r",
      "docker exec ct sh -c 'gh auth setup-git'",
      "(cd /wt && claude --prompt x)",
      "mkdir -p /wt/.ralph",
    ]);
  });

  it("is selected by the factory's dry-run mode", async () => {
    const log = new CommandLog();
    const backends = createBackends("dry-run", { commandLog: log });

    expect(await backends.git.ensureLocal("/src/r")).toBe("/src/r");
    expect(log.commands).toEqual(["# ensure_local: validate /src/r"]);
  });
});

describe("ProcessCommandRunner", () => {
  it("fails an empty command without spawning", async () => {
    const runner = new ProcessCommandRunner();
    expect(await runner.run([])).toEqual({ exitCode: 127, stdout: "", stderr: "empty command" });
    expect(await runner.spawnDetached([])).toBe(false);
  });
});
