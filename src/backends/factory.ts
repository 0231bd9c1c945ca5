import { type CommandRunner, ProcessCommandRunner } from "./command-runner.js";
import { RealAuthBackend } from "./auth-backend.js";
import { RealDockerBackend, type RealDockerBackendOptions } from "./docker-backend.js";
import { CommandLog, createDryRunBackends } from "./dry-run.js";
import { RealGitBackend } from "./git-backend.js";
import { FileStateBackend } from "./state-backend.js";
import { RealTerminalBackend } from "./terminal-backend.js";
import type { Backends } from "./types.js";

export type BackendMode = "real" | "dry-run";

export interface CreateBackendsOptions {
  runner?: CommandRunner;
  /** Collects dry-run commands. */
  commandLog?: CommandLog;
  searchPaths?: readonly string[];
  docker?: RealDockerBackendOptions;
}

export function createBackends(mode: BackendMode, options: CreateBackendsOptions = {}): Backends {
  if (mode === "dry-run") {
    return createDryRunBackends(options.commandLog);
  }

  const runner = options.runner ?? new ProcessCommandRunner();
  const docker = new RealDockerBackend(runner, options.docker);
  return {
    git: new RealGitBackend(runner, options.searchPaths),
    docker,
    auth: new RealAuthBackend(docker),
    terminal: new RealTerminalBackend(runner),
    state: new FileStateBackend(),
  };
}
