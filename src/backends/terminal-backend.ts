import type { CommandRunner } from "./command-runner.js";
import type { TerminalBackend } from "./types.js";

/** Starts a local agent process detached from the orchestrator. */
export class RealTerminalBackend implements TerminalBackend {
  constructor(private readonly runner: CommandRunner) {}

  spawn(command: readonly string[], cwd: string): Promise<boolean> {
    return this.runner.spawnDetached(command, { cwd });
  }
}
