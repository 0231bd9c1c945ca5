import type { AgentProbeResult } from "../workflow/executor.js";

export type EnvironmentKind = "sandbox" | "container";

export interface GitBackend {
  /** Resolve a path or URL to an existing local clone, or null. */
  ensureLocal(repo: string): Promise<string | null>;
  clone(url: string, target: string): Promise<boolean>;
  createWorktree(repoPath: string, branch: string, target: string): Promise<boolean>;
}

/** Docker sandboxes and plain containers behind one surface. */
export interface DockerBackend {
  exists(kind: EnvironmentKind, name: string): Promise<boolean>;
  create(kind: EnvironmentKind, name: string, workspace: string): Promise<boolean>;
  stop(kind: EnvironmentKind, name: string): Promise<boolean>;
  exec(kind: EnvironmentKind, name: string, command: string): Promise<AgentProbeResult>;
  runAgent(kind: EnvironmentKind, name: string, workspace: string, prompt: string): Promise<boolean>;
}

export interface AuthBackend {
  setupGitAuth(kind: EnvironmentKind, name: string): Promise<boolean>;
}

export interface TerminalBackend {
  spawn(command: readonly string[], cwd: string): Promise<boolean>;
}

export interface StateBackend {
  /** Sets up the agent state directory in a worktree; returns its path. */
  initialize(worktreePath: string, task: string): Promise<string>;
}

export interface Backends {
  git: GitBackend;
  docker: DockerBackend;
  auth: AuthBackend;
  terminal: TerminalBackend;
  state: StateBackend;
}
