import path from "node:path";
import { AGENT_STATE_DIRNAME } from "../state/agent-state.js";
import type { AgentProbeResult } from "../workflow/executor.js";
import type {
  AuthBackend,
  Backends,
  DockerBackend,
  EnvironmentKind,
  GitBackend,
  StateBackend,
  TerminalBackend,
} from "./types.js";

/** Shared log of the commands dry-run backends would have executed. */
export class CommandLog {
  readonly commands: string[] = [];

  record(command: string): void {
    this.commands.push(command);
  }
}

export class DryRunGitBackend implements GitBackend {
  constructor(private readonly log: CommandLog) {}

  async ensureLocal(repo: string): Promise<string | null> {
    this.log.record(`# ensure_local: validate ${repo}`);
    return repo;
  }

  async clone(url: string, target: string): Promise<boolean> {
    this.log.record(`git clone ${url} ${target}`);
    return true;
  }

  async createWorktree(repoPath: string, branch: string, target: string): Promise<boolean> {
    this.log.record(`git -C ${repoPath} worktree add ${target} -b ${branch}`);
    return true;
  }
}

export class DryRunDockerBackend implements DockerBackend {
  constructor(private readonly log: CommandLog) {}

  async exists(kind: EnvironmentKind, name: string): Promise<boolean> {
    this.log.record(
      kind === "sandbox"
        ? `docker sandbox ls --format {{.Name}} | grep ${name}`
        : `docker ps -a --format {{.Names}} | grep ${name}`,
    );
    return false;
  }

  async create(kind: EnvironmentKind, name: string, workspace: string): Promise<boolean> {
    this.log.record(
      kind === "sandbox"
        ? `docker sandbox create --name ${name} -v ${workspace}:/workspace`
        : `docker run -d --name ${name} -v ${workspace}:/workspace`,
    );
    return true;
  }

  async stop(kind: EnvironmentKind, name: string): Promise<boolean> {
    this.log.record(kind === "sandbox" ? `docker sandbox stop ${name}` : `docker rm -f ${name}`);
    return true;
  }

  async exec(kind: EnvironmentKind, name: string, command: string): Promise<AgentProbeResult> {
    this.log.record(
      kind === "sandbox"
        ? `docker sandbox exec ${name} sh -c '${command}'`
        : `docker exec ${name} sh -c '${command}'`,
    );
    // Agents report as finished with exit code 0.
    return { exitCode: 0, output: "" };
  }

  async runAgent(
    kind: EnvironmentKind,
    name: string,
    workspace: string,
    prompt: string,
  ): Promise<boolean> {
    this.log.record(
      kind === "sandbox"
        ? `docker sandbox run --name ${name} -v ${workspace}:/workspace -- claude --prompt '${prompt}'`
        : `docker exec -d ${name} claude --prompt '${prompt}'`,
    );
    return true;
  }
}

export class DryRunAuthBackend implements AuthBackend {
  constructor(private readonly log: CommandLog) {}

  async setupGitAuth(kind: EnvironmentKind, name: string): Promise<boolean> {
    this.log.record(
      kind === "sandbox"
        ? `docker sandbox exec ${name} sh -c 'gh auth setup-git'`
        : `docker exec ${name} sh -c 'gh auth setup-git'`,
    );
    return true;
  }
}

export class DryRunTerminalBackend implements TerminalBackend {
  constructor(private readonly log: CommandLog) {}

  async spawn(command: readonly string[], cwd: string): Promise<boolean> {
    this.log.record(`(cd ${cwd} && ${command.join(" ")})`);
    return true;
  }
}

export class DryRunStateBackend implements StateBackend {
  constructor(private readonly log: CommandLog) {}

  async initialize(worktreePath: string): Promise<string> {
    const dir = path.join(worktreePath, AGENT_STATE_DIRNAME);
    this.log.record(`mkdir -p ${dir}`);
    return dir;
  }
}

export function createDryRunBackends(log: CommandLog = new CommandLog()): Backends {
  return {
    git: new DryRunGitBackend(log),
    docker: new DryRunDockerBackend(log),
    auth: new DryRunAuthBackend(log),
    terminal: new DryRunTerminalBackend(log),
    state: new DryRunStateBackend(log),
  };
}
