import path from "node:path";
import type { Backends, EnvironmentKind } from "../backends/types.js";
import type { Logger } from "../core/observability.js";
import type {
  AgentProbeResult,
  ExecutionContext,
  StepHandler,
} from "./executor.js";
import type { StepResult, WorkflowStep } from "./types.js";
import { stepFailed, stepSucceeded } from "./types.js";

/**
 * Exit code 0 with the agent's own exit code on stdout once it is done;
 * exit code 1 while it is still running.
 */
export const AGENT_STATUS_COMMAND =
  "test -f /tmp/.agent-done && cat /tmp/.agent-exit-code || exit 1";

type ActionHandler = (step: WorkflowStep, context: ExecutionContext) => Promise<StepResult>;

export interface BackendStepHandlerOptions {
  /** Directory fresh clones land in and local agents fall back to. */
  cwd?: string;
  agentCommand?: readonly string[];
  logger?: Logger;
}

function stringParam(step: WorkflowStep, key: string): string | undefined {
  const value = step.params[key];
  return typeof value === "string" ? value : undefined;
}

function outputString(
  context: ExecutionContext,
  stepId: string,
  key: string,
): string | undefined {
  const value = context.stepOutputs[stepId]?.[key];
  return typeof value === "string" ? value : undefined;
}

export function worktreePathFor(repoPath: string, repoName: string, branch: string): string {
  return path.join(path.dirname(repoPath), `${repoName}-${branch.replaceAll("/", "-")}`);
}

/** Dispatches plan steps to git, docker, auth and terminal backends. */
export class BackendStepHandler implements StepHandler {
  private readonly dispatch: ReadonlyMap<string, ActionHandler>;
  private readonly environments = new Map<string, EnvironmentKind>();
  private readonly cwd: string;
  private readonly agentCommand: readonly string[];
  private readonly logger: Logger | undefined;

  constructor(
    private readonly backends: Backends,
    options: BackendStepHandlerOptions = {},
  ) {
    this.cwd = options.cwd ?? process.cwd();
    this.agentCommand = options.agentCommand ?? ["claude"];
    this.logger = options.logger;
    this.dispatch = new Map<string, ActionHandler>([
      ["validate_repo", (step) => this.validateRepo(step)],
      ["create_worktree", (step, ctx) => this.createWorktree(step, ctx)],
      ["prepare_sandbox", (step, ctx) => this.prepareEnvironment("sandbox", step, ctx)],
      ["prepare_container", (step, ctx) => this.prepareEnvironment("container", step, ctx)],
      ["authenticate", (step) => this.authenticate(step)],
      ["initialize_state", (step, ctx) => this.initializeState(step, ctx)],
      ["start_agent", (step, ctx) => this.startAgent(step, ctx)],
    ]);
  }

  get registeredActions(): string[] {
    return [...this.dispatch.keys()];
  }

  async execute(step: WorkflowStep, context: ExecutionContext): Promise<StepResult> {
    const handler = this.dispatch.get(step.action);
    if (handler === undefined) {
      return stepFailed(step.id, `Unknown action: ${step.action}`);
    }
    this.logger?.debug("Dispatching step", { stepId: step.id, action: step.action });
    return handler(step, context);
  }

  probeAgent(sandboxName: string): Promise<AgentProbeResult> {
    const kind = this.environments.get(sandboxName) ?? "sandbox";
    return this.backends.docker.exec(kind, sandboxName, AGENT_STATUS_COMMAND);
  }

  // -----------------------------------------------------------------------
  // Git
  // -----------------------------------------------------------------------

  private async validateRepo(step: WorkflowStep): Promise<StepResult> {
    const repo = stringParam(step, "repo");
    if (repo === undefined) {
      return stepFailed(step.id, "Missing parameter: repo");
    }
    const isUrl = step.params["is_url"] === true;
    const git = this.backends.git;

    const local = await git.ensureLocal(repo);
    if (local !== null) {
      return stepSucceeded(step.id, { repo_path: local });
    }

    if (isUrl) {
      const trimmed = repo.replace(/\/+$/, "");
      let name = trimmed.slice(trimmed.lastIndexOf("/") + 1);
      if (name.endsWith(".git")) name = name.slice(0, -4);
      const target = path.join(this.cwd, name);
      if (!(await git.clone(repo, target))) {
        return stepFailed(step.id, `Failed to clone ${repo}`);
      }
      return stepSucceeded(step.id, { repo_path: target });
    }

    return stepFailed(step.id, `Repository not found: ${repo}`);
  }

  private async createWorktree(step: WorkflowStep, context: ExecutionContext): Promise<StepResult> {
    const repoPath = outputString(context, "validate_repo", "repo_path");
    if (repoPath === undefined) {
      return stepFailed(step.id, "Missing validate_repo output (repo_path)");
    }
    const branch = stringParam(step, "branch");
    const repoName = stringParam(step, "repo_name");
    if (branch === undefined || repoName === undefined) {
      return stepFailed(step.id, "Missing parameter: branch or repo_name");
    }

    const worktreePath = worktreePathFor(repoPath, repoName, branch);
    if (!(await this.backends.git.createWorktree(repoPath, branch, worktreePath))) {
      return stepFailed(step.id, `Failed to create worktree at ${worktreePath}`);
    }
    return stepSucceeded(step.id, { worktree_path: worktreePath });
  }

  // -----------------------------------------------------------------------
  // Sandbox / container
  // -----------------------------------------------------------------------

  private async prepareEnvironment(
    kind: EnvironmentKind,
    step: WorkflowStep,
    context: ExecutionContext,
  ): Promise<StepResult> {
    const workspace = outputString(context, "create_worktree", "worktree_path");
    if (workspace === undefined) {
      return stepFailed(step.id, "Missing create_worktree output (worktree_path)");
    }
    const key = kind === "sandbox" ? "sandbox_name" : "container_name";
    const name = stringParam(step, key);
    if (name === undefined) {
      return stepFailed(step.id, `Missing parameter: ${key}`);
    }

    const docker = this.backends.docker;
    if (step.params["force"] === true && (await docker.exists(kind, name))) {
      this.logger?.info("Replacing existing environment", { kind, name });
      await docker.stop(kind, name);
    }

    if (!(await docker.create(kind, name, workspace))) {
      return stepFailed(step.id, `Failed to create ${kind}: ${name}`);
    }
    this.environments.set(name, kind);
    return stepSucceeded(step.id, { [key]: name });
  }

  private async authenticate(step: WorkflowStep): Promise<StepResult> {
    const target = this.environmentFromParams(step);
    if (target === undefined) {
      return stepFailed(step.id, "Missing parameter: sandbox_name or container_name");
    }
    if (!(await this.backends.auth.setupGitAuth(target.kind, target.name))) {
      return stepFailed(step.id, `Failed to configure auth in ${target.kind}: ${target.name}`);
    }
    return stepSucceeded(step.id);
  }

  // -----------------------------------------------------------------------
  // Agent state and launch
  // -----------------------------------------------------------------------

  private async initializeState(step: WorkflowStep, context: ExecutionContext): Promise<StepResult> {
    const worktreePath = outputString(context, "create_worktree", "worktree_path");
    if (worktreePath === undefined) {
      return stepFailed(step.id, "Missing create_worktree output (worktree_path)");
    }
    const stateDir = await this.backends.state.initialize(worktreePath, stringParam(step, "task") ?? "");
    return stepSucceeded(step.id, { state_dir: stateDir });
  }

  private async startAgent(step: WorkflowStep, context: ExecutionContext): Promise<StepResult> {
    const task = stringParam(step, "task") ?? "";
    const worktreePath = outputString(context, "create_worktree", "worktree_path") ?? this.cwd;
    const target = this.environmentFromParams(step);

    if (target !== undefined) {
      const started = await this.backends.docker.runAgent(target.kind, target.name, worktreePath, task);
      if (!started) {
        return stepFailed(step.id, `Failed to start agent in ${target.kind}: ${target.name}`);
      }
      return stepSucceeded(step.id);
    }

    const spawned = await this.backends.terminal.spawn(
      [...this.agentCommand, "--prompt", task],
      worktreePath,
    );
    if (!spawned) {
      return stepFailed(step.id, "Failed to spawn local agent");
    }
    return stepSucceeded(step.id);
  }

  private environmentFromParams(
    step: WorkflowStep,
  ): { kind: EnvironmentKind; name: string } | undefined {
    const sandbox = stringParam(step, "sandbox_name");
    if (sandbox !== undefined) return { kind: "sandbox", name: sandbox };
    const container = stringParam(step, "container_name");
    if (container !== undefined) return { kind: "container", name: container };
    return undefined;
  }
}
