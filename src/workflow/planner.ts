import path from "node:path";
import { WorkflowPlan } from "./plan.js";
import { Mode, Target, makeStep } from "./types.js";
import type { PlanMetadata, WorkflowStep } from "./types.js";

export interface PlannerInput {
  /** Local path or clone URL. */
  repo: string;
  task: string;
  mode?: Mode;
  target?: Target;
  branch?: string;
  contextFile?: string;
  sandboxName?: string;
  force?: boolean;
}

export class PlannerError extends Error {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Planner produced invalid plan: ${errors.join("; ")}`);
    this.name = "PlannerError";
    this.errors = errors;
  }
}

const URL_PREFIXES = ["http://", "https://", "git@"];

export function isRepoUrl(repo: string): boolean {
  return URL_PREFIXES.some((prefix) => repo.startsWith(prefix));
}

/** Short repository name from a path or clone URL. */
export function extractRepoName(repo: string): string {
  if (isRepoUrl(repo)) {
    const trimmed = repo.replace(/\/+$/, "");
    const last = trimmed.slice(trimmed.lastIndexOf("/") + 1);
    return last.endsWith(".git") ? last.slice(0, -4) : last;
  }
  const base = path.basename(repo);
  return base !== "" ? base : path.basename(path.dirname(repo));
}

/**
 * Turns a repo + task into a validated WorkflowPlan. Stateless; running
 * the plan is the executor's job.
 */
export class Planner {
  createPlan(input: PlannerInput): WorkflowPlan {
    const repoName = extractRepoName(input.repo);
    const target = input.target ?? Target.SANDBOX;
    const envName = input.sandboxName ?? `claude-${repoName}`;
    const branch = input.branch ?? `agent/${repoName}`;

    const metadata: PlanMetadata = {
      repo: input.repo,
      repo_name: repoName,
      task: input.task,
      mode: input.mode ?? Mode.AUTONOMOUS,
      target,
      branch,
    };
    if (target === Target.CONTAINER) {
      metadata["container_name"] = envName;
    } else {
      metadata["sandbox_name"] = envName;
    }
    if (input.contextFile) {
      metadata["context_file"] = input.contextFile;
    }

    const plan = new WorkflowPlan(this.buildSteps(input, target, repoName, branch, envName), metadata);

    const errors = plan.validate();
    if (errors.length > 0) {
      throw new PlannerError(errors);
    }
    return plan;
  }

  private buildSteps(
    input: PlannerInput,
    target: Target,
    repoName: string,
    branch: string,
    envName: string,
  ): WorkflowStep[] {
    const force = input.force ?? false;
    const stateParams = { task: input.task, context_file: input.contextFile ?? null };

    const steps: WorkflowStep[] = [
      makeStep("validate_repo", "validate_repo", {
        repo: input.repo,
        is_url: isRepoUrl(input.repo),
      }),
      makeStep("create_worktree", "create_worktree", { branch, repo_name: repoName }, [
        "validate_repo",
      ]),
    ];

    switch (target) {
      case Target.SANDBOX:
        steps.push(
          makeStep("prepare_sandbox", "prepare_sandbox", { sandbox_name: envName, force }, [
            "create_worktree",
          ]),
          makeStep("authenticate", "authenticate", { sandbox_name: envName }, ["prepare_sandbox"]),
          makeStep("initialize_state", "initialize_state", stateParams, ["authenticate"]),
          makeStep("start_agent", "start_agent", { sandbox_name: envName, task: input.task }, [
            "initialize_state",
          ]),
        );
        break;
      case Target.CONTAINER:
        steps.push(
          makeStep("prepare_container", "prepare_container", { container_name: envName, force }, [
            "create_worktree",
          ]),
          makeStep("authenticate", "authenticate", { container_name: envName }, [
            "prepare_container",
          ]),
          makeStep("initialize_state", "initialize_state", stateParams, ["authenticate"]),
          makeStep("start_agent", "start_agent", { container_name: envName, task: input.task }, [
            "initialize_state",
          ]),
        );
        break;
      case Target.LOCAL:
        // No sandbox and no auth; the executor walks past those states.
        steps.push(
          makeStep("initialize_state", "initialize_state", stateParams, ["create_worktree"]),
          makeStep("start_agent", "start_agent", { task: input.task }, ["initialize_state"]),
        );
        break;
    }

    return steps;
  }
}
