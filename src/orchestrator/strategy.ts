import { Mode, Target } from "../workflow/types.js";
import type { RepoInfo } from "./repo-info.js";

export interface TaskInfo {
  /** Task-source id; used for bookkeeping and status updates. */
  name: string;
  /** Text handed to the agent. */
  description: string;
  isDestructive: boolean;
  complexity: string;
  dependsOn: string[];
  labels: string[];
}

export function makeTaskInfo(name: string, fields: Partial<Omit<TaskInfo, "name">> = {}): TaskInfo {
  return {
    name,
    description: fields.description ?? name,
    isDestructive: fields.isDestructive ?? false,
    complexity: fields.complexity ?? "simple",
    dependsOn: [...(fields.dependsOn ?? [])],
    labels: [...(fields.labels ?? [])],
  };
}

export interface ExecutionDecision {
  mode: Mode;
  target: Target;
  parallelism: number;
  /** Advisory; never parsed. */
  reasoning: string;
  taskGroups: TaskInfo[][];
}

export interface DecisionOverrides {
  mode?: Mode;
  target?: Target;
  parallelism?: number;
}

const COMPLEXITY_WEIGHTS: Readonly<Record<string, number>> = {
  simple: 1,
  moderate: 2,
  complex: 4,
};

const INTERACTIVE_COMPLEXITY_THRESHOLD = 6;

export const DEFAULT_MAX_PARALLEL_AGENTS = 8;

/**
 * Decides mode, target, parallelism and task grouping from the task list
 * and repository signals. Pure: the same inputs give the same decision.
 */
export class ExecutionStrategy {
  constructor(readonly maxParallelAgents: number = DEFAULT_MAX_PARALLEL_AGENTS) {}

  decide(tasks: readonly TaskInfo[], repo: RepoInfo, overrides: DecisionOverrides = {}): ExecutionDecision {
    const reasons: string[] = [];

    let mode = this.decideMode(tasks, reasons);
    if (overrides.mode !== undefined) {
      mode = overrides.mode;
      reasons.push(`Mode overridden to ${mode}`);
    }

    let target = this.decideTarget(repo, reasons);
    if (overrides.target !== undefined) {
      target = overrides.target;
      reasons.push(`Target overridden to ${target}`);
    }

    const taskGroups = groupTasks(tasks);
    let parallelism = Math.min(taskGroups.length, this.maxParallelAgents);
    if (overrides.parallelism !== undefined) {
      parallelism = overrides.parallelism;
      reasons.push(`Parallelism overridden to ${parallelism}`);
    }

    return { mode, target, parallelism, reasoning: reasons.join("; "), taskGroups };
  }

  explain(decision: ExecutionDecision): string {
    const lines = [
      `Mode: ${decision.mode}`,
      `Target: ${decision.target}`,
      `Parallelism: ${decision.parallelism}`,
      `Task groups: ${decision.taskGroups.length}`,
    ];
    if (decision.reasoning) {
      lines.push(`Reasoning: ${decision.reasoning}`);
    }
    return lines.join("\n");
  }

  private decideMode(tasks: readonly TaskInfo[], reasons: string[]): Mode {
    if (tasks.some((t) => t.isDestructive)) {
      reasons.push("Destructive operations detected, using interactive mode");
      return Mode.INTERACTIVE;
    }

    const total = tasks.reduce((sum, t) => sum + (COMPLEXITY_WEIGHTS[t.complexity] ?? 1), 0);
    if (total >= INTERACTIVE_COMPLEXITY_THRESHOLD) {
      reasons.push(`High total complexity (${total}), using interactive mode`);
      return Mode.INTERACTIVE;
    }

    reasons.push("Tasks are well-scoped, using autonomous mode");
    return Mode.AUTONOMOUS;
  }

  private decideTarget(repo: RepoInfo, reasons: string[]): Target {
    // Credentials stay isolated in a sandbox, even when a Dockerfile exists.
    if (repo.needsAuth || repo.hasEnvFile) {
      const parts: string[] = [];
      if (repo.needsAuth) parts.push("auth requirements");
      if (repo.hasEnvFile) parts.push("environment files");
      reasons.push(`Detected ${parts.join(" and ")}, using sandbox for persistent auth`);
      return Target.SANDBOX;
    }

    if (repo.hasDockerfile || repo.hasDevcontainer) {
      reasons.push("Detected container configuration, using container for isolation");
      return Target.CONTAINER;
    }

    reasons.push("No special requirements, using local execution");
    return Target.LOCAL;
  }
}

/**
 * Connected components of the dependency graph, in order of each
 * component's first task. Dependencies on unknown names are ignored.
 */
export function groupTasks(tasks: readonly TaskInfo[]): TaskInfo[][] {
  const parent = new Map<string, string>();
  for (const t of tasks) parent.set(t.name, t.name);

  const find = (x: string): string => {
    let node = x;
    let up = parent.get(node);
    while (up !== undefined && up !== node) {
      // Path halving
      const grand = parent.get(up) ?? up;
      parent.set(node, grand);
      node = grand;
      up = parent.get(node);
    }
    return node;
  };

  for (const task of tasks) {
    for (const dep of task.dependsOn) {
      if (!parent.has(dep)) continue;
      const a = find(task.name);
      const b = find(dep);
      if (a !== b) parent.set(a, b);
    }
  }

  const groups = new Map<string, TaskInfo[]>();
  const seen = new Set<string>();
  for (const task of tasks) {
    // Repeated names (e.g. identical checklist lines) are grouped once.
    if (seen.has(task.name)) continue;
    seen.add(task.name);
    const root = find(task.name);
    const group = groups.get(root);
    if (group) {
      group.push(task);
    } else {
      groups.set(root, [task]);
    }
  }
  return [...groups.values()];
}

/** Strategy view of a task-source task, named by its id. */
export function taskInfoFromTask(task: {
  taskId: string;
  description: string;
  dependencies: readonly string[];
  labels: Readonly<Record<string, string>>;
}): TaskInfo {
  return makeTaskInfo(task.taskId, {
    description: task.description,
    isDestructive: task.labels["destructive"] === "true",
    complexity: task.labels["complexity"] ?? "simple",
    dependsOn: [...task.dependencies],
    labels: Object.keys(task.labels),
  });
}
