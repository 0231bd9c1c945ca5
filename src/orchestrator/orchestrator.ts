import { Effect } from "effect";
import { Logger, defaultLogLevel } from "../core/observability.js";
import {
  interruptibleSleep,
  runEffectPromise,
  withTimeout,
} from "../core/effect-concurrency.js";
import { type Task, type TaskSource, TaskStatus } from "../sources/types.js";
import { errorMessage } from "../types/index.js";
import {
  type CheckpointStore,
  type WorkflowCheckpoint,
  createCheckpoint,
  updateCheckpoint,
} from "../workflow/checkpoint-store.js";
import { type AgentProbeResult, type StepHandler, StepExecutor } from "../workflow/executor.js";
import type { WorkflowPlan } from "../workflow/plan.js";
import { Planner, extractRepoName } from "../workflow/planner.js";
import { WorkflowState } from "../workflow/state-machine.js";
import { Target } from "../workflow/types.js";
import type { ExecutionResult } from "../workflow/types.js";
import { NoopReporter, type Reporter } from "./reporter.js";
import { type ExecutionDecision, type TaskInfo, taskInfoFromTask } from "./strategy.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export enum FailurePolicy {
  RETRY = "retry",
  SKIP = "skip",
  ABORT = "abort",
}

export function parseFailurePolicy(value: string): FailurePolicy | undefined {
  return Object.values(FailurePolicy).find((p) => p === value);
}

export enum AgentStatus {
  RUNNING = "running",
  COMPLETED = "completed",
  FAILED = "failed",
}

export interface AgentHandle {
  id: string;
  taskGroup: TaskInfo[];
  /** Undefined for local agents. */
  sandboxName?: string;
  startedAt: number;
  retryCount: number;
  executionResult: ExecutionResult;
  handler: StepHandler;
}

export interface OrchestratorResult {
  completedTasks: string[];
  failedTasks: string[];
  skippedTasks: string[];
  agentsSpawned: number;
  errors: string[];
  totalTimeSeconds: number;
}

export interface OrchestratorOptions {
  /** Called once per spawn; each agent gets its own handler. */
  createStepHandler: () => StepHandler;
  taskSource?: TaskSource;
  reporter?: Reporter;
  /** Defaults to the decision's parallelism. */
  maxParallel?: number;
  pollIntervalMs?: number;
  failurePolicy?: FailurePolicy;
  maxRetries?: number;
  probeTimeoutMs?: number;
  checkpointStore?: CheckpointStore;
  logger?: Logger;
  planner?: Planner;
}

export interface RunOptions {
  /** Aborting stops new spawns and interrupts the poll sleep. */
  signal?: AbortSignal;
}

export const DEFAULT_POLL_INTERVAL_MS = 5000;
export const DEFAULT_MAX_RETRIES = 1;
export const DEFAULT_PROBE_TIMEOUT_MS = 30_000;

interface PendingGroup {
  tasks: TaskInfo[];
  retryCount: number;
}

type SpawnOutcome =
  | { ok: true; handle: AgentHandle }
  | { ok: false; reason: string };

class ProbeTimeoutError extends Error {
  constructor(sandboxName: string, timeoutMs: number) {
    super(`Status probe for ${sandboxName} timed out after ${timeoutMs}ms`);
    this.name = "ProbeTimeoutError";
  }
}

function names(tasks: readonly TaskInfo[]): string[] {
  return tasks.map((t) => t.name);
}

function countTasks(groups: readonly PendingGroup[]): number {
  return groups.reduce((sum, g) => sum + g.tasks.length, 0);
}

/** Exit code 0 with empty or "0" output means the agent finished cleanly. */
export function statusFromProbe(probe: AgentProbeResult): AgentStatus {
  if (probe.exitCode !== 0) return AgentStatus.RUNNING;
  const output = probe.output.trim();
  return output === "" || output === "0" ? AgentStatus.COMPLETED : AgentStatus.FAILED;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Spawns one agent per task group, polls them until they finish, applies
 * the failure policy, and picks up tasks the source reports as newly ready.
 *
 * A single loop owns all scheduling state; the poll sleep is its only
 * suspension point between iterations.
 */
export class Orchestrator {
  private readonly createStepHandler: () => StepHandler;
  private readonly taskSource?: TaskSource;
  private readonly reporter: Reporter;
  private readonly maxParallelOverride?: number;
  private readonly pollIntervalMs: number;
  private readonly failurePolicy: FailurePolicy;
  private readonly maxRetries: number;
  private readonly probeTimeoutMs: number;
  private readonly checkpointStore?: CheckpointStore;
  private readonly logger: Logger;
  private readonly planner: Planner;
  private agentCounter = 0;
  private readonly probeWarned = new Set<string>();

  constructor(options: OrchestratorOptions) {
    this.createStepHandler = options.createStepHandler;
    this.taskSource = options.taskSource;
    this.reporter = options.reporter ?? new NoopReporter();
    this.maxParallelOverride = options.maxParallel;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.failurePolicy = options.failurePolicy ?? FailurePolicy.SKIP;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.checkpointStore = options.checkpointStore;
    this.logger = options.logger ?? new Logger("orchestrator", defaultLogLevel());
    this.planner = options.planner ?? new Planner();
  }

  async run(decision: ExecutionDecision, repo: string, options: RunOptions = {}): Promise<OrchestratorResult> {
    const { signal } = options;
    const startedAt = Date.now();
    const maxParallel = Math.max(1, this.maxParallelOverride ?? decision.parallelism);

    const pending: PendingGroup[] = decision.taskGroups.map((g) => ({ tasks: [...g], retryCount: 0 }));
    const running = new Map<string, AgentHandle>();
    const knownTaskNames = new Set<string>(decision.taskGroups.flatMap(names));
    const result: OrchestratorResult = {
      completedTasks: [],
      failedTasks: [],
      skippedTasks: [],
      agentsSpawned: 0,
      errors: [],
      totalTimeSeconds: 0,
    };
    let aborting = false;
    let interrupted = false;

    this.logger.info("Orchestration started", {
      repo,
      target: decision.target,
      groups: pending.length,
      maxParallel,
      failurePolicy: this.failurePolicy,
    });

    const skipPending = () => {
      for (const group of pending.splice(0)) {
        result.skippedTasks.push(...names(group.tasks));
      }
    };

    while (pending.length > 0 || running.size > 0) {
      if (signal?.aborted) {
        this.logger.warn("Orchestration interrupted", { running: running.size });
        skipPending();
        interrupted = true;
        break;
      }

      // Spawn phase
      while (!aborting && !signal?.aborted && pending.length > 0 && running.size < maxParallel) {
        const group = pending.shift();
        if (group === undefined) break;
        const outcome = await this.spawnAgent(group, decision, repo);
        if (outcome.ok) {
          running.set(outcome.handle.id, outcome.handle);
          result.agentsSpawned += 1;
          this.reporter.onAgentStarted(outcome.handle.id, names(group.tasks), outcome.handle.sandboxName);
        } else {
          result.failedTasks.push(...names(group.tasks));
          result.errors.push(`Failed to spawn agent for: ${names(group.tasks).join(", ")}: ${outcome.reason}`);
          this.logger.error("Agent spawn failed", { tasks: names(group.tasks), reason: outcome.reason });
          await this.markTasks(group.tasks, TaskStatus.FAILED, result);
        }
      }

      if (running.size === 0) break;

      // Poll phase
      const finished: Array<[AgentHandle, AgentStatus]> = [];
      for (const handle of running.values()) {
        const status = await this.checkAgentStatus(handle, decision.target);
        if (status !== AgentStatus.RUNNING) finished.push([handle, status]);
      }

      for (const [handle, status] of finished) {
        running.delete(handle.id);
        const taskNames = names(handle.taskGroup);
        const durationSeconds = (Date.now() - handle.startedAt) / 1000;

        if (status === AgentStatus.COMPLETED) {
          result.completedTasks.push(...taskNames);
          await this.markTasks(handle.taskGroup, TaskStatus.COMPLETED, result);
          this.reporter.onAgentCompleted(handle.id, taskNames, durationSeconds);
          this.logger.info("Agent completed", { agentId: handle.id, tasks: taskNames, durationSeconds });

          if (!aborting && !signal?.aborted) {
            for (const group of await this.findNewlyUnblocked(knownTaskNames, result)) {
              pending.push(group);
            }
          }
          continue;
        }

        this.reporter.onAgentFailed(handle.id, taskNames, `Agent ${handle.id} failed`);
        this.logger.warn("Agent failed", { agentId: handle.id, tasks: taskNames, retryCount: handle.retryCount });
        if (await this.handleFailure(handle, result, pending)) {
          aborting = true;
          skipPending();
        }
      }

      this.reporter.onProgress({
        running: running.size,
        completed: result.completedTasks.length,
        pending: countTasks(pending),
        failed: result.failedTasks.length,
      });

      if (running.size > 0) {
        await interruptibleSleep(this.pollIntervalMs, signal);
      }
    }

    // Tasks of groups that never ran (or were still in flight when interrupted)
    const accounted = new Set([...result.completedTasks, ...result.failedTasks, ...result.skippedTasks]);
    for (const name of knownTaskNames) {
      if (!accounted.has(name)) result.skippedTasks.push(name);
    }

    result.totalTimeSeconds = (Date.now() - startedAt) / 1000;
    this.reporter.summarize(result);
    this.logger.info("Orchestration finished", {
      completed: result.completedTasks.length,
      failed: result.failedTasks.length,
      skipped: result.skippedTasks.length,
      agentsSpawned: result.agentsSpawned,
      interrupted,
    });
    return result;
  }

  // -----------------------------------------------------------------------
  // Spawning
  // -----------------------------------------------------------------------

  private nextAgentId(): string {
    this.agentCounter += 1;
    return `agent-${this.agentCounter}`;
  }

  private async spawnAgent(group: PendingGroup, decision: ExecutionDecision, repo: string): Promise<SpawnOutcome> {
    const agentId = this.nextAgentId();
    const sandboxName = `sandbox-${agentId}`;
    const log = this.logger.child(agentId);

    let plan: WorkflowPlan;
    try {
      plan = this.planner.createPlan({
        repo,
        task: group.tasks.map((t) => t.description).join("; "),
        mode: decision.mode,
        target: decision.target,
        branch: `agent/${extractRepoName(repo)}-${agentId}`,
        sandboxName,
      });
    } catch (err) {
      return { ok: false, reason: errorMessage(err) };
    }

    const handler = this.createStepHandler();
    let executionResult: ExecutionResult;
    try {
      executionResult = await this.executePlan(agentId, sandboxName, plan, handler, log);
    } catch (err) {
      return { ok: false, reason: errorMessage(err) };
    }

    if (executionResult.state === WorkflowState.FAILED) {
      return { ok: false, reason: executionResult.error ?? "plan execution failed" };
    }

    log.info("Agent started", { tasks: names(group.tasks), retryCount: group.retryCount });
    return {
      ok: true,
      handle: {
        id: agentId,
        taskGroup: group.tasks,
        sandboxName: decision.target === Target.LOCAL ? undefined : sandboxName,
        startedAt: Date.now(),
        retryCount: group.retryCount,
        executionResult,
        handler,
      },
    };
  }

  private async executePlan(
    agentId: string,
    sandboxName: string,
    plan: WorkflowPlan,
    handler: StepHandler,
    log: Logger,
  ): Promise<ExecutionResult> {
    const store = this.checkpointStore;
    if (store === undefined) {
      return new StepExecutor(handler, { logger: log }).run(plan);
    }

    await store.savePlan(agentId, plan);
    let persisted: WorkflowCheckpoint = createCheckpoint(agentId, sandboxName, "");
    const executor = new StepExecutor(handler, {
      logger: log,
      onCheckpoint: async (checkpoint) => {
        persisted = updateCheckpoint(persisted, {
          currentState: checkpoint.state,
          completedSteps: checkpoint.completedSteps,
        });
        await store.saveCheckpoint(persisted);
      },
    });

    const result = await executor.run(plan);
    const worktreePath = result.stepOutputs["create_worktree"]?.["worktree_path"];
    persisted = {
      ...updateCheckpoint(persisted, { currentState: result.state, completedSteps: result.completedSteps }),
      worktreePath: typeof worktreePath === "string" ? worktreePath : persisted.worktreePath,
    };
    await store.saveCheckpoint(persisted);
    return result;
  }

  // -----------------------------------------------------------------------
  // Monitoring
  // -----------------------------------------------------------------------

  private async checkAgentStatus(handle: AgentHandle, target: Target): Promise<AgentStatus> {
    // A local agent is done once its plan has run.
    if (target === Target.LOCAL || handle.sandboxName === undefined) {
      return AgentStatus.COMPLETED;
    }

    const sandboxName = handle.sandboxName;
    const probe = handle.handler.probeAgent?.bind(handle.handler);
    if (probe === undefined) {
      if (!this.probeWarned.has(handle.id)) {
        this.probeWarned.add(handle.id);
        this.logger.warn("Step handler cannot probe agents; treating as running", { agentId: handle.id });
      }
      return AgentStatus.RUNNING;
    }

    try {
      const result = await runEffectPromise(
        withTimeout(
          Effect.tryPromise({ try: () => probe(sandboxName), catch: (err) => err }),
          this.probeTimeoutMs,
          () => new ProbeTimeoutError(sandboxName, this.probeTimeoutMs),
        ),
      );
      return statusFromProbe(result);
    } catch (err) {
      this.logger.warn("Agent status probe failed", { agentId: handle.id, error: errorMessage(err) });
      return AgentStatus.RUNNING;
    }
  }

  /** Returns true when the run should stop spawning. */
  private async handleFailure(
    handle: AgentHandle,
    result: OrchestratorResult,
    pending: PendingGroup[],
  ): Promise<boolean> {
    if (this.failurePolicy === FailurePolicy.RETRY && handle.retryCount < this.maxRetries) {
      pending.push({ tasks: handle.taskGroup, retryCount: handle.retryCount + 1 });
      return false;
    }

    const taskNames = names(handle.taskGroup);
    result.failedTasks.push(...taskNames);
    result.errors.push(`Agent ${handle.id} failed (tasks: ${taskNames.join(", ")})`);
    await this.markTasks(handle.taskGroup, TaskStatus.FAILED, result);
    return this.failurePolicy === FailurePolicy.ABORT;
  }

  // -----------------------------------------------------------------------
  // Task source
  // -----------------------------------------------------------------------

  private async markTasks(tasks: readonly TaskInfo[], status: TaskStatus, result: OrchestratorResult): Promise<void> {
    const source = this.taskSource;
    if (source === undefined) return;
    for (const task of tasks) {
      try {
        await source.updateStatus(task.name, status);
      } catch (err) {
        result.errors.push(`Failed to update task ${task.name}: ${errorMessage(err)}`);
        this.logger.error("Task status update failed", { task: task.name, status, error: errorMessage(err) });
      }
    }
  }

  /** Each ready task not seen before becomes its own group. */
  private async findNewlyUnblocked(known: Set<string>, result: OrchestratorResult): Promise<PendingGroup[]> {
    const source = this.taskSource;
    if (source === undefined) return [];

    let ready: Task[];
    try {
      ready = await source.getReadyTasks();
    } catch (err) {
      result.errors.push(`Failed to query ready tasks: ${errorMessage(err)}`);
      this.logger.error("Ready task query failed", { error: errorMessage(err) });
      return [];
    }

    const groups: PendingGroup[] = [];
    for (const task of ready) {
      if (known.has(task.taskId)) continue;
      known.add(task.taskId);
      groups.push({ tasks: [taskInfoFromTask(task)], retryCount: 0 });
    }
    if (groups.length > 0) {
      this.logger.info("Discovered newly ready tasks", { tasks: groups.flatMap((g) => names(g.tasks)) });
    }
    return groups;
  }
}
