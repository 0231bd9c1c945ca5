import type { Logger } from "../core/observability.js";
import { errorMessage, isoNow } from "../types/index.js";
import type { WorkflowPlan } from "./plan.js";
import {
  InvalidTransitionError,
  WorkflowState,
  stateForAction,
  transitionPath,
} from "./state-machine.js";
import type {
  Checkpoint,
  ExecutionResult,
  StepData,
  StepResult,
  WorkflowStep,
} from "./types.js";
import { stepFailed } from "./types.js";

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

/** Outputs of earlier steps, keyed by step id. */
export interface ExecutionContext {
  readonly stepOutputs: Readonly<Record<string, StepData>>;
}

export interface AgentProbeResult {
  exitCode: number;
  output: string;
}

export interface StepHandler {
  execute(step: WorkflowStep, context: ExecutionContext): Promise<StepResult>;

  /**
   * Optional status check for an agent running in a sandbox or container.
   * A non-zero exit code means the agent has not finished yet.
   */
  probeAgent?(sandboxName: string): Promise<AgentProbeResult>;
}

export type CheckpointListener = (checkpoint: Checkpoint) => void | Promise<void>;

export interface StepExecutorOptions {
  onCheckpoint?: CheckpointListener;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// StepExecutor
// ---------------------------------------------------------------------------

/**
 * Drives a plan's steps, in execution order, through the workflow state
 * machine. One executor runs one plan; build a fresh one per run.
 */
export class StepExecutor {
  private _state: WorkflowState = WorkflowState.INIT;
  private readonly _checkpoints: Checkpoint[] = [];
  private readonly stepOutputs: Record<string, StepData> = {};
  private readonly onCheckpoint?: CheckpointListener;
  private readonly logger?: Logger;

  constructor(
    private readonly handler?: StepHandler,
    options: StepExecutorOptions = {},
  ) {
    this.onCheckpoint = options.onCheckpoint;
    this.logger = options.logger;
  }

  get state(): WorkflowState {
    return this._state;
  }

  get checkpoints(): Checkpoint[] {
    return this._checkpoints.map((c) => ({ ...c, completedSteps: [...c.completedSteps] }));
  }

  async run(plan: WorkflowPlan): Promise<ExecutionResult> {
    const result: ExecutionResult = {
      state: WorkflowState.INIT,
      completedSteps: [],
      stepResults: {},
      stepOutputs: this.stepOutputs,
    };

    const errors = plan.validate();
    if (errors.length > 0) {
      return this.fail(result, undefined, `Invalid plan: ${errors.join("; ")}`);
    }

    if (!this.handler) {
      return this.fail(result, undefined, "No step handler configured");
    }

    const context: ExecutionContext = { stepOutputs: this.stepOutputs };

    for (const step of plan.executionOrder()) {
      const target = stateForAction(step.action);
      if (target === undefined) {
        return this.fail(result, step.id, `Unknown action: ${step.action}`);
      }

      try {
        this.advanceTo(target);
      } catch (err) {
        if (err instanceof InvalidTransitionError) {
          return this.fail(result, step.id, err.message);
        }
        throw err;
      }

      const stepResult = await this.invoke(this.handler, step, context);
      result.stepResults[step.id] = stepResult;
      await this.saveCheckpoint(step, stepResult, result.completedSteps);

      if (!stepResult.success) {
        this.logger?.warn("Step failed", { stepId: step.id, error: stepResult.message });
        return this.fail(result, step.id, stepResult.message);
      }

      result.completedSteps.push(step.id);
      if (Object.keys(stepResult.data).length > 0) {
        this.stepOutputs[step.id] = { ...stepResult.data };
      }
    }

    // "Agent started" is the natural end of a plan; waiting for the agent
    // to finish is the orchestrator's job.
    if (this._state === WorkflowState.STARTING_AGENT) {
      this.advanceTo(WorkflowState.AGENT_RUNNING);
    }

    result.state = this._state;
    return result;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private advanceTo(target: WorkflowState): void {
    for (const state of transitionPath(this._state, target)) {
      this.logger?.debug("State transition", { from: this._state, to: state });
      this._state = state;
    }
  }

  private async invoke(
    handler: StepHandler,
    step: WorkflowStep,
    context: ExecutionContext,
  ): Promise<StepResult> {
    try {
      return await handler.execute(step, context);
    } catch (err) {
      return stepFailed(step.id, errorMessage(err));
    }
  }

  private async saveCheckpoint(
    step: WorkflowStep,
    stepResult: StepResult,
    completed: readonly string[],
  ): Promise<void> {
    const checkpoint: Checkpoint = {
      stepId: step.id,
      state: this._state,
      success: stepResult.success,
      completedSteps: [...completed],
      timestamp: isoNow(),
    };
    this._checkpoints.push(checkpoint);
    if (this.onCheckpoint) {
      await this.onCheckpoint(checkpoint);
    }
  }

  private fail(result: ExecutionResult, stepId: string | undefined, error: string): ExecutionResult {
    this._state = WorkflowState.FAILED;
    result.state = WorkflowState.FAILED;
    if (stepId !== undefined) result.failedStep = stepId;
    result.error = error;
    return result;
  }
}
