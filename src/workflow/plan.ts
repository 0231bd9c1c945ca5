import type { PlanMetadata, WorkflowStep } from "./types.js";
import { topologicalOrder, validateSteps, type ValidationError } from "./dag-validator.js";

export interface PlanDict {
  steps: Array<{
    id: string;
    action: string;
    params: Record<string, unknown>;
    depends_on: string[];
  }>;
  metadata: PlanMetadata;
}

export class PlanValidationError extends Error {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Invalid plan: ${errors.join("; ")}`);
    this.name = "PlanValidationError";
    this.errors = errors;
  }
}

/**
 * A DAG of workflow steps plus free-form metadata.
 *
 * The plan is validated once and then queried for its execution order;
 * executors track progress outside of it.
 */
export class WorkflowPlan {
  private readonly _steps: WorkflowStep[];
  private readonly stepById = new Map<string, WorkflowStep>();
  readonly metadata: PlanMetadata;

  constructor(steps: readonly WorkflowStep[] = [], metadata: PlanMetadata = {}) {
    this._steps = [...steps];
    this.metadata = { ...metadata };
    for (const step of this._steps) {
      this.stepById.set(step.id, step);
    }
  }

  get steps(): readonly WorkflowStep[] {
    return this._steps;
  }

  getStep(stepId: string): WorkflowStep | undefined {
    return this.stepById.get(stepId);
  }

  addStep(step: WorkflowStep): void {
    this._steps.push(step);
    this.stepById.set(step.id, step);
  }

  validationErrors(): ValidationError[] {
    return validateSteps(this._steps);
  }

  /** Human-readable validation errors; empty when the plan is valid. */
  validate(): string[] {
    return this.validationErrors().map((e) => e.message);
  }

  /** Steps in dependency order. Throws PlanValidationError on an invalid plan. */
  executionOrder(): WorkflowStep[] {
    const errors = this.validate();
    if (errors.length > 0) {
      throw new PlanValidationError(errors);
    }
    return topologicalOrder(this._steps);
  }

  toDict(): PlanDict {
    return {
      steps: this._steps.map((step) => ({
        id: step.id,
        action: step.action,
        params: { ...step.params },
        depends_on: [...step.depends_on],
      })),
      metadata: { ...this.metadata },
    };
  }

  toJSON(): PlanDict {
    return this.toDict();
  }
}
