import type { WorkflowState } from "./state-machine.js";

// ---------------------------------------------------------------------------
// Execution mode / target
// ---------------------------------------------------------------------------

export enum Mode {
  INTERACTIVE = "interactive",
  AUTONOMOUS = "autonomous",
}

export enum Target {
  SANDBOX = "sandbox",
  CONTAINER = "container",
  LOCAL = "local",
}

export function parseMode(value: string): Mode | undefined {
  return Object.values(Mode).find((m) => m === value);
}

export function parseTarget(value: string): Target | undefined {
  return Object.values(Target).find((t) => t === value);
}

// ---------------------------------------------------------------------------
// Plan shape (wire-compatible field names)
// ---------------------------------------------------------------------------

export type StepParams = Record<string, unknown>;
export type PlanMetadata = Record<string, unknown>;
export type StepData = Record<string, unknown>;

export interface WorkflowStep {
  readonly id: string;
  readonly action: string;
  readonly params: StepParams;
  readonly depends_on: readonly string[];
}

export function makeStep(
  id: string,
  action: string,
  params: StepParams = {},
  dependsOn: readonly string[] = [],
): WorkflowStep {
  return { id, action, params: { ...params }, depends_on: [...dependsOn] };
}

// ---------------------------------------------------------------------------
// Execution results
// ---------------------------------------------------------------------------

export interface StepResult {
  success: boolean;
  step_id: string;
  message: string;
  data: StepData;
}

export function stepSucceeded(stepId: string, data: StepData = {}, message = ""): StepResult {
  return { success: true, step_id: stepId, message, data };
}

export function stepFailed(stepId: string, message: string): StepResult {
  return { success: false, step_id: stepId, message, data: {} };
}

export interface Checkpoint {
  stepId: string;
  state: WorkflowState;
  success: boolean;
  completedSteps: string[];
  timestamp: string;
}

export interface ExecutionResult {
  state: WorkflowState;
  completedSteps: string[];
  failedStep?: string;
  error?: string;
  stepResults: Record<string, StepResult>;
  stepOutputs: Record<string, StepData>;
}
