import { isRecord } from "../types/index.js";
import { WorkflowPlan } from "./plan.js";
import type { WorkflowStep } from "./types.js";

export class PlanParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanParseError";
  }
}

function assertString(value: unknown, field: string): asserts value is string {
  if (typeof value !== "string" || value === "") {
    throw new PlanParseError(`"${field}" must be a non-empty string`);
  }
}

function optionalRecord(value: unknown, field: string): Record<string, unknown> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new PlanParseError(`"${field}" must be an object`);
  }
  return value;
}

function optionalStringArray(value: unknown, field: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new PlanParseError(`"${field}" must be an array`);
  }
  const out: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string") {
      throw new PlanParseError(`"${field}" must contain only strings`);
    }
    out.push(entry);
  }
  return out;
}

function stepFromDict(raw: unknown, index: number): WorkflowStep {
  const field = `steps[${index}]`;
  if (!isRecord(raw)) {
    throw new PlanParseError(`"${field}" must be an object`);
  }
  assertString(raw["id"], `${field}.id`);
  assertString(raw["action"], `${field}.action`);
  return {
    id: raw["id"],
    action: raw["action"],
    params: optionalRecord(raw["params"], `${field}.params`),
    depends_on: optionalStringArray(raw["depends_on"], `${field}.depends_on`),
  };
}

/**
 * Build a plan from its dictionary form:
 * `{"steps": [{"id", "action", "params", "depends_on"}], "metadata": {}}`.
 * The result is not validated as a DAG; call `validate()` for that.
 */
export function planFromDict(data: unknown): WorkflowPlan {
  if (!isRecord(data)) {
    throw new PlanParseError(`plan must be an object`);
  }
  const rawSteps = data["steps"] ?? [];
  if (!Array.isArray(rawSteps)) {
    throw new PlanParseError(`"steps" must be an array`);
  }
  const steps = rawSteps.map((raw: unknown, i) => stepFromDict(raw, i));
  return new WorkflowPlan(steps, optionalRecord(data["metadata"], "metadata"));
}

export function parsePlan(json: string): WorkflowPlan {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    throw new PlanParseError(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return planFromDict(parsed);
}

export function serializePlan(plan: WorkflowPlan): string {
  return JSON.stringify(plan.toDict(), null, 2);
}
