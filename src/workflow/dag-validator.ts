import type { WorkflowStep } from "./types.js";

export interface ValidationError {
  stepId?: string;
  field: "id" | "depends_on";
  message: string;
}

/**
 * Validate the structure of a step list.
 * Returns an array of validation errors (empty array means valid).
 *
 * Duplicate ids and unknown dependencies are both reported so every
 * structural problem surfaces at once; cycle detection only runs over an
 * otherwise well-formed graph.
 */
export function validateSteps(steps: readonly WorkflowStep[]): ValidationError[] {
  const errors: ValidationError[] = [
    ...findDuplicateIds(steps),
    ...findMissingDependencies(steps),
  ];

  if (errors.length === 0) {
    const cycle = findCycle(steps);
    if (cycle) {
      errors.push({
        field: "depends_on",
        message: `Dependency cycle detected: ${cycle.join(" -> ")}`,
      });
    }
  }

  return errors;
}

function findDuplicateIds(steps: readonly WorkflowStep[]): ValidationError[] {
  const errors: ValidationError[] = [];
  const seen = new Set<string>();
  for (const step of steps) {
    if (seen.has(step.id)) {
      errors.push({ stepId: step.id, field: "id", message: `Duplicate step ID: ${step.id}` });
    }
    seen.add(step.id);
  }
  return errors;
}

function findMissingDependencies(steps: readonly WorkflowStep[]): ValidationError[] {
  const errors: ValidationError[] = [];
  const ids = new Set(steps.map((s) => s.id));
  for (const step of steps) {
    for (const dep of step.depends_on) {
      if (!ids.has(dep)) {
        errors.push({
          stepId: step.id,
          field: "depends_on",
          message: `Step '${step.id}' depends on unknown step '${dep}'`,
        });
      }
    }
  }
  return errors;
}

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;
type Color = typeof WHITE | typeof GRAY | typeof BLACK;

/**
 * Three-colour DFS over dependency edges. Returns some cycle (not
 * necessarily the shortest) as a list of step ids, or null when acyclic.
 */
export function findCycle(steps: readonly WorkflowStep[]): string[] | null {
  const byId = new Map<string, WorkflowStep>();
  const color = new Map<string, Color>();
  const parent = new Map<string, string | null>();
  for (const step of steps) {
    byId.set(step.id, step);
    color.set(step.id, WHITE);
    parent.set(step.id, null);
  }

  const dfs = (node: string): string[] | null => {
    color.set(node, GRAY);
    for (const dep of byId.get(node)?.depends_on ?? []) {
      const depColor = color.get(dep);
      if (depColor === undefined) continue;

      if (depColor === GRAY) {
        if (dep === node) return [node, node];
        // Walk parent pointers from `node` back to `dep`.
        const cycle = [dep, node];
        let current = node;
        let up = parent.get(current) ?? null;
        while (up !== null && up !== dep) {
          current = up;
          cycle.push(current);
          up = parent.get(current) ?? null;
        }
        return cycle.reverse();
      }

      if (depColor === WHITE) {
        parent.set(dep, node);
        const found = dfs(dep);
        if (found) return found;
      }
    }
    color.set(node, BLACK);
    return null;
  };

  for (const step of steps) {
    if (color.get(step.id) === WHITE) {
      const found = dfs(step.id);
      if (found) return found;
    }
  }
  return null;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Kahn's algorithm with a lexicographic tie-break: among all ready steps the
 * smallest id is always taken next, so independent steps order by id.
 * Assumes the steps already passed validateSteps().
 */
export function topologicalOrder(steps: readonly WorkflowStep[]): WorkflowStep[] {
  const byId = new Map<string, WorkflowStep>();
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const step of steps) {
    byId.set(step.id, step);
    inDegree.set(step.id, 0);
    dependents.set(step.id, []);
  }

  for (const step of steps) {
    for (const dep of step.depends_on) {
      inDegree.set(step.id, (inDegree.get(step.id) ?? 0) + 1);
      dependents.get(dep)?.push(step.id);
    }
  }

  const ready: string[] = [];
  for (const [id, degree] of inDegree) {
    if (degree === 0) ready.push(id);
  }
  ready.sort(compareIds);

  const order: WorkflowStep[] = [];
  let current = ready.shift();
  while (current !== undefined) {
    const step = byId.get(current);
    if (step) order.push(step);

    for (const dependent of dependents.get(current) ?? []) {
      const degree = (inDegree.get(dependent) ?? 1) - 1;
      inDegree.set(dependent, degree);
      if (degree === 0) {
        ready.push(dependent);
        ready.sort(compareIds);
      }
    }
    current = ready.shift();
  }

  return order;
}
