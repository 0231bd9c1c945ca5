import { mkdir, readFile, rename, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { isRecord, isoNow } from "../types/index.js";
import { WorkflowState } from "./state-machine.js";
import type { WorkflowPlan } from "./plan.js";
import { parsePlan, serializePlan } from "./plan-codec.js";

export interface WorkflowCheckpoint {
  workflowId: string;
  currentState: WorkflowState;
  completedSteps: string[];
  sandboxName: string;
  worktreePath: string;
  createdAt: string;
  updatedAt: string;
}

export class CheckpointFormatError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Invalid checkpoint ${filePath}: ${message}`);
    this.name = "CheckpointFormatError";
    this.filePath = filePath;
  }
}

export function createCheckpoint(
  workflowId: string,
  sandboxName: string,
  worktreePath: string,
): WorkflowCheckpoint {
  const ts = isoNow();
  return {
    workflowId,
    currentState: WorkflowState.INIT,
    completedSteps: [],
    sandboxName,
    worktreePath,
    createdAt: ts,
    updatedAt: ts,
  };
}

/** Returns a copy with the given fields replaced and `updatedAt` refreshed. */
export function updateCheckpoint(
  checkpoint: WorkflowCheckpoint,
  changes: { currentState?: WorkflowState; completedSteps?: string[] },
): WorkflowCheckpoint {
  return {
    ...checkpoint,
    currentState: changes.currentState ?? checkpoint.currentState,
    completedSteps: changes.completedSteps ? [...changes.completedSteps] : [...checkpoint.completedSteps],
    updatedAt: isoNow(),
  };
}

function parseState(value: unknown): WorkflowState | undefined {
  return Object.values(WorkflowState).find((s) => s === value);
}

function checkpointFromJson(filePath: string, data: unknown): WorkflowCheckpoint {
  if (!isRecord(data)) {
    throw new CheckpointFormatError(filePath, "root must be an object");
  }
  const state = parseState(data["currentState"]);
  if (state === undefined) {
    throw new CheckpointFormatError(filePath, `unknown state "${String(data["currentState"])}"`);
  }
  const completed = data["completedSteps"];
  if (!Array.isArray(completed) || !completed.every((s): s is string => typeof s === "string")) {
    throw new CheckpointFormatError(filePath, `"completedSteps" must be a string array`);
  }
  const strings = ["workflowId", "sandboxName", "worktreePath", "createdAt", "updatedAt"] as const;
  const fields: Record<(typeof strings)[number], string> = {
    workflowId: "",
    sandboxName: "",
    worktreePath: "",
    createdAt: "",
    updatedAt: "",
  };
  for (const key of strings) {
    const value = data[key];
    if (typeof value !== "string") {
      throw new CheckpointFormatError(filePath, `"${key}" must be a string`);
    }
    fields[key] = value;
  }
  return { ...fields, currentState: state, completedSteps: completed };
}

/**
 * File-backed store for workflow checkpoints and the plans they belong to.
 * Writes go through a temp file and rename so readers never see partial JSON.
 */
export class CheckpointStore {
  constructor(private readonly dir: string) {}

  async saveCheckpoint(checkpoint: WorkflowCheckpoint): Promise<void> {
    await this.writeAtomic(this.checkpointPath(checkpoint.workflowId), JSON.stringify(checkpoint, null, 2));
  }

  async loadCheckpoint(workflowId: string): Promise<WorkflowCheckpoint | null> {
    const filePath = this.checkpointPath(workflowId);
    const raw = await this.readIfExists(filePath);
    if (raw === null) return null;
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (e) {
      throw new CheckpointFormatError(filePath, e instanceof Error ? e.message : String(e));
    }
    return checkpointFromJson(filePath, data);
  }

  async exists(workflowId: string): Promise<boolean> {
    try {
      await stat(this.checkpointPath(workflowId));
      return true;
    } catch {
      return false;
    }
  }

  async savePlan(workflowId: string, plan: WorkflowPlan): Promise<void> {
    await this.writeAtomic(this.planPath(workflowId), serializePlan(plan));
  }

  async loadPlan(workflowId: string): Promise<WorkflowPlan | null> {
    const raw = await this.readIfExists(this.planPath(workflowId));
    return raw === null ? null : parsePlan(raw);
  }

  // -----------------------------------------------------------------------
  // Path helpers
  // -----------------------------------------------------------------------

  private checkpointPath(workflowId: string): string {
    return path.join(this.dir, `${safeSegment(workflowId)}.checkpoint.json`);
  }

  private planPath(workflowId: string): string {
    return path.join(this.dir, `${safeSegment(workflowId)}.plan.json`);
  }

  private async readIfExists(filePath: string): Promise<string | null> {
    try {
      return await readFile(filePath, "utf-8");
    } catch (err) {
      if (isRecord(err) && err["code"] === "ENOENT") return null;
      throw err;
    }
  }

  private async writeAtomic(filePath: string, content: string): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.${process.pid}.tmp`;
    await writeFile(tmp, content);
    await rename(tmp, filePath);
  }
}

function safeSegment(id: string): string {
  if (id === "" || id.includes("..") || id.includes("/") || id.includes("\\")) {
    throw new Error(`Invalid workflow id: ${id}`);
  }
  return id;
}
