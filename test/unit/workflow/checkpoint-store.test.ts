import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import {
  CheckpointFormatError,
  CheckpointStore,
  createCheckpoint,
  updateCheckpoint,
} from "../../../src/workflow/checkpoint-store.js";
import { WorkflowPlan } from "../../../src/workflow/plan.js";
import { WorkflowState } from "../../../src/workflow/state-machine.js";
import { makeStep } from "../../../src/workflow/types.js";
import { makeTempDir, removeDir } from "../../helpers/fixtures.js";

describe("checkpoint helpers", () => {
  it("creates an INIT checkpoint with matching timestamps", () => {
    const cp = createCheckpoint("wf-1", "sandbox-1", "/tmp/wt");
    expect(cp.currentState).toBe(WorkflowState.INIT);
    expect(cp.completedSteps).toEqual([]);
    expect(cp.createdAt).toBe(cp.updatedAt);
  });

  it("updates state and steps without touching the original", () => {
    const cp = createCheckpoint("wf-1", "sandbox-1", "/tmp/wt");
    const next = updateCheckpoint(cp, {
      currentState: WorkflowState.CREATING_WORKTREE,
      completedSteps: ["validate_repo"],
    });

    expect(next.currentState).toBe(WorkflowState.CREATING_WORKTREE);
    expect(next.completedSteps).toEqual(["validate_repo"]);
    expect(next.createdAt).toBe(cp.createdAt);
    expect(cp.currentState).toBe(WorkflowState.INIT);
    expect(cp.completedSteps).toEqual([]);
  });
});

describe("CheckpointStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("saves and loads a checkpoint", async () => {
    const store = new CheckpointStore(path.join(dir, "nested", "checkpoints"));
    const cp = updateCheckpoint(createCheckpoint("wf-1", "sandbox-1", "/tmp/wt"), {
      currentState: WorkflowState.AUTHENTICATING,
      completedSteps: ["validate_repo", "create_worktree", "prepare_sandbox"],
    });

    await store.saveCheckpoint(cp);

    expect(await store.exists("wf-1")).toBe(true);
    expect(await store.loadCheckpoint("wf-1")).toEqual(cp);
  });

  it("returns null for unknown workflows", async () => {
    const store = new CheckpointStore(dir);
    expect(await store.exists("nope")).toBe(false);
    expect(await store.loadCheckpoint("nope")).toBeNull();
    expect(await store.loadPlan("nope")).toBeNull();
  });

  it("saves and loads a plan", async () => {
    const store = new CheckpointStore(dir);
    const plan = new WorkflowPlan([makeStep("a", "validate_repo"), makeStep("b", "start_agent", {}, ["a"])], {
      task: "t",
    });

    await store.savePlan("wf-1", plan);
    const loaded = await store.loadPlan("wf-1");

    expect(loaded?.toDict()).toEqual(plan.toDict());
  });

  it("rejects corrupt checkpoint files", async () => {
    const store = new CheckpointStore(dir);
    await writeFile(path.join(dir, "bad.checkpoint.json"), "{not json");
    await expect(store.loadCheckpoint("bad")).rejects.toBeInstanceOf(CheckpointFormatError);
  });

  it("rejects checkpoints with an unknown state", async () => {
    const store = new CheckpointStore(dir);
    const file = path.join(dir, "odd.checkpoint.json");
    await writeFile(
      file,
      JSON.stringify({
        workflowId: "odd",
        currentState: "NOPE",
        completedSteps: [],
        sandboxName: "",
        worktreePath: "",
        createdAt: "",
        updatedAt: "",
      }),
    );
    await expect(store.loadCheckpoint("odd")).rejects.toThrow(`Invalid checkpoint ${file}: unknown state "NOPE"`);
  });

  it("refuses workflow ids that escape the directory", async () => {
    const store = new CheckpointStore(dir);
    await expect(store.loadCheckpoint("../escape")).rejects.toThrow("Invalid workflow id: ../escape");
  });
});
