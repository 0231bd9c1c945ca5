import { describe, it, expect } from "vitest";
import { StepExecutor } from "../../../src/workflow/executor.js";
import { WorkflowPlan } from "../../../src/workflow/plan.js";
import { Planner } from "../../../src/workflow/planner.js";
import { WorkflowState } from "../../../src/workflow/state-machine.js";
import { Target, makeStep } from "../../../src/workflow/types.js";
import type { Checkpoint } from "../../../src/workflow/types.js";
import { ScriptedStepHandler } from "../../helpers/fixtures.js";

const SANDBOX_STEPS = [
  "validate_repo",
  "create_worktree",
  "prepare_sandbox",
  "authenticate",
  "initialize_state",
  "start_agent",
];

function plannedFor(target: Target): WorkflowPlan {
  return new Planner().createPlan({ repo: "/tmp/example", task: "Fix the flaky test", target });
}

describe("StepExecutor", () => {
  // -------------------------------------------------------------------------
  // Happy paths
  // -------------------------------------------------------------------------

  describe("successful runs", () => {
    it("runs a sandbox plan to AGENT_RUNNING", async () => {
      const handler = new ScriptedStepHandler();
      const executor = new StepExecutor(handler);

      const result = await executor.run(plannedFor(Target.SANDBOX));

      expect(result.state).toBe(WorkflowState.AGENT_RUNNING);
      expect(result.completedSteps).toEqual(SANDBOX_STEPS);
      expect(result.failedStep).toBeUndefined();
      expect(result.error).toBeUndefined();
      expect(handler.calls.map((c) => c.stepId)).toEqual(SANDBOX_STEPS);
      expect(executor.state).toBe(WorkflowState.AGENT_RUNNING);
    });

    it("walks past sandbox states for a local plan", async () => {
      const executor = new StepExecutor(new ScriptedStepHandler());

      const result = await executor.run(plannedFor(Target.LOCAL));

      expect(result.state).toBe(WorkflowState.AGENT_RUNNING);
      expect(result.completedSteps).toEqual([
        "validate_repo",
        "create_worktree",
        "initialize_state",
        "start_agent",
      ]);
      expect(executor.checkpoints.map((c) => c.state)).toEqual([
        WorkflowState.ENSURING_REPO,
        WorkflowState.CREATING_WORKTREE,
        WorkflowState.INITIALIZING_STATE,
        WorkflowState.STARTING_AGENT,
      ]);
    });

    it("runs a container plan through PREPARING_SANDBOX", async () => {
      const executor = new StepExecutor(new ScriptedStepHandler());
      const result = await executor.run(plannedFor(Target.CONTAINER));

      expect(result.state).toBe(WorkflowState.AGENT_RUNNING);
      expect(executor.checkpoints[2]?.state).toBe(WorkflowState.PREPARING_SANDBOX);
    });

    it("stays in the last step's state when the plan has no start_agent", async () => {
      const executor = new StepExecutor(new ScriptedStepHandler());
      const plan = new WorkflowPlan([makeStep("v", "validate_repo")]);

      const result = await executor.run(plan);

      expect(result.state).toBe(WorkflowState.ENSURING_REPO);
      expect(result.completedSteps).toEqual(["v"]);
    });

    it("leaves an empty plan in INIT", async () => {
      const result = await new StepExecutor(new ScriptedStepHandler()).run(new WorkflowPlan());
      expect(result.state).toBe(WorkflowState.INIT);
      expect(result.completedSteps).toEqual([]);
    });
  });

  // -------------------------------------------------------------------------
  // Failures
  // -------------------------------------------------------------------------

  describe("failures", () => {
    it("stops at the first failed step", async () => {
      const handler = new ScriptedStepHandler({ failActions: ["prepare_sandbox"] });
      const executor = new StepExecutor(handler);

      const result = await executor.run(plannedFor(Target.SANDBOX));

      expect(result.state).toBe(WorkflowState.FAILED);
      expect(result.completedSteps).toEqual(["validate_repo", "create_worktree"]);
      expect(result.failedStep).toBe("prepare_sandbox");
      expect(result.error).toBe("prepare_sandbox failed");
      expect(result.stepResults["prepare_sandbox"]?.success).toBe(false);
      expect(result.stepResults["authenticate"]).toBeUndefined();
      expect(handler.calls).toHaveLength(3);
      expect(executor.state).toBe(WorkflowState.FAILED);
    });

    it("turns a throwing handler into a failed step", async () => {
      const handler = new ScriptedStepHandler({ throwActions: ["create_worktree"] });
      const result = await new StepExecutor(handler).run(plannedFor(Target.LOCAL));

      expect(result.state).toBe(WorkflowState.FAILED);
      expect(result.failedStep).toBe("create_worktree");
      expect(result.error).toBe("create_worktree exploded");
      expect(result.completedSteps).toEqual(["validate_repo"]);
    });

    it("fails on an unknown action without calling the handler", async () => {
      const handler = new ScriptedStepHandler();
      const plan = new WorkflowPlan([makeStep("a", "frobnicate")]);

      const result = await new StepExecutor(handler).run(plan);

      expect(result.state).toBe(WorkflowState.FAILED);
      expect(result.failedStep).toBe("a");
      expect(result.error).toBe("Unknown action: frobnicate");
      expect(handler.calls).toEqual([]);
    });

    it("fails when an action would move the state backwards", async () => {
      const plan = new WorkflowPlan([
        makeStep("a", "create_worktree"),
        makeStep("b", "validate_repo", {}, ["a"]),
      ]);

      const result = await new StepExecutor(new ScriptedStepHandler()).run(plan);

      expect(result.state).toBe(WorkflowState.FAILED);
      expect(result.completedSteps).toEqual(["a"]);
      expect(result.failedStep).toBe("b");
      expect(result.error).toBe("Cannot transition from CREATING_WORKTREE to ENSURING_REPO");
    });

    it("fails without a handler", async () => {
      const result = await new StepExecutor().run(plannedFor(Target.SANDBOX));

      expect(result.state).toBe(WorkflowState.FAILED);
      expect(result.error).toBe("No step handler configured");
      expect(result.failedStep).toBeUndefined();
      expect(result.completedSteps).toEqual([]);
    });

    it("fails an invalid plan before running anything", async () => {
      const handler = new ScriptedStepHandler();
      const plan = new WorkflowPlan([makeStep("a", "validate_repo", {}, ["x"])]);

      const result = await new StepExecutor(handler).run(plan);

      expect(result.state).toBe(WorkflowState.FAILED);
      expect(result.error).toBe("Invalid plan: Step 'a' depends on unknown step 'x'");
      expect(handler.calls).toEqual([]);
    });
  });

  // -------------------------------------------------------------------------
  // Outputs and checkpoints
  // -------------------------------------------------------------------------

  describe("step outputs", () => {
    it("passes earlier outputs to later steps", async () => {
      const handler = new ScriptedStepHandler({
        data: {
          validate_repo: { repo_path: "/tmp/example" },
          create_worktree: { worktree_path: "/tmp/example-agent" },
        },
      });

      const result = await new StepExecutor(handler).run(plannedFor(Target.LOCAL));

      expect(handler.calls[0]?.outputs).toEqual({});
      expect(handler.calls[1]?.outputs).toEqual({ validate_repo: { repo_path: "/tmp/example" } });
      expect(handler.calls[2]?.outputs).toEqual({
        validate_repo: { repo_path: "/tmp/example" },
        create_worktree: { worktree_path: "/tmp/example-agent" },
      });
      expect(Object.keys(result.stepOutputs)).toEqual(["validate_repo", "create_worktree"]);
    });
  });

  describe("checkpoints", () => {
    it("records one checkpoint per executed step", async () => {
      const handler = new ScriptedStepHandler({ failActions: ["prepare_sandbox"] });
      const executor = new StepExecutor(handler);

      await executor.run(plannedFor(Target.SANDBOX));

      const checkpoints = executor.checkpoints;
      expect(checkpoints.map((c) => [c.stepId, c.success])).toEqual([
        ["validate_repo", true],
        ["create_worktree", true],
        ["prepare_sandbox", false],
      ]);
      expect(checkpoints[0]?.completedSteps).toEqual([]);
      expect(checkpoints[2]?.completedSteps).toEqual(["validate_repo", "create_worktree"]);
      expect(checkpoints[2]?.state).toBe(WorkflowState.PREPARING_SANDBOX);
    });

    it("hands every checkpoint to the listener and awaits it", async () => {
      const seen: Checkpoint[] = [];
      const executor = new StepExecutor(new ScriptedStepHandler(), {
        onCheckpoint: async (checkpoint) => {
          await Promise.resolve();
          seen.push(checkpoint);
        },
      });

      await executor.run(plannedFor(Target.LOCAL));

      expect(seen.map((c) => c.stepId)).toEqual([
        "validate_repo",
        "create_worktree",
        "initialize_state",
        "start_agent",
      ]);
      expect(seen[3]?.completedSteps).toEqual(["validate_repo", "create_worktree", "initialize_state"]);
    });

    it("returns copies from the checkpoints getter", async () => {
      const executor = new StepExecutor(new ScriptedStepHandler());
      await executor.run(plannedFor(Target.LOCAL));

      const first = executor.checkpoints;
      first[1]?.completedSteps.push("tampered");
      expect(executor.checkpoints[1]?.completedSteps).toEqual(["validate_repo"]);
    });
  });
});
