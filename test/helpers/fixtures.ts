import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { CommandOptions, CommandResult, CommandRunner } from "../../src/backends/command-runner.js";
import type { AgentProbeResult, ExecutionContext, StepHandler } from "../../src/workflow/executor.js";
import type { StepData, StepParams, StepResult, WorkflowStep } from "../../src/workflow/types.js";
import { stepFailed, stepSucceeded } from "../../src/workflow/types.js";

// ---------------------------------------------------------------------------
// ScriptedStepHandler
// ---------------------------------------------------------------------------

export interface ScriptedStepHandlerOptions {
  /** Actions that return a failed StepResult. */
  failActions?: readonly string[];
  /** Actions whose handler throws. */
  throwActions?: readonly string[];
  /** Data returned per action on success. */
  data?: Readonly<Record<string, StepData>>;
  /** Called before each step is scripted. */
  onExecute?: (step: WorkflowStep) => void;
  /** Status probe; omit to build a handler without probeAgent. */
  probe?: (sandboxName: string, call: number) => AgentProbeResult;
}

/** Records every call; behaviour is driven by action name. */
export class ScriptedStepHandler implements StepHandler {
  readonly calls: Array<{
    stepId: string;
    action: string;
    params: StepParams;
    outputs: Record<string, StepData>;
  }> = [];
  readonly probes: string[] = [];
  probeAgent?: (sandboxName: string) => Promise<AgentProbeResult>;

  constructor(private readonly options: ScriptedStepHandlerOptions = {}) {
    const probe = options.probe;
    if (probe) {
      this.probeAgent = async (sandboxName) => {
        this.probes.push(sandboxName);
        return probe(sandboxName, this.probes.length);
      };
    }
  }

  async execute(step: WorkflowStep, context: ExecutionContext): Promise<StepResult> {
    this.calls.push({
      stepId: step.id,
      action: step.action,
      params: { ...step.params },
      outputs: { ...context.stepOutputs },
    });
    this.options.onExecute?.(step);
    if (this.options.throwActions?.includes(step.action)) {
      throw new Error(`${step.action} exploded`);
    }
    if (this.options.failActions?.includes(step.action)) {
      return stepFailed(step.id, `${step.action} failed`);
    }
    return stepSucceeded(step.id, this.options.data?.[step.action] ?? {});
  }
}

export const AGENT_DONE: AgentProbeResult = { exitCode: 0, output: "0\n" };
export const AGENT_FAILED: AgentProbeResult = { exitCode: 0, output: "1\n" };
export const AGENT_RUNNING: AgentProbeResult = { exitCode: 1, output: "" };

// ---------------------------------------------------------------------------
// FakeCommandRunner
// ---------------------------------------------------------------------------

export class FakeCommandRunner implements CommandRunner {
  readonly commands: Array<{ command: string[]; options: CommandOptions }> = [];
  readonly detached: Array<{ command: string[]; options: CommandOptions }> = [];

  constructor(
    private readonly respond: (command: readonly string[]) => Partial<CommandResult> = () => ({}),
    private readonly spawnOk = true,
  ) {}

  async run(command: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    this.commands.push({ command: [...command], options });
    return { exitCode: 0, stdout: "", stderr: "", ...this.respond(command) };
  }

  async spawnDetached(command: readonly string[], options: CommandOptions = {}): Promise<boolean> {
    this.detached.push({ command: [...command], options });
    return this.spawnOk;
  }
}

// ---------------------------------------------------------------------------
// Temp directories
// ---------------------------------------------------------------------------

export async function makeTempDir(prefix = "superintendent-test-"): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
