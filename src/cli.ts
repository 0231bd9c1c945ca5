#!/usr/bin/env node
/**
 * superintendent CLI: plan, explain and run coding-agent workflows.
 *
 * Commands:
 *   superintendent plan --repo <r> --task <t>    Print the workflow plan as JSON
 *   superintendent explain --repo <dir>          Show the execution decision
 *   superintendent run --repo <dir>              Run agents for every task
 *
 * Command output goes to stdout; structured logs go to stderr.
 */
import path from "node:path";
import { createBackends } from "./backends/factory.js";
import { CommandLog } from "./backends/dry-run.js";
import {
  type CliCommand,
  CliUsageError,
  type ExplainCommandOptions,
  HELP_TEXT,
  type PlanCommandOptions,
  type RunCommandOptions,
  parseCliArgs,
} from "./cli/args.js";
import { type SuperintendentConfig, loadConfig } from "./config/config.js";
import { DurationParseError, parseDuration } from "./config/duration.js";
import { ObservabilityProvider } from "./core/observability.js";
import { Orchestrator } from "./orchestrator/orchestrator.js";
import { detectRepoInfo } from "./orchestrator/repo-info.js";
import { ConsoleReporter, DryRunReporter } from "./orchestrator/reporter.js";
import { type ExecutionDecision, ExecutionStrategy, taskInfoFromTask } from "./orchestrator/strategy.js";
import { detectSource } from "./sources/detect.js";
import { type TaskSource, TaskStatus } from "./sources/types.js";
import { errorMessage, generateId } from "./types/index.js";
import { CheckpointStore } from "./workflow/checkpoint-store.js";
import { serializePlan } from "./workflow/plan-codec.js";
import { Planner } from "./workflow/planner.js";
import { BackendStepHandler } from "./workflow/step-handler.js";

const VERSION = "0.1.0";

function die(msg: string): never {
  process.stderr.write(`Error: ${msg}\n`);
  process.exit(1);
}

// ── plan ─────────────────────────────────────────────────────────

function planCommand(opts: PlanCommandOptions): void {
  const plan = new Planner().createPlan({
    repo: opts.repo,
    task: opts.task,
    mode: opts.mode,
    target: opts.target,
    branch: opts.branch,
    sandboxName: opts.sandboxName,
    contextFile: opts.contextFile,
    force: opts.force,
  });
  process.stdout.write(serializePlan(plan) + "\n");
}

// ── explain / run ────────────────────────────────────────────────

interface Prepared {
  repoRoot: string;
  source: TaskSource;
  decision: ExecutionDecision;
  strategy: ExecutionStrategy;
}

async function prepare(opts: ExplainCommandOptions, maxParallelAgents: number): Promise<Prepared> {
  const repoRoot = path.resolve(opts.repo);
  const source = detectSource(repoRoot, {
    sourceType: opts.from,
    taskDescription: opts.task,
    markdownPath: opts.tasksFile,
  });
  if (source === null) {
    throw new CliUsageError("no tasks found: add tasks.md or TODO.md, or pass --task");
  }

  const tasks = (await source.getTasks()).filter((t) => t.status !== TaskStatus.COMPLETED);
  const strategy = new ExecutionStrategy(maxParallelAgents);
  const decision = strategy.decide(tasks.map(taskInfoFromTask), detectRepoInfo(repoRoot), {
    mode: opts.mode,
    target: opts.target,
    parallelism: opts.parallel,
  });
  return { repoRoot, source, decision, strategy };
}

async function explainCommand(opts: ExplainCommandOptions): Promise<void> {
  const config = await loadConfig({ repoRoot: path.resolve(opts.repo) });
  const { decision, strategy } = await prepare(opts, config.strategy.maxParallelAgents);

  const lines = [strategy.explain(decision)];
  decision.taskGroups.forEach((group, i) => {
    lines.push(`  [${i + 1}] ${group.map((t) => t.name).join(", ")}`);
  });
  process.stdout.write(lines.join("\n") + "\n");
}

function applyRunFlags(config: SuperintendentConfig, opts: RunCommandOptions): SuperintendentConfig {
  const orchestrator = { ...config.orchestrator };
  if (opts.policy !== undefined) orchestrator.failurePolicy = opts.policy;
  if (opts.maxRetries !== undefined) orchestrator.maxRetries = opts.maxRetries;
  if (opts.maxParallel !== undefined) orchestrator.maxParallel = opts.maxParallel;
  if (opts.pollInterval !== undefined) {
    try {
      orchestrator.pollIntervalMs = parseDuration(opts.pollInterval);
    } catch (err) {
      if (err instanceof DurationParseError) throw new CliUsageError(`--poll-interval: ${err.message}`);
      throw err;
    }
  }
  return { ...config, logLevel: opts.logLevel ?? config.logLevel, orchestrator };
}

async function runCommand(opts: RunCommandOptions): Promise<number> {
  const repoRoot = path.resolve(opts.repo);
  const config = applyRunFlags(await loadConfig({ configPath: opts.config, repoRoot }), opts);

  const observability = new ObservabilityProvider(config.logLevel);
  const logger = observability.createLogger("superintendent");
  logger.setTraceId(generateId());

  const { source, decision } = await prepare(opts, config.strategy.maxParallelAgents);
  if (decision.taskGroups.length === 0) {
    process.stdout.write("No pending tasks.\n");
    return 0;
  }

  const commandLog = new CommandLog();
  const backends = createBackends(opts.dryRun ? "dry-run" : "real", { commandLog });
  const reporter = opts.dryRun ? new DryRunReporter() : new ConsoleReporter();

  const orchestrator = new Orchestrator({
    createStepHandler: () => new BackendStepHandler(backends, { cwd: path.dirname(repoRoot), logger: logger.child("steps") }),
    taskSource: source,
    reporter,
    maxParallel: Math.min(config.orchestrator.maxParallel, Math.max(1, decision.parallelism)),
    pollIntervalMs: config.orchestrator.pollIntervalMs,
    failurePolicy: config.orchestrator.failurePolicy,
    maxRetries: config.orchestrator.maxRetries,
    checkpointStore: config.checkpointDir ? new CheckpointStore(path.resolve(repoRoot, config.checkpointDir)) : undefined,
    logger: logger.child("orchestrator"),
  });

  // First signal stops new spawns; in-flight agents keep running.
  const controller = new AbortController();
  const onSignal = () => {
    logger.info("Interrupt received, stopping new spawns");
    controller.abort("interrupted");
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const result = await orchestrator.run(decision, repoRoot, { signal: controller.signal });
    if (reporter instanceof DryRunReporter) {
      const lines = [...commandLog.commands.map((c) => `$ ${c}`), ...reporter.messages];
      process.stdout.write(lines.join("\n") + "\n");
    }
    return result.failedTasks.length > 0 ? 1 : 0;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

// ── Main ─────────────────────────────────────────────────────────

async function dispatch(cmd: CliCommand): Promise<number> {
  switch (cmd.command) {
    case "help":
      process.stdout.write(HELP_TEXT + "\n");
      return 0;
    case "version":
      process.stdout.write(`superintendent ${VERSION}\n`);
      return 0;
    case "plan":
      planCommand(cmd.opts);
      return 0;
    case "explain":
      await explainCommand(cmd.opts);
      return 0;
    case "run":
      return runCommand(cmd.opts);
  }
}

async function main(): Promise<void> {
  let cmd: CliCommand;
  try {
    cmd = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    die(errorMessage(err));
  }

  try {
    process.exitCode = await dispatch(cmd);
  } catch (err) {
    // Usage, config and task-source errors all surface as one line.
    die(errorMessage(err));
  }
}

main().catch((err: unknown) => {
  die(errorMessage(err));
});
