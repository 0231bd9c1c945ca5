import { type LogLevel, isLogLevel } from "../core/observability.js";
import { type FailurePolicy, parseFailurePolicy } from "../orchestrator/orchestrator.js";
import { type SourceType, parseSourceType } from "../sources/detect.js";
import { type Mode, type Target, parseMode, parseTarget } from "../workflow/types.js";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

// ── Option shapes ────────────────────────────────────────────────

export interface PlanCommandOptions {
  repo: string;
  task: string;
  target?: Target;
  mode?: Mode;
  branch?: string;
  sandboxName?: string;
  contextFile?: string;
  force: boolean;
}

export interface ExplainCommandOptions {
  repo: string;
  from: SourceType;
  tasksFile?: string;
  task?: string;
  target?: Target;
  mode?: Mode;
  parallel?: number;
}

export interface RunCommandOptions extends ExplainCommandOptions {
  dryRun: boolean;
  policy?: FailurePolicy;
  maxRetries?: number;
  maxParallel?: number;
  /** Raw duration string; parsed with the config layer. */
  pollInterval?: string;
  config?: string;
  logLevel?: LogLevel;
}

export type CliCommand =
  | { command: "help" }
  | { command: "version" }
  | { command: "plan"; opts: PlanCommandOptions }
  | { command: "explain"; opts: ExplainCommandOptions }
  | { command: "run"; opts: RunCommandOptions };

export const HELP_TEXT = `
superintendent: plan and run coding-agent workflows

USAGE
  superintendent plan --repo <path|url> --task <text> [options]
  superintendent explain --repo <dir> [options]
  superintendent run --repo <dir> [options]

PLAN OPTIONS
  --repo <path|url>       Repository to work on                        (required)
  --task <text>           Task for the agent                           (required)
  --target <t>            sandbox | container | local                  (default: sandbox)
  --mode <m>              interactive | autonomous                     (default: autonomous)
  --branch <name>         Worktree branch                              (default: agent/<repo>)
  --sandbox-name <name>   Sandbox or container name                    (default: claude-<repo>)
  --context-file <path>   Extra context handed to the agent
  --force                 Replace an existing sandbox

EXPLAIN / RUN OPTIONS
  --repo <dir>            Local repository root                        (required)
  --from <source>         auto | markdown | single                     (default: auto)
  --tasks-file <path>     Markdown checklist to read tasks from
  --task <text>           Single ad-hoc task
  --target <t>            Override the chosen target
  --mode <m>              Override the chosen mode
  --parallel <n>          Override the chosen parallelism

RUN-ONLY OPTIONS
  --dry-run               Print backend commands instead of running them
  --policy <p>            retry | skip | abort                         (default: skip)
  --max-retries <n>       Retries per task group under "retry"         (default: 1)
  --max-parallel <n>      Concurrent agents                            (default: 3)
  --poll-interval <d>     Status poll interval, e.g. 5s, 1m            (default: 5s)
  --config <path>         Configuration file                           (default: <repo>/superintendent.yaml)
  --log-level <level>     debug | info | warn | error | fatal          (default: info)

  --help, -h              Show this help message
  --version, -v           Show version
`.trim();

// ── Parsing ──────────────────────────────────────────────────────

class ArgCursor {
  private i = 0;

  constructor(private readonly argv: readonly string[]) {}

  nextArg(): string | undefined {
    const arg = this.argv[this.i];
    this.i++;
    return arg;
  }

  value(flag: string): string {
    const val = this.argv[this.i];
    this.i++;
    if (val === undefined || val.startsWith("--")) {
      throw new CliUsageError(`${flag} requires a value`);
    }
    return val;
  }

  integer(flag: string, min: number): number {
    const raw = this.value(flag);
    const v = Number(raw);
    if (!Number.isInteger(v) || v < min) {
      throw new CliUsageError(`${flag} requires an integer >= ${min}, got "${raw}"`);
    }
    return v;
  }
}

function targetValue(cursor: ArgCursor, flag: string): Target {
  const raw = cursor.value(flag);
  const target = parseTarget(raw);
  if (target === undefined) {
    throw new CliUsageError(`invalid target "${raw}". Must be one of: sandbox, container, local`);
  }
  return target;
}

function modeValue(cursor: ArgCursor, flag: string): Mode {
  const raw = cursor.value(flag);
  const mode = parseMode(raw);
  if (mode === undefined) {
    throw new CliUsageError(`invalid mode "${raw}". Must be one of: interactive, autonomous`);
  }
  return mode;
}

function parsePlan(cursor: ArgCursor): CliCommand {
  let repo: string | undefined;
  let task: string | undefined;
  const opts: Omit<PlanCommandOptions, "repo" | "task"> = { force: false };

  for (let arg = cursor.nextArg(); arg !== undefined; arg = cursor.nextArg()) {
    switch (arg) {
      case "--help": case "-h": return { command: "help" };
      case "--repo": repo = cursor.value(arg); break;
      case "--task": task = cursor.value(arg); break;
      case "--target": opts.target = targetValue(cursor, arg); break;
      case "--mode": opts.mode = modeValue(cursor, arg); break;
      case "--branch": opts.branch = cursor.value(arg); break;
      case "--sandbox-name": opts.sandboxName = cursor.value(arg); break;
      case "--context-file": opts.contextFile = cursor.value(arg); break;
      case "--force": opts.force = true; break;
      default:
        throw new CliUsageError(`unknown option "${arg}"\nRun 'superintendent --help' for usage.`);
    }
  }

  if (repo === undefined) throw new CliUsageError("--repo is required");
  if (task === undefined) throw new CliUsageError("--task is required");
  return { command: "plan", opts: { repo, task, ...opts } };
}

function parseExplainOrRun(cursor: ArgCursor, command: "explain" | "run"): CliCommand {
  let repo: string | undefined;
  const opts: Omit<RunCommandOptions, "repo"> = { from: "auto", dryRun: false };

  for (let arg = cursor.nextArg(); arg !== undefined; arg = cursor.nextArg()) {
    switch (arg) {
      case "--help": case "-h": return { command: "help" };
      case "--repo": repo = cursor.value(arg); break;
      case "--from": {
        const raw = cursor.value(arg);
        const from = parseSourceType(raw);
        if (from === undefined) {
          throw new CliUsageError(`invalid source "${raw}". Must be one of: auto, markdown, single`);
        }
        opts.from = from;
        break;
      }
      case "--tasks-file": opts.tasksFile = cursor.value(arg); break;
      case "--task": opts.task = cursor.value(arg); break;
      case "--target": opts.target = targetValue(cursor, arg); break;
      case "--mode": opts.mode = modeValue(cursor, arg); break;
      case "--parallel": opts.parallel = cursor.integer(arg, 1); break;
      default:
        if (command === "explain") {
          throw new CliUsageError(`unknown option "${arg}"\nRun 'superintendent --help' for usage.`);
        }
        parseRunOnly(cursor, arg, opts);
    }
  }

  if (repo === undefined) throw new CliUsageError("--repo is required");
  if (command === "explain") {
    return {
      command: "explain",
      opts: {
        repo,
        from: opts.from,
        tasksFile: opts.tasksFile,
        task: opts.task,
        target: opts.target,
        mode: opts.mode,
        parallel: opts.parallel,
      },
    };
  }
  return { command: "run", opts: { repo, ...opts } };
}

function parseRunOnly(cursor: ArgCursor, arg: string, opts: Omit<RunCommandOptions, "repo">): void {
  switch (arg) {
    case "--dry-run": opts.dryRun = true; break;
    case "--policy": {
      const raw = cursor.value(arg);
      const policy = parseFailurePolicy(raw);
      if (policy === undefined) {
        throw new CliUsageError(`invalid policy "${raw}". Must be one of: retry, skip, abort`);
      }
      opts.policy = policy;
      break;
    }
    case "--max-retries": opts.maxRetries = cursor.integer(arg, 0); break;
    case "--max-parallel": opts.maxParallel = cursor.integer(arg, 1); break;
    case "--poll-interval": opts.pollInterval = cursor.value(arg); break;
    case "--config": opts.config = cursor.value(arg); break;
    case "--log-level": {
      const level = cursor.value(arg);
      if (!isLogLevel(level)) {
        throw new CliUsageError(`invalid log level "${level}". Must be one of: debug, info, warn, error, fatal`);
      }
      opts.logLevel = level;
      break;
    }
    default:
      throw new CliUsageError(`unknown option "${arg}"\nRun 'superintendent --help' for usage.`);
  }
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [first, ...rest] = argv;
  const cursor = new ArgCursor(rest);

  switch (first) {
    case undefined:
    case "--help":
    case "-h":
    case "help":
      return { command: "help" };
    case "--version":
    case "-v":
      return { command: "version" };
    case "plan":
      return parsePlan(cursor);
    case "explain":
      return parseExplainOrRun(cursor, "explain");
    case "run":
      return parseExplainOrRun(cursor, "run");
    default:
      throw new CliUsageError(`unknown command "${first}"\nRun 'superintendent --help' for usage.`);
  }
}
