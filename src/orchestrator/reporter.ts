// ---------------------------------------------------------------------------
// Reporter contract
// ---------------------------------------------------------------------------

export interface ProgressSnapshot {
  running: number;
  completed: number;
  pending: number;
  failed: number;
}

export interface RunSummary {
  completedTasks: readonly string[];
  failedTasks: readonly string[];
  skippedTasks: readonly string[];
  agentsSpawned: number;
  totalTimeSeconds: number;
  errors: readonly string[];
}

export interface Reporter {
  onAgentStarted(agentId: string, taskNames: readonly string[], sandboxName?: string): void;
  onAgentCompleted(agentId: string, taskNames: readonly string[], durationSeconds: number): void;
  onAgentFailed(agentId: string, taskNames: readonly string[], error: string): void;
  onProgress(snapshot: ProgressSnapshot): void;
  /** Called once per run; returns the rendered summary. */
  summarize(summary: RunSummary): string;
}

export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(line + "\n");
};

export function formatDuration(seconds: number): string {
  const minutes = seconds / 60;
  return minutes >= 1 ? `${minutes.toFixed(1)}m` : `${seconds.toFixed(0)}s`;
}

// ---------------------------------------------------------------------------
// ConsoleReporter
// ---------------------------------------------------------------------------

export class ConsoleReporter implements Reporter {
  constructor(private readonly write: LineWriter = stdoutWriter) {}

  onAgentStarted(agentId: string, taskNames: readonly string[], sandboxName?: string): void {
    const location = sandboxName ? ` in ${sandboxName}` : "";
    this.write(`[started] Agent ${agentId}${location} (tasks: ${taskNames.join(", ")})`);
  }

  onAgentCompleted(agentId: string, taskNames: readonly string[], durationSeconds: number): void {
    this.write(
      `[completed] Agent ${agentId} completed in ${formatDuration(durationSeconds)} (tasks: ${taskNames.join(", ")})`,
    );
  }

  onAgentFailed(agentId: string, taskNames: readonly string[], error: string): void {
    this.write(`[FAILED] Agent ${agentId} FAILED (tasks: ${taskNames.join(", ")}): ${error}`);
  }

  onProgress({ running, completed, pending, failed }: ProgressSnapshot): void {
    const total = running + completed + pending + failed;
    this.write(
      `[progress] ${completed}/${total} completed, ${running} running, ${pending} pending, ${failed} failed`,
    );
  }

  summarize(summary: RunSummary): string {
    const lines = ["--- Orchestration Summary ---"];
    lines.push(`Total time: ${formatDuration(summary.totalTimeSeconds)}`);
    lines.push(`Agents spawned: ${summary.agentsSpawned}`);
    lines.push(`Completed: ${summary.completedTasks.length} tasks`);
    for (const t of summary.completedTasks) lines.push(`  - ${t}`);
    if (summary.failedTasks.length > 0) {
      lines.push(`Failed: ${summary.failedTasks.length} tasks`);
      for (const t of summary.failedTasks) lines.push(`  - ${t}`);
    }
    if (summary.skippedTasks.length > 0) {
      lines.push(`Skipped: ${summary.skippedTasks.length} tasks`);
      for (const t of summary.skippedTasks) lines.push(`  - ${t}`);
    }
    if (summary.errors.length > 0) {
      lines.push(`Errors (${summary.errors.length}):`);
      for (const e of summary.errors) lines.push(`  - ${e}`);
    }
    const text = lines.join("\n");
    this.write(text);
    return text;
  }
}

// ---------------------------------------------------------------------------
// RecordingReporter
// ---------------------------------------------------------------------------

export type ReporterEvent =
  | { type: "started"; agentId: string; taskNames: string[]; sandboxName?: string }
  | { type: "completed"; agentId: string; taskNames: string[]; durationSeconds: number }
  | { type: "failed"; agentId: string; taskNames: string[]; error: string }
  | { type: "progress"; snapshot: ProgressSnapshot };

/** Keeps every event in memory for later inspection. */
export class RecordingReporter implements Reporter {
  readonly events: ReporterEvent[] = [];
  readonly summaries: string[] = [];

  onAgentStarted(agentId: string, taskNames: readonly string[], sandboxName?: string): void {
    this.events.push({ type: "started", agentId, taskNames: [...taskNames], sandboxName });
  }

  onAgentCompleted(agentId: string, taskNames: readonly string[], durationSeconds: number): void {
    this.events.push({ type: "completed", agentId, taskNames: [...taskNames], durationSeconds });
  }

  onAgentFailed(agentId: string, taskNames: readonly string[], error: string): void {
    this.events.push({ type: "failed", agentId, taskNames: [...taskNames], error });
  }

  onProgress(snapshot: ProgressSnapshot): void {
    this.events.push({ type: "progress", snapshot: { ...snapshot } });
  }

  summarize(summary: RunSummary): string {
    const text =
      `completed=${summary.completedTasks.length} ` +
      `failed=${summary.failedTasks.length} ` +
      `skipped=${summary.skippedTasks.length} ` +
      `agents=${summary.agentsSpawned} ` +
      `time=${summary.totalTimeSeconds.toFixed(0)}s ` +
      `errors=${summary.errors.length}`;
    this.summaries.push(text);
    return text;
  }

  progressSnapshots(): ProgressSnapshot[] {
    const out: ProgressSnapshot[] = [];
    for (const e of this.events) {
      if (e.type === "progress") out.push(e.snapshot);
    }
    return out;
  }
}

// ---------------------------------------------------------------------------
// DryRunReporter / NoopReporter
// ---------------------------------------------------------------------------

export class DryRunReporter implements Reporter {
  readonly messages: string[] = [];

  onAgentStarted(agentId: string, taskNames: readonly string[], sandboxName?: string): void {
    const location = sandboxName ? ` in ${sandboxName}` : "";
    this.messages.push(
      `[dry-run] Would report: Agent ${agentId} started${location} (tasks: ${taskNames.join(", ")})`,
    );
  }

  onAgentCompleted(agentId: string, taskNames: readonly string[], durationSeconds: number): void {
    this.messages.push(
      `[dry-run] Would report: Agent ${agentId} completed in ${durationSeconds.toFixed(0)}s (tasks: ${taskNames.join(", ")})`,
    );
  }

  onAgentFailed(agentId: string, taskNames: readonly string[], error: string): void {
    this.messages.push(
      `[dry-run] Would report: Agent ${agentId} FAILED (tasks: ${taskNames.join(", ")}): ${error}`,
    );
  }

  onProgress({ running, completed, pending, failed }: ProgressSnapshot): void {
    this.messages.push(
      `[dry-run] Would report progress: ${completed} completed, ${running} running, ${pending} pending, ${failed} failed`,
    );
  }

  summarize(summary: RunSummary): string {
    const msg =
      `[dry-run] Would summarize: ${summary.completedTasks.length} completed, ` +
      `${summary.failedTasks.length} failed, ${summary.skippedTasks.length} skipped, ` +
      `${summary.agentsSpawned} agents, ${summary.totalTimeSeconds.toFixed(0)}s total, ` +
      `${summary.errors.length} errors`;
    this.messages.push(msg);
    return msg;
  }
}

export class NoopReporter implements Reporter {
  onAgentStarted(): void {}
  onAgentCompleted(): void {}
  onAgentFailed(): void {}
  onProgress(): void {}
  summarize(): string {
    return "";
  }
}
