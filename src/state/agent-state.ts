import { appendFile, mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { isRecord, isoNow } from "../types/index.js";

export const AGENT_STATE_DIRNAME = ".ralph";

export interface AgentStateConfig {
  execution_mode: string;
  task: string;
  created_at: string;
  [key: string]: unknown;
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * The per-worktree agent state directory: config, a running progress log,
 * learned guardrails and the task statement.
 */
export class AgentState {
  constructor(readonly dir: string) {}

  static forWorktree(worktreePath: string): AgentState {
    return new AgentState(path.join(worktreePath, AGENT_STATE_DIRNAME));
  }

  async isInitialized(): Promise<boolean> {
    try {
      return (await stat(this.dir)).isDirectory();
    } catch {
      return false;
    }
  }

  /** Creates missing files only; existing ones are left untouched. */
  async init(task: string, executionMode = "unknown"): Promise<void> {
    await mkdir(this.dir, { recursive: true });

    const config: AgentStateConfig = {
      execution_mode: executionMode,
      task,
      created_at: isoNow(),
    };
    await this.writeIfMissing("config.json", JSON.stringify(config, null, 2));
    await this.writeIfMissing("progress.md", "# Progress\n\n");
    await this.writeIfMissing(
      "guardrails.md",
      "# Guardrails\n\nLearned failure patterns and things to avoid.\n",
    );
    await this.writeIfMissing("worktree-task.md", `# Task\n\n${task}\n`);
  }

  async readConfig(): Promise<AgentStateConfig | null> {
    const file = path.join(this.dir, "config.json");
    if (!(await pathExists(file))) return null;
    const data: unknown = JSON.parse(await readFile(file, "utf-8"));
    if (!isRecord(data) || typeof data["task"] !== "string") return null;
    return {
      ...data,
      execution_mode: typeof data["execution_mode"] === "string" ? data["execution_mode"] : "unknown",
      task: data["task"],
      created_at: typeof data["created_at"] === "string" ? data["created_at"] : "",
    };
  }

  async appendProgress(entry: string): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await appendFile(path.join(this.dir, "progress.md"), `- [${isoNow()}] ${entry}\n`);
  }

  async reset(): Promise<void> {
    await rm(this.dir, { recursive: true, force: true });
  }

  private async writeIfMissing(name: string, content: string): Promise<void> {
    const file = path.join(this.dir, name);
    if (await pathExists(file)) return;
    await writeFile(file, content);
  }
}
