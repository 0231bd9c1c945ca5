import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { shortDigest } from "./hash.js";
import { type Task, type TaskSource, TaskStatus, isBlocked, makeTask } from "./types.js";

// "- [ ] Task", "- [x] Task", "- [ ] [T001] Task"
const TASK_LINE = /^(\s*)-\s+\[([ xX])\]\s+(?:\[([^\]]+)\]\s+)?(.+)$/;

export const MARKDOWN_CANDIDATES = ["tasks.md", "TODO.md"] as const;

interface ParsedLine {
  indent: string;
  checked: boolean;
  explicitId: string | undefined;
  text: string;
}

function parseLine(line: string): ParsedLine | null {
  const m = TASK_LINE.exec(line);
  if (m === null) return null;
  const [, indent = "", box = " ", explicitId, text = ""] = m;
  return { indent, checked: box === "x" || box === "X", explicitId, text };
}

export function markdownTaskId(text: string): string {
  return `md-${shortDigest(text.trim())}`;
}

/** Finds `tasks.md` or `TODO.md` in a repository root. */
export function findMarkdownTaskFile(repoRoot: string): string | null {
  for (const name of MARKDOWN_CANDIDATES) {
    const candidate = path.join(repoRoot, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Checklist items in a markdown file. Nested items depend on their
 * parent; status changes rewrite the checkbox in place.
 */
export class MarkdownSource implements TaskSource {
  constructor(readonly filePath: string) {}

  async getTasks(): Promise<Task[]> {
    const content = await readFile(this.filePath, "utf-8");
    return this.parseTasks(content);
  }

  async getReadyTasks(): Promise<Task[]> {
    const tasks = await this.getTasks();
    const completed = new Set(
      tasks.filter((t) => t.status === TaskStatus.COMPLETED).map((t) => t.taskId),
    );
    return tasks.filter((t) => t.status !== TaskStatus.COMPLETED && !isBlocked(t, completed));
  }

  async updateStatus(taskId: string, status: TaskStatus): Promise<void> {
    const content = await readFile(this.filePath, "utf-8");
    let changed = false;

    const lines = content.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

    const updated = lines.map((line) => {
      const parsed = parseLine(line);
      if (parsed === null) return line;
      const lineId = parsed.explicitId ?? markdownTaskId(parsed.text);
      if (lineId !== taskId) return line;
      changed = true;
      const check = status === TaskStatus.COMPLETED ? "x" : " ";
      const idPart = parsed.explicitId ? `[${parsed.explicitId}] ` : "";
      return `${parsed.indent}- [${check}] ${idPart}${parsed.text}`;
    });

    if (changed) {
      await writeFile(this.filePath, updated.join("\n") + "\n");
    }
  }

  async claimTask(): Promise<boolean> {
    return true;
  }

  private parseTasks(content: string): Task[] {
    const tasks: Task[] = [];
    // (indent width, task id) of the enclosing items
    const parents: Array<[number, string]> = [];

    for (const line of content.split(/\r?\n/)) {
      const parsed = parseLine(line);
      if (parsed === null) continue;

      const level = parsed.indent.length;
      const taskId = parsed.explicitId ?? markdownTaskId(parsed.text);

      while (parents.length > 0) {
        const top = parents[parents.length - 1];
        if (top === undefined || top[0] < level) break;
        parents.pop();
      }
      const parent = parents[parents.length - 1];

      const title = parsed.text.trim();
      tasks.push(
        makeTask(taskId, {
          title,
          description: title,
          status: parsed.checked ? TaskStatus.COMPLETED : TaskStatus.PENDING,
          dependencies: parent ? [parent[1]] : [],
          sourceRef: this.filePath,
        }),
      );
      parents.push([level, taskId]);
    }
    return tasks;
  }
}
