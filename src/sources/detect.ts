import { MarkdownSource, findMarkdownTaskFile } from "./markdown-source.js";
import { SingleTaskSource } from "./single-source.js";
import { type TaskSource, TaskSourceError } from "./types.js";

export type SourceType = "auto" | "markdown" | "single";

export const SOURCE_TYPES: readonly SourceType[] = ["auto", "markdown", "single"];

export function parseSourceType(value: string): SourceType | undefined {
  return SOURCE_TYPES.find((s) => s === value);
}

export interface DetectSourceOptions {
  sourceType?: string;
  taskDescription?: string;
  markdownPath?: string;
}

/** Picks a task source for a repository, or null when none applies. */
export function detectSource(repoRoot: string, options: DetectSourceOptions = {}): TaskSource | null {
  const raw = options.sourceType ?? "auto";
  const sourceType = parseSourceType(raw);
  if (sourceType === undefined) {
    throw new TaskSourceError(`Unknown task source: ${raw}`);
  }

  switch (sourceType) {
    case "single":
      return options.taskDescription ? new SingleTaskSource(options.taskDescription) : null;

    case "markdown": {
      const file = options.markdownPath ?? findMarkdownTaskFile(repoRoot);
      if (file === null) {
        throw new TaskSourceError(`No markdown task file found in ${repoRoot}`);
      }
      return new MarkdownSource(file);
    }

    case "auto": {
      const file = findMarkdownTaskFile(repoRoot);
      if (file !== null) return new MarkdownSource(file);
      return options.taskDescription ? new SingleTaskSource(options.taskDescription) : null;
    }
  }
}
