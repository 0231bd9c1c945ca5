import { existsSync, readdirSync, statSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";
import { extractRepoName, isRepoUrl } from "../workflow/planner.js";
import type { CommandRunner } from "./command-runner.js";
import type { GitBackend } from "./types.js";

const GIT_TIMEOUT_MS = 10 * 60 * 1000;

function isDirectory(dir: string): boolean {
  try {
    return statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

function isGitRepo(dir: string): boolean {
  return isDirectory(dir) && existsSync(path.join(dir, ".git"));
}

/**
 * Look for `<root>/<name>` and one level deeper (`<root>/<child>/<name>`),
 * which covers layouts like `~/projects/<name>`.
 */
export function findLocalClone(repoName: string, searchPaths: readonly string[]): string | null {
  for (const root of searchPaths) {
    if (!isDirectory(root)) continue;

    const direct = path.join(root, repoName);
    if (isGitRepo(direct)) return direct;

    let children: string[];
    try {
      children = readdirSync(root, { withFileTypes: true })
        .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
        .map((entry) => entry.name);
    } catch {
      // Unreadable search path
      continue;
    }
    for (const child of children) {
      const candidate = path.join(root, child, repoName);
      if (isGitRepo(candidate)) return candidate;
    }
  }
  return null;
}

export class RealGitBackend implements GitBackend {
  constructor(
    private readonly runner: CommandRunner,
    private readonly searchPaths?: readonly string[],
  ) {}

  async ensureLocal(repo: string): Promise<string | null> {
    if (isRepoUrl(repo)) {
      const paths = this.searchPaths ?? [process.cwd(), homedir()];
      return findLocalClone(extractRepoName(repo), paths);
    }
    return isGitRepo(repo) ? repo : null;
  }

  async clone(url: string, target: string): Promise<boolean> {
    const result = await this.runner.run(["git", "clone", url, target], {
      timeoutMs: GIT_TIMEOUT_MS,
    });
    return result.exitCode === 0;
  }

  async createWorktree(repoPath: string, branch: string, target: string): Promise<boolean> {
    const result = await this.runner.run(
      ["git", "-C", repoPath, "worktree", "add", target, "-b", branch],
      { timeoutMs: GIT_TIMEOUT_MS },
    );
    return result.exitCode === 0;
  }
}
