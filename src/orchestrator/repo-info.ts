import { existsSync, statSync } from "node:fs";
import path from "node:path";

export type Complexity = "simple" | "moderate" | "complex";

/** Repository signals the execution strategy decides from. */
export interface RepoInfo {
  hasDockerfile: boolean;
  hasDevcontainer: boolean;
  hasEnvFile: boolean;
  needsAuth: boolean;
  languages: string[];
  estimatedComplexity: Complexity;
}

export class RepoInfoError extends Error {
  constructor(readonly repoPath: string, message: string) {
    super(message);
    this.name = "RepoInfoError";
  }
}

const DOCKER_FILES = [
  "Dockerfile",
  "docker-compose.yml",
  "docker-compose.yaml",
  "compose.yml",
  "compose.yaml",
];
const ENV_FILES = [".env", ".env.example", ".env.local", ".env.sample"];
const AUTH_FILES = [".npmrc", "pip.conf", ".pypirc"];

const LANGUAGE_MARKERS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["python", ["pyproject.toml", "setup.py", "setup.cfg", "requirements.txt", "Pipfile"]],
  ["javascript", ["package.json"]],
  ["typescript", ["tsconfig.json"]],
  ["rust", ["Cargo.toml"]],
  ["go", ["go.mod"]],
  ["java", ["pom.xml", "build.gradle", "build.gradle.kts"]],
];

export function emptyRepoInfo(): RepoInfo {
  return {
    hasDockerfile: false,
    hasDevcontainer: false,
    hasEnvFile: false,
    needsAuth: false,
    languages: [],
    estimatedComplexity: "simple",
  };
}

export function estimateComplexity(info: Omit<RepoInfo, "estimatedComplexity">): Complexity {
  let score = 0;
  if (info.hasDockerfile) score += 1;
  if (info.hasDevcontainer) score += 1;
  if (info.hasEnvFile) score += 1;
  if (info.needsAuth) score += 1;
  // Each language past the first counts.
  score += Math.max(0, info.languages.length - 1);

  if (score >= 3) return "complex";
  if (score >= 1) return "moderate";
  return "simple";
}

export function detectRepoInfo(repoPath: string): RepoInfo {
  if (!existsSync(repoPath)) {
    throw new RepoInfoError(repoPath, `Repository path does not exist: ${repoPath}`);
  }
  if (!statSync(repoPath).isDirectory()) {
    throw new RepoInfoError(repoPath, `Repository path is not a directory: ${repoPath}`);
  }

  const has = (name: string) => existsSync(path.join(repoPath, name));
  const devcontainer = path.join(repoPath, ".devcontainer");

  const signals = {
    hasDockerfile: DOCKER_FILES.some(has),
    hasDevcontainer: existsSync(devcontainer) && statSync(devcontainer).isDirectory(),
    hasEnvFile: ENV_FILES.some(has),
    needsAuth: AUTH_FILES.some(has),
    languages: LANGUAGE_MARKERS.filter(([, markers]) => markers.some(has)).map(([lang]) => lang),
  };
  return { ...signals, estimatedComplexity: estimateComplexity(signals) };
}
