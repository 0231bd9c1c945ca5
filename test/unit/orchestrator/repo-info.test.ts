import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  RepoInfoError,
  detectRepoInfo,
  emptyRepoInfo,
  estimateComplexity,
} from "../../../src/orchestrator/repo-info.js";
import { makeTempDir, removeDir } from "../../helpers/fixtures.js";

describe("detectRepoInfo", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function touch(...names: string[]): Promise<void> {
    for (const name of names) {
      await writeFile(path.join(dir, name), "");
    }
  }

  it("reports nothing for an empty directory", () => {
    expect(detectRepoInfo(dir)).toEqual(emptyRepoInfo());
  });

  it("detects container, env and auth signals", async () => {
    await touch("compose.yaml", ".env.example", ".npmrc");
    await mkdir(path.join(dir, ".devcontainer"));

    const info = detectRepoInfo(dir);

    expect(info).toMatchObject({
      hasDockerfile: true,
      hasDevcontainer: true,
      hasEnvFile: true,
      needsAuth: true,
      estimatedComplexity: "complex",
    });
  });

  it("ignores a .devcontainer file that is not a directory", async () => {
    await touch(".devcontainer");
    expect(detectRepoInfo(dir).hasDevcontainer).toBe(false);
  });

  it("lists languages in a fixed order", async () => {
    await touch("go.mod", "tsconfig.json", "package.json", "pyproject.toml");

    const info = detectRepoInfo(dir);

    expect(info.languages).toEqual(["python", "javascript", "typescript", "go"]);
    expect(info.estimatedComplexity).toBe("complex");
  });

  it("rejects missing paths and files", async () => {
    const missing = path.join(dir, "missing");
    expect(() => detectRepoInfo(missing)).toThrow(new RepoInfoError(missing, `Repository path does not exist: ${missing}`));

    await touch("file.txt");
    const file = path.join(dir, "file.txt");
    expect(() => detectRepoInfo(file)).toThrow(`Repository path is not a directory: ${file}`);
  });
});

describe("estimateComplexity", () => {
  const base = { hasDockerfile: false, hasDevcontainer: false, hasEnvFile: false, needsAuth: false, languages: [] };

  it("scores signals and extra languages", () => {
    expect(estimateComplexity(base)).toBe("simple");
    expect(estimateComplexity({ ...base, languages: ["go"] })).toBe("simple");
    expect(estimateComplexity({ ...base, hasDockerfile: true })).toBe("moderate");
    expect(estimateComplexity({ ...base, languages: ["go", "rust", "java"] })).toBe("moderate");
    expect(estimateComplexity({ ...base, hasEnvFile: true, languages: ["go", "rust", "java"] })).toBe("complex");
  });
});
