import type { AgentProbeResult } from "../workflow/executor.js";
import type { CommandRunner } from "./command-runner.js";
import type { DockerBackend, EnvironmentKind } from "./types.js";

export const DEFAULT_CONTAINER_IMAGE = "node:20";

export interface RealDockerBackendOptions {
  /** Image used for `container` environments. */
  containerImage?: string;
  agentCommand?: readonly string[];
}

/**
 * `sandbox` environments go through `docker sandbox`; `container`
 * environments are long-running `docker run -d` containers.
 */
export class RealDockerBackend implements DockerBackend {
  private readonly containerImage: string;
  private readonly agentCommand: readonly string[];

  constructor(
    private readonly runner: CommandRunner,
    options: RealDockerBackendOptions = {},
  ) {
    this.containerImage = options.containerImage ?? DEFAULT_CONTAINER_IMAGE;
    this.agentCommand = options.agentCommand ?? ["claude"];
  }

  async exists(kind: EnvironmentKind, name: string): Promise<boolean> {
    const command =
      kind === "sandbox"
        ? ["docker", "sandbox", "ls", "--format", "{{.Name}}"]
        : ["docker", "ps", "-a", "--format", "{{.Names}}"];
    const result = await this.runner.run(command);
    if (result.exitCode !== 0) return false;
    return result.stdout
      .split("\n")
      .map((line) => line.trim())
      .includes(name);
  }

  async create(kind: EnvironmentKind, name: string, workspace: string): Promise<boolean> {
    const command =
      kind === "sandbox"
        ? ["docker", "sandbox", "create", "--name", name, "-v", `${workspace}:/workspace`]
        : [
            "docker", "run", "-d",
            "--name", name,
            "-v", `${workspace}:/workspace`,
            "-w", "/workspace",
            this.containerImage,
            "sleep", "infinity",
          ];
    const result = await this.runner.run(command);
    return result.exitCode === 0;
  }

  async stop(kind: EnvironmentKind, name: string): Promise<boolean> {
    const command =
      kind === "sandbox"
        ? ["docker", "sandbox", "stop", name]
        : ["docker", "rm", "-f", name];
    const result = await this.runner.run(command);
    return result.exitCode === 0;
  }

  async exec(kind: EnvironmentKind, name: string, command: string): Promise<AgentProbeResult> {
    const argv =
      kind === "sandbox"
        ? ["docker", "sandbox", "exec", name, "sh", "-c", command]
        : ["docker", "exec", name, "sh", "-c", command];
    const result = await this.runner.run(argv);
    return { exitCode: result.exitCode, output: result.stdout + result.stderr };
  }

  async runAgent(
    kind: EnvironmentKind,
    name: string,
    workspace: string,
    prompt: string,
  ): Promise<boolean> {
    const command =
      kind === "sandbox"
        ? [
            "docker", "sandbox", "run",
            "--name", name,
            "-v", `${workspace}:/workspace`,
            "--",
            ...this.agentCommand, "--prompt", prompt,
          ]
        : ["docker", "exec", "-d", name, ...this.agentCommand, "--prompt", prompt];
    const result = await this.runner.run(command);
    return result.exitCode === 0;
  }
}
