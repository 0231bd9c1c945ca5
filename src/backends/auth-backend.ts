import type { AuthBackend, DockerBackend, EnvironmentKind } from "./types.js";

export class RealAuthBackend implements AuthBackend {
  constructor(private readonly docker: DockerBackend) {}

  async setupGitAuth(kind: EnvironmentKind, name: string): Promise<boolean> {
    const result = await this.docker.exec(kind, name, "gh auth setup-git");
    return result.exitCode === 0;
  }
}
