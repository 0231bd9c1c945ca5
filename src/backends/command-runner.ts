import { spawn } from "node:child_process";

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /** Run to completion, capturing output. Spawn errors surface as exit code 127. */
  run(command: readonly string[], options?: CommandOptions): Promise<CommandResult>;

  /** Start a process that outlives this one. Returns false if it could not be started. */
  spawnDetached(command: readonly string[], options?: CommandOptions): Promise<boolean>;
}

const SPAWN_FAILURE_EXIT_CODE = 127;

export class ProcessCommandRunner implements CommandRunner {
  run(command: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const [file, ...args] = command;
    if (file === undefined) {
      return Promise.resolve({ exitCode: SPAWN_FAILURE_EXIT_CODE, stdout: "", stderr: "empty command" });
    }

    return new Promise<CommandResult>((resolve) => {
      const child = spawn(file, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      let timer: NodeJS.Timeout | undefined;
      if (options.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          child.kill("SIGTERM");
        }, options.timeoutMs);
      }

      let settled = false;
      const finish = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(result);
      };

      child.on("error", (err) => {
        finish({ exitCode: SPAWN_FAILURE_EXIT_CODE, stdout, stderr: stderr + err.message });
      });
      child.on("close", (code, signal) => {
        // Killed by signal (e.g. timeout) has no exit code.
        finish({ exitCode: code ?? (signal ? 128 : 1), stdout, stderr });
      });
    });
  }

  spawnDetached(command: readonly string[], options: CommandOptions = {}): Promise<boolean> {
    const [file, ...args] = command;
    if (file === undefined) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const child = spawn(file, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        detached: true,
        stdio: "ignore",
      });
      child.once("error", () => resolve(false));
      child.once("spawn", () => {
        child.unref();
        resolve(true);
      });
    });
  }
}
