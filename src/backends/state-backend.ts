import { AgentState } from "../state/agent-state.js";
import type { StateBackend } from "./types.js";

export class FileStateBackend implements StateBackend {
  async initialize(worktreePath: string, task: string): Promise<string> {
    const state = AgentState.forWorktree(worktreePath);
    await state.init(task);
    return state.dir;
  }
}
