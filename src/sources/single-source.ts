import { shortDigest } from "./hash.js";
import { type Task, type TaskSource, TaskStatus, makeTask } from "./types.js";

/** One ad-hoc task string. Ephemeral, so status updates are dropped. */
export class SingleTaskSource implements TaskSource {
  readonly taskId: string;

  constructor(
    private readonly description: string,
    taskId?: string,
  ) {
    this.taskId = taskId ?? `single-${shortDigest(description)}`;
  }

  async getTasks(): Promise<Task[]> {
    return [
      makeTask(this.taskId, {
        title: this.description,
        description: this.description,
        status: TaskStatus.PENDING,
        sourceRef: "single",
      }),
    ];
  }

  async getReadyTasks(): Promise<Task[]> {
    return this.getTasks();
  }

  async updateStatus(): Promise<void> {}

  async claimTask(): Promise<boolean> {
    return true;
  }
}
