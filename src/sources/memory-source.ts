import { type Task, type TaskSource, TaskStatus, isBlocked } from "./types.js";

export class InMemoryTaskSource implements TaskSource {
  private readonly tasks: Task[];

  constructor(tasks: readonly Task[] = []) {
    this.tasks = tasks.map((t) => ({ ...t, dependencies: [...t.dependencies], labels: { ...t.labels } }));
  }

  /** Adds a task mid-run, e.g. work discovered by another agent. */
  add(task: Task): void {
    this.tasks.push({ ...task, dependencies: [...task.dependencies], labels: { ...task.labels } });
  }

  async getTasks(): Promise<Task[]> {
    return this.tasks.map((t) => ({ ...t }));
  }

  async getReadyTasks(): Promise<Task[]> {
    const completed = new Set(
      this.tasks.filter((t) => t.status === TaskStatus.COMPLETED).map((t) => t.taskId),
    );
    return this.tasks
      .filter((t) => t.status === TaskStatus.PENDING && !isBlocked(t, completed))
      .map((t) => ({ ...t }));
  }

  async updateStatus(taskId: string, status: TaskStatus): Promise<void> {
    const task = this.tasks.find((t) => t.taskId === taskId);
    if (task) task.status = status;
  }

  async claimTask(taskId: string): Promise<boolean> {
    const task = this.tasks.find((t) => t.taskId === taskId);
    if (!task || task.status !== TaskStatus.PENDING) return false;
    task.status = TaskStatus.IN_PROGRESS;
    return true;
  }
}
