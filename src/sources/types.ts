export enum TaskStatus {
  PENDING = "pending",
  IN_PROGRESS = "in_progress",
  COMPLETED = "completed",
  FAILED = "failed",
}

export interface Task {
  taskId: string;
  title: string;
  description: string;
  status: TaskStatus;
  /** Ids of tasks that must complete first. */
  dependencies: string[];
  labels: Record<string, string>;
  sourceRef: string;
}

export function makeTask(
  taskId: string,
  fields: Partial<Omit<Task, "taskId">> = {},
): Task {
  const title = fields.title ?? taskId;
  return {
    taskId,
    title,
    description: fields.description ?? title,
    status: fields.status ?? TaskStatus.PENDING,
    dependencies: [...(fields.dependencies ?? [])],
    labels: { ...(fields.labels ?? {}) },
    sourceRef: fields.sourceRef ?? "",
  };
}

export function isBlocked(task: Task, completedIds: ReadonlySet<string>): boolean {
  return task.dependencies.some((dep) => !completedIds.has(dep));
}

/**
 * Provider of tasks and their status. One orchestrator owns a source for
 * the duration of a run.
 */
export interface TaskSource {
  getTasks(): Promise<Task[]>;
  /** Tasks whose dependencies are all completed. */
  getReadyTasks(): Promise<Task[]>;
  updateStatus(taskId: string, status: TaskStatus): Promise<void>;
  claimTask(taskId: string): Promise<boolean>;
}

export class TaskSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TaskSourceError";
  }
}
