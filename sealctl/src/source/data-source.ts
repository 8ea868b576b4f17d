import type { Comment, Task, TaskSummary } from "../types/discourse.js";

/**
 * Read side of the collaboration platform.
 * `getTaskDetail` resolving to null is an expected outcome (permissions,
 * rate limiting, a changed response shape) and is handled as a soft failure.
 */
export interface DataSource {
  listTasks(): Promise<TaskSummary[]>;
  getTaskDetail(id: string): Promise<Task | null>;
  listComments(taskId: string): Promise<Comment[]>;
}

/** An item the collector skipped without aborting the batch. */
export type SoftFailure = {
  task_id: string;
  stage: "detail" | "comments";
  reason: string;
};
