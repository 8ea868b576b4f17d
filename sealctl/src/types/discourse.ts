/** Discourse records collected from the collaboration platform. */
export type Task = {
  id: string;
  title: string;
  tags: string[];
  upvote_count: number;
  comment_count: number;
  created_at: string;
  description?: string;
  author?: string;
  status?: string;
  /** Pull requests (or other deliverables) attached to the task. */
  deliverable_count?: number;
  /** Deliverables marked merged / complete. */
  completed_deliverable_count?: number;
};

/** Task list entry. Only the id is guaranteed by the list endpoint. */
export type TaskSummary = {
  id: string;
  title?: string;
  comment_count?: number;
};

export type Comment = {
  id: string;
  task_id: string;
  author: string;
  body: string;
  created_at: string;
};
