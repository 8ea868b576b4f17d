import type { Comment, Task } from "../types/discourse.js";
import type { Snapshot } from "../types/snapshot.js";

/** Content first seen in one snapshot. */
export type Window = {
  sequence_number: number;
  collected_at: string;
  tasks: Task[];
  comments: Comment[];
};

export type Corpus = {
  /** Latest stored version of every task. */
  tasks: Task[];
  /** Every comment once, ordered by creation time. */
  comments: Comment[];
  commentsByTask: Map<string, Comment[]>;
  windows: Window[];
};

export function byCreation<T extends { created_at: string; id: string }>(a: T, b: T): number {
  return a.created_at.localeCompare(b.created_at) || a.id.localeCompare(b.id);
}

/** Fold an ordered snapshot range into a de-duplicated corpus. */
export function buildCorpus(snapshots: readonly Snapshot[]): Corpus {
  const tasks = new Map<string, Task>();
  const comments = new Map<string, Comment>();
  const windows: Window[] = [];

  for (const snapshot of snapshots) {
    const window: Window = {
      sequence_number: snapshot.sequence_number,
      collected_at: snapshot.collected_at,
      tasks: [],
      comments: [],
    };
    for (const task of snapshot.payload.tasks) {
      if (!tasks.has(task.id)) window.tasks.push(task);
      tasks.set(task.id, task);
    }
    for (const comment of snapshot.payload.comments) {
      if (comments.has(comment.id)) continue;
      comments.set(comment.id, comment);
      window.comments.push(comment);
    }
    window.comments.sort(byCreation);
    windows.push(window);
  }

  const ordered = [...comments.values()].sort(byCreation);
  const commentsByTask = new Map<string, Comment[]>();
  for (const c of ordered) {
    const list = commentsByTask.get(c.task_id);
    if (list) list.push(c);
    else commentsByTask.set(c.task_id, [c]);
  }

  return {
    tasks: [...tasks.values()].sort(byCreation),
    comments: ordered,
    commentsByTask,
    windows,
  };
}

export function taskText(task: Pick<Task, "title" | "description">): string {
  return `${task.title} ${task.description ?? ""}`;
}
