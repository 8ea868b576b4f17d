import type { Comment, Task } from "./discourse.js";

export type SnapshotPayload = {
  tasks: Task[];
  comments: Comment[];
};

/** One hash-chained capture of the collected data. */
export type Snapshot = {
  sequence_number: number;
  collected_at: string;
  content_hash: string;
  previous_hash: string;
  payload: SnapshotPayload;
};

/** Per-task activity counts. Carries no text, so it is readable while sealed. */
export type TaskStats = {
  id: string;
  comment_count: number;
  upvote_count: number;
  deliverable_count: number;
  completed_deliverable_count: number;
  created_at: string;
};

/** Chain index entry (chain.json). */
export type SnapshotMeta = {
  sequence_number: number;
  collected_at: string;
  content_hash: string;
  previous_hash: string;
  task_count: number;
  comment_count: number;
  task_stats: TaskStats[];
};

export type ChainIndex = {
  schema_version: 1;
  snapshots: SnapshotMeta[];
};

export type ChainInspection =
  | { ok: true; checked: number; head: string }
  | { ok: false; broken_at: number; reason: string };
