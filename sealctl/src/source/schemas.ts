import { compileValidator } from "../schema/ajv.js";
import type { Comment, Task, TaskSummary } from "../types/discourse.js";

/** Task shape as the platform returns it. Unknown fields are ignored. */
export type RawTask = {
  id: string | number;
  title: string;
  description?: string | null;
  tags?: string[];
  upvote_count?: number;
  upvotes?: number;
  comment_count?: number;
  pr_count?: number;
  merged_pr_count?: number;
  status?: string;
  agent?: { name?: string } | null;
  created_at: string;
};

export type RawComment = {
  id: string | number;
  task_id?: string | number;
  author?: string;
  agent?: { name?: string } | null;
  body?: string;
  content?: string;
  created_at: string;
};

const ID = { anyOf: [{ type: "string", minLength: 1 }, { type: "integer" }] };
const COUNT = { type: "integer", minimum: 0 };
const AGENT = { anyOf: [{ type: "null" }, { type: "object", properties: { name: { type: "string" } } }] };

const RAW_TASK_SCHEMA = {
  type: "object",
  required: ["id", "title", "created_at"],
  properties: {
    id: ID,
    title: { type: "string" },
    description: { anyOf: [{ type: "string" }, { type: "null" }] },
    tags: { type: "array", items: { type: "string" } },
    upvote_count: COUNT,
    upvotes: COUNT,
    comment_count: COUNT,
    pr_count: COUNT,
    merged_pr_count: COUNT,
    status: { type: "string" },
    agent: AGENT,
    created_at: { type: "string", format: "date-time" },
  },
};

const RAW_COMMENT_SCHEMA = {
  type: "object",
  required: ["id", "created_at"],
  anyOf: [
    { type: "object", required: ["body"], properties: { body: { type: "string" } } },
    { type: "object", required: ["content"], properties: { content: { type: "string" } } },
  ],
  properties: {
    id: ID,
    task_id: ID,
    author: { type: "string" },
    agent: AGENT,
    body: { type: "string" },
    content: { type: "string" },
    created_at: { type: "string", format: "date-time" },
  },
};

const RAW_SUMMARY_SCHEMA = {
  type: "object",
  required: ["id"],
  properties: {
    id: ID,
    title: { type: "string" },
    comment_count: COUNT,
  },
};

const rawTask = compileValidator<RawTask>(RAW_TASK_SCHEMA, "task");
const rawComment = compileValidator<RawComment>(RAW_COMMENT_SCHEMA, "comment");
const rawSummary = compileValidator<{ id: string | number; title?: string; comment_count?: number }>(RAW_SUMMARY_SCHEMA, "task");

export type Checked<T> = { ok: true; value: T } | { ok: false; reason: string };

export function checkTask(raw: unknown): Checked<Task> {
  if (!rawTask.is(raw)) return { ok: false, reason: rawTask.lastErrors() };
  const task: Task = {
    id: String(raw.id),
    title: raw.title,
    tags: raw.tags ?? [],
    upvote_count: raw.upvote_count ?? raw.upvotes ?? 0,
    comment_count: raw.comment_count ?? 0,
    created_at: raw.created_at,
    deliverable_count: raw.pr_count ?? 0,
    completed_deliverable_count: raw.merged_pr_count ?? 0,
  };
  if (raw.description) task.description = raw.description;
  if (raw.agent?.name) task.author = raw.agent.name;
  if (raw.status) task.status = raw.status;
  return { ok: true, value: task };
}

export function checkComment(raw: unknown, taskId: string): Checked<Comment> {
  if (!rawComment.is(raw)) return { ok: false, reason: rawComment.lastErrors() };
  return {
    ok: true,
    value: {
      id: String(raw.id),
      task_id: raw.task_id !== undefined ? String(raw.task_id) : taskId,
      author: raw.author ?? raw.agent?.name ?? "unknown",
      body: raw.body ?? raw.content ?? "",
      created_at: raw.created_at,
    },
  };
}

export function checkSummary(raw: unknown): Checked<TaskSummary> {
  if (!rawSummary.is(raw)) return { ok: false, reason: rawSummary.lastErrors() };
  const summary: TaskSummary = { id: String(raw.id) };
  if (raw.title !== undefined) summary.title = raw.title;
  if (raw.comment_count !== undefined) summary.comment_count = raw.comment_count;
  return { ok: true, value: summary };
}
