import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ManualClock } from "../src/core/clock.js";
import { openWorkspace, type Workspace } from "../src/core/workspace.js";
import { createMemoryLogger, type LogRecord } from "../src/log/logger.js";
import type { DataSource } from "../src/source/data-source.js";
import type { SealctlConfig } from "../src/types/config.js";
import type { Comment, Task, TaskSummary } from "../src/types/discourse.js";
import type { ProtocolDefinitionInput } from "../src/types/protocol.js";

export const T0 = "2026-03-01T00:00:00.000Z";
export const DAY_MS = 86_400_000;

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "sealctl-test-"));
}

export function makeTask(id: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    title: `Task ${id}`,
    tags: [],
    upvote_count: 0,
    comment_count: 0,
    created_at: "2026-02-01T00:00:00.000Z",
    ...overrides,
  };
}

export function makeComment(id: string, taskId: string, author: string, body: string, createdAt: string): Comment {
  return { id, task_id: taskId, author, body, created_at: createdAt };
}

export function testConfig(dataDir: string): SealctlConfig {
  return {
    schema_version: "1",
    data_dir: dataDir,
    log_level: "debug",
    source: {
      base_url: "http://platform.test/api/v1",
      token: "test-secret",
      limit: 50,
      timeout_ms: 1000,
      retry: { attempts: 3, base_delay_ms: 1, max_delay_ms: 4 },
    },
    structural: { new_max_age_days: 1, theory_min_comments: 10, theory_min_age_days: 7, high_ratio: 5 },
    analysis: { scope: "sealed_prefix" },
    schedule: { interval_ms: 60_000 },
  };
}

/** In-process data source over a fixed task/comment set. */
export class FakeSource implements DataSource {
  readonly missing = new Set<string>();
  listCalls = 0;

  constructor(
    public tasks: Task[],
    public comments: Comment[] = [],
  ) {}

  async listTasks(): Promise<TaskSummary[]> {
    this.listCalls++;
    return this.tasks.map((t) => ({ id: t.id }));
  }

  async getTaskDetail(id: string): Promise<Task | null> {
    if (this.missing.has(id)) return null;
    return this.tasks.find((t) => t.id === id) ?? null;
  }

  async listComments(taskId: string): Promise<Comment[]> {
    return this.comments.filter((c) => c.task_id === taskId);
  }
}

export type TestWorkspace = Workspace & { clock: ManualClock; records: LogRecord[]; source: FakeSource };

export function makeWorkspace(dataDir: string, source = new FakeSource([]), start: string = T0): TestWorkspace {
  const { logger, records } = createMemoryLogger();
  const clock = new ManualClock(start);
  const ws = openWorkspace({ config: testConfig(dataDir), logger, clock, source });
  return { ...ws, clock, records, source };
}

/** One definition per metric kind. */
export const FULL_PROTOCOL: ProtocolDefinitionInput[] = [
  { name: "novelty", metric_kind: "semantic_novelty", parameters: { top_n: 3 } },
  { name: "synthesis", metric_kind: "conceptual_synthesis", parameters: {} },
  { name: "drift", metric_kind: "temporal_dynamics", parameters: {} },
  { name: "emergence", metric_kind: "collaborative_emergence", parameters: {} },
  { name: "surprise", metric_kind: "surprise", parameters: { baseline: "corpus" } },
];

export async function registerAll(ws: Workspace, defs: ProtocolDefinitionInput[] = FULL_PROTOCOL): Promise<void> {
  for (const def of defs) await ws.registry.register(def);
}
