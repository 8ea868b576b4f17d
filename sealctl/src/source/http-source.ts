import { errorMessage } from "../core/errors.js";
import type { Logger } from "../log/logger.js";
import type { Comment, Task, TaskSummary } from "../types/discourse.js";
import type { SourceConfig } from "../types/config.js";
import type { DataSource } from "./data-source.js";
import { TransientError, withRetry, type RetryHooks } from "./retry.js";
import { checkComment, checkSummary, checkTask } from "./schemas.js";

export type FetchLike = (url: string, init: { headers: Record<string, string>; signal: AbortSignal }) => Promise<Response>;

export type HttpDataSourceOptions = {
  fetch?: FetchLike;
  retryHooks?: RetryHooks;
};

/**
 * REST client for the collaboration platform:
 *   GET /tasks?limit=&sort=recent   → { tasks: [...] }
 *   GET /tasks/:id                  → { task: {...} }
 *   GET /tasks/:id/comments         → { comments: [...] }
 *
 * 429 and 5xx responses and transport errors are retried with backoff.
 * A missing or malformed task detail resolves to null.
 */
export class HttpDataSource implements DataSource {
  private readonly fetchImpl: FetchLike;
  private readonly retryHooks: RetryHooks;

  constructor(
    private readonly config: SourceConfig,
    private readonly logger: Logger,
    opts: HttpDataSourceOptions = {},
  ) {
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.retryHooks = {
      ...opts.retryHooks,
      onRetry: (attempt, delayMs, error) => {
        this.logger.warn("RETRY", `Attempt ${attempt} failed, retrying in ${delayMs}ms`, { error: error.message });
        opts.retryHooks?.onRetry?.(attempt, delayMs, error);
      },
    };
  }

  async listTasks(): Promise<TaskSummary[]> {
    const body = await this.getJson(`/tasks?limit=${this.config.limit}&sort=recent`);
    const list = body && typeof body === "object" && "tasks" in body ? body.tasks : null;
    if (!Array.isArray(list)) {
      throw new Error("Task list response has no `tasks` array");
    }

    const out: TaskSummary[] = [];
    for (const raw of list) {
      const checked = checkSummary(raw);
      if (checked.ok) out.push(checked.value);
      else this.logger.warn("INVALID_RECORD", "Skipping malformed task list entry", { reason: checked.reason });
    }
    return out;
  }

  async getTaskDetail(id: string): Promise<Task | null> {
    const body = await this.getJson(`/tasks/${encodeURIComponent(id)}`);
    if (body === null) return null;

    const raw = typeof body === "object" && "task" in body ? body.task : null;
    if (raw === null || raw === undefined) return null;

    const checked = checkTask(raw);
    if (!checked.ok) {
      this.logger.warn("INVALID_RECORD", `Task ${id} detail failed validation`, { reason: checked.reason });
      return null;
    }
    return checked.value;
  }

  async listComments(taskId: string): Promise<Comment[]> {
    const body = await this.getJson(`/tasks/${encodeURIComponent(taskId)}/comments`);
    const list = body && typeof body === "object" && "comments" in body ? body.comments : [];
    if (!Array.isArray(list)) return [];

    const out: Comment[] = [];
    for (const raw of list) {
      const checked = checkComment(raw, taskId);
      if (checked.ok) out.push(checked.value);
      else this.logger.warn("INVALID_RECORD", `Skipping malformed comment on task ${taskId}`, { reason: checked.reason });
    }
    return out;
  }

  /** GET a JSON document. 4xx other than 429 resolves to null. */
  private async getJson(pathAndQuery: string): Promise<object | null> {
    const url = this.config.base_url.replace(/\/+$/, "") + pathAndQuery;
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.config.token) headers.Authorization = `Bearer ${this.config.token}`;

    return withRetry(
      `GET ${pathAndQuery}`,
      this.config.retry,
      async () => {
        let res: Response;
        try {
          res = await this.fetchImpl(url, { headers, signal: AbortSignal.timeout(this.config.timeout_ms) });
        } catch (e: unknown) {
          throw new TransientError(errorMessage(e));
        }

        if (res.status === 429 || res.status >= 500) {
          throw new TransientError(`HTTP ${res.status}`, res.status);
        }
        if (!res.ok) {
          this.logger.debug("HTTP_STATUS", `GET ${pathAndQuery} returned ${res.status}`);
          return null;
        }

        const json: unknown = await res.json();
        return json !== null && typeof json === "object" ? json : null;
      },
      this.retryHooks,
    );
  }
}
