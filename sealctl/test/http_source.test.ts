import { describe, expect, it } from "vitest";
import { NetworkError } from "../src/core/errors.js";
import { createMemoryLogger } from "../src/log/logger.js";
import { HttpDataSource, type FetchLike } from "../src/source/http-source.js";
import { TransientError, backoffDelay, withRetry } from "../src/source/retry.js";
import { testConfig } from "./helpers.js";

type Call = { url: string; headers: Record<string, string> };

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

/** Fake fetch answering from a queue of responses (or thrown errors). */
function fakeFetch(queue: Array<Response | Error>): { fetch: FetchLike; calls: Call[] } {
  const calls: Call[] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, headers: init.headers });
    const next = queue.shift();
    if (!next) throw new Error(`unexpected request: ${url}`);
    if (next instanceof Error) throw next;
    return next;
  };
  return { fetch, calls };
}

function makeSource(queue: Array<Response | Error>) {
  const { logger, records } = createMemoryLogger();
  const { fetch, calls } = fakeFetch(queue);
  const sleeps: number[] = [];
  const source = new HttpDataSource(testConfig("/tmp/unused").source, logger, {
    fetch,
    retryHooks: { sleep: async (ms) => void sleeps.push(ms), random: () => 0 },
  });
  return { source, calls, sleeps, records };
}

describe("HttpDataSource", () => {
  it("lists recent tasks with the bearer token", async () => {
    const { source, calls } = makeSource([jsonResponse(200, { tasks: [{ id: 1, title: "A" }, { id: "b" }] })]);

    expect(await source.listTasks()).toEqual([{ id: "1", title: "A" }, { id: "b" }]);
    expect(calls[0].url).toBe("http://platform.test/api/v1/tasks?limit=50&sort=recent");
    expect(calls[0].headers.Authorization).toBe("Bearer test-secret");
  });

  it("maps platform fields onto a task", async () => {
    const { source } = makeSource([
      jsonResponse(200, {
        task: {
          id: 42,
          title: "Shared allocator",
          description: null,
          upvotes: 3,
          pr_count: 2,
          merged_pr_count: 1,
          agent: { name: "ana" },
          created_at: "2026-02-01T00:00:00Z",
        },
      }),
    ]);

    expect(await source.getTaskDetail("42")).toEqual({
      id: "42",
      title: "Shared allocator",
      tags: [],
      upvote_count: 3,
      comment_count: 0,
      created_at: "2026-02-01T00:00:00Z",
      deliverable_count: 2,
      completed_deliverable_count: 1,
      author: "ana",
    });
  });

  it("resolves a missing task to null without retrying", async () => {
    const { source, calls } = makeSource([jsonResponse(404, { error: "not found" })]);
    expect(await source.getTaskDetail("x")).toBeNull();
    expect(calls).toHaveLength(1);
  });

  it("resolves a malformed task to null and logs it", async () => {
    const { source, records } = makeSource([jsonResponse(200, { task: { id: "x", created_at: "2026-02-01T00:00:00Z" } })]);
    expect(await source.getTaskDetail("x")).toBeNull();
    expect(records.filter((r) => r.code === "INVALID_RECORD")).toHaveLength(1);
  });

  it("retries 5xx responses with backoff", async () => {
    const { source, calls, sleeps, records } = makeSource([
      jsonResponse(503, {}),
      jsonResponse(429, {}),
      jsonResponse(200, { comments: [] }),
    ]);

    expect(await source.listComments("t1")).toEqual([]);
    expect(calls).toHaveLength(3);
    expect(sleeps).toEqual([1, 2]);
    expect(records.filter((r) => r.code === "RETRY")).toHaveLength(2);
  });

  it("retries transport errors", async () => {
    const { source, calls } = makeSource([new Error("socket hang up"), jsonResponse(200, { comments: [] })]);
    expect(await source.listComments("t1")).toEqual([]);
    expect(calls).toHaveLength(2);
  });

  it("gives up with NetworkError once attempts are spent", async () => {
    const { source } = makeSource([jsonResponse(502, {}), jsonResponse(502, {}), jsonResponse(502, {})]);
    const err = await source.getTaskDetail("t1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NetworkError);
    if (err instanceof NetworkError) {
      expect(err.attempts).toBe(3);
      expect(err.status).toBe(502);
    }
  });

  it("keeps valid comments and drops invalid ones", async () => {
    const { source, records } = makeSource([
      jsonResponse(200, {
        comments: [
          { id: 7, content: "agreed", agent: { name: "bo" }, created_at: "2026-02-03T00:00:00Z" },
          { id: 8, created_at: "2026-02-03T00:00:00Z" },
        ],
      }),
    ]);

    expect(await source.listComments("t1")).toEqual([
      { id: "7", task_id: "t1", author: "bo", body: "agreed", created_at: "2026-02-03T00:00:00Z" },
    ]);
    expect(records.filter((r) => r.code === "INVALID_RECORD")).toHaveLength(1);
  });
});

describe("retry policy", () => {
  const policy = { attempts: 5, base_delay_ms: 100, max_delay_ms: 1000 };

  it("doubles the delay up to the cap", () => {
    expect(backoffDelay(1, policy, () => 0)).toBe(100);
    expect(backoffDelay(4, policy, () => 0)).toBe(800);
    expect(backoffDelay(5, policy, () => 0)).toBe(1000);
  });

  it("adds at most ten percent jitter", () => {
    expect(backoffDelay(5, policy, () => 1)).toBe(1100);
  });

  it("rethrows non-transient errors immediately", async () => {
    let calls = 0;
    const run = withRetry("op", policy, async () => {
      calls++;
      throw new Error("bad request");
    });
    await expect(run).rejects.toThrow("bad request");
    expect(calls).toBe(1);
  });

  it("returns the first success", async () => {
    let calls = 0;
    const value = await withRetry(
      "op",
      policy,
      async () => {
        calls++;
        if (calls < 3) throw new TransientError("busy", 503);
        return "done";
      },
      { sleep: async () => undefined },
    );
    expect(value).toBe("done");
    expect(calls).toBe(3);
  });
});
