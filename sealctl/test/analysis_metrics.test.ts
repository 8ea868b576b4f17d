import { describe, expect, it } from "vitest";
import { buildCorpus, type Corpus } from "../src/analysis/corpus.js";
import { collaborativeEmergence, threadEmergence } from "../src/analysis/metrics/emergence.js";
import { classifyNovelty, semanticNovelty } from "../src/analysis/metrics/novelty.js";
import { surprise } from "../src/analysis/metrics/surprise.js";
import { conceptualSynthesis } from "../src/analysis/metrics/synthesis.js";
import { temporalDynamics } from "../src/analysis/metrics/temporal.js";
import type { SemanticScorer } from "../src/analysis/scorer.js";
import type { Vector } from "../src/analysis/vector.js";
import type { Comment, Task } from "../src/types/discourse.js";
import type { Snapshot } from "../src/types/snapshot.js";
import { makeComment, makeTask } from "./helpers.js";

/** Scorer answering from fixed tables; unknown text embeds to the zero vector. */
class TableScorer implements SemanticScorer {
  readonly id = "table";

  constructor(
    private readonly vectors: Record<string, Vector>,
    private readonly bits: Record<string, number> = {},
    private readonly failOn = new Set<string>(),
  ) {}

  async embed(text: string): Promise<Vector> {
    if (this.failOn.has(text)) throw new Error("scorer unavailable");
    return this.vectors[text] ?? [0, 0];
  }

  async surprisal(text: string): Promise<number> {
    if (this.failOn.has(text)) throw new Error("scorer unavailable");
    return this.bits[text] ?? 0;
  }
}

const T1 = makeTask("t1", { title: "Memory allocator", tags: ["systems"], created_at: "2026-02-01T00:00:00.000Z" });
const T2 = makeTask("t2", { title: "Garden planner", tags: ["hobby"], created_at: "2026-02-05T00:00:00.000Z" });
const T3 = makeTask("t3", { title: "Garden arena", tags: ["Hobby"], created_at: "2026-02-09T00:00:00.000Z" });

const C1 = makeComment("c1", "t1", "ana", "allocator arena design", "2026-02-02T00:00:00.000Z");
const C2 = makeComment("c2", "t1", "bo", "arena fragmentation benchmark", "2026-02-03T00:00:00.000Z");
const C3 = makeComment("c3", "t2", "cy", "seedling arena layout", "2026-02-10T00:00:00.000Z");
const C4 = makeComment("c4", "t1", "ana", "fragmentation tests pass", "2026-02-11T00:00:00.000Z");

function snapshot(seq: number, tasks: Task[], comments: Comment[]): Snapshot {
  return {
    sequence_number: seq,
    collected_at: `2026-03-0${seq + 1}T00:00:00.000Z`,
    content_hash: "",
    previous_hash: "",
    payload: { tasks, comments },
  };
}

function corpus(): Corpus {
  return buildCorpus([snapshot(0, [T1, T2], [C1, C2]), snapshot(1, [T1, T2, T3], [C1, C2, C3, C4])]);
}

const scorer = new TableScorer(
  {
    boilerplate: [1, 0],
    [C1.body]: [1, 0],
    [C2.body]: [0, 1],
    [C3.body]: [0, 1],
    [C4.body]: [1, 1],
  },
  { [C1.body]: 2, [C2.body]: 14, [C3.body]: 13, [C4.body]: 5 },
);

describe("buildCorpus", () => {
  it("de-duplicates content and assigns it to the window it first appeared in", () => {
    const c = corpus();
    expect(c.tasks.map((t) => t.id)).toEqual(["t1", "t2", "t3"]);
    expect(c.comments.map((x) => x.id)).toEqual(["c1", "c2", "c3", "c4"]);
    expect(c.windows.map((w) => w.comments.map((x) => x.id))).toEqual([["c1", "c2"], ["c3", "c4"]]);
    expect(c.windows[1].tasks.map((t) => t.id)).toEqual(["t3"]);
    expect(c.commentsByTask.get("t1")?.map((x) => x.id)).toEqual(["c1", "c2", "c4"]);
  });

  it("keeps the latest version of a task", () => {
    const edited = { ...T1, title: "Arena allocator" };
    const c = buildCorpus([snapshot(0, [T1], []), snapshot(1, [edited], [])]);
    expect(c.tasks[0].title).toBe("Arena allocator");
  });
});

describe("semantic novelty", () => {
  it("measures distance from the baseline centroid", async () => {
    const out = await semanticNovelty({ corpus: corpus(), scorer, parameters: { baseline_phrases: ["boilerplate"], top_n: 2 } });

    expect(out.skipped_items).toBe(0);
    expect(out.value).toMatchObject({
      scored_comments: 4,
      empty_comments: 0,
      mean_distance: 0.5732,
      per_task: [
        { task_id: "t1", comments: 3, mean_distance: 0.431 },
        { task_id: "t2", comments: 1, mean_distance: 1 },
      ],
      per_window: [
        { sequence_number: 0, comments: 2, mean_distance: 0.5 },
        { sequence_number: 1, comments: 2, mean_distance: 0.6464 },
      ],
      most_novel_comments: [
        { comment_id: "c2", task_id: "t1", distance: 1 },
        { comment_id: "c3", task_id: "t2", distance: 1 },
      ],
    });
  });

  it("rates task keyword novelty against earlier tasks", async () => {
    const out = await semanticNovelty({ corpus: corpus(), scorer, parameters: { baseline_phrases: ["boilerplate"] } });
    expect(out.value.task_novelty).toEqual({
      average: 0.8333,
      pioneers: 2,
      echoes: 0,
      tasks: [
        { task_id: "t1", novelty: 1, keywords: 2, class: "PIONEER" },
        { task_id: "t2", novelty: 1, keywords: 2, class: "PIONEER" },
        { task_id: "t3", novelty: 0.5, keywords: 2, class: "ITERATOR" },
      ],
    });
  });

  it("counts empty embeddings and skips scorer failures", async () => {
    const flaky = new TableScorer({ boilerplate: [1, 0], [C2.body]: [0, 1] }, {}, new Set([C3.body]));
    const out = await semanticNovelty({ corpus: corpus(), scorer: flaky, parameters: { baseline_phrases: ["boilerplate"] } });
    expect(out.skipped_items).toBe(1);
    expect(out.value).toMatchObject({ scored_comments: 1, empty_comments: 2, mean_distance: 1 });
  });

  it("fails without a usable baseline", async () => {
    await expect(
      semanticNovelty({ corpus: corpus(), scorer, parameters: { baseline_phrases: ["unknown phrase"] } }),
    ).rejects.toThrow("No usable baseline");
  });

  it("rejects a malformed parameter", async () => {
    await expect(semanticNovelty({ corpus: corpus(), scorer, parameters: { top_n: "five" } })).rejects.toThrow(
      "top_n must be a number",
    );
  });

  it("classifies novelty scores", () => {
    expect([0.9, 0.7, 0.5, 0.3, 0.1].map(classifyNovelty)).toEqual(["PIONEER", "EXPLORER", "ITERATOR", "VARIANT", "ECHO"]);
  });
});

describe("conceptual synthesis", () => {
  it("finds concepts shared by tasks without a common tag", async () => {
    const out = await conceptualSynthesis({ corpus: corpus(), scorer, parameters: {} });
    expect(out.value).toEqual({
      tasks: 3,
      total_pairs: 2,
      pairs: [
        { a: "t1", b: "t2", shared: ["arena"] },
        { a: "t1", b: "t3", shared: ["arena"] },
      ],
      bridging_concepts: [{ concept: "arena", tasks: ["t1", "t2", "t3"] }],
    });
  });

  it("applies min_shared to pairs", async () => {
    const out = await conceptualSynthesis({ corpus: corpus(), scorer, parameters: { min_shared: 2 } });
    expect(out.value.total_pairs).toBe(0);
  });
});

describe("temporal dynamics", () => {
  it("reports concept and centroid drift between windows", async () => {
    const out = await temporalDynamics({ corpus: corpus(), scorer, parameters: {} });
    expect(out.value).toEqual({
      windows: [
        { sequence_number: 0, collected_at: "2026-03-01T00:00:00.000Z", comments: 2, concepts: 8 },
        { sequence_number: 1, collected_at: "2026-03-02T00:00:00.000Z", comments: 2, concepts: 7 },
      ],
      transitions: [
        {
          from: 0,
          to: 1,
          jaccard_distance: 0.75,
          centroid_shift: 0.0513,
          entered: ["layout", "pass", "seedling", "tests"],
          left: ["allocator", "benchmark", "design", "memory", "planner"],
        },
      ],
      mean_jaccard_distance: 0.75,
      mean_centroid_shift: 0.0513,
    });
  });

  it("has no transitions for a single window", async () => {
    const single = buildCorpus([snapshot(0, [T1], [C1])]);
    const out = await temporalDynamics({ corpus: single, scorer, parameters: {} });
    expect(out.value).toMatchObject({ transitions: [], mean_jaccard_distance: null, mean_centroid_shift: null });
  });
});

describe("collaborative emergence", () => {
  it("finds concepts adopted after a second author joined", () => {
    expect(threadEmergence([C1, C2, C4])).toEqual({ authors: 2, emergent: ["fragmentation"] });
  });

  it("ignores single-author threads", () => {
    expect(threadEmergence([C3])).toBeNull();
  });

  it("summarises threads across the corpus", async () => {
    const out = await collaborativeEmergence({ corpus: corpus(), scorer, parameters: {} });
    expect(out.value).toEqual({
      multi_author_tasks: 1,
      tasks_with_emergence: 1,
      total_emergent: 1,
      per_task: [{ task_id: "t1", authors: 2, emergent_count: 1, examples: ["fragmentation"] }],
    });
  });
});

describe("surprise", () => {
  it("flags comments above the threshold against the first window", async () => {
    const out = await surprise({ corpus: corpus(), scorer, parameters: {} });
    expect(out.value).toEqual({
      baseline: "first_window",
      baseline_comments: 2,
      scored: 4,
      threshold: 12,
      mean_bits: 8.5,
      max_bits: 14,
      outliers: [
        { comment_id: "c2", task_id: "t1", bits: 14 },
        { comment_id: "c3", task_id: "t2", bits: 13 },
      ],
    });
  });

  it("can use the whole corpus as baseline", async () => {
    const out = await surprise({ corpus: corpus(), scorer, parameters: { baseline: "corpus", threshold: 13.5 } });
    expect(out.value).toMatchObject({ baseline: "corpus", baseline_comments: 4, outliers: [{ comment_id: "c2", task_id: "t1", bits: 14 }] });
  });

  it("rejects an unknown baseline", async () => {
    await expect(surprise({ corpus: corpus(), scorer, parameters: { baseline: "yesterday" } })).rejects.toThrow(
      "baseline must be one of first_window, corpus",
    );
  });
});
