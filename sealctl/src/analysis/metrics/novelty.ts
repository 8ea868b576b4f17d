import { InvalidArgumentError } from "../../core/errors.js";
import type { Task } from "../../types/discourse.js";
import { scoreEach } from "../batch.js";
import { byCreation, taskText } from "../corpus.js";
import { extractKeywords } from "../text.js";
import { centroid, cosineDistance, mean, norm, round } from "../vector.js";
import { numberParam, stringListParam, type MetricComputer } from "./types.js";

export const DEFAULT_BASELINE_PHRASES = [
  "thanks for sharing this",
  "great idea, I agree",
  "looks good to me",
  "interesting point, following this thread",
  "nice work on this task",
];

export type NoveltyClass = "PIONEER" | "EXPLORER" | "ITERATOR" | "VARIANT" | "ECHO";

export function classifyNovelty(score: number): NoveltyClass {
  if (score >= 0.8) return "PIONEER";
  if (score >= 0.6) return "EXPLORER";
  if (score >= 0.4) return "ITERATOR";
  if (score >= 0.2) return "VARIANT";
  return "ECHO";
}

/** Share of each task's keywords that no earlier task used. */
export function taskKeywordNovelty(tasks: readonly Task[]) {
  const prior = new Set<string>();
  return [...tasks].sort(byCreation).map((task) => {
    const keywords = extractKeywords(taskText(task));
    let fresh = 0;
    for (const k of keywords) if (!prior.has(k)) fresh++;
    for (const k of keywords) prior.add(k);
    const novelty = keywords.size === 0 ? 0 : fresh / keywords.size;
    return { task_id: task.id, novelty: round(novelty), keywords: keywords.size, class: classifyNovelty(novelty) };
  });
}

/**
 * Distance of each comment from the centroid of formulaic phrasing, aggregated
 * per task and per window, plus task-level keyword novelty.
 */
export const semanticNovelty: MetricComputer = async ({ corpus, scorer, parameters, logger }) => {
  const phrases = stringListParam(parameters, "baseline_phrases", DEFAULT_BASELINE_PHRASES);
  const topN = numberParam(parameters, "top_n", 5);

  const baseline = await scoreEach(phrases, (p) => scorer.embed(p), logger, "baseline phrase");
  const center = centroid(baseline.scored.map((s) => s.value).filter((v) => norm(v) > 0));
  if (!center || norm(center) === 0) {
    throw new InvalidArgumentError("No usable baseline phrase embeddings");
  }

  const embedded = await scoreEach(corpus.comments, (c) => scorer.embed(c.body), logger, "comment");
  const distances = new Map<string, number>();
  let empty = 0;
  for (const { item, value } of embedded.scored) {
    if (norm(value) === 0) {
      empty++;
      continue;
    }
    distances.set(item.id, cosineDistance(value, center));
  }

  const perTask = [...corpus.commentsByTask.entries()]
    .map(([taskId, comments]) => {
      const ds = comments.flatMap((c) => {
        const d = distances.get(c.id);
        return d === undefined ? [] : [d];
      });
      const m = mean(ds);
      return { task_id: taskId, comments: ds.length, mean_distance: m === null ? null : round(m) };
    })
    .sort((a, b) => a.task_id.localeCompare(b.task_id));

  const perWindow = corpus.windows.map((w) => {
    const ds = w.comments.flatMap((c) => {
      const d = distances.get(c.id);
      return d === undefined ? [] : [d];
    });
    const m = mean(ds);
    return { sequence_number: w.sequence_number, comments: ds.length, mean_distance: m === null ? null : round(m) };
  });

  const ranked = corpus.comments
    .flatMap((c) => {
      const d = distances.get(c.id);
      return d === undefined ? [] : [{ comment_id: c.id, task_id: c.task_id, distance: round(d) }];
    })
    .sort((a, b) => b.distance - a.distance || a.comment_id.localeCompare(b.comment_id));

  const overall = mean([...distances.values()]);
  const taskNovelty = taskKeywordNovelty(corpus.tasks);

  return {
    value: {
      scored_comments: distances.size,
      empty_comments: empty,
      mean_distance: overall === null ? null : round(overall),
      per_task: perTask,
      per_window: perWindow,
      most_novel_comments: ranked.slice(0, topN),
      task_novelty: {
        average: round(mean(taskNovelty.map((t) => t.novelty)) ?? 0),
        pioneers: taskNovelty.filter((t) => t.class === "PIONEER").length,
        echoes: taskNovelty.filter((t) => t.class === "ECHO").length,
        tasks: taskNovelty,
      },
    },
    skipped_items: baseline.failures + embedded.failures,
  };
};
