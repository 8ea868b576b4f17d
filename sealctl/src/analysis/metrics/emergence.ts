import type { Comment } from "../../types/discourse.js";
import { extractKeywords } from "../text.js";
import { numberParam, type MetricComputer } from "./types.js";

export type ThreadEmergence = {
  authors: number;
  emergent: string[];
};

/**
 * Concepts used by at least two authors of a multi-author thread that did not
 * already appear while only one author was talking. `comments` must be in
 * creation order. Returns null for single-author threads.
 */
export function threadEmergence(comments: readonly Comment[]): ThreadEmergence | null {
  const authors = new Set(comments.map((c) => c.author));
  if (authors.size < 2) return null;

  const firstAuthor = comments[0].author;
  const secondIdx = comments.findIndex((c) => c.author !== firstAuthor);

  const opening = new Set<string>();
  for (const c of comments.slice(0, secondIdx)) {
    for (const k of extractKeywords(c.body)) opening.add(k);
  }

  const usedBy = new Map<string, Set<string>>();
  for (const c of comments) {
    for (const k of extractKeywords(c.body)) {
      const set = usedBy.get(k) ?? new Set<string>();
      set.add(c.author);
      usedBy.set(k, set);
    }
  }

  const emergent = [...usedBy.entries()]
    .filter(([k, who]) => who.size >= 2 && !opening.has(k))
    .map(([k]) => k)
    .sort();
  return { authors: authors.size, emergent };
}

export const collaborativeEmergence: MetricComputer = async ({ corpus, parameters }) => {
  const maxExamples = numberParam(parameters, "max_examples", 5);

  const perTask: { task_id: string; authors: number; emergent_count: number; examples: string[] }[] = [];
  for (const [taskId, comments] of corpus.commentsByTask) {
    const result = threadEmergence(comments);
    if (!result) continue;
    perTask.push({
      task_id: taskId,
      authors: result.authors,
      emergent_count: result.emergent.length,
      examples: result.emergent.slice(0, maxExamples),
    });
  }
  perTask.sort((a, b) => b.emergent_count - a.emergent_count || a.task_id.localeCompare(b.task_id));

  return {
    value: {
      multi_author_tasks: perTask.length,
      tasks_with_emergence: perTask.filter((t) => t.emergent_count > 0).length,
      total_emergent: perTask.reduce((n, t) => n + t.emergent_count, 0),
      per_task: perTask,
    },
    skipped_items: 0,
  };
};
