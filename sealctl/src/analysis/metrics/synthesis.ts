import type { Task } from "../../types/discourse.js";
import { taskText, type Corpus } from "../corpus.js";
import { extractKeywords } from "../text.js";
import { numberParam, type MetricComputer } from "./types.js";

/** Concepts of a task: keywords of its title, description and comments. */
export function taskConcepts(corpus: Corpus): Map<string, Set<string>> {
  const out = new Map<string, Set<string>>();
  for (const task of corpus.tasks) {
    const concepts = extractKeywords(taskText(task));
    for (const c of corpus.commentsByTask.get(task.id) ?? []) {
      for (const k of extractKeywords(c.body)) concepts.add(k);
    }
    out.set(task.id, concepts);
  }
  return out;
}

/** Tasks are related when they share a tag. */
function related(a: Task, b: Task): boolean {
  const tags = new Set(a.tags.map((t) => t.toLowerCase()));
  return b.tags.some((t) => tags.has(t.toLowerCase()));
}

/**
 * Concepts that turn up in otherwise unrelated tasks (no shared tag), and the
 * task pairs they connect.
 */
export const conceptualSynthesis: MetricComputer = async ({ corpus, parameters }) => {
  const minTasks = numberParam(parameters, "min_tasks", 2);
  const minShared = numberParam(parameters, "min_shared", 1);
  const maxPairs = numberParam(parameters, "max_pairs", 20);

  const concepts = taskConcepts(corpus);
  const tasks = corpus.tasks;

  const pairs: { a: string; b: string; shared: string[] }[] = [];
  const bridging = new Map<string, Set<string>>();

  for (let i = 0; i < tasks.length; i++) {
    for (let j = i + 1; j < tasks.length; j++) {
      const a = tasks[i];
      const b = tasks[j];
      if (related(a, b)) continue;
      const ca = concepts.get(a.id) ?? new Set<string>();
      const cb = concepts.get(b.id) ?? new Set<string>();
      const shared = [...ca].filter((k) => cb.has(k)).sort();
      if (shared.length === 0) continue;

      for (const k of shared) {
        const set = bridging.get(k) ?? new Set<string>();
        set.add(a.id).add(b.id);
        bridging.set(k, set);
      }
      if (shared.length >= minShared) {
        const [first, second] = a.id < b.id ? [a.id, b.id] : [b.id, a.id];
        pairs.push({ a: first, b: second, shared });
      }
    }
  }

  pairs.sort((x, y) => y.shared.length - x.shared.length || x.a.localeCompare(y.a) || x.b.localeCompare(y.b));

  const bridgingConcepts = [...bridging.entries()]
    .filter(([, ids]) => ids.size >= minTasks)
    .map(([concept, ids]) => ({ concept, tasks: [...ids].sort() }))
    .sort((x, y) => y.tasks.length - x.tasks.length || x.concept.localeCompare(y.concept));

  return {
    value: {
      tasks: tasks.length,
      total_pairs: pairs.length,
      pairs: pairs.slice(0, maxPairs),
      bridging_concepts: bridgingConcepts,
    },
    skipped_items: 0,
  };
};
