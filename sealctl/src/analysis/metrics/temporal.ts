import { scoreEach } from "../batch.js";
import { taskText, type Window } from "../corpus.js";
import { extractKeywords, jaccardDistance } from "../text.js";
import { centroid, cosineDistance, mean, norm, round, type Vector } from "../vector.js";
import { numberParam, type MetricComputer } from "./types.js";

export function windowConcepts(w: Window): Set<string> {
  const out = new Set<string>();
  for (const t of w.tasks) for (const k of extractKeywords(taskText(t))) out.add(k);
  for (const c of w.comments) for (const k of extractKeywords(c.body)) out.add(k);
  return out;
}

/**
 * Drift between consecutive snapshot windows: Jaccard distance of concept
 * sets and the shift of the comment embedding centroid.
 */
export const temporalDynamics: MetricComputer = async ({ corpus, scorer, parameters, logger }) => {
  const maxTerms = numberParam(parameters, "max_terms", 10);

  const concepts = corpus.windows.map(windowConcepts);
  let skipped = 0;
  const centroids: (Vector | null)[] = [];
  for (const w of corpus.windows) {
    const embedded = await scoreEach(w.comments, (c) => scorer.embed(c.body), logger, "comment");
    skipped += embedded.failures;
    centroids.push(centroid(embedded.scored.map((s) => s.value).filter((v) => norm(v) > 0)));
  }

  const transitions = corpus.windows.slice(1).map((w, i) => {
    const prev = concepts[i];
    const cur = concepts[i + 1];
    const before = centroids[i];
    const after = centroids[i + 1];
    return {
      from: corpus.windows[i].sequence_number,
      to: w.sequence_number,
      jaccard_distance: round(jaccardDistance(prev, cur)),
      centroid_shift: before && after ? round(cosineDistance(before, after)) : null,
      entered: [...cur].filter((k) => !prev.has(k)).sort().slice(0, maxTerms),
      left: [...prev].filter((k) => !cur.has(k)).sort().slice(0, maxTerms),
    };
  });

  const meanJaccard = mean(transitions.map((t) => t.jaccard_distance));
  const shifts = transitions.flatMap((t) => (t.centroid_shift === null ? [] : [t.centroid_shift]));
  const meanShift = mean(shifts);

  return {
    value: {
      windows: corpus.windows.map((w, i) => ({
        sequence_number: w.sequence_number,
        collected_at: w.collected_at,
        comments: w.comments.length,
        concepts: concepts[i].size,
      })),
      transitions,
      mean_jaccard_distance: meanJaccard === null ? null : round(meanJaccard),
      mean_centroid_shift: meanShift === null ? null : round(meanShift),
    },
    skipped_items: skipped,
  };
};
