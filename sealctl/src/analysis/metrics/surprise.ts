import { scoreEach } from "../batch.js";
import { max, mean, round } from "../vector.js";
import { choiceParam, numberParam, type MetricComputer } from "./types.js";

/**
 * Surprisal of every comment against a baseline unigram model: either the
 * first window that has comments, or the whole corpus. Comments above
 * `threshold` bits/token are outliers.
 */
export const surprise: MetricComputer = async ({ corpus, scorer, parameters, logger }) => {
  const threshold = numberParam(parameters, "threshold", 12);
  const baselineKind = choiceParam(parameters, "baseline", ["first_window", "corpus"] as const, "first_window");

  const baselineComments =
    baselineKind === "corpus" ? corpus.comments : (corpus.windows.find((w) => w.comments.length > 0)?.comments ?? []);
  const baseline: readonly string[] = baselineComments.map((c) => c.body);

  const scored = await scoreEach(corpus.comments, (c) => scorer.surprisal(c.body, baseline), logger, "comment");
  const bits = scored.scored.map((s) => s.value);

  const outliers = scored.scored
    .filter((s) => s.value > threshold)
    .map((s) => ({ comment_id: s.item.id, task_id: s.item.task_id, bits: round(s.value) }))
    .sort((a, b) => b.bits - a.bits || a.comment_id.localeCompare(b.comment_id));

  const m = mean(bits);
  const top = max(bits);
  return {
    value: {
      baseline: baselineKind,
      baseline_comments: baseline.length,
      scored: bits.length,
      threshold,
      mean_bits: m === null ? null : round(m),
      max_bits: top === null ? null : round(top),
      outliers,
    },
    skipped_items: scored.failures,
  };
};
