import type { Logger } from "../log/logger.js";
import { errorMessage } from "../core/errors.js";

export type Scored<T, R> = { item: T; value: R };

/**
 * Apply `fn` to every item concurrently. Rejections are counted and logged,
 * not propagated, so one bad item never sinks the batch.
 */
export async function scoreEach<T, R>(
  items: readonly T[],
  fn: (item: T) => Promise<R>,
  logger?: Logger,
  label = "item",
): Promise<{ scored: Scored<T, R>[]; failures: number }> {
  const settled = await Promise.allSettled(items.map((item) => fn(item)));
  const scored: Scored<T, R>[] = [];
  let failures = 0;
  settled.forEach((s, i) => {
    if (s.status === "fulfilled") {
      scored.push({ item: items[i], value: s.value });
    } else {
      failures++;
      logger?.warn("SCORE_FAILED", `Scoring ${label} ${i} failed: ${errorMessage(s.reason)}`);
    }
  });
  return { scored, failures };
}
