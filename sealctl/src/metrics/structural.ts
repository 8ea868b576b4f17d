import type { StructuralThresholds } from "../types/config.js";
import type { SnapshotMeta, TaskStats } from "../types/snapshot.js";

export const CATEGORIES = ["SHIPPED", "BUILDING", "THEORY", "ALL_TALK", "NEW", "DORMANT"] as const;

export type Category = (typeof CATEGORIES)[number];

export const DEFAULT_THRESHOLDS: StructuralThresholds = {
  new_max_age_days: 1,
  theory_min_comments: 10,
  theory_min_age_days: 7,
  high_ratio: 5,
};

const DAY_MS = 86_400_000;

export type TaskRow = {
  id: string;
  category: Category;
  comments: number;
  deliverables: number;
  completed: number;
  ratio: number;
  age_days: number;
};

export type TalkToCodeReport = {
  snapshot: { sequence_number: number; collected_at: string } | null;
  totals: {
    tasks: number;
    comments: number;
    deliverables: number;
    completed_deliverables: number;
    overall_ratio: number;
    tasks_with_deliverables: number;
    all_talk: number;
    high_ratio: number;
  };
  by_category: Record<Category, number>;
  rows: TaskRow[];
  insights: {
    most_discourse_heavy: { id: string; comments: number } | null;
    highest_code_to_talk: { id: string; deliverables: number; comments: number } | null;
    average_ratio_with_deliverables: number | null;
  };
};

export type ActivityPoint = {
  sequence_number: number;
  collected_at: string;
  tasks: number;
  comments: number;
  deliverables: number;
};

function deliverables(stats: TaskStats): number {
  return Math.max(stats.deliverable_count, stats.completed_deliverable_count);
}

export function ageDays(stats: TaskStats, now: Date): number {
  return (now.getTime() - new Date(stats.created_at).getTime()) / DAY_MS;
}

/** Comments per deliverable; a task without deliverables divides by one. */
export function ratio(stats: TaskStats): number {
  return stats.comment_count / Math.max(deliverables(stats), 1);
}

/**
 * Discourse/delivery category from counts alone.
 * Priority SHIPPED > BUILDING > ALL_TALK > THEORY > NEW, except that THEORY,
 * being a stricter form of ALL_TALK, wins over it. Inactive tasks past the NEW
 * window are DORMANT.
 */
export function classifyTask(
  stats: TaskStats,
  now: Date,
  thresholds: StructuralThresholds = DEFAULT_THRESHOLDS,
): Category {
  const delivered = deliverables(stats);
  const age = ageDays(stats, now);

  if (stats.completed_deliverable_count >= 1) return "SHIPPED";
  if (delivered > 0) return "BUILDING";
  if (stats.comment_count > 0) {
    if (stats.comment_count >= thresholds.theory_min_comments && age >= thresholds.theory_min_age_days) {
      return "THEORY";
    }
    return "ALL_TALK";
  }
  if (age < thresholds.new_max_age_days) return "NEW";
  return "DORMANT";
}

function emptyCategoryCounts(): Record<Category, number> {
  return { SHIPPED: 0, BUILDING: 0, THEORY: 0, ALL_TALK: 0, NEW: 0, DORMANT: 0 };
}

/** Talk-to-code report over one snapshot's task stats. Reads counts only. */
export function talkToCode(
  meta: SnapshotMeta | null,
  now: Date,
  thresholds: StructuralThresholds = DEFAULT_THRESHOLDS,
): TalkToCodeReport {
  const stats = meta?.task_stats ?? [];
  const byCategory = emptyCategoryCounts();

  const rows: TaskRow[] = stats.map((s) => {
    const category = classifyTask(s, now, thresholds);
    byCategory[category]++;
    return {
      id: s.id,
      category,
      comments: s.comment_count,
      deliverables: deliverables(s),
      completed: s.completed_deliverable_count,
      ratio: ratio(s),
      age_days: Math.floor(ageDays(s, now)),
    };
  });

  rows.sort((a, b) => b.ratio - a.ratio || b.comments - a.comments || a.id.localeCompare(b.id));

  const totalComments = rows.reduce((n, r) => n + r.comments, 0);
  const totalDeliverables = rows.reduce((n, r) => n + r.deliverables, 0);
  const withDeliverables = rows.filter((r) => r.deliverables > 0);
  const allTalk = rows.filter((r) => r.deliverables === 0 && r.comments > 0);

  const mostDiscourse = allTalk.reduce<TaskRow | null>((best, r) => (!best || r.comments > best.comments ? r : best), null);
  const bestBuilder = withDeliverables.reduce<TaskRow | null>(
    (best, r) => (!best || r.ratio < best.ratio || (r.ratio === best.ratio && r.deliverables > best.deliverables) ? r : best),
    null,
  );

  return {
    snapshot: meta ? { sequence_number: meta.sequence_number, collected_at: meta.collected_at } : null,
    totals: {
      tasks: rows.length,
      comments: totalComments,
      deliverables: totalDeliverables,
      completed_deliverables: rows.reduce((n, r) => n + r.completed, 0),
      overall_ratio: totalComments / Math.max(totalDeliverables, 1),
      tasks_with_deliverables: withDeliverables.length,
      all_talk: allTalk.length,
      high_ratio: withDeliverables.filter((r) => r.ratio > thresholds.high_ratio).length,
    },
    by_category: byCategory,
    rows,
    insights: {
      most_discourse_heavy: mostDiscourse ? { id: mostDiscourse.id, comments: mostDiscourse.comments } : null,
      highest_code_to_talk: bestBuilder
        ? { id: bestBuilder.id, deliverables: bestBuilder.deliverables, comments: bestBuilder.comments }
        : null,
      average_ratio_with_deliverables:
        withDeliverables.length > 0 ? withDeliverables.reduce((n, r) => n + r.ratio, 0) / withDeliverables.length : null,
    },
  };
}

/** Activity volume per snapshot, from the chain index. */
export function activityTrend(metas: SnapshotMeta[]): ActivityPoint[] {
  return metas.map((m) => ({
    sequence_number: m.sequence_number,
    collected_at: m.collected_at,
    tasks: m.task_count,
    comments: m.task_stats.reduce((n, s) => n + s.comment_count, 0),
    deliverables: m.task_stats.reduce((n, s) => n + deliverables(s), 0),
  }));
}
