import type { Workspace } from "../core/workspace.js";
import { activityTrend, talkToCode as buildReport, type ActivityPoint, type TalkToCodeReport } from "../metrics/structural.js";
import { runCommand, type CommandResult } from "./exit-codes.js";

export type TalkToCodeResult = CommandResult<{ report: TalkToCodeReport; trend: ActivityPoint[] | null }>;

/**
 * Structural report over the latest snapshot's counts. Available in every
 * seal state: it never reads comment text.
 */
export function talkToCode(ws: Workspace, opts: { trend?: boolean } = {}): Promise<TalkToCodeResult> {
  return runCommand(async () => {
    const metas = await ws.store.metas();
    const head = metas[metas.length - 1] ?? null;
    return {
      report: buildReport(head, ws.clock.now(), ws.config.structural),
      trend: opts.trend ? activityTrend(metas) : null,
    };
  });
}
