import type { CollectionReport } from "../collector/collector.js";
import type { Workspace } from "../core/workspace.js";
import { runCommand, type CommandResult } from "./exit-codes.js";

export type CollectResult = CommandResult<{ report: CollectionReport }>;

/** One collection pass. CollectionInProgress exits 4 so a cron wrapper can retry. */
export function collect(ws: Workspace): Promise<CollectResult> {
  return runCommand(async () => ({ report: await ws.collector.collect() }));
}
